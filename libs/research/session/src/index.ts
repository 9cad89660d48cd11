export * from './lib/session-manager.service';
export * from './lib/session-manager.module';

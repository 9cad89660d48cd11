export * from './lib/interfaces/memory-store.interface';
export * from './lib/memory-entry.schema';
export * from './lib/stores/json-file-memory.store';
export * from './lib/stores/in-memory-memory.store';
export * from './lib/memory-bank.service';
export * from './lib/memory-bank.module';

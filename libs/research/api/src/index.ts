export * from './lib/dto/research.dto';
export * from './lib/pipes/zod-validation.pipe';
export * from './lib/filters/research-exception.filter';
export * from './lib/research.controller';
export * from './lib/research-api.module';

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ResearchConfig, researchConfig } from '@equity-research/research/config';
import { MEMORY_BANK_STORE } from './interfaces/memory-store.interface';
import { JsonFileMemoryStore } from './stores/json-file-memory.store';
import { MemoryBankService } from './memory-bank.service';

@Module({
  imports: [ConfigModule.forFeature(researchConfig)],
  providers: [
    {
      provide: MEMORY_BANK_STORE,
      useFactory: (config: ResearchConfig) => new JsonFileMemoryStore(config.memoryBankPath),
      inject: [researchConfig.KEY],
    },
    MemoryBankService,
  ],
  exports: [MEMORY_BANK_STORE, MemoryBankService],
})
export class MemoryBankModule {}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { researchConfig } from '@equity-research/research/config';
import { AnalysisModule } from '@equity-research/research/analysis';
import { SessionManagerModule } from '@equity-research/research/session';
import { MemoryBankModule } from '@equity-research/research/memory';
import { ProvidersModule } from '@equity-research/research/providers';
import { ResearchStage } from './stages/research.stage';
import { AnalysisStage } from './stages/analysis.stage';
import { ReportStage } from './stages/report.stage';
import { ResearchPipelineService } from './research-pipeline.service';
import { BatchCoordinatorService } from './batch-coordinator.service';
import { ResearchService } from './research.service';
import { ActivityLogService } from './activity-log.service';

@Module({
  imports: [
    ConfigModule.forFeature(researchConfig),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),
    AnalysisModule,
    SessionManagerModule,
    MemoryBankModule,
    ProvidersModule,
  ],
  providers: [
    ResearchStage,
    AnalysisStage,
    ReportStage,
    ResearchPipelineService,
    BatchCoordinatorService,
    ResearchService,
    ActivityLogService,
  ],
  exports: [ResearchService, ActivityLogService],
})
export class ResearchPipelineModule {}

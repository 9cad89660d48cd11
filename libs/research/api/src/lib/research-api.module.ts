import { Module } from '@nestjs/common';
import { ResearchPipelineModule } from '@equity-research/research/pipeline';
import { ResearchController } from './research.controller';

@Module({
  imports: [ResearchPipelineModule],
  controllers: [ResearchController],
})
export class ResearchApiModule {}

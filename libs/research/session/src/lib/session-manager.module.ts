import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { researchConfig } from '@equity-research/research/config';
import { SessionManagerService } from './session-manager.service';

@Module({
  imports: [ConfigModule.forFeature(researchConfig)],
  providers: [SessionManagerService],
  exports: [SessionManagerService],
})
export class SessionManagerModule {}

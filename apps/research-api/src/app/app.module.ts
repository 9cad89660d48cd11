import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { researchConfig } from '@equity-research/research/config';
import { ResearchApiModule } from '@equity-research/research/api';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [researchConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    ResearchApiModule,
  ],
})
export class AppModule {}

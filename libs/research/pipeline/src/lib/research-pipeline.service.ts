/**
 * ResearchPipelineService
 * Runs research, analysis and report for one ticker inside a session.
 */

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  PipelineStage,
  Report,
  ResearchEventPayload,
  ResearchEventType,
  createResearchEventName,
} from '@equity-research/shared/types';
import { throwIfAborted, toResearchError } from '@equity-research/shared/utils';
import { SessionManagerService } from '@equity-research/research/session';
import { ResearchStage } from './stages/research.stage';
import { AnalysisStage } from './stages/analysis.stage';
import { ReportStage } from './stages/report.stage';

export interface PipelineRunResult {
  report: Report;
  persisted: boolean;
  persistenceError?: string;
}

@Injectable()
export class ResearchPipelineService {
  private readonly logger = new Logger(ResearchPipelineService.name);

  constructor(
    private readonly sessionManager: SessionManagerService,
    private readonly researchStage: ResearchStage,
    private readonly analysisStage: AnalysisStage,
    private readonly reportStage: ReportStage,
    private readonly eventEmitter: EventEmitter2
  ) {}

  /**
   * Session faults and ResearchFailed propagate; a persistence fault does not,
   * it is reported on the result with `persisted: false`.
   */
  async run(ticker: string, sessionId: string): Promise<PipelineRunResult> {
    const symbol = ticker.trim().toUpperCase();
    const startedAt = Date.now();

    this.sessionManager.touch(sessionId);
    const signal = this.sessionManager.getSignal(sessionId);

    this.logger.log(`[${sessionId}] Starting pipeline for ${symbol}`);

    try {
      let stageStart = Date.now();
      const record = await this.researchStage.run(symbol, { sessionId, signal });
      this.stageCompleted(sessionId, symbol, PipelineStage.RESEARCH, stageStart);

      throwIfAborted(signal);
      stageStart = Date.now();
      const analysis = this.analysisStage.run(record);
      this.stageCompleted(sessionId, symbol, PipelineStage.ANALYSIS, stageStart);

      throwIfAborted(signal);
      stageStart = Date.now();
      const { report, persistenceError } = await this.reportStage.run(sessionId, record, analysis);
      this.stageCompleted(sessionId, symbol, PipelineStage.REPORT, stageStart);

      const durationMs = Date.now() - startedAt;
      const persisted = persistenceError === undefined;

      this.logger.log(
        `[${sessionId}] ${symbol} complete in ${durationMs}ms: ${report.recommendation.action} (valuation ${report.financial_analysis.valuation_score})`
      );
      this.emit({
        type: ResearchEventType.PIPELINE_COMPLETED,
        sessionId,
        timestamp: new Date().toISOString(),
        ticker: symbol,
        action: report.recommendation.action,
        valuationScore: report.financial_analysis.valuation_score,
        persisted,
        durationMs,
      });

      return persistenceError
        ? { report, persisted: false, persistenceError: persistenceError.message }
        : { report, persisted: true };
    } catch (error) {
      const failure = toResearchError(error);

      this.logger.error(`[${sessionId}] ${symbol} failed (${failure.kind}): ${failure.message}`);
      this.emit({
        type: ResearchEventType.PIPELINE_FAILED,
        sessionId,
        timestamp: new Date().toISOString(),
        ticker: symbol,
        kind: failure.kind,
        reason: failure.message,
      });

      throw failure;
    }
  }

  private stageCompleted(sessionId: string, ticker: string, stage: PipelineStage, startedAt: number): void {
    this.emit({
      type: ResearchEventType.STAGE_COMPLETED,
      sessionId,
      timestamp: new Date().toISOString(),
      ticker,
      stage,
      durationMs: Date.now() - startedAt,
    });
  }

  private emit(event: ResearchEventPayload): void {
    this.eventEmitter.emit(createResearchEventName(event.sessionId), event);
  }
}

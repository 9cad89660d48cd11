/**
 * BatchCoordinatorService
 * Fans tickers out over a fixed worker pool under one session. Ticker
 * failures are recorded as outcomes and never abort the batch.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  BatchCompletedEvent,
  BatchSummary,
  ResearchEventType,
  TickerOutcome,
  createResearchEventName,
} from '@equity-research/shared/types';
import { toResearchError } from '@equity-research/shared/utils';
import { ResearchConfig, researchConfig } from '@equity-research/research/config';
import { ResearchPipelineService } from './research-pipeline.service';
import { summarizeBatch } from './batch-summary';

export interface BatchRunResult {
  outcomes: TickerOutcome[];
  summary: BatchSummary;
}

@Injectable()
export class BatchCoordinatorService {
  private readonly logger = new Logger(BatchCoordinatorService.name);

  constructor(
    @Inject(researchConfig.KEY)
    private readonly config: ResearchConfig,
    private readonly pipeline: ResearchPipelineService,
    private readonly eventEmitter: EventEmitter2
  ) {}

  async run(tickers: readonly string[], sessionId: string): Promise<BatchRunResult> {
    const outcomes = new Array<TickerOutcome>(tickers.length);
    const workerCount = Math.min(this.config.batchSizeLimit, tickers.length);
    let next = 0;

    this.logger.log(`[${sessionId}] Batch of ${tickers.length} tickers with ${workerCount} workers`);

    const worker = async () => {
      while (next < tickers.length) {
        const index = next++;
        outcomes[index] = await this.runOne(tickers[index], sessionId);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const summary = summarizeBatch(outcomes);
    this.logger.log(`[${sessionId}] ${summary.narrative}`);

    const event: BatchCompletedEvent = {
      type: ResearchEventType.BATCH_COMPLETED,
      sessionId,
      timestamp: new Date().toISOString(),
      total: summary.total,
      successful: summary.successful,
      failed: summary.failed,
      topPick: summary.topPick,
    };
    this.eventEmitter.emit(createResearchEventName(sessionId), event);

    return { outcomes, summary };
  }

  private async runOne(ticker: string, sessionId: string): Promise<TickerOutcome> {
    const symbol = ticker.trim().toUpperCase();

    try {
      const { report, persisted } = await this.pipeline.run(symbol, sessionId);
      return { ticker: symbol, status: 'success', report, persisted };
    } catch (error) {
      const failure = toResearchError(error);
      return { ticker: symbol, status: 'failure', kind: failure.kind, reason: failure.message };
    }
  }
}

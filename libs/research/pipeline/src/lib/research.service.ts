/**
 * ResearchService
 * Entry point for callers: single and batch research, session lifecycle and
 * memory bank history. Calls without a session id run in a session opened
 * for that call and closed afterwards.
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  BatchResearchResult,
  MemoryEntry,
  Report,
  SessionSnapshot,
  SingleResearchResult,
} from '@equity-research/shared/types';
import { SessionManagerService } from '@equity-research/research/session';
import { DEFAULT_HISTORY_LIMIT, MemoryBankService } from '@equity-research/research/memory';
import { ResearchPipelineService } from './research-pipeline.service';
import { BatchCoordinatorService } from './batch-coordinator.service';

@Injectable()
export class ResearchService {
  private readonly logger = new Logger(ResearchService.name);

  constructor(
    private readonly sessionManager: SessionManagerService,
    private readonly pipeline: ResearchPipelineService,
    private readonly batchCoordinator: BatchCoordinatorService,
    private readonly memoryBank: MemoryBankService
  ) {}

  async researchSingle(ticker: string, sessionId?: string): Promise<SingleResearchResult> {
    return this.withSession(sessionId, async (id) => {
      const { report, persisted } = await this.pipeline.run(ticker, id);
      return { sessionId: id, report, persisted };
    });
  }

  async researchBatch(tickers: readonly string[], sessionId?: string): Promise<BatchResearchResult> {
    return this.withSession(sessionId, async (id) => {
      const { outcomes, summary } = await this.batchCoordinator.run(tickers, id);
      const reports: Report[] = [];
      for (const outcome of outcomes) {
        if (outcome.status === 'success') {
          reports.push(outcome.report);
        }
      }
      return { sessionId: id, reports, outcomes, summary };
    });
  }

  openSession(): SessionSnapshot {
    return this.sessionManager.createSession();
  }

  getSession(sessionId: string): SessionSnapshot {
    return this.sessionManager.get(sessionId);
  }

  closeSession(sessionId: string): boolean {
    return this.sessionManager.close(sessionId);
  }

  getTickerHistory(ticker: string, limit = DEFAULT_HISTORY_LIMIT): MemoryEntry[] {
    return this.memoryBank.query(ticker, limit);
  }

  getSessionHistory(sessionId: string): MemoryEntry[] {
    return this.memoryBank.querySession(sessionId);
  }

  private async withSession<T>(sessionId: string | undefined, run: (sessionId: string) => Promise<T>): Promise<T> {
    if (sessionId !== undefined) {
      // Surfaces SessionExpired for evicted ids before any work starts
      this.sessionManager.get(sessionId);
      return run(sessionId);
    }

    const { sessionId: ephemeralId } = this.sessionManager.createSession();
    this.logger.debug(`[${ephemeralId}] Opened session for a single call`);

    try {
      return await run(ephemeralId);
    } finally {
      this.sessionManager.close(ephemeralId);
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { AnalysisResult, Report, ResearchRecord } from '@equity-research/shared/types';
import { PersistenceFailedError, errorMessage } from '@equity-research/shared/utils';
import { MemoryBankService } from '@equity-research/research/memory';
import { buildReport } from './report.builder';

export interface ReportStageResult {
  report: Report;
  persistenceError?: PersistenceFailedError;
}

/**
 * Serializes an analysis into a Report and appends it to the memory bank.
 * The report is returned even when the write fails.
 */
@Injectable()
export class ReportStage {
  private readonly logger = new Logger(ReportStage.name);

  constructor(private readonly memoryBank: MemoryBankService) {}

  async run(sessionId: string, record: ResearchRecord, analysis: AnalysisResult): Promise<ReportStageResult> {
    const previous = this.memoryBank.latest(analysis.ticker);
    const report = buildReport({ sessionId, record, analysis, previous });

    try {
      await this.memoryBank.record({
        sessionId,
        ticker: report.ticker,
        report,
        storedAt: report.report_date,
      });
    } catch (error) {
      const persistenceError =
        error instanceof PersistenceFailedError
          ? error
          : new PersistenceFailedError(`Failed to persist report for ${report.ticker}: ${errorMessage(error)}`, {
              cause: error,
            });
      this.logger.warn(`[${sessionId}] ${report.ticker}: report returned without persistence`);
      return { report, persistenceError };
    }

    return { report };
  }
}

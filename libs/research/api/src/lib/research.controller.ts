import { Body, Controller, Delete, Get, HttpCode, Logger, Param, Post, Query, UseFilters } from '@nestjs/common';
import {
  BatchResearchResult,
  MemoryEntry,
  ResearchEventPayload,
  SessionSnapshot,
  SingleResearchResult,
} from '@equity-research/shared/types';
import { ActivityLogService, ActivityMetrics, ResearchService } from '@equity-research/research/pipeline';
import {
  ActivityQuery,
  BatchResearchRequest,
  HistoryQuery,
  ResearchRequest,
  activityQuerySchema,
  batchResearchRequestSchema,
  historyQuerySchema,
  researchRequestSchema,
} from './dto/research.dto';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';
import { ResearchExceptionFilter } from './filters/research-exception.filter';

/**
 * Research Controller
 *
 * Runs single and batch research, manages sessions and serves memory bank
 * history. Research calls without a sessionId run in a session opened for
 * that request.
 *
 * Example request:
 * POST /api/research
 * Body: { "ticker": "ACME", "sessionId": "optional-session-id" }
 */
@Controller('api')
@UseFilters(ResearchExceptionFilter)
export class ResearchController {
  private readonly logger = new Logger(ResearchController.name);

  constructor(
    private readonly researchService: ResearchService,
    private readonly activityLog: ActivityLogService
  ) {}

  @Post('research')
  @HttpCode(200)
  research(@Body(new ZodValidationPipe(researchRequestSchema)) body: ResearchRequest): Promise<SingleResearchResult> {
    this.logger.log(`Research requested for ${body.ticker}${body.sessionId ? ` in ${body.sessionId}` : ''}`);
    return this.researchService.researchSingle(body.ticker, body.sessionId);
  }

  @Post('research/batch')
  @HttpCode(200)
  researchBatch(
    @Body(new ZodValidationPipe(batchResearchRequestSchema)) body: BatchResearchRequest
  ): Promise<BatchResearchResult> {
    this.logger.log(`Batch research requested for ${body.tickers.join(', ')}`);
    return this.researchService.researchBatch(body.tickers, body.sessionId);
  }

  @Post('sessions')
  openSession(): SessionSnapshot {
    return this.researchService.openSession();
  }

  @Get('sessions/:id')
  getSession(@Param('id') sessionId: string): SessionSnapshot {
    return this.researchService.getSession(sessionId);
  }

  @Delete('sessions/:id')
  closeSession(@Param('id') sessionId: string): { sessionId: string; closed: boolean } {
    return { sessionId, closed: this.researchService.closeSession(sessionId) };
  }

  @Get('sessions/:id/history')
  getSessionHistory(@Param('id') sessionId: string): { sessionId: string; entries: MemoryEntry[] } {
    return { sessionId, entries: this.researchService.getSessionHistory(sessionId) };
  }

  @Get('history/:ticker')
  getTickerHistory(
    @Param('ticker') ticker: string,
    @Query(new ZodValidationPipe(historyQuerySchema)) query: HistoryQuery
  ): { ticker: string; entries: MemoryEntry[] } {
    const symbol = ticker.toUpperCase();
    return { ticker: symbol, entries: this.researchService.getTickerHistory(symbol, query.limit) };
  }

  @Get('activity')
  getActivity(
    @Query(new ZodValidationPipe(activityQuerySchema)) query: ActivityQuery
  ): { events: ResearchEventPayload[] } {
    return { events: this.activityLog.getActivity(query.sessionId, query.limit) };
  }

  @Get('activity/metrics')
  getMetrics(): ActivityMetrics {
    return this.activityLog.getMetrics();
  }
}

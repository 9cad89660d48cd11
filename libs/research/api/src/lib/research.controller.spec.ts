/**
 * ResearchController Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { ResearchEventType, SessionStatus } from '@equity-research/shared/types';
import { createTestMemoryEntry, createTestReport } from '@equity-research/research/memory/testing';
import { ActivityLogService, ResearchService } from '@equity-research/research/pipeline';
import { ResearchController } from './research.controller';

describe('ResearchController', () => {
  let controller: ResearchController;
  let researchService: jest.Mocked<
    Pick<
      ResearchService,
      | 'researchSingle'
      | 'researchBatch'
      | 'openSession'
      | 'getSession'
      | 'closeSession'
      | 'getTickerHistory'
      | 'getSessionHistory'
    >
  >;
  let activityLog: ActivityLogService;

  const snapshot = {
    sessionId: 'session-1',
    status: SessionStatus.ACTIVE,
    createdAt: '2025-03-01T10:00:00.000Z',
    lastActivity: '2025-03-01T10:00:00.000Z',
    expiresAt: '2025-03-01T11:00:00.000Z',
    expiryMs: 3600000,
  };

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'verbose').mockImplementation(() => undefined);

    researchService = {
      researchSingle: jest.fn(),
      researchBatch: jest.fn(),
      openSession: jest.fn(),
      getSession: jest.fn(),
      closeSession: jest.fn(),
      getTickerHistory: jest.fn(),
      getSessionHistory: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ResearchController],
      providers: [{ provide: ResearchService, useValue: researchService }, ActivityLogService],
    }).compile();

    controller = module.get<ResearchController>(ResearchController);
    activityLog = module.get<ActivityLogService>(ActivityLogService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run single research with the optional session', async () => {
    const result = { sessionId: 'session-1', report: createTestReport(), persisted: true };
    researchService.researchSingle.mockResolvedValue(result);

    await expect(controller.research({ ticker: 'ACME', sessionId: 'session-1' })).resolves.toBe(result);
    expect(researchService.researchSingle).toHaveBeenCalledWith('ACME', 'session-1');
  });

  it('should run batch research', async () => {
    researchService.researchBatch.mockResolvedValue({
      sessionId: 'session-2',
      reports: [],
      outcomes: [],
      summary: {
        total: 0,
        successful: 0,
        failed: 0,
        entries: [],
        failures: [],
        recommendationCounts: { Buy: 0, Hold: 0, Sell: 0 },
        topPick: null,
        note: 'No stock completed analysis.',
        narrative: 'Analyzed 0 stocks: 0 succeeded, 0 failed. No stock completed analysis.',
      },
    });

    const result = await controller.researchBatch({ tickers: ['ACME', 'GLOBEX'], sessionId: undefined });

    expect(researchService.researchBatch).toHaveBeenCalledWith(['ACME', 'GLOBEX'], undefined);
    expect(result.sessionId).toBe('session-2');
  });

  it('should manage sessions', () => {
    researchService.openSession.mockReturnValue(snapshot);
    researchService.getSession.mockReturnValue(snapshot);
    researchService.closeSession.mockReturnValue(true);

    expect(controller.openSession()).toBe(snapshot);
    expect(controller.getSession('session-1')).toBe(snapshot);
    expect(controller.closeSession('session-1')).toEqual({ sessionId: 'session-1', closed: true });
  });

  it('should serve ticker history with an uppercased ticker', () => {
    const entries = [createTestMemoryEntry('ACME', 'session-1', '2025-03-01T10:00:00.000Z')];
    researchService.getTickerHistory.mockReturnValue(entries);

    expect(controller.getTickerHistory('acme', { limit: 3 })).toEqual({ ticker: 'ACME', entries });
    expect(researchService.getTickerHistory).toHaveBeenCalledWith('ACME', 3);
  });

  it('should serve session history', () => {
    researchService.getSessionHistory.mockReturnValue([]);

    expect(controller.getSessionHistory('session-1')).toEqual({ sessionId: 'session-1', entries: [] });
  });

  it('should expose the activity log and metrics', () => {
    activityLog.handle({ type: ResearchEventType.SESSION_OPENED, sessionId: 'session-1', timestamp: snapshot.createdAt });
    activityLog.handle({ type: ResearchEventType.SESSION_OPENED, sessionId: 'session-2', timestamp: snapshot.createdAt });

    expect(controller.getActivity({ sessionId: 'session-2' }).events).toEqual([
      { type: ResearchEventType.SESSION_OPENED, sessionId: 'session-2', timestamp: snapshot.createdAt },
    ]);
    expect(controller.getMetrics().sessionsOpened).toBe(2);
  });
});

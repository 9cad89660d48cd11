/**
 * ActivityLogService
 * Keeps a bounded log of research events and aggregate counters for the
 * activity endpoints.
 */

import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  FailureKind,
  PipelineStage,
  RESEARCH_EVENT_PREFIX,
  ResearchEventPayload,
  ResearchEventType,
  isPipelineFailedEvent,
  isStageCompletedEvent,
} from '@equity-research/shared/types';

export const MAX_ACTIVITY_ENTRIES = 500;

export interface ActivityMetrics {
  sessionsOpened: number;
  sessionsClosed: number;
  sessionsExpired: number;
  pipelinesCompleted: number;
  pipelinesFailed: number;
  batchesCompleted: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
  averageStageDurationMs: Partial<Record<PipelineStage, number>>;
}

interface StageTiming {
  count: number;
  totalMs: number;
}

@Injectable()
export class ActivityLogService {
  private readonly logger = new Logger(ActivityLogService.name);
  private readonly entries: ResearchEventPayload[] = [];
  private readonly counters = new Map<ResearchEventType, number>();
  private readonly failuresByKind: Partial<Record<FailureKind, number>> = {};
  private readonly stageTimings = new Map<PipelineStage, StageTiming>();

  @OnEvent(`${RESEARCH_EVENT_PREFIX}.*`)
  handle(event: ResearchEventPayload): void {
    this.entries.push(event);
    if (this.entries.length > MAX_ACTIVITY_ENTRIES) {
      this.entries.shift();
    }

    this.counters.set(event.type, (this.counters.get(event.type) ?? 0) + 1);

    if (isPipelineFailedEvent(event)) {
      this.failuresByKind[event.kind] = (this.failuresByKind[event.kind] ?? 0) + 1;
    }

    if (isStageCompletedEvent(event)) {
      const timing = this.stageTimings.get(event.stage) ?? { count: 0, totalMs: 0 };
      timing.count++;
      timing.totalMs += event.durationMs;
      this.stageTimings.set(event.stage, timing);
    }

    this.logger.verbose(`[${event.sessionId}] ${event.type}`);
  }

  /**
   * Most recent entries last, optionally restricted to one session
   */
  getActivity(sessionId?: string, limit = 100): ResearchEventPayload[] {
    const filtered = sessionId ? this.entries.filter((e) => e.sessionId === sessionId) : this.entries;
    return filtered.slice(-limit);
  }

  getMetrics(): ActivityMetrics {
    const averageStageDurationMs: Partial<Record<PipelineStage, number>> = {};
    for (const [stage, timing] of this.stageTimings) {
      averageStageDurationMs[stage] = Math.round(timing.totalMs / timing.count);
    }

    return {
      sessionsOpened: this.count(ResearchEventType.SESSION_OPENED),
      sessionsClosed: this.count(ResearchEventType.SESSION_CLOSED),
      sessionsExpired: this.count(ResearchEventType.SESSION_EXPIRED),
      pipelinesCompleted: this.count(ResearchEventType.PIPELINE_COMPLETED),
      pipelinesFailed: this.count(ResearchEventType.PIPELINE_FAILED),
      batchesCompleted: this.count(ResearchEventType.BATCH_COMPLETED),
      failuresByKind: { ...this.failuresByKind },
      averageStageDurationMs,
    };
  }

  private count(type: ResearchEventType): number {
    return this.counters.get(type) ?? 0;
  }
}

/**
 * Research Event Payload Types
 * Emitted on the `research.<sessionId>` channel by the session manager and pipeline
 */

import {
  FailureKind,
  PipelineStage,
  RecommendationAction,
  ResearchEventType,
} from './enums';

// ============================================================================
// Base Event Properties
// ============================================================================

interface BaseEvent {
  sessionId: string;
  timestamp: string;
}

// ============================================================================
// Session Events
// ============================================================================

export interface SessionOpenedEvent extends BaseEvent {
  type: ResearchEventType.SESSION_OPENED;
}

export interface SessionClosedEvent extends BaseEvent {
  type: ResearchEventType.SESSION_CLOSED;
}

export interface SessionExpiredEvent extends BaseEvent {
  type: ResearchEventType.SESSION_EXPIRED;
  idleMs: number;
}

// ============================================================================
// Pipeline Events
// ============================================================================

export interface StageCompletedEvent extends BaseEvent {
  type: ResearchEventType.STAGE_COMPLETED;
  ticker: string;
  stage: PipelineStage;
  durationMs: number;
}

export interface PipelineCompletedEvent extends BaseEvent {
  type: ResearchEventType.PIPELINE_COMPLETED;
  ticker: string;
  action: RecommendationAction;
  valuationScore: number;
  persisted: boolean;
  durationMs: number;
}

export interface PipelineFailedEvent extends BaseEvent {
  type: ResearchEventType.PIPELINE_FAILED;
  ticker: string;
  kind: FailureKind;
  reason: string;
}

export interface BatchCompletedEvent extends BaseEvent {
  type: ResearchEventType.BATCH_COMPLETED;
  total: number;
  successful: number;
  failed: number;
  topPick: string | null;
}

// ============================================================================
// Union Type for All Research Event Payloads
// ============================================================================

export type ResearchEventPayload =
  | SessionOpenedEvent
  | SessionClosedEvent
  | SessionExpiredEvent
  | StageCompletedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent
  | BatchCompletedEvent;

// ============================================================================
// Type Guards
// ============================================================================

export function isStageCompletedEvent(event: ResearchEventPayload): event is StageCompletedEvent {
  return event.type === ResearchEventType.STAGE_COMPLETED;
}

export function isPipelineCompletedEvent(event: ResearchEventPayload): event is PipelineCompletedEvent {
  return event.type === ResearchEventType.PIPELINE_COMPLETED;
}

export function isPipelineFailedEvent(event: ResearchEventPayload): event is PipelineFailedEvent {
  return event.type === ResearchEventType.PIPELINE_FAILED;
}

export function isBatchCompletedEvent(event: ResearchEventPayload): event is BatchCompletedEvent {
  return event.type === ResearchEventType.BATCH_COMPLETED;
}

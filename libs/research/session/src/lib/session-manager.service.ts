/**
 * SessionManagerService
 * Owns the session table: creation under a capacity bound, idle expiry,
 * and per-session cancellation signals for in-flight pipeline runs.
 */

import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import {
  ResearchEventPayload,
  ResearchEventType,
  SessionSnapshot,
  SessionStatus,
  createResearchEventName,
} from '@equity-research/shared/types';
import {
  CancelledError,
  CapacityExceededError,
  SessionExpiredError,
  SessionNotFoundError,
} from '@equity-research/shared/utils';
import { ResearchConfig, researchConfig } from '@equity-research/research/config';

interface SessionEntry {
  sessionId: string;
  createdAt: number;
  lastActivity: number;
  controller: AbortController;
}

// Remembered ids of evicted sessions, so late lookups report SessionExpired
const MAX_EXPIRED_IDS = 1000;

@Injectable()
export class SessionManagerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionManagerService.name);
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly expiredIds = new Set<string>();
  private readonly expiryMs: number;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    @Inject(researchConfig.KEY)
    private readonly config: ResearchConfig,
    private readonly eventEmitter: EventEmitter2
  ) {
    this.expiryMs = config.sessionTimeoutSeconds * 1000;
  }

  onModuleInit() {
    if (this.config.sessionSweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweepExpired();
      }, this.config.sessionSweepIntervalMs);

      this.logger.log(
        `Session manager initialized (expiry ${this.config.sessionTimeoutSeconds}s, sweep every ${this.config.sessionSweepIntervalMs}ms)`
      );
    }
  }

  onModuleDestroy() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }

    for (const sessionId of [...this.sessions.keys()]) {
      this.close(sessionId);
    }
  }

  /**
   * Create a new session, failing with CapacityExceeded at the configured maximum
   */
  createSession(): SessionSnapshot {
    this.sweepExpired();

    if (this.sessions.size >= this.config.maxConcurrentSessions) {
      this.logger.warn(`Rejected new session: ${this.sessions.size} active sessions`);
      throw new CapacityExceededError(this.config.maxConcurrentSessions);
    }

    const now = Date.now();
    const entry: SessionEntry = {
      sessionId: randomUUID(),
      createdAt: now,
      lastActivity: now,
      controller: new AbortController(),
    };
    this.sessions.set(entry.sessionId, entry);

    this.logger.log(`[${entry.sessionId}] Session opened (${this.sessions.size} active)`);
    this.emit({
      type: ResearchEventType.SESSION_OPENED,
      sessionId: entry.sessionId,
      timestamp: new Date(now).toISOString(),
    });

    return this.toSnapshot(entry);
  }

  /**
   * Refresh last activity; SessionNotFound when absent or already expired
   */
  touch(sessionId: string): void {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }

    const now = Date.now();
    if (this.isExpired(entry, now)) {
      this.evict(entry, now);
      throw new SessionNotFoundError(sessionId);
    }

    entry.lastActivity = now;
  }

  /**
   * Look up a live session and mark it active
   */
  get(sessionId: string): SessionSnapshot {
    this.sweepExpired();

    const entry = this.requireLive(sessionId);
    entry.lastActivity = Date.now();
    return this.toSnapshot(entry);
  }

  /**
   * Cancellation signal that fires when the session is closed or expires
   */
  getSignal(sessionId: string): AbortSignal {
    const entry = this.requireLive(sessionId);
    if (this.isExpired(entry, Date.now())) {
      this.evict(entry, Date.now());
      throw new SessionExpiredError(sessionId);
    }
    return entry.controller.signal;
  }

  /**
   * Remove a session and abort its in-flight work. Unknown ids are a no-op.
   */
  close(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return false;
    }

    this.sessions.delete(sessionId);
    entry.controller.abort(new CancelledError(`Session ${sessionId} was closed`));

    this.logger.log(`[${sessionId}] Session closed`);
    this.emit({
      type: ResearchEventType.SESSION_CLOSED,
      sessionId,
      timestamp: new Date().toISOString(),
    });
    return true;
  }

  getActiveCount(): number {
    this.sweepExpired();
    return this.sessions.size;
  }

  /**
   * Evict every session idle for at least the expiry duration
   */
  sweepExpired(): number {
    const now = Date.now();
    let evicted = 0;

    for (const entry of [...this.sessions.values()]) {
      if (this.isExpired(entry, now)) {
        this.evict(entry, now);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.log(`Evicted ${evicted} expired sessions`);
    }
    return evicted;
  }

  private requireLive(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (entry) {
      return entry;
    }
    if (this.expiredIds.has(sessionId)) {
      throw new SessionExpiredError(sessionId);
    }
    throw new SessionNotFoundError(sessionId);
  }

  private isExpired(entry: SessionEntry, now: number): boolean {
    return now - entry.lastActivity >= this.expiryMs;
  }

  private evict(entry: SessionEntry, now: number): void {
    this.sessions.delete(entry.sessionId);
    this.rememberExpired(entry.sessionId);
    entry.controller.abort(new SessionExpiredError(entry.sessionId));

    this.emit({
      type: ResearchEventType.SESSION_EXPIRED,
      sessionId: entry.sessionId,
      timestamp: new Date(now).toISOString(),
      idleMs: now - entry.lastActivity,
    });
  }

  private rememberExpired(sessionId: string): void {
    this.expiredIds.add(sessionId);

    if (this.expiredIds.size > MAX_EXPIRED_IDS) {
      const oldest = this.expiredIds.values().next();
      if (!oldest.done) {
        this.expiredIds.delete(oldest.value);
      }
    }
  }

  private toSnapshot(entry: SessionEntry): SessionSnapshot {
    return {
      sessionId: entry.sessionId,
      status: SessionStatus.ACTIVE,
      createdAt: new Date(entry.createdAt).toISOString(),
      lastActivity: new Date(entry.lastActivity).toISOString(),
      expiresAt: new Date(entry.lastActivity + this.expiryMs).toISOString(),
      expiryMs: this.expiryMs,
    };
  }

  private emit(event: ResearchEventPayload): void {
    this.eventEmitter.emit(createResearchEventName(event.sessionId), event);
  }
}

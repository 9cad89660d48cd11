/**
 * MemoryBankService
 * Append-only log of completed reports, queryable by ticker and by session.
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { MemoryEntry } from '@equity-research/shared/types';
import { PersistenceFailedError, errorMessage } from '@equity-research/shared/utils';
import { IMemoryStore, MEMORY_BANK_STORE } from './interfaces/memory-store.interface';

export const DEFAULT_HISTORY_LIMIT = 5;

@Injectable()
export class MemoryBankService implements OnModuleInit {
  private readonly logger = new Logger(MemoryBankService.name);
  private entries: MemoryEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    @Inject(MEMORY_BANK_STORE)
    private readonly store: IMemoryStore
  ) {}

  async onModuleInit() {
    this.entries = await this.store.load();
    this.logger.log(`Memory bank ready with ${this.entries.length} entries`);
  }

  /**
   * Append an entry and durably save the log. Writers are serialized; a store
   * failure surfaces as PersistenceFailed while the entry stays in memory.
   */
  async record(entry: MemoryEntry): Promise<void> {
    this.entries.push({ ...entry, ticker: entry.ticker.toUpperCase() });

    const write = this.writeChain.then(() => this.store.save(this.entries));
    // Later writers wait on the chain, not on this write's outcome
    this.writeChain = write.catch(() => undefined);

    try {
      await write;
    } catch (error) {
      this.logger.error(`[${entry.sessionId}] Failed to persist ${entry.ticker}: ${errorMessage(error)}`);
      throw new PersistenceFailedError(`Failed to persist memory entry for ${entry.ticker}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Up to `limit` most recent entries for a ticker, newest first
   */
  query(ticker: string, limit = DEFAULT_HISTORY_LIMIT): MemoryEntry[] {
    const normalized = ticker.toUpperCase();
    const results: MemoryEntry[] = [];

    for (let i = this.entries.length - 1; i >= 0 && results.length < limit; i--) {
      if (this.entries[i].ticker === normalized) {
        results.push(this.entries[i]);
      }
    }

    return results;
  }

  /**
   * All entries written under a session, in write order
   */
  querySession(sessionId: string): MemoryEntry[] {
    return this.entries.filter((entry) => entry.sessionId === sessionId);
  }

  latest(ticker: string): MemoryEntry | null {
    return this.query(ticker, 1)[0] ?? null;
  }

  get size(): number {
    return this.entries.length;
  }
}

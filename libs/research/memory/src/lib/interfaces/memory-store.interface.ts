import { MemoryEntry } from '@equity-research/shared/types';

/**
 * Injection token for IMemoryStore
 * Use this token when injecting the store via @Inject()
 */
export const MEMORY_BANK_STORE = 'MEMORY_BANK_STORE';

/**
 * Whole-log persistence for the memory bank: the log is loaded once and
 * rewritten in full on every append.
 */
export interface IMemoryStore {
  load(): Promise<MemoryEntry[]>;
  save(entries: readonly MemoryEntry[]): Promise<void>;
}

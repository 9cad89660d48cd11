import { MemoryEntry } from '@equity-research/shared/types';
import { IMemoryStore } from '../interfaces/memory-store.interface';

/**
 * Process-local store for tests and ephemeral runs
 */
export class InMemoryMemoryStore implements IMemoryStore {
  private entries: MemoryEntry[] = [];

  constructor(initial: readonly MemoryEntry[] = []) {
    this.entries = [...initial];
  }

  async load(): Promise<MemoryEntry[]> {
    return [...this.entries];
  }

  async save(entries: readonly MemoryEntry[]): Promise<void> {
    this.entries = [...entries];
  }
}

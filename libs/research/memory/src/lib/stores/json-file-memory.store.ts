import { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { MemoryEntry } from '@equity-research/shared/types';
import { PersistenceFailedError, errorMessage } from '@equity-research/shared/utils';
import { IMemoryStore } from '../interfaces/memory-store.interface';
import { memoryLogSchema } from '../memory-entry.schema';

// fs errors may come from another realm's Error class, so match on shape
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps the memory log as one JSON array on disk. Saves go through a
 * temporary file and a rename so a crash never leaves a half-written log.
 */
export class JsonFileMemoryStore implements IMemoryStore {
  private readonly logger = new Logger(JsonFileMemoryStore.name);
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  async load(): Promise<MemoryEntry[]> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.log(`No memory bank at ${this.filePath}, starting empty`);
        return [];
      }
      throw new PersistenceFailedError(`Failed to read memory bank: ${errorMessage(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (error) {
      throw new PersistenceFailedError(`Memory bank at ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = memoryLogSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceFailedError(`Memory bank at ${this.filePath} is malformed: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    this.logger.log(`Loaded ${parsed.data.length} memory entries from ${this.filePath}`);
    return parsed.data;
  }

  async save(entries: readonly MemoryEntry[]): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(entries, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

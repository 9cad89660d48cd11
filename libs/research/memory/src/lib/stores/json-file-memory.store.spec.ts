import { Logger } from '@nestjs/common';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runInNewContext } from 'vm';
import { PersistenceFailedError } from '@equity-research/shared/utils';
import { JsonFileMemoryStore, isMissingFile } from './json-file-memory.store';
import { createTestMemoryEntry } from '../../test-utils/report.fixture';

describe('JsonFileMemoryStore', () => {
  let dir: string;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), 'memory-bank-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should start empty when the file does not exist', async () => {
    const store = new JsonFileMemoryStore(join(dir, 'memory_bank.json'));

    await expect(store.load()).resolves.toEqual([]);
  });

  it('should report any other read fault as PersistenceFailed', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, '', 'utf-8');

    await expect(new JsonFileMemoryStore(join(blocker, 'memory_bank.json')).load()).rejects.toThrow(
      /^Failed to read memory bank: ENOTDIR/
    );
  });

  describe('isMissingFile', () => {
    it('should recognise ENOENT raised from another realm', () => {
      const foreign: unknown = runInNewContext("Object.assign(new Error('missing'), { code: 'ENOENT' })");

      expect(foreign instanceof Error).toBe(false);
      expect(isMissingFile(foreign)).toBe(true);
    });

    it('should ignore other codes and non-objects', () => {
      expect(isMissingFile({ code: 'EACCES' })).toBe(false);
      expect(isMissingFile('ENOENT')).toBe(false);
      expect(isMissingFile(null)).toBe(false);
    });
  });

  it('should write the whole log and read it back', async () => {
    const filePath = join(dir, 'nested', 'memory_bank.json');
    const store = new JsonFileMemoryStore(filePath);
    const entries = [
      createTestMemoryEntry('ACME', 's1', '2025-03-01T10:00:00.000Z'),
      createTestMemoryEntry('GLOBEX', 's1', '2025-03-01T10:01:00.000Z'),
    ];

    await store.save(entries);

    const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(Array.isArray(raw) && raw.length).toBe(2);
    await expect(store.load()).resolves.toEqual(entries);
  });

  it('should reject a file that is not valid JSON', async () => {
    const filePath = join(dir, 'memory_bank.json');
    await writeFile(filePath, '{not json', 'utf-8');

    await expect(new JsonFileMemoryStore(filePath).load()).rejects.toBeInstanceOf(PersistenceFailedError);
  });

  it('should reject entries that do not match the report shape', async () => {
    const filePath = join(dir, 'memory_bank.json');
    await writeFile(filePath, JSON.stringify([{ sessionId: 's1', ticker: 'ACME' }]), 'utf-8');

    await expect(new JsonFileMemoryStore(filePath).load()).rejects.toThrow(/is malformed/);
  });
});

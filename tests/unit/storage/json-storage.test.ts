import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createJSONStorage } from '../../../src/storage/json-storage.js';
import { PersistenceError } from '../../../src/core/errors.js';
import { createMockLogger, loggedMessages } from '../../helpers/factories.js';

describe('JSONStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'engine-storage-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    const storage = createJSONStorage(dir);

    expect(await storage.load('absent')).toBeNull();
    expect(await storage.exists('absent')).toBe(false);
    expect(await storage.delete('absent')).toBe(false);
  });

  it('saves, loads and deletes a document', async () => {
    const storage = createJSONStorage(join(dir, 'nested'));

    await storage.save('state', { count: 2, names: ['a'] });

    expect(await storage.load('state')).toEqual({ count: 2, names: ['a'] });
    expect(await storage.exists('state')).toBe(true);
    expect(await storage.delete('state')).toBe(true);
    expect(await storage.load('state')).toBeNull();
  });

  it('keeps the previous version as a backup', async () => {
    const storage = createJSONStorage(dir);

    await storage.save('state', { v: 1 });
    await storage.save('state', { v: 2 });

    expect(JSON.parse(await readFile(join(dir, 'state.backup.json'), 'utf-8'))).toEqual({ v: 1 });
  });

  it('falls back to the backup when the primary is corrupt', async () => {
    const logger = createMockLogger();
    const storage = createJSONStorage(dir, { logger });
    await storage.save('state', { v: 1 });
    await storage.save('state', { v: 2 });
    await writeFile(join(dir, 'state.json'), '{"v": ', 'utf-8');

    expect(await storage.load('state')).toEqual({ v: 1 });
    expect(loggedMessages(logger, 'warn')).toEqual(['Primary file unreadable, loaded backup']);
  });

  it('throws a persistence error without a usable backup', async () => {
    const storage = createJSONStorage(dir, { createBackup: false });
    await writeFile(join(dir, 'state.json'), 'not json', 'utf-8');

    await expect(storage.load('state')).rejects.toBeInstanceOf(PersistenceError);
  });
});

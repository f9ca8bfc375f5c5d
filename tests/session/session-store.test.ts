import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SessionStore } from '../../src/session/session-store.js';
import type { SessionState } from '../../src/session/types.js';
import { makeTempDir, removeDir } from '../helpers/workbook.js';

const STATE: SessionState = {
  version: 1,
  savedAt: '2026-01-01T00:00:00.000Z',
  cookieJar: '{"cookies":[]}',
  headers: { 'User-Agent': 'test-agent' },
};

describe('SessionStore', () => {
  let dir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new SessionStore(join(dir, 'session.json'));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns the saved state for chaining and reads it back', async () => {
    await expect(store.save(STATE)).resolves.toBe(STATE);
    await expect(store.load()).resolves.toEqual(STATE);
  });

  it('writes versioned JSON', async () => {
    await store.save(STATE);
    const raw: unknown = JSON.parse(await readFile(store.filePath, 'utf-8'));
    expect(raw).toMatchObject({ version: 1, cookieJar: '{"cookies":[]}' });
  });

  it('treats a missing file as no session', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('treats invalid JSON as no session', async () => {
    await writeFile(store.filePath, '\u0080\u0004binary-pickle');
    await expect(store.load()).resolves.toBeNull();
  });

  it('treats a file of another version or shape as no session', async () => {
    await writeFile(store.filePath, JSON.stringify({ ...STATE, version: 2 }));
    await expect(store.load()).resolves.toBeNull();

    await writeFile(store.filePath, JSON.stringify({ cookies: [] }));
    await expect(store.load()).resolves.toBeNull();
  });

  it('discards the stored state, and tolerates discarding twice', async () => {
    await store.save(STATE);
    await store.discard();
    await store.discard();

    await expect(store.load()).resolves.toBeNull();
  });
});

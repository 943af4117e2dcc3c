import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileSentMarkerStore, SENT_MARKER_FILE } from '../../services/sentMarkerStore';

describe('FileSentMarkerStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'courier-marker-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a missing marker as never sent', async () => {
    expect(await new FileSentMarkerStore(dir).read()).toBeNull();
  });

  it('writes a single dated line and reads it back', async () => {
    const store = new FileSentMarkerStore(dir);

    await store.write('2026-10-19');

    expect(await readFile(join(dir, SENT_MARKER_FILE), 'utf-8')).toBe('2026-10-19\n');
    expect(await store.read()).toBe('2026-10-19');
  });

  it('replaces the previous date and leaves no temp files behind', async () => {
    const store = new FileSentMarkerStore(dir);

    await store.write('2026-10-18');
    await store.write('2026-10-19');

    expect(await store.read()).toBe('2026-10-19');
    expect(await readdir(dir)).toEqual([SENT_MARKER_FILE]);
  });

  it('creates the cache directory on first write', async () => {
    const store = new FileSentMarkerStore(join(dir, 'nested', 'cache'));

    await store.write('2026-10-19');

    expect(await store.read()).toBe('2026-10-19');
  });

  it('reads malformed content as never sent', async () => {
    await writeFile(join(dir, SENT_MARKER_FILE), 'yesterday-ish');

    expect(await new FileSentMarkerStore(dir).read()).toBeNull();
  });

  it('refuses to write something that is not an ISO date', async () => {
    await expect(new FileSentMarkerStore(dir).write('19-10-2026')).rejects.toThrow(
      'SentMarkerStore: refusing to write malformed date "19-10-2026"',
    );
  });
});

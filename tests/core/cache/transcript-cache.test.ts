import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TranscriptCache } from '../../../src/core/cache/transcript-cache.js';
import { CacheError } from '../../../src/core/errors.js';

describe('TranscriptCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcript-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return what was put', async () => {
    const cache = new TranscriptCache(dir, { now: () => new Date('2024-03-01T08:00:00.000Z') });

    const written = await cache.put('abc123', 'hello world');
    const entry = await cache.get('abc123');

    expect(written.ok).toBe(true);
    expect(entry).toEqual({
      videoId: 'abc123',
      text: 'hello world',
      fetchedAt: '2024-03-01T08:00:00.000Z',
    });
  });

  it('should return null for an unknown id', async () => {
    const cache = new TranscriptCache(dir);
    expect(await cache.get('missing')).toBeNull();
  });

  it('should overwrite an existing entry', async () => {
    const cache = new TranscriptCache(dir);
    await cache.put('abc123', 'first');
    await cache.put('abc123', 'second');

    expect((await cache.get('abc123'))?.text).toBe('second');
  });

  it('should return old entries verbatim regardless of age', async () => {
    const old = new TranscriptCache(dir, { now: () => new Date('2001-01-01T00:00:00.000Z') });
    await old.put('old-video', 'ancient transcript');

    const cache = new TranscriptCache(dir);
    const entry = await cache.get('old-video');

    expect(entry?.text).toBe('ancient transcript');
    expect(entry?.fetchedAt).toBe('2001-01-01T00:00:00.000Z');
  });

  it('should leave only the entry file after a write', async () => {
    const cache = new TranscriptCache(dir);
    await cache.put('abc123', 'text');

    expect(await readdir(dir)).toEqual(['abc123.json']);
    const stored = JSON.parse(await readFile(join(dir, 'abc123.json'), 'utf-8'));
    expect(stored.videoId).toBe('abc123');
  });

  it('should encode ids into safe file names', () => {
    const cache = new TranscriptCache(dir);
    expect(cache.entryPath('../etc/passwd')).toBe(join(dir, '..%2Fetc%2Fpasswd.json'));
  });

  it('should treat a corrupt entry as a miss and warn', async () => {
    const onWarning = vi.fn();
    const cache = new TranscriptCache(dir, { onWarning });
    await writeFile(join(dir, 'broken.json'), '{not json', 'utf-8');

    expect(await cache.get('broken')).toBeNull();
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it('should treat an entry for another id as a miss', async () => {
    const cache = new TranscriptCache(dir);
    await writeFile(
      join(dir, 'one.json'),
      JSON.stringify({ videoId: 'two', text: 'x', fetchedAt: '2024-01-01T00:00:00.000Z' }),
      'utf-8'
    );

    expect(await cache.get('one')).toBeNull();
  });

  it('should return a CacheError when the directory cannot be created', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'file in the way', 'utf-8');
    const cache = new TranscriptCache(join(blocker, 'cache'));

    const written = await cache.put('abc123', 'text');

    expect(written.ok).toBe(false);
    if (!written.ok) {
      expect(written.error).toBeInstanceOf(CacheError);
      expect(written.error.kind).toBe('cache');
    }
  });
});

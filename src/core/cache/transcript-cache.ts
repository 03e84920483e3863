import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { CacheError } from '../errors.js';
import { err, ok } from '../retry/index.js';
import type { Result, TranscriptCacheEntry } from '../../types/index.js';

const CacheEntrySchema = z.object({
  videoId: z.string(),
  text: z.string(),
  fetchedAt: z.string(),
});

export interface TranscriptCacheOptions {
  now?: () => Date;
  onWarning?: (message: string) => void;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Durable videoId -> transcript store. One JSON file per video, replaced
 * atomically; entries never expire.
 */
export class TranscriptCache {
  private cacheDir: string;
  private now: () => Date;
  private onWarning?: (message: string) => void;

  constructor(cacheDir: string, options: TranscriptCacheOptions = {}) {
    this.cacheDir = cacheDir;
    this.now = options.now ?? (() => new Date());
    this.onWarning = options.onWarning;
  }

  entryPath(videoId: string): string {
    return join(this.cacheDir, `${encodeURIComponent(videoId)}.json`);
  }

  async get(videoId: string): Promise<TranscriptCacheEntry | null> {
    const path = this.entryPath(videoId);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.onWarning?.(`Cannot read cache entry ${path}: ${String(error)}`);
      }
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      this.onWarning?.(`Ignoring corrupt cache entry ${path}`);
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(raw);
    if (!parsed.success || parsed.data.videoId !== videoId) {
      this.onWarning?.(`Ignoring cache entry with unexpected shape ${path}`);
      return null;
    }

    return parsed.data;
  }

  async put(videoId: string, text: string): Promise<Result<TranscriptCacheEntry, CacheError>> {
    const entry: TranscriptCacheEntry = {
      videoId,
      text,
      fetchedAt: this.now().toISOString(),
    };
    const path = this.entryPath(videoId);
    const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');
      await rename(tempPath, path);
      return ok(entry);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      return err(
        new CacheError(`Failed to write cache entry for ${videoId}: ${String(error)}`, {
          cause: error,
        })
      );
    }
  }
}

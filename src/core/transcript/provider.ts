import { TranscriptNotFoundError } from '../errors.js';
import { RetryExecutor, unwrap } from '../retry/index.js';
import type { TranscriptCache } from '../cache/index.js';
import type { TranscriptFetcher } from './client.js';
import type { VideoRef } from '../../types/index.js';

export interface TranscriptProviderLogger {
  debug?: (message: string) => void;
  warn?: (message: string) => void;
}

export interface MockTranscriptSource {
  enabled: boolean;
  load: () => Promise<string>;
}

export interface TranscriptProviderDeps {
  fetcher: TranscriptFetcher;
  cache: TranscriptCache;
  retry: RetryExecutor;
  mock?: MockTranscriptSource;
  logger?: TranscriptProviderLogger;
}

export class TranscriptProvider {
  private fetcher: TranscriptFetcher;
  private cache: TranscriptCache;
  private retry: RetryExecutor;
  private mock?: MockTranscriptSource;
  private logger: TranscriptProviderLogger;

  constructor(deps: TranscriptProviderDeps) {
    this.fetcher = deps.fetcher;
    this.cache = deps.cache;
    this.retry = deps.retry;
    this.mock = deps.mock;
    this.logger = deps.logger ?? {};
  }

  async getTranscript(video: VideoRef): Promise<string> {
    if (this.mock?.enabled) {
      this.logger.debug?.('Mock mode: using sample transcript');
      return this.mock.load();
    }

    const cached = await this.cache.get(video.id);
    if (cached) {
      this.logger.debug?.(`Transcript cache hit for ${video.id} (fetched ${cached.fetchedAt})`);
      return cached.text;
    }

    this.logger.debug?.(`Transcript cache miss for ${video.id}`);
    const text = unwrap(
      await this.retry.execute(() => this.fetcher.fetchTranscript(video.url), {
        label: 'Transcript fetch',
      })
    );

    if (text.length === 0) {
      throw new TranscriptNotFoundError(video.id);
    }

    // A failed write leaves the transcript usable; the next run fetches again.
    const written = await this.cache.put(video.id, text);
    if (!written.ok) {
      this.logger.warn?.(written.error.message);
    }

    return text;
  }
}

import { NotFoundError } from '../errors.js';
import { RetryExecutor, unwrap } from '../retry/index.js';
import type { VideoSearchSource } from './client.js';
import type { VideoRef } from '../../types/index.js';

export interface VideoLocatorOptions {
  maxResults?: number;
  eventType?: string;
  onDebug?: (message: string) => void;
}

export function titleMatches(title: string, pattern: string): boolean {
  return title.toLowerCase().includes(pattern.toLowerCase());
}

export class VideoLocator {
  private source: VideoSearchSource;
  private retry: RetryExecutor;
  private maxResults: number;
  private eventType?: string;
  private onDebug?: (message: string) => void;

  constructor(source: VideoSearchSource, retry: RetryExecutor, options: VideoLocatorOptions = {}) {
    this.source = source;
    this.retry = retry;
    this.maxResults = options.maxResults ?? 5;
    this.eventType = options.eventType;
    this.onDebug = options.onDebug;
  }

  /**
   * Newest video on the channel whose title contains `titlePattern`
   * (case-insensitive). Only the first `maxResults` results, newest first,
   * are examined.
   */
  async findLatestMatching(channelId: string, titlePattern: string): Promise<VideoRef> {
    const results = unwrap(
      await this.retry.execute(
        () =>
          this.source.searchChannel(channelId, {
            maxResults: this.maxResults,
            eventType: this.eventType,
          }),
        { label: 'YouTube search' }
      )
    );

    this.onDebug?.(`Search returned ${results.length} videos`);

    const match = results.find((video) => titleMatches(video.title, titlePattern));
    if (!match) {
      throw new NotFoundError(
        `No video matching "${titlePattern}" among the latest ${results.length} on channel ${channelId}`
      );
    }
    return match;
  }

  async findById(videoId: string): Promise<VideoRef> {
    const videos = unwrap(
      await this.retry.execute(() => this.source.getVideoDetails([videoId]), {
        label: 'YouTube video lookup',
      })
    );

    const video = videos.find((v) => v.id === videoId);
    if (!video) {
      throw new NotFoundError(`Video not found: ${videoId}`);
    }
    return video;
  }
}

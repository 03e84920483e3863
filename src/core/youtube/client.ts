import { google, youtube_v3 } from 'googleapis';
import type { VideoRef } from '../../types/index.js';

export interface ChannelSearchOptions {
  maxResults: number;
  eventType?: string;
}

/**
 * The part of the YouTube Data API the locator depends on.
 */
export interface VideoSearchSource {
  searchChannel(channelId: string, options: ChannelSearchOptions): Promise<VideoRef[]>;
  getVideoDetails(videoIds: string[]): Promise<VideoRef[]>;
}

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&#039;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(?:amp|quot|#0?39|lt|gt);/g, (entity) => HTML_ENTITIES[entity] ?? entity);
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export class YouTubeClient implements VideoSearchSource {
  private youtube: youtube_v3.Youtube;
  private timeoutMs: number;

  /**
   * gaxios retries are disabled on every call; the pipeline's RetryExecutor
   * owns the attempt count.
   */
  constructor(apiKey: string, timeoutMs: number = 30000) {
    this.youtube = google.youtube({
      version: 'v3',
      auth: apiKey,
    });
    this.timeoutMs = timeoutMs;
  }

  parseVideoId(url: string): string {
    const trimmed = url.trim();
    if (/^[a-zA-Z0-9_-]{11}$/.test(trimmed)) return trimmed;

    const patterns = [
      /youtu\.be\/([a-zA-Z0-9_-]+)/,
      /[?&]v=([a-zA-Z0-9_-]+)/,
      /youtube\.com\/embed\/([a-zA-Z0-9_-]+)/,
      /youtube\.com\/shorts\/([a-zA-Z0-9_-]+)/,
    ];

    for (const pattern of patterns) {
      const match = trimmed.match(pattern);
      if (match) return match[1];
    }

    throw new Error('Invalid video URL');
  }

  async searchChannel(channelId: string, options: ChannelSearchOptions): Promise<VideoRef[]> {
    const response = await this.youtube.search.list(
      {
        part: ['snippet'],
        channelId,
        maxResults: options.maxResults,
        order: 'date',
        type: ['video'],
        eventType: options.eventType,
      },
      { timeout: this.timeoutMs, retry: false }
    );

    const videos: VideoRef[] = [];
    for (const item of response.data.items || []) {
      const id = item.id?.videoId;
      if (!id) continue;

      videos.push({
        id,
        title: decodeHtmlEntities(item.snippet?.title || ''),
        publishedAt: item.snippet?.publishedAt || '',
        url: videoUrl(id),
      });
    }
    return videos;
  }

  async getVideoDetails(videoIds: string[]): Promise<VideoRef[]> {
    const response = await this.youtube.videos.list(
      {
        part: ['snippet'],
        id: videoIds,
      },
      { timeout: this.timeoutMs, retry: false }
    );

    const videos: VideoRef[] = [];
    for (const video of response.data.items || []) {
      if (!video.id) continue;

      videos.push({
        id: video.id,
        title: video.snippet?.title || '',
        publishedAt: video.snippet?.publishedAt || '',
        url: videoUrl(video.id),
      });
    }
    return videos;
  }
}

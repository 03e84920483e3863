export interface TranscriptCacheEntry {
  videoId: string;
  text: string;
  fetchedAt: string; // ISO 8601
}

export interface TranscriptSegment {
  text: string;
  offset?: number;
  duration?: number;
  lang?: string;
}

export { TranscriptCache, type TranscriptCacheOptions } from './transcript-cache.js';

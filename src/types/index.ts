export * from './youtube.js';
export * from './transcript.js';
export * from './summary.js';
export * from './discord.js';
export * from './pipeline.js';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PipelineConfig {
  youtubeApiKey: string;
  channelId: string;
  titlePattern: string;
  searchMaxResults: number;
  searchEventType?: string;
  transcriptApiUrl: string;
  transcriptApiKey: string;
  aiApiUrl: string;
  aiApiKey?: string;
  aiPersona: string;
  aiUserId: string;
  discordWebhookUrl: string;
  discordFooter: string;
  useMockData: boolean;
  sampleTranscriptPath: string;
  cacheDir: string;
  maxChunkLength: number;
  retry: RetryConfig;
  requestTimeoutMs: number;
  aiTimeoutMs: number;
}

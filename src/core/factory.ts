import { TranscriptCache } from './cache/index.js';
import { RetryExecutor, type RetryAttemptInfo } from './retry/index.js';
import { VideoLocator, YouTubeClient, type VideoSearchSource } from './youtube/index.js';
import {
  TranscriptClient,
  TranscriptProvider,
  loadSampleTranscript,
  type TranscriptFetcher,
} from './transcript/index.js';
import { AIClient, Summarizer, type ChatEndpoint } from './ai/index.js';
import { DiscordNotifier, DiscordWebhookClient, type WebhookSender } from './discord/index.js';
import { Pipeline, type PipelineCallbacks } from './pipeline.js';
import type { PipelineConfig } from '../types/index.js';

export interface PipelineLogger extends PipelineCallbacks {
  onWarning?: (message: string) => void;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Remote collaborators; each defaults to the real client built from config.
 */
export interface PipelineOverrides {
  search?: VideoSearchSource;
  transcripts?: TranscriptFetcher;
  chat?: ChatEndpoint;
  webhook?: WebhookSender;
  sleep?: (ms: number) => Promise<void>;
}

export function createPipeline(
  config: PipelineConfig,
  logger: PipelineLogger = {},
  overrides: PipelineOverrides = {}
): Pipeline {
  const retry = new RetryExecutor(config.retry, { onRetry: logger.onRetry, sleep: overrides.sleep });

  const locator = new VideoLocator(
    overrides.search ?? new YouTubeClient(config.youtubeApiKey, config.requestTimeoutMs),
    retry,
    {
      maxResults: config.searchMaxResults,
      eventType: config.searchEventType,
      onDebug: logger.onDebug,
    }
  );

  const transcripts = new TranscriptProvider({
    fetcher:
      overrides.transcripts ??
      new TranscriptClient({
        apiKey: config.transcriptApiKey,
        apiUrl: config.transcriptApiUrl,
        timeoutMs: config.requestTimeoutMs,
      }),
    cache: new TranscriptCache(config.cacheDir, { onWarning: logger.onWarning }),
    retry,
    mock: {
      enabled: config.useMockData,
      load: () => loadSampleTranscript(config.sampleTranscriptPath),
    },
    logger: { debug: logger.onDebug, warn: logger.onWarning },
  });

  const summarizer = new Summarizer(
    overrides.chat ??
      new AIClient({ apiUrl: config.aiApiUrl, apiKey: config.aiApiKey, timeoutMs: config.aiTimeoutMs }),
    retry,
    { persona: config.aiPersona, userId: config.aiUserId }
  );

  const notifier = new DiscordNotifier(
    overrides.webhook ?? new DiscordWebhookClient(config.discordWebhookUrl, config.requestTimeoutMs),
    retry,
    {
      maxChunkLength: config.maxChunkLength,
      footer: config.discordFooter,
      onProgress: logger.onDebug,
    }
  );

  return new Pipeline({ locator, transcripts, summarizer, notifier }, logger);
}

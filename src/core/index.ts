export { Pipeline, type PipelineCallbacks, type PipelineDeps, type PipelineRunResult } from './pipeline.js';
export { createPipeline, type PipelineLogger, type PipelineOverrides } from './factory.js';
export { RetryExecutor, DEFAULT_RETRY } from './retry/index.js';
export { TranscriptCache } from './cache/index.js';
export { YouTubeClient, VideoLocator } from './youtube/index.js';
export { TranscriptClient, TranscriptProvider, defaultSampleTranscriptPath } from './transcript/index.js';
export { AIClient, Summarizer } from './ai/index.js';
export { DiscordNotifier, DiscordWebhookClient, chunkText } from './discord/index.js';
export * from './errors.js';

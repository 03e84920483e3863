export {
  TranscriptClient,
  TranscriptResponseSchema,
  DEFAULT_TRANSCRIPT_API_URL,
  transcriptFromPayload,
  joinSegments,
  loadSampleTranscript,
  defaultSampleTranscriptPath,
  type TranscriptFetcher,
  type TranscriptClientConfig,
  type TranscriptResponse,
} from './client.js';
export {
  TranscriptProvider,
  type TranscriptProviderDeps,
  type TranscriptProviderLogger,
  type MockTranscriptSource,
} from './provider.js';

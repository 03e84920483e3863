export { AIClient, type AIClientConfig, type ChatEndpoint } from './client.js';
export {
  Summarizer,
  normalizeAnswer,
  DEFAULT_IDENTITY,
  type SummarizerIdentity,
} from './summarizer.js';

export {
  chunkText,
  splitPlain,
  findBreak,
  safeCut,
  markdownBlocks,
  BREAK_POINTS,
  MIN_CHUNK_LENGTH,
} from './chunker.js';
export { DiscordWebhookClient, type WebhookSender } from './client.js';
export {
  DiscordNotifier,
  DEFAULT_CHUNK_LENGTH,
  DISCORD_DESCRIPTION_LIMIT,
  DISCORD_TITLE_LIMIT,
  EMBED_COLOR,
  type NotifierOptions,
  type PublishOptions,
} from './notifier.js';

import { PartialDeliveryError, PipelineError } from '../errors.js';
import { RetryExecutor } from '../retry/index.js';
import { MIN_CHUNK_LENGTH, chunkText, safeCut } from './chunker.js';
import type { WebhookSender } from './client.js';
import type { DiscordWebhookPayload, NotificationChunk, PublishReport } from '../../types/index.js';

export const DISCORD_DESCRIPTION_LIMIT = 4096;
export const DISCORD_TITLE_LIMIT = 256;
export const DEFAULT_CHUNK_LENGTH = 4000;
export const EMBED_COLOR = 0x5865f2;

export interface NotifierOptions {
  maxChunkLength?: number;
  footer?: string;
  color?: number;
  now?: () => Date;
  onProgress?: (message: string) => void;
}

export interface PublishOptions {
  title?: string;
}

function embedTitle(title: string, index: number, total: number): string {
  const suffix = total > 1 ? ` (${index + 1}/${total})` : '';
  const room = DISCORD_TITLE_LIMIT - suffix.length;
  const base = title.length > room ? `${title.slice(0, safeCut(title, room - 1))}…` : title;
  return `${base}${suffix}`;
}

/**
 * Posts a summary as one embed per chunk, in order. Stops at the first chunk
 * that still fails after retries; chunks already posted stay posted.
 */
export class DiscordNotifier {
  private sender: WebhookSender;
  private retry: RetryExecutor;
  private maxChunkLength: number;
  private footer?: string;
  private color: number;
  private now: () => Date;
  private onProgress?: (message: string) => void;

  constructor(sender: WebhookSender, retry: RetryExecutor, options: NotifierOptions = {}) {
    const maxChunkLength = options.maxChunkLength ?? DEFAULT_CHUNK_LENGTH;
    if (maxChunkLength < MIN_CHUNK_LENGTH || maxChunkLength > DISCORD_DESCRIPTION_LIMIT) {
      throw new RangeError(
        `maxChunkLength must be between ${MIN_CHUNK_LENGTH} and ${DISCORD_DESCRIPTION_LIMIT}, got ${maxChunkLength}`
      );
    }

    this.sender = sender;
    this.retry = retry;
    this.maxChunkLength = maxChunkLength;
    this.footer = options.footer;
    this.color = options.color ?? EMBED_COLOR;
    this.now = options.now ?? (() => new Date());
    this.onProgress = options.onProgress;
  }

  buildPayload(
    chunk: NotificationChunk,
    total: number,
    title: string,
    timestamp: string
  ): DiscordWebhookPayload {
    return {
      embeds: [
        {
          title: embedTitle(title, chunk.index, total),
          description: chunk.body,
          color: this.color,
          timestamp,
          ...(this.footer ? { footer: { text: this.footer } } : {}),
        },
      ],
    };
  }

  async publish(summaryText: string, options: PublishOptions = {}): Promise<PublishReport> {
    const chunks = chunkText(summaryText, this.maxChunkLength);
    if (chunks.length === 0) {
      throw new PipelineError('permanent', 'Nothing to publish: summary is empty');
    }

    const title = options.title || 'Daily Summary';
    const timestamp = this.now().toISOString();
    let delivered = 0;

    for (const chunk of chunks) {
      const payload = this.buildPayload(chunk, chunks.length, title, timestamp);
      const result = await this.retry.execute(() => this.sender.send(payload), {
        label: `Discord chunk ${chunk.index + 1}/${chunks.length}`,
      });

      if (!result.ok) {
        throw delivered > 0
          ? new PartialDeliveryError(delivered, chunks.length, result.error)
          : result.error;
      }

      delivered++;
      this.onProgress?.(`Posted chunk ${delivered}/${chunks.length} (${chunk.body.length} chars)`);
    }

    return { delivered, total: chunks.length };
  }
}

import { requestOk } from '../http.js';
import type { DiscordWebhookPayload } from '../../types/index.js';

export interface WebhookSender {
  send(payload: DiscordWebhookPayload): Promise<void>;
}

export class DiscordWebhookClient implements WebhookSender {
  private webhookUrl: string;
  private timeoutMs: number;

  constructor(webhookUrl: string, timeoutMs: number = 30000) {
    this.webhookUrl = webhookUrl;
    this.timeoutMs = timeoutMs;
  }

  async send(payload: DiscordWebhookPayload): Promise<void> {
    await requestOk(this.webhookUrl, {
      method: 'POST',
      body: payload,
      timeoutMs: this.timeoutMs,
    });
  }
}

import { requestJson } from '../http.js';
import type { SummaryRequest } from '../../types/index.js';

export interface AIClientConfig {
  apiUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

export interface ChatEndpoint {
  chat(request: SummaryRequest): Promise<unknown>;
}

export class AIClient implements ChatEndpoint {
  private apiUrl: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(config: AIClientConfig) {
    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 120000;
  }

  async chat(request: SummaryRequest): Promise<unknown> {
    return requestJson(this.apiUrl, {
      method: 'POST',
      headers: this.apiKey ? { 'X-API-Key': this.apiKey } : {},
      body: {
        persona: request.persona,
        user_id: request.userId,
        messages: request.messages,
      },
      timeoutMs: this.timeoutMs,
    });
  }
}

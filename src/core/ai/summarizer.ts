import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { RetryExecutor, unwrap } from '../retry/index.js';
import type { ChatEndpoint } from './client.js';
import type { SummaryRequest, SummaryResult } from '../../types/index.js';

const AnswerSchema = z.object({
  answer: z.string(),
});

export interface SummarizerIdentity {
  persona: string;
  userId: string;
}

export const DEFAULT_IDENTITY: SummarizerIdentity = {
  persona: 'ks-discord',
  userId: 'ks-discord',
};

function stripCodeFence(text: string): string {
  const match = text.match(/^```[^\n]*\n([\s\S]*?)\n```$/);
  return match ? match[1] : text;
}

/**
 * Some personas answer with a JSON document (sometimes fenced) that wraps
 * the real answer; unwrap it, otherwise keep the text as is.
 */
export function normalizeAnswer(answer: string): string {
  const trimmed = answer.trim();
  const candidate = stripCodeFence(trimmed).trim();
  if (!candidate.startsWith('{')) return trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return trimmed;
  }

  const inner = AnswerSchema.safeParse(parsed);
  return inner.success ? inner.data.answer.trim() : trimmed;
}

export class Summarizer {
  private endpoint: ChatEndpoint;
  private retry: RetryExecutor;
  private identity: SummarizerIdentity;

  constructor(endpoint: ChatEndpoint, retry: RetryExecutor, identity: SummarizerIdentity = DEFAULT_IDENTITY) {
    this.endpoint = endpoint;
    this.retry = retry;
    this.identity = identity;
  }

  buildRequest(transcript: string): SummaryRequest {
    return {
      persona: this.identity.persona,
      userId: this.identity.userId,
      messages: [{ role: 'user', content: transcript }],
    };
  }

  parseResponse(payload: unknown): SummaryResult {
    const parsed = AnswerSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError('AI response has no "answer" string');
    }

    const text = normalizeAnswer(parsed.data.answer);
    if (text.length === 0) {
      throw new MalformedResponseError('AI response answer is empty');
    }
    return { text };
  }

  async summarize(transcript: string): Promise<string> {
    const request = this.buildRequest(transcript);
    const result = unwrap(
      await this.retry.execute(
        async () => this.parseResponse(await this.endpoint.chat(request)),
        { label: 'AI summarization' }
      )
    );
    return result.text;
  }
}

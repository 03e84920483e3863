import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { requestJson } from '../http.js';
import type { TranscriptSegment } from '../../types/index.js';

export const DEFAULT_TRANSCRIPT_API_URL = 'https://api.supadata.ai/v1/transcript';

const TranscriptSegmentSchema = z.object({
  text: z.string(),
  offset: z.number().optional(),
  duration: z.number().optional(),
  lang: z.string().optional(),
});

export const TranscriptResponseSchema = z.object({
  lang: z.string().optional(),
  availableLangs: z.array(z.string()).optional(),
  content: z.union([z.string(), z.array(TranscriptSegmentSchema)]),
});

export type TranscriptResponse = z.infer<typeof TranscriptResponseSchema>;

export function joinSegments(segments: TranscriptSegment[]): string {
  return segments
    .map((segment) => segment.text.trim())
    .filter((text) => text.length > 0)
    .join(' ');
}

/**
 * Plain transcript text from a transcript API payload; `content` is either
 * the full text or a list of timed segments.
 */
export function transcriptFromPayload(payload: unknown): string {
  const parsed = TranscriptResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Unexpected transcript response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`
    );
  }

  const { content } = parsed.data;
  return typeof content === 'string' ? content.trim() : joinSegments(content);
}

export async function loadSampleTranscript(path: string): Promise<string> {
  const content = await readFile(path, 'utf-8');
  return transcriptFromPayload(JSON.parse(content));
}

/**
 * Bundled sample used in mock mode. Resolves the same from src/ and dist/.
 */
export function defaultSampleTranscriptPath(): string {
  return fileURLToPath(new URL('../../../fixtures/sample-transcript.json', import.meta.url));
}

export interface TranscriptFetcher {
  fetchTranscript(videoUrl: string): Promise<string>;
}

export interface TranscriptClientConfig {
  apiKey: string;
  apiUrl?: string;
  timeoutMs?: number;
}

export class TranscriptClient implements TranscriptFetcher {
  private apiKey: string;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(config: TranscriptClientConfig) {
    this.apiKey = config.apiKey;
    this.apiUrl = config.apiUrl ?? DEFAULT_TRANSCRIPT_API_URL;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async fetchTranscript(videoUrl: string): Promise<string> {
    const payload = await requestJson(this.apiUrl, {
      query: { url: videoUrl },
      headers: { 'x-api-key': this.apiKey },
      timeoutMs: this.timeoutMs,
    });
    return transcriptFromPayload(payload);
  }
}

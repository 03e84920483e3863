import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  TranscriptClient,
  defaultSampleTranscriptPath,
  loadSampleTranscript,
  transcriptFromPayload,
} from '../../../src/core/transcript/client.js';
import { HttpStatusError, MalformedResponseError } from '../../../src/core/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('transcriptFromPayload', () => {
  it('should join segment texts with single spaces', () => {
    const payload = {
      lang: 'en',
      availableLangs: ['en'],
      content: [
        { text: 'Hello there.', offset: 0, duration: 1000, lang: 'en' },
        { text: '  ', offset: 1000, duration: 500, lang: 'en' },
        { text: ' General news. ', offset: 1500, duration: 900, lang: 'en' },
      ],
    };
    expect(transcriptFromPayload(payload)).toBe('Hello there. General news.');
  });

  it('should accept plain text content', () => {
    expect(transcriptFromPayload({ content: '  full text  ' })).toBe('full text');
  });

  it('should reject payloads without content', () => {
    expect(() => transcriptFromPayload({ message: 'nope' })).toThrow(MalformedResponseError);
  });
});

describe('TranscriptClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send the video URL and API key', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ content: [{ text: 'one' }, { text: 'two' }] })
    );
    vi.stubGlobal('fetch', fetchMock);
    const client = new TranscriptClient({
      apiKey: 'test-key',
      apiUrl: 'https://transcripts.example.com/v1/transcript',
    });

    const text = await client.fetchTranscript('https://www.youtube.com/watch?v=abc');

    expect(text).toBe('one two');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      'https://transcripts.example.com/v1/transcript?url=https%3A%2F%2Fwww.youtube.com%2Fwatch%3Fv%3Dabc'
    );
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({ 'x-api-key': 'test-key' });
  });

  it('should turn error statuses into HttpStatusError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('not found', { status: 404 })));
    const client = new TranscriptClient({ apiKey: 'test-key' });

    const failure = await client.fetchTranscript('https://www.youtube.com/watch?v=abc').catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(HttpStatusError);
    expect(failure).toMatchObject({ status: 404, kind: 'permanent' });
  });
});

describe('loadSampleTranscript', () => {
  it('should load the bundled sample', async () => {
    const text = await loadSampleTranscript(defaultSampleTranscriptPath());

    expect(text.startsWith("Good morning and welcome to this week's market outlook.")).toBe(true);
    expect(text.endsWith('see you next week.')).toBe(true);
  });
});

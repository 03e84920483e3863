import { ConfigError } from '../../core/errors.js';
import { DEFAULT_RETRY } from '../../core/retry/index.js';
import { DEFAULT_TRANSCRIPT_API_URL, defaultSampleTranscriptPath } from '../../core/transcript/index.js';
import { DEFAULT_CHUNK_LENGTH, DISCORD_DESCRIPTION_LIMIT, MIN_CHUNK_LENGTH } from '../../core/discord/index.js';
import { DEFAULT_IDENTITY } from '../../core/ai/index.js';
import type { PipelineConfig } from '../../types/index.js';

export type Env = Record<string, string | undefined>;

export interface ConfigOverrides {
  channel?: string;
  title?: string;
  mock?: boolean;
  cacheDir?: string;
  retry?: string;
  /** A single video was requested, so no channel is needed. */
  videoMode?: boolean;
}

export const DEFAULT_TITLE_PATTERN = 'KS Forward';
export const DEFAULT_CACHE_DIR = './transcript_cache';

class ConfigReader {
  readonly problems: string[] = [];

  constructor(private env: Env) {}

  string(name: string, fallback = ''): string {
    const value = this.env[name]?.trim();
    return value ? value : fallback;
  }

  required(name: string, value: string, minLength = 1): string {
    if (!value) {
      this.problems.push(`${name} must be set`);
    } else if (value.length < minLength) {
      this.problems.push(`${name} appears to be invalid (too short)`);
    }
    return value;
  }

  url(name: string, value: string): string {
    if (!value) {
      this.problems.push(`${name} must be set`);
    } else if (!/^https?:\/\//.test(value)) {
      this.problems.push(`${name} must be a valid URL (starting with http:// or https://)`);
    }
    return value;
  }

  int(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      this.problems.push(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  bool(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    return raw === 'true';
  }
}

/**
 * Builds the pipeline configuration from environment variables, with
 * command-line options taking precedence. Every problem found is reported
 * in a single ConfigError.
 */
export function loadPipelineConfig(env: Env, overrides: ConfigOverrides = {}): PipelineConfig {
  const read = new ConfigReader(env);

  const useMockData = overrides.mock ?? read.bool('USE_MOCK_DATA', false);
  const channelId = overrides.channel?.trim() || read.string('CHANNEL_ID');
  if (!overrides.videoMode) {
    read.required('CHANNEL_ID', channelId, 10);
  }

  const transcriptApiKey = read.string('TRANSCRIPT_API_KEY');
  if (!useMockData) {
    read.required('TRANSCRIPT_API_KEY', transcriptApiKey);
  }

  const aiApiKey = read.string('AI_API_KEY');
  const searchEventType = read.string('SEARCH_EVENT_TYPE');

  const config: PipelineConfig = {
    youtubeApiKey: read.required('YOUTUBE_API_KEY', read.string('YOUTUBE_API_KEY'), 10),
    channelId,
    titlePattern: overrides.title?.trim() || read.string('TITLE_PATTERN', DEFAULT_TITLE_PATTERN),
    searchMaxResults: read.int('SEARCH_MAX_RESULTS', env.SEARCH_MAX_RESULTS, 5, 1, 50),
    ...(searchEventType && { searchEventType }),
    transcriptApiUrl: read.url(
      'TRANSCRIPT_API_URL',
      read.string('TRANSCRIPT_API_URL', DEFAULT_TRANSCRIPT_API_URL)
    ),
    transcriptApiKey,
    aiApiUrl: read.url('AI_API_URL', read.string('AI_API_URL')),
    ...(aiApiKey && { aiApiKey }),
    aiPersona: read.string('AI_PERSONA', DEFAULT_IDENTITY.persona),
    aiUserId: read.string('AI_USER_ID', DEFAULT_IDENTITY.userId),
    discordWebhookUrl: read.url('DISCORD_WEBHOOK_URL', read.string('DISCORD_WEBHOOK_URL')),
    discordFooter: read.string('DISCORD_FOOTER', 'KS Forward'),
    useMockData,
    sampleTranscriptPath: read.string('SAMPLE_TRANSCRIPT_PATH', defaultSampleTranscriptPath()),
    cacheDir: overrides.cacheDir?.trim() || read.string('TRANSCRIPT_CACHE_DIR', DEFAULT_CACHE_DIR),
    maxChunkLength: read.int(
      'MAX_CHUNK_LENGTH',
      env.MAX_CHUNK_LENGTH,
      DEFAULT_CHUNK_LENGTH,
      MIN_CHUNK_LENGTH,
      DISCORD_DESCRIPTION_LIMIT
    ),
    retry: {
      maxAttempts: read.int(
        'RETRY_MAX_ATTEMPTS',
        overrides.retry ?? env.RETRY_MAX_ATTEMPTS,
        DEFAULT_RETRY.maxAttempts,
        1,
        10
      ),
      baseDelayMs: read.int(
        'RETRY_BASE_DELAY_MS',
        env.RETRY_BASE_DELAY_MS,
        DEFAULT_RETRY.baseDelayMs,
        0,
        60000
      ),
      maxDelayMs: DEFAULT_RETRY.maxDelayMs,
    },
    requestTimeoutMs: read.int('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, 30000, 1000, 600000),
    aiTimeoutMs: read.int('AI_TIMEOUT_MS', env.AI_TIMEOUT_MS, 120000, 1000, 600000),
  };

  if (read.problems.length > 0) {
    throw new ConfigError(read.problems);
  }
  return config;
}

export function maskKey(key: string): string {
  if (key.length <= 8) return '***';
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}

export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/***`;
  } catch {
    return '***';
  }
}

/**
 * One line per setting, with credentials masked.
 */
export function describeConfig(config: PipelineConfig): string[] {
  return [
    `channel:       ${config.channelId || '(none)'}`,
    `title pattern: ${config.titlePattern}`,
    `youtube key:   ${maskKey(config.youtubeApiKey)}`,
    `transcripts:   ${config.transcriptApiUrl} (key ${config.transcriptApiKey ? maskKey(config.transcriptApiKey) : 'unset'})`,
    `ai endpoint:   ${config.aiApiUrl} (key ${config.aiApiKey ? maskKey(config.aiApiKey) : 'unset'}, persona ${config.aiPersona})`,
    `discord:       ${maskUrl(config.discordWebhookUrl)}`,
    `mock data:     ${config.useMockData}`,
    `cache dir:     ${config.cacheDir}`,
    `chunk length:  ${config.maxChunkLength}`,
    `retry:         ${config.retry.maxAttempts} attempts, ${config.retry.baseDelayMs}ms base delay`,
  ];
}

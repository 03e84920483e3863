export type FailureKind =
  | 'transient'
  | 'permanent'
  | 'malformed_response'
  | 'not_found'
  | 'cache'
  | 'partial_delivery'
  | 'config';

export class PipelineError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind === 'transient';
  }
}

export class HttpStatusError extends PipelineError {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(isRetryableStatus(status) ? 'transient' : 'permanent', message, options);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient', message, options);
    this.name = 'NetworkError';
  }
}

export class MalformedResponseError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed_response', message, options);
    this.name = 'MalformedResponseError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class TranscriptNotFoundError extends PipelineError {
  readonly videoId: string;

  constructor(videoId: string) {
    super('permanent', `Transcript not found for video: ${videoId}`);
    this.name = 'TranscriptNotFoundError';
    this.videoId = videoId;
  }
}

export class CacheError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('cache', message, options);
    this.name = 'CacheError';
  }
}

export class PartialDeliveryError extends PipelineError {
  readonly delivered: number;
  readonly total: number;

  constructor(delivered: number, total: number, cause: PipelineError) {
    super(
      'partial_delivery',
      `Delivered ${delivered}/${total} chunks before failure: ${cause.message}`,
      { cause }
    );
    this.name = 'PartialDeliveryError';
    this.delivered = delivered;
    this.total = total;
  }
}

export class RetryExhaustedError extends PipelineError {
  readonly attempts: number;
  readonly lastError: PipelineError;

  constructor(attempts: number, lastError: PipelineError, label?: string) {
    const subject = label ? `${label} failed` : 'Operation failed';
    super('transient', `${subject} after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ConfigError extends PipelineError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('config', `Configuration error: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * HTTP status carried by a thrown value, if any. Covers gaxios errors from
 * googleapis, which expose it either directly or on `response`.
 */
export function readStatus(error: unknown): number | undefined {
  const direct = readProperty(error, 'status');
  if (typeof direct === 'number') return direct;

  const fromResponse = readProperty(readProperty(error, 'response'), 'status');
  if (typeof fromResponse === 'number') return fromResponse;

  const code = readProperty(error, 'code');
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return Number(code);

  return undefined;
}

function readNetworkCode(error: unknown): string | undefined {
  // undici wraps the socket error: TypeError('fetch failed') with a coded cause
  for (const candidate of [error, readProperty(error, 'cause')]) {
    const code = readProperty(candidate, 'code');
    if (typeof code === 'string' && (NETWORK_ERROR_CODES.has(code) || code.startsWith('UND_ERR_'))) {
      return code;
    }
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new NetworkError(`Request timed out: ${error.message}`, { cause: error });
  }

  const networkCode = readNetworkCode(error);
  if (networkCode) {
    return new NetworkError(`Network error [${networkCode}]: ${messageOf(error)}`, { cause: error });
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return new HttpStatusError(status, messageOf(error), { cause: error });
  }

  if (error instanceof TypeError && error.message === 'fetch failed') {
    return new NetworkError(error.message, { cause: error });
  }

  if (error instanceof SyntaxError) {
    return new MalformedResponseError(error.message, { cause: error });
  }

  return new PipelineError('permanent', messageOf(error), { cause: error });
}

/**
 * Message with nested causes appended, e.g. for the final log line.
 */
export function describeError(error: Error): string {
  const parts: string[] = [`${error.name}: ${error.message}`];

  let cause: unknown = error.cause;
  let depth = 0;
  while (cause instanceof Error && depth < 3) {
    if (!error.message.includes(cause.message)) {
      parts.push(`[cause: ${cause.message}]`);
    }
    cause = cause.cause;
    depth++;
  }

  return parts.join(' ');
}

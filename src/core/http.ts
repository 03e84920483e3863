import { HttpStatusError, MalformedResponseError, toPipelineError } from './errors.js';

export interface HttpRequest {
  method?: 'GET' | 'POST';
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

/**
 * Host part of a URL, for error messages. Webhook URLs and query strings
 * carry credentials and must not end up in logs.
 */
export function describeEndpoint(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '<invalid url>';
  }
}

function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

async function send(url: string, request: HttpRequest): Promise<Response> {
  const method = request.method ?? 'GET';
  const endpoint = describeEndpoint(url);
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...request.headers,
  };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(buildUrl(url, request.query), {
      method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    const failure = toPipelineError(error);
    failure.message = `${method} ${endpoint}: ${failure.message}`;
    throw failure;
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new HttpStatusError(
      response.status,
      `${method} ${endpoint} returned ${response.status}: ${errorText.slice(0, 200)}`
    );
  }

  return response;
}

export async function requestJson(url: string, request: HttpRequest): Promise<unknown> {
  const response = await send(url, request);
  const text = await response.text();

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(
      `${request.method ?? 'GET'} ${describeEndpoint(url)} returned invalid JSON`,
      { cause: error }
    );
  }
}

/**
 * Sends a request whose response body is not needed (e.g. 204 No Content).
 */
export async function requestOk(url: string, request: HttpRequest): Promise<number> {
  const response = await send(url, request);
  await response.arrayBuffer();
  return response.status;
}

import { request } from 'undici';
import { errorMessage } from '../utils/errors.js';

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export interface GetJsonOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  timeoutMs: number;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'value-bet-engine/0.1',
  Accept: 'application/json',
};

/** GET a JSON document. Non-2xx responses raise a ProviderError. */
export async function getJson(baseUrl: string, opts: GetJsonOptions): Promise<unknown> {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(opts.query ?? {})) {
    url.searchParams.set(key, String(value));
  }
  const href = url.toString();

  const { statusCode, body } = await request(href, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, ...opts.headers },
    headersTimeout: opts.timeoutMs,
    bodyTimeout: opts.timeoutMs,
  });

  if (statusCode < 200 || statusCode >= 300) {
    // drain so the socket is released
    await body.text();
    throw new ProviderError(`HTTP ${statusCode}`, redact(href), statusCode);
  }

  try {
    return await body.json();
  } catch (err) {
    throw new ProviderError(`Invalid JSON: ${errorMessage(err)}`, redact(href), statusCode);
  }
}

/** Drops API keys from URLs before they reach logs or messages. */
export function redact(href: string): string {
  const url = new URL(href);
  if (url.searchParams.has('apiKey')) url.searchParams.set('apiKey', '***');
  return url.toString();
}

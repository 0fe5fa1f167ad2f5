import { withRetry, type RetryOptions } from './retry.js';

/**
 * クエリ（API キーを含むことがある）を除いた URL
 */
export function redactUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
}

/**
 * 2xx 以外のレスポンス。url はクエリを除いたもの
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly headers: Headers;

  constructor(status: number, url: string, headers: Headers, statusText = '') {
    const shown = redactUrl(url);
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${shown}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = shown;
    this.headers = headers;
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetch?: FetchLike;
  retry?: RetryOptions;
}

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

async function request(url: string, options: HttpOptions): Promise<Response> {
  const doFetch = options.fetch ?? defaultFetch;
  return withRetry(async () => {
    const response = await doFetch(url);
    if (!response.ok) {
      throw new HttpError(response.status, url, response.headers, response.statusText);
    }
    return response;
  }, { label: `GET ${new URL(url).host}`, ...options.retry });
}

export async function fetchJson(url: string, options: HttpOptions = {}): Promise<unknown> {
  const response = await request(url, options);
  const body: unknown = await response.json();
  return body;
}

export async function fetchBuffer(url: string, options: HttpOptions = {}): Promise<Buffer> {
  const response = await request(url, options);
  return Buffer.from(await response.arrayBuffer());
}

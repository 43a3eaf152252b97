import { request, type Dispatcher } from 'undici';
import type { Credentials } from '../types.js';

export const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Transport-level failure (DNS, refused or reset connection, timeout).
 * The only failure class the engine retries.
 */
export class NetworkError extends Error {
  constructor(readonly url: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'NetworkError';
  }
}

export class TooManyRedirectsError extends Error {
  constructor(readonly url: string, readonly hops: number) {
    super(`Too many redirects (${hops}) while fetching ${url}`);
    this.name = 'TooManyRedirectsError';
  }
}

export interface ListingResponse {
  statusCode: number;
  body: string;
}

export interface HeadResponse {
  statusCode: number;
  location?: string;
}

export type StreamResponse =
  | {
      kind: 'ok';
      statusCode: number;
      totalBytes: number;
      chunks: AsyncIterable<Buffer>;
      discard(): void;
    }
  | { kind: 'redirect'; statusCode: number; location: string }
  | { kind: 'status'; statusCode: number };

export interface Transport {
  fetchListing(url: string): Promise<ListingResponse>;
  fetchHead(url: string): Promise<HeadResponse>;
  /**
   * Open a file body. Redirects are handed back to the caller, never followed.
   */
  openStream(url: string, credentials?: Credentials): Promise<StreamResponse>;
}

export interface HttpTransportOptions {
  userAgent: string;
  chunkSize: number;
  maxRedirects: number;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class HttpTransport implements Transport {
  constructor(private readonly options: HttpTransportOptions) {}

  async fetchListing(url: string): Promise<ListingResponse> {
    let current = url;
    for (let hops = 0; hops <= this.options.maxRedirects; hops++) {
      const response = await this.send(current, 'GET');
      const location = redirectTarget(response, current);
      if (location === undefined) {
        return { statusCode: response.statusCode, body: await readText(current, response.body) };
      }
      await response.body.dump();
      current = location;
    }
    throw new TooManyRedirectsError(url, this.options.maxRedirects);
  }

  async fetchHead(url: string): Promise<HeadResponse> {
    const response = await this.send(url, 'HEAD');
    await response.body.dump();
    return {
      statusCode: response.statusCode,
      location: redirectTarget(response, url)
    };
  }

  async openStream(url: string, credentials?: Credentials): Promise<StreamResponse> {
    const response = await this.send(url, 'GET', credentials);
    const { statusCode, headers, body } = response;

    const location = redirectTarget(response, url);
    if (location !== undefined) {
      await body.dump();
      return { kind: 'redirect', statusCode, location };
    }

    if (statusCode !== 200) {
      await body.dump();
      return { kind: 'status', statusCode };
    }

    return {
      kind: 'ok',
      statusCode,
      totalBytes: parseContentLength(headers['content-length']),
      chunks: rechunk(url, body, this.options.chunkSize),
      discard: () => {
        body.destroy();
      }
    };
  }

  private async send(
    rawUrl: string,
    method: 'GET' | 'HEAD',
    credentials?: Credentials
  ): Promise<Dispatcher.ResponseData> {
    const { url, authorization } = prepareUrl(rawUrl, credentials);
    const headers: Record<string, string> = { 'user-agent': this.options.userAgent };
    if (authorization) {
      headers.authorization = authorization;
    }

    try {
      return await request(url, {
        method,
        headers,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher
      });
    } catch (error) {
      throw new NetworkError(rawUrl, error);
    }
  }
}

/**
 * Move URL user-info into a basic auth header.
 * Explicit credentials win when both username and password are non-empty.
 */
export function prepareUrl(
  rawUrl: string,
  credentials?: Credentials
): { url: string; authorization?: string } {
  const url = new URL(rawUrl);
  let authorization: string | undefined;

  if (credentials?.username && credentials.password) {
    authorization = basicAuth(credentials.username, credentials.password);
  } else if (url.username || url.password) {
    authorization = basicAuth(decodeURIComponent(url.username), decodeURIComponent(url.password));
  }

  url.username = '';
  url.password = '';
  return { url: url.toString(), authorization };
}

function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

function redirectTarget(response: Dispatcher.ResponseData, currentUrl: string): string | undefined {
  if (!REDIRECT_STATUSES.has(response.statusCode)) {
    return undefined;
  }
  const header = response.headers.location;
  const location = Array.isArray(header) ? header[0] : header;
  if (!location) {
    return undefined;
  }
  return new URL(location, currentUrl).toString();
}

function parseContentLength(header: string | string[] | undefined): number {
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined) return 0;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

async function readText(url: string, body: Dispatcher.ResponseData['body']): Promise<string> {
  try {
    return await body.text();
  } catch (error) {
    throw new NetworkError(url, error);
  }
}

/**
 * Re-slice a body into fixed-size chunks. Breaking out of the loop
 * closes the underlying response.
 */
export async function* rechunk(
  url: string,
  source: AsyncIterable<Uint8Array>,
  chunkSize: number
): AsyncGenerator<Buffer> {
  let pending = Buffer.alloc(0);
  const iterator = source[Symbol.asyncIterator]();

  try {
    while (true) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (error) {
        throw new NetworkError(url, error);
      }
      if (next.done) break;

      pending = pending.length > 0
        ? Buffer.concat([pending, next.value])
        : Buffer.from(next.value);

      while (pending.length >= chunkSize) {
        yield pending.subarray(0, chunkSize);
        pending = pending.subarray(chunkSize);
      }
    }
  } finally {
    await iterator.return?.();
  }

  if (pending.length > 0) {
    yield pending;
  }
}

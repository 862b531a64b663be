/**
 * Authenticated HTTP transport for the repository REST API.
 *
 * Every request carries static basic-auth credentials from the
 * RepositoryConfig. There is no retry: a connection failure rejects
 * immediately and the caller decides whether it is per-item or fatal.
 */

import { Readable } from 'node:stream';
import type { Logger } from 'pino';
import type { RepositoryConfig } from '../config/types.js';
import { RepositoryError, errorMessage } from '../errors.js';

/** Options for constructing an HttpTransport */
export interface HttpTransportOptions {
  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;
}

/** Query parameters; undefined values are omitted */
export type QueryParams = Record<string, string | undefined>;

export class HttpTransport {
  private readonly config: RepositoryConfig;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly authorization: string;

  constructor(config: RepositoryConfig, logger: Logger, options?: HttpTransportOptions) {
    this.config = config;
    this.logger = logger.child({ component: 'http-transport' });
    this.fetchFn = options?.fetchFn ?? globalThis.fetch;
    const token = Buffer.from(`${config.username}:${config.password}`).toString('base64');
    this.authorization = `Basic ${token}`;
  }

  /**
   * Build an absolute URL under the configured base URL.
   */
  buildUrl(pathname: string, params: QueryParams = {}): string {
    const normalized = pathname.startsWith('/') ? pathname : `/${pathname}`;
    const url = new URL(`${this.config.baseUrl}${normalized}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  /**
   * Authenticated GET. The body is left unread for the caller to stream.
   */
  async get(url: string): Promise<Response> {
    this.logger.debug({ method: 'GET', url }, 'HTTP request');
    const response = await this.fetchFn(url, {
      method: 'GET',
      headers: { Authorization: this.authorization },
    });
    this.logger.debug({ method: 'GET', url, status: response.status }, 'HTTP response');
    return response;
  }

  /**
   * Authenticated GET of a JSON document.
   *
   * Connection failures, non-2xx responses and unparseable bodies are all
   * reported as RepositoryError.
   */
  async getJson(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.get(url);
    } catch (err) {
      throw new RepositoryError(`Request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!isSuccessStatus(response.status)) {
      const responseBody = await readErrorBody(response);
      throw new RepositoryError(`${response.status} ${responseBody}`.trim(), {
        statusCode: response.status,
        responseBody,
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new RepositoryError(`Invalid JSON response: ${errorMessage(err)}`, {
        statusCode: response.status,
        cause: err,
      });
    }
  }

  /**
   * Authenticated POST with a streamed request body.
   */
  async post(url: string, body: Readable, headers: Record<string, string> = {}): Promise<Response> {
    this.logger.debug({ method: 'POST', url }, 'HTTP request');
    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: { ...headers, Authorization: this.authorization },
      body,
      duplex: 'half',
    });
    this.logger.debug({ method: 'POST', url, status: response.status }, 'HTTP response');
    return response;
  }
}

/** 2xx */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Read a response body as text for error detail. A body that cannot be
 * read is reported in place of the text.
 */
export async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    return `<unreadable body: ${errorMessage(err)}>`;
  }
}

/**
 * Expose a response body as a Node stream. A bodiless response becomes an
 * empty stream.
 */
export function toNodeStream(response: Response, highWaterMark?: number): Readable {
  if (!response.body) {
    return Readable.from([]);
  }
  return Readable.fromWeb(response.body, highWaterMark === undefined ? undefined : { highWaterMark });
}

/**
 * Parse the content-length header; absent or malformed counts as 0 (unknown).
 */
export function contentLengthOf(response: Response): number {
  const raw = response.headers.get('content-length');
  if (raw === null) return 0;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) || parsed < 0 ? 0 : parsed;
}

/**
 * Shared helpers for tests: config, silent logger, temp dirs, fake fetch.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pino } from 'pino';
import type { Logger } from 'pino';
import type { RepositoryConfig } from '../core/config/types.js';

export const BASE_URL = 'http://repo.test:8081';

export function makeConfig(overrides?: Partial<RepositoryConfig>): RepositoryConfig {
  return {
    baseUrl: BASE_URL,
    username: 'test-user',
    password: 'test-secret',
    maxConcurrentDownloads: 8,
    chunkSizeBytes: 8192,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function makeTempDir(prefix = 'raw-transfer-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relativePath: string, content: string): string {
  const filePath = path.join(root, ...relativePath.split('/'));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/** One request seen by the fake fetch */
export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  /** Request body bytes (streamed bodies are drained) */
  body: Buffer | null;
}

export type FakeFetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

async function drainBody(body: unknown): Promise<Buffer | null> {
  if (body === undefined || body === null) return null;
  if (typeof body === 'string') return Buffer.from(body);
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  }
  throw new Error('Unsupported request body in fake fetch');
}

/**
 * fetch stand-in that records every request and answers via `handler`.
 */
export function createFakeFetch(handler: FakeFetchHandler): {
  fetchFn: typeof fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetchFn: typeof fetch = async (input, init) => {
    const url = typeof input === 'string'
      ? input
      : input instanceof URL
        ? input.toString()
        : input.url;
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: await drainBody(init?.body),
    };
    requests.push(request);
    return handler(request);
  };

  return { fetchFn, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** Collects everything written to it, for CLI output assertions */
export class MemoryStream {
  readonly chunks: string[] = [];
  isTTY = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

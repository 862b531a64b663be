/**
 * Streaming multipart/form-data encoder for raw component uploads.
 *
 * For file N (1-based) the body carries a `raw.assetN` part with the file
 * content followed by a `raw.assetN.filename` part holding its relative
 * path; a single `raw.directory` part closes the form. File content is
 * read lazily, chunk by chunk, so the whole body is never in memory. The
 * exact body length is known before the first byte is sent.
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { UploadError, errorMessage } from '../errors.js';
import type { UploadManifest } from './types.js';

const CRLF = '\r\n';
const DEFAULT_READ_CHUNK_SIZE = 8 * 1024;

type BodySegment =
  | { kind: 'bytes'; data: Buffer }
  | { kind: 'file'; handle: fs.promises.FileHandle; size: number; relativePath: string };

export interface MultipartEncoderOptions {
  /** Fixed boundary (default: random) */
  boundary?: string;

  /** File read size in bytes (default: 8 KiB) */
  chunkSize?: number;
}

/** Quote a header parameter value: backslash and double quote are escaped. */
function quoteParam(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function partHeader(boundary: string, name: string, filename?: string): Buffer {
  const lines = [`--${boundary}`];
  if (filename === undefined) {
    lines.push(`Content-Disposition: form-data; name=${quoteParam(name)}`);
  } else {
    lines.push(
      `Content-Disposition: form-data; name=${quoteParam(name)}; filename=${quoteParam(filename)}`,
      'Content-Type: application/octet-stream'
    );
  }
  return Buffer.from(lines.join(CRLF) + CRLF + CRLF, 'utf-8');
}

function textPart(boundary: string, name: string, value: string): Buffer {
  return Buffer.concat([partHeader(boundary, name), Buffer.from(value + CRLF, 'utf-8')]);
}

export class MultipartEncoder {
  readonly boundary: string;
  readonly length: number;

  private readonly segments: BodySegment[];
  private readonly chunkSize: number;
  private closed = false;

  private constructor(boundary: string, segments: BodySegment[], chunkSize: number) {
    this.boundary = boundary;
    this.segments = segments;
    this.chunkSize = chunkSize;
    this.length = segments.reduce(
      (sum, segment) => sum + (segment.kind === 'bytes' ? segment.data.length : segment.size),
      0
    );
  }

  /**
   * Open every manifest file and lay out the body.
   *
   * If any file cannot be opened, the handles opened so far are closed and
   * an UploadError is thrown.
   */
  static async open(
    manifest: UploadManifest,
    options: MultipartEncoderOptions = {}
  ): Promise<MultipartEncoder> {
    const boundary = options.boundary ?? randomBytes(16).toString('hex');
    const segments: BodySegment[] = [];
    const handles: fs.promises.FileHandle[] = [];

    try {
      let index = 1;
      for (const entry of manifest.entries) {
        const handle = await fs.promises.open(entry.absolutePath, 'r');
        handles.push(handle);
        const { size } = await handle.stat();

        const field = `raw.asset${index}`;
        segments.push({
          kind: 'bytes',
          data: partHeader(boundary, field, path.posix.basename(entry.relativePath)),
        });
        segments.push({ kind: 'file', handle, size, relativePath: entry.relativePath });
        segments.push({
          kind: 'bytes',
          data: Buffer.concat([
            Buffer.from(CRLF, 'utf-8'),
            textPart(boundary, `${field}.filename`, entry.relativePath),
          ]),
        });
        index++;
      }
    } catch (err) {
      await Promise.allSettled(handles.map((handle) => handle.close()));
      throw new UploadError(`Failed to open files for upload: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    segments.push({
      kind: 'bytes',
      data: Buffer.concat([
        textPart(boundary, 'raw.directory', manifest.directory ?? ''),
        Buffer.from(`--${boundary}--${CRLF}`, 'utf-8'),
      ]),
    });

    return new MultipartEncoder(boundary, segments, options.chunkSize ?? DEFAULT_READ_CHUNK_SIZE);
  }

  /** Content-Type header value, boundary included */
  get contentType(): string {
    return `multipart/form-data; boundary=${this.boundary}`;
  }

  /**
   * The encoded body as a byte stream. Each file contributes exactly the
   * size it had when opened; a file that shrinks in the meantime fails the
   * stream.
   */
  stream(): Readable {
    return Readable.from(this.generate(), { objectMode: false });
  }

  private async *generate(): AsyncGenerator<Buffer> {
    for (const segment of this.segments) {
      if (segment.kind === 'bytes') {
        yield segment.data;
        continue;
      }

      let position = 0;
      while (position < segment.size) {
        const want = Math.min(this.chunkSize, segment.size - position);
        const buffer = Buffer.alloc(want);
        const { bytesRead } = await segment.handle.read(buffer, 0, want, position);
        if (bytesRead === 0) {
          throw new UploadError(
            `File changed while uploading: ${segment.relativePath} ended at ${position} of ${segment.size} bytes`
          );
        }
        position += bytesRead;
        yield bytesRead === want ? buffer : buffer.subarray(0, bytesRead);
      }
    }
  }

  /**
   * Close every file handle. Returns the errors raised while closing;
   * calling again is a no-op.
   */
  async close(): Promise<Error[]> {
    if (this.closed) return [];
    this.closed = true;

    const settled = await Promise.allSettled(
      this.segments.flatMap((segment) => (segment.kind === 'file' ? [segment.handle.close()] : []))
    );

    const errors: Error[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        errors.push(reason instanceof Error ? reason : new Error(String(reason)));
      }
    }
    return errors;
  }
}

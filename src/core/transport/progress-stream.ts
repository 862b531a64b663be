/**
 * Progress-observing pass-through stream.
 *
 * Counts bytes as the downstream consumer pulls them and reports each
 * chunk to an injected sink. Knows nothing about HTTP; the same class
 * sits between a response body and a file, or between a multipart body
 * and the HTTP client.
 */

import { Transform } from 'node:stream';
import type { TransformCallback, TransformOptions } from 'node:stream';

export interface ProgressUpdate {
  /** Bytes in the chunk that just passed through */
  chunkBytes: number;
  /** Cumulative bytes passed through so far */
  bytesTransferred: number;
}

export type ProgressSink = (update: ProgressUpdate) => void;

export class ProgressStream extends Transform {
  private readonly sink: ProgressSink | undefined;
  private _bytesTransferred = 0;

  constructor(sink?: ProgressSink, options?: TransformOptions) {
    super(options);
    this.sink = sink;
  }

  get bytesTransferred(): number {
    return this._bytesTransferred;
  }

  override _transform(
    chunk: Buffer | Uint8Array,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this._bytesTransferred += chunk.length;
    try {
      this.sink?.({ chunkBytes: chunk.length, bytesTransferred: this._bytesTransferred });
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, chunk);
  }
}

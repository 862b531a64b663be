/**
 * Single-asset downloader.
 *
 * Streams one asset body to disk in chunkSizeBytes pieces, reporting byte
 * progress as it goes. Failures come back as a DownloadResult carrying a
 * TransferError; nothing here throws for a per-asset problem.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import type { RepositoryConfig } from '../config/types.js';
import { TransferError, errorMessage } from '../errors.js';
import type { HttpTransport } from '../transport/http-transport.js';
import {
  contentLengthOf,
  isSuccessStatus,
  readErrorBody,
  toNodeStream,
} from '../transport/http-transport.js';
import { ProgressStream } from '../transport/progress-stream.js';
import type { DownloadProgressCallback, DownloadResult, DownloadTask } from './types.js';

/**
 * Path of an asset relative to the destination directory.
 *
 * The leading slash is dropped. With `basePath`, an asset under that folder
 * is placed relative to it instead of the repository root.
 */
export function assetRelativePath(assetPath: string, basePath?: string): string {
  const stripped = assetPath.replace(/^\/+/, '');
  if (!basePath) return stripped;

  const base = basePath.replace(/^\/+/, '').replace(/\/+$/, '');
  if (base !== '' && stripped.startsWith(`${base}/`)) {
    return stripped.slice(base.length + 1);
  }
  return stripped;
}

/**
 * Host path for a relative asset path under `destinationDir`, or null when
 * the path would land outside it.
 */
export function resolveLocalPath(destinationDir: string, relativePath: string): string | null {
  const segments = relativePath.split('/').filter((segment) => segment !== '');
  if (segments.length === 0) return null;

  const localPath = path.join(destinationDir, ...segments);
  const root = path.resolve(destinationDir);
  const resolved = path.resolve(localPath);
  const rootPrefix = root.endsWith(path.sep) ? root : root + path.sep;

  return resolved.startsWith(rootPrefix) ? localPath : null;
}

export class AssetDownloader {
  private readonly transport: HttpTransport;
  private readonly config: RepositoryConfig;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, config: RepositoryConfig, logger: Logger) {
    this.transport = transport;
    this.config = config;
    this.logger = logger.child({ component: 'asset-downloader' });
  }

  /**
   * Download one asset to its task's local path.
   *
   * Intermediate directories are created first. A non-2xx response, a
   * connection failure or a write failure all produce a failed result.
   */
  async download(
    task: DownloadTask,
    onProgress?: DownloadProgressCallback
  ): Promise<DownloadResult> {
    const startTime = Date.now();
    const assetPath = task.asset.path;
    let contentLength = 0;
    let bytesWritten = 0;

    try {
      await fs.promises.mkdir(path.dirname(task.localPath), { recursive: true });

      const response = await this.transport.get(task.asset.downloadUrl);
      if (!isSuccessStatus(response.status)) {
        const body = await readErrorBody(response);
        throw new TransferError(
          assetPath,
          `Failed to download ${assetPath}: ${response.status} ${body}`.trim(),
          { statusCode: response.status }
        );
      }

      contentLength = contentLengthOf(response);

      const progress = new ProgressStream((update) => {
        bytesWritten = update.bytesTransferred;
        onProgress?.({
          assetPath,
          chunkBytes: update.chunkBytes,
          bytesTransferred: update.bytesTransferred,
          contentLength,
        });
      });

      await pipeline(
        toNodeStream(response, this.config.chunkSizeBytes),
        progress,
        fs.createWriteStream(task.localPath, { highWaterMark: this.config.chunkSizeBytes })
      );
      bytesWritten = progress.bytesTransferred;

      const durationMs = Date.now() - startTime;
      this.logger.debug(
        { assetPath, localPath: task.localPath, bytesWritten, durationMs },
        'Asset downloaded'
      );

      return {
        assetPath,
        localPath: task.localPath,
        success: true,
        bytesWritten,
        contentLength,
        durationMs,
      };
    } catch (err) {
      const error = err instanceof TransferError
        ? err
        : new TransferError(assetPath, `Failed to download ${assetPath}: ${errorMessage(err)}`, {
          cause: err,
        });

      this.logger.warn(
        { assetPath, localPath: task.localPath, error: error.message },
        'Asset download failed'
      );

      return {
        assetPath,
        localPath: task.localPath,
        success: false,
        bytesWritten,
        contentLength,
        durationMs: Date.now() - startTime,
        error,
      };
    }
  }
}

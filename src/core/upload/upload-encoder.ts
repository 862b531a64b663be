/**
 * UploadEncoder - posts a local directory tree to a raw repository as one
 * component.
 *
 * Integrates:
 * - collectFiles / buildUploadManifest: what gets sent
 * - MultipartEncoder: how it is framed and streamed
 * - ProgressStream: bytes read by the HTTP client
 *
 * The repository answers 204 on success; anything else is a failure.
 * uploadAll never throws: every failure comes back in the outcome.
 */

import { pipeline } from 'node:stream';
import type { Logger } from 'pino';
import type { RepositoryConfig } from '../config/types.js';
import { UploadError, errorMessage } from '../errors.js';
import { parseGlobFilter } from '../filter/glob-filter.js';
import { componentLogger } from '../logger.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { readErrorBody } from '../transport/http-transport.js';
import { ProgressStream } from '../transport/progress-stream.js';
import { buildUploadManifest, collectFiles } from './file-collector.js';
import { MultipartEncoder } from './multipart-encoder.js';
import type { UploadManifest, UploadOptions, UploadOutcome } from './types.js';
import { COMPONENTS_PATH, UPLOAD_SUCCESS_STATUS } from './types.js';

export class UploadEncoder {
  private readonly transport: HttpTransport;
  private readonly config: RepositoryConfig;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, config: RepositoryConfig, logger: Logger) {
    this.transport = transport;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Upload every file under `sourceDir` to `repository`, preserving
   * relative paths under `options.directory`.
   */
  async uploadAll(
    sourceDir: string,
    repository: string,
    options: UploadOptions = {}
  ): Promise<UploadOutcome> {
    const startTime = Date.now();
    const logger = componentLogger(this.logger, 'upload-encoder', options.quiet);
    const emptyManifest: UploadManifest = { entries: [], directory: options.directory };

    let manifest: UploadManifest;
    try {
      const entries = await collectFiles(sourceDir);
      manifest = buildUploadManifest(entries, options.directory, parseGlobFilter(options.glob));
    } catch (err) {
      const error = err instanceof UploadError
        ? err
        : new UploadError(errorMessage(err), { cause: err });
      logger.error({ sourceDir, error: error.message }, 'Failed to collect files');
      return this.failure(emptyManifest, error, startTime);
    }

    logger.info(
      { sourceDir, repository, directory: manifest.directory, files: manifest.entries.length },
      'Collected files for upload'
    );

    if (options.dryRun) {
      return {
        success: true,
        fileCount: manifest.entries.length,
        totalBytes: 0,
        bytesSent: 0,
        durationMs: Date.now() - startTime,
        manifest,
      };
    }

    let encoder: MultipartEncoder;
    try {
      encoder = await MultipartEncoder.open(manifest, { chunkSize: this.config.chunkSizeBytes });
    } catch (err) {
      const error = err instanceof UploadError
        ? err
        : new UploadError(errorMessage(err), { cause: err });
      logger.error({ sourceDir, error: error.message }, 'Failed to prepare upload body');
      return this.failure(manifest, error, startTime);
    }

    const totalBytes = encoder.length;
    const progress = new ProgressStream((update) => {
      options.onProgress?.({
        chunkBytes: update.chunkBytes,
        bytesSent: update.bytesTransferred,
        totalBytes,
      });
    });
    const body = encoder.stream();

    try {
      pipeline(body, progress, (err) => {
        if (err) {
          logger.debug({ error: err.message }, 'Upload body stream ended with error');
        }
      });

      const url = this.transport.buildUrl(COMPONENTS_PATH, { repository });
      const response = await this.transport.post(url, progress, {
        'Content-Type': encoder.contentType,
      });

      const base = {
        fileCount: manifest.entries.length,
        totalBytes,
        bytesSent: progress.bytesTransferred,
        statusCode: response.status,
        manifest,
      };

      if (response.status !== UPLOAD_SUCCESS_STATUS) {
        const responseBody = await readErrorBody(response);
        const error = new UploadError(
          `Failed to upload files: ${response.status} ${responseBody}`.trim(),
          { statusCode: response.status, responseBody }
        );
        logger.error({ repository, status: response.status }, 'Upload rejected');
        return { ...base, success: false, durationMs: Date.now() - startTime, error };
      }

      logger.info(
        { repository, files: base.fileCount, bytes: base.bytesSent },
        'Upload complete'
      );
      return { ...base, success: true, durationMs: Date.now() - startTime };
    } catch (err) {
      const error = new UploadError(`Failed to upload files: ${errorMessage(err)}`, { cause: err });
      logger.error({ repository, error: error.message }, 'Upload failed');
      return {
        ...this.failure(manifest, error, startTime),
        totalBytes,
        bytesSent: progress.bytesTransferred,
      };
    } finally {
      body.destroy();
      progress.destroy();
      const closeErrors = await encoder.close();
      for (const closeError of closeErrors) {
        logger.warn({ error: closeError.message }, 'Failed to close upload file handle');
      }
    }
  }

  private failure(manifest: UploadManifest, error: UploadError, startTime: number): UploadOutcome {
    return {
      success: false,
      fileCount: manifest.entries.length,
      totalBytes: 0,
      bytesSent: 0,
      durationMs: Date.now() - startTime,
      manifest,
      error,
    };
  }
}

/**
 * DownloadCoordinator - fans a listed batch of assets out across a bounded
 * worker pool and aggregates the per-asset results.
 *
 * Integrates:
 * - AssetDownloader: streams one asset to disk
 * - path planning: maps each asset path under the destination directory
 *
 * At most min(maxConcurrentDownloads, N) downloads are in flight. One
 * asset failing never stops the others.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { validateRepositoryConfig } from '../config/config.js';
import type { RepositoryConfig } from '../config/types.js';
import { ConfigError, TransferError, errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { AssetDownloader, assetRelativePath, resolveLocalPath } from './asset-downloader.js';
import type {
  AssetRecord,
  DownloadCoordinatorEvents,
  DownloadOptions,
  DownloadOutcome,
  DownloadProgress,
  DownloadResult,
  DownloadTask,
} from './types.js';

/**
 * Typed event emitter interface for the download coordinator.
 */
export interface TypedDownloadCoordinatorEmitter {
  on<K extends keyof DownloadCoordinatorEvents>(
    event: K,
    listener: DownloadCoordinatorEvents[K]
  ): this;
  off<K extends keyof DownloadCoordinatorEvents>(
    event: K,
    listener: DownloadCoordinatorEvents[K]
  ): this;
  emit<K extends keyof DownloadCoordinatorEvents>(
    event: K,
    ...args: Parameters<DownloadCoordinatorEvents[K]>
  ): boolean;
}

/** A planned batch: runnable tasks plus assets refused at planning time */
export interface DownloadPlan {
  tasks: DownloadTask[];
  rejected: DownloadResult[];
}

export class DownloadCoordinator
  extends EventEmitter
  implements TypedDownloadCoordinatorEmitter
{
  private readonly config: RepositoryConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: RepositoryConfig, transport: HttpTransport, logger: Logger) {
    super();

    const errors = validateRepositoryConfig(config);
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }

    this.config = config;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Map assets to local paths under `destinationDir`.
   *
   * An asset whose path would escape the destination (via `..` segments)
   * is not downloaded; it comes back as a failed result instead.
   */
  planTasks(
    records: AssetRecord[],
    destinationDir: string,
    options: Pick<DownloadOptions, 'basePath' | 'flatten'> = {}
  ): DownloadPlan {
    const tasks: DownloadTask[] = [];
    const rejected: DownloadResult[] = [];

    for (const asset of records) {
      const relativePath = assetRelativePath(
        asset.path,
        options.flatten ? options.basePath : undefined
      );
      const localPath = resolveLocalPath(destinationDir, relativePath);

      if (localPath === null) {
        rejected.push({
          assetPath: asset.path,
          localPath: '',
          success: false,
          bytesWritten: 0,
          contentLength: 0,
          durationMs: 0,
          error: new TransferError(
            asset.path,
            `Refusing to download ${asset.path}: path resolves outside ${destinationDir}`
          ),
        });
        continue;
      }

      tasks.push({ asset, relativePath, localPath });
    }

    return { tasks, rejected };
  }

  /**
   * Download every asset into `destinationDir`, preserving each asset's
   * repository path beneath it.
   *
   * Resolves once every task has finished. Per-asset failures are counted
   * in the outcome, never thrown.
   */
  async downloadAll(
    records: AssetRecord[],
    destinationDir: string,
    options: DownloadOptions = {}
  ): Promise<DownloadOutcome> {
    const startTime = Date.now();
    const scoped = options.quiet ? this.logger.child({}, { level: 'silent' }) : this.logger;
    const logger = componentLogger(scoped, 'download-coordinator');
    const downloader = new AssetDownloader(this.transport, this.config, scoped);

    const { tasks, rejected } = this.planTasks(records, destinationDir, options);
    const results: DownloadResult[] = [];

    for (const result of rejected) {
      logger.warn({ assetPath: result.assetPath }, 'Asset path rejected');
      results.push(result);
      this.emitComplete(result, logger);
    }

    const onProgress = (progress: DownloadProgress): void => {
      this.emit('progress', progress);
      options.onProgress?.(progress);
    };

    const workerCount = Math.min(this.config.maxConcurrentDownloads, tasks.length);
    logger.info(
      { assets: records.length, tasks: tasks.length, workers: workerCount, destinationDir },
      'Starting download batch'
    );

    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        const task = tasks[nextIndex++];
        if (!task) break;

        const result = await this.runTask(downloader, task, onProgress);
        results.push(result);
        this.emitComplete(result, logger);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const succeeded = results.filter((r) => r.success).length;
    const failed = results.length - succeeded;
    const outcome: DownloadOutcome = {
      success: failed === 0,
      total: records.length,
      succeeded,
      failed,
      bytesWritten: results.reduce((sum, r) => sum + r.bytesWritten, 0),
      durationMs: Date.now() - startTime,
      results,
    };

    logger.info(
      {
        total: outcome.total,
        succeeded,
        failed,
        bytesWritten: outcome.bytesWritten,
        durationMs: outcome.durationMs,
      },
      'Download batch complete'
    );

    return outcome;
  }

  /** A throwing listener is logged; it must not abort the worker that emitted */
  private emitComplete(result: DownloadResult, logger: Logger): void {
    try {
      this.emit('assetComplete', result);
    } catch (err) {
      logger.warn(
        { assetPath: result.assetPath, error: errorMessage(err) },
        'assetComplete listener failed'
      );
    }
  }

  private async runTask(
    downloader: AssetDownloader,
    task: DownloadTask,
    onProgress: (progress: DownloadProgress) => void
  ): Promise<DownloadResult> {
    const startTime = Date.now();
    try {
      this.emit('assetStart', task);
      return await downloader.download(task, onProgress);
    } catch (err) {
      // A throwing progress or start listener lands here
      return {
        assetPath: task.asset.path,
        localPath: task.localPath,
        success: false,
        bytesWritten: 0,
        contentLength: 0,
        durationMs: Date.now() - startTime,
        error: new TransferError(
          task.asset.path,
          `Failed to download ${task.asset.path}: ${errorMessage(err)}`,
          { cause: err }
        ),
      };
    }
  }
}

/**
 * Sum of the repository-recorded sizes, or 0 when any asset lacks one.
 */
export function totalRecordedSize(records: AssetRecord[]): number {
  let total = 0;
  for (const record of records) {
    if (record.fileSize === undefined) return 0;
    total += record.fileSize;
  }
  return total;
}

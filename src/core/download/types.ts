/**
 * Types for the download pipeline.
 *
 * Assets are enumerated through the paginated search endpoint and fanned
 * out across a bounded pool of workers, each streaming one asset to disk.
 */

import type { TransferError } from '../errors.js';

/** Search endpoint, relative to the repository base URL */
export const SEARCH_ASSETS_PATH = '/service/rest/v1/search/assets';

/** Remote metadata for one stored file, as returned by asset search */
export interface AssetRecord {
  /** Repository-relative path, forward slashes (may carry a leading /) */
  path: string;

  /** Absolute URL the asset content is served from */
  downloadUrl: string;

  /** Asset id */
  id?: string;

  /** Repository the asset belongs to */
  repository?: string;

  /** Repository format (always raw here) */
  format?: string;

  /** MIME type recorded by the repository */
  contentType?: string;

  /** Size in bytes as recorded by the repository (used for aggregate progress) */
  fileSize?: number;
}

/** One page of search results */
export interface SearchPage {
  items: AssetRecord[];

  /** Cursor for the next page; null when this is the last page */
  continuationToken: string | null;
}

/** One asset paired with its local destination */
export interface DownloadTask {
  asset: AssetRecord;

  /** Forward-slash path under the destination directory */
  relativePath: string;

  /** Host path the asset is written to */
  localPath: string;
}

/** Result of downloading a single asset */
export interface DownloadResult {
  /** Asset path as listed */
  assetPath: string;

  /** Host path written to */
  localPath: string;

  /** Whether the download succeeded */
  success: boolean;

  /** Bytes written to disk */
  bytesWritten: number;

  /** content-length of the response (0 when unknown) */
  contentLength: number;

  /** Duration of the download in milliseconds */
  durationMs: number;

  /** Failure cause if the download failed */
  error?: TransferError;
}

/** Aggregate result of a download batch */
export interface DownloadOutcome {
  /** True iff no task failed */
  success: boolean;

  /** Number of tasks submitted */
  total: number;

  succeeded: number;

  failed: number;

  /** Total bytes written across all tasks */
  bytesWritten: number;

  /** Wall-clock duration of the batch in milliseconds */
  durationMs: number;

  /** Per-task results, in completion order */
  results: DownloadResult[];
}

/** Byte progress for one asset */
export interface DownloadProgress {
  assetPath: string;

  /** Bytes in the chunk just written */
  chunkBytes: number;

  /** Cumulative bytes written for this asset */
  bytesTransferred: number;

  /** content-length of the response (0 when unknown) */
  contentLength: number;
}

export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/** Options for a download batch */
export interface DownloadOptions {
  /** Silence logging for this batch */
  quiet?: boolean;

  /**
   * Folder the assets were listed from. With `flatten`, this prefix is
   * stripped from each asset path before it is placed under the destination.
   */
  basePath?: string;

  /** Place assets relative to `basePath` instead of the repository root */
  flatten?: boolean;

  /** Byte progress sink */
  onProgress?: DownloadProgressCallback;
}

/** Events emitted by the DownloadCoordinator */
export interface DownloadCoordinatorEvents {
  /** A worker picked up a task */
  assetStart: (task: DownloadTask) => void;

  /** Bytes were written for an asset */
  progress: (progress: DownloadProgress) => void;

  /** A task finished, successfully or not */
  assetComplete: (result: DownloadResult) => void;
}

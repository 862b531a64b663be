/**
 * Types for the upload module.
 *
 * A source directory is walked into a manifest, encoded as a single
 * multipart/form-data body and posted as one raw component.
 */

import type { UploadError } from '../errors.js';

/** Component upload endpoint, relative to the repository base URL */
export const COMPONENTS_PATH = '/service/rest/v1/components';

/** Success status for a component upload */
export const UPLOAD_SUCCESS_STATUS = 204;

/** One local file selected for upload */
export interface UploadManifestEntry {
  /** Host path of the file */
  absolutePath: string;

  /** Path relative to the source directory, forward slashes */
  relativePath: string;

  /** Size in bytes at collection time */
  size: number;
}

/** Everything that goes into one component upload */
export interface UploadManifest {
  entries: readonly UploadManifestEntry[];

  /** Repository subdirectory the files are placed under */
  directory?: string;
}

/** Byte progress for the request body */
export interface UploadProgress {
  /** Bytes in the chunk just read by the HTTP client */
  chunkBytes: number;

  /** Cumulative bytes read */
  bytesSent: number;

  /** Exact length of the encoded body */
  totalBytes: number;
}

export type UploadProgressCallback = (progress: UploadProgress) => void;

/** Options for uploadAll */
export interface UploadOptions {
  /** Repository subdirectory to place the files under */
  directory?: string;

  /** Comma-separated include/exclude glob patterns */
  glob?: string;

  /** Build the manifest but send nothing */
  dryRun?: boolean;

  /** Silence logging for this upload */
  quiet?: boolean;

  /** Byte progress sink */
  onProgress?: UploadProgressCallback;
}

/** Result of one component upload */
export interface UploadOutcome {
  /** True iff the repository answered 204 (or this was a dry run) */
  success: boolean;

  /** Number of files in the manifest */
  fileCount: number;

  /** Exact length of the encoded body (0 for a dry run) */
  totalBytes: number;

  /** Bytes the HTTP client read from the body */
  bytesSent: number;

  durationMs: number;

  /** Response status, when a response arrived */
  statusCode?: number;

  /** Manifest that was (or, for a dry run, would have been) sent */
  manifest: UploadManifest;

  /** Failure cause if the upload failed */
  error?: UploadError;
}

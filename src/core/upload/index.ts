/**
 * Upload module - walks a local tree and posts it as one raw component.
 */

export { UploadEncoder } from './upload-encoder.js';
export { MultipartEncoder } from './multipart-encoder.js';
export type { MultipartEncoderOptions } from './multipart-encoder.js';
export { collectFiles, buildUploadManifest } from './file-collector.js';
export { COMPONENTS_PATH, UPLOAD_SUCCESS_STATUS } from './types.js';
export type {
  UploadManifestEntry,
  UploadManifest,
  UploadProgress,
  UploadProgressCallback,
  UploadOptions,
  UploadOutcome,
} from './types.js';

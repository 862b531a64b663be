/**
 * Download module - lists raw assets under a folder and streams them to disk.
 */

export { AssetLister, buildSearchQuery, parseSearchPage, filterAssets } from './asset-lister.js';
export { AssetDownloader, assetRelativePath, resolveLocalPath } from './asset-downloader.js';
export { DownloadCoordinator, totalRecordedSize } from './download-coordinator.js';
export type { TypedDownloadCoordinatorEmitter, DownloadPlan } from './download-coordinator.js';
export { SEARCH_ASSETS_PATH } from './types.js';
export type {
  AssetRecord,
  SearchPage,
  DownloadTask,
  DownloadResult,
  DownloadOutcome,
  DownloadProgress,
  DownloadProgressCallback,
  DownloadOptions,
  DownloadCoordinatorEvents,
} from './types.js';

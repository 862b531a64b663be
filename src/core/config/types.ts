/**
 * Types for repository connection configuration.
 *
 * One RepositoryConfig is built at process start and handed to every
 * transfer component; nothing reads the environment after that.
 */

/** Connection and tuning settings shared by upload and download */
export interface RepositoryConfig {
  /** Repository base URL, without trailing slash (e.g., http://localhost:8081) */
  baseUrl: string;

  /** Basic-auth username */
  username: string;

  /** Basic-auth password */
  password: string;

  /** Upper bound on parallel asset downloads */
  maxConcurrentDownloads: number;

  /** Read/write chunk size for streamed file I/O, in bytes */
  chunkSizeBytes: number;
}

/** Shape of the optional JSON config file */
export interface RepositoryConfigFile {
  url?: string;
  username?: string;
  password?: string;
}

/** Default configuration values */
export const DEFAULT_REPOSITORY_CONFIG: RepositoryConfig = {
  baseUrl: 'http://localhost:8081',
  username: 'admin',
  password: 'admin',
  maxConcurrentDownloads: 8,
  chunkSizeBytes: 8 * 1024,
};

/** Options controlling where buildRepositoryConfig looks for values */
export interface ConfigSourceOptions {
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Explicit config file path (default: RAW_TRANSFER_CONFIG or ~/.raw-transfer/config.json) */
  configPath?: string;

  /** Receives non-fatal problems, such as an unreadable config file */
  onWarning?: (message: string) => void;
}

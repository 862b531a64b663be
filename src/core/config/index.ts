export {
  buildRepositoryConfig,
  validateRepositoryConfig,
  loadRepositoryConfig,
  readConfigFile,
  getConfigFilePath,
} from './config.js';
export type {
  RepositoryConfig,
  RepositoryConfigFile,
  ConfigSourceOptions,
} from './types.js';
export { DEFAULT_REPOSITORY_CONFIG } from './types.js';

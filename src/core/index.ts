/**
 * Library entry point: raw repository upload and download.
 */

export * from './config/index.js';
export * from './download/index.js';
export * from './upload/index.js';
export * from './filter/index.js';
export * from './transport/index.js';
export * from './errors.js';
export { createLogger, componentLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';

export {
  HttpTransport,
  isSuccessStatus,
  readErrorBody,
  toNodeStream,
  contentLengthOf,
} from './http-transport.js';
export type { HttpTransportOptions, QueryParams } from './http-transport.js';
export { ProgressStream } from './progress-stream.js';
export type { ProgressSink, ProgressUpdate } from './progress-stream.js';

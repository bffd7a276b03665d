export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';
export {
  FfmpegToolkit,
  escapeConcatPath,
  parseTimemark,
  parseLastTime,
  type FfmpegToolkitOptions,
} from './media/ffmpeg.js';
export { sanitizeDocumentId, documentWorkDir } from './paths.js';

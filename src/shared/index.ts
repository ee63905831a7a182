export { McpError, invalidParams, notFound, upstreamError, mappingError, isMappingError } from './errors.js';
export type { ErrorCode } from './errors.js';
export { createCollectingLogger, createStderrLogger, logLevelFromEnv, LOG_LEVEL_ENV } from './logger.js';
export type { LogEntry, Logger, LogLevel } from './logger.js';
export { MAINFILE_ENV, resolveMainfile, resolvePathFromEnv, validateFilePath } from './paths.js';

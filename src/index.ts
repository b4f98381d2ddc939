export { classify, normalizeSuffix } from './classifier.js';
export { ConfigManager, DEFAULT_CONFIG, type AppConfig } from './config.js';
export { assertDirectory, bucketOf, groupEntries, listEntries } from './grouper.js';
export { AppError, Logger, logger, type ErrorCode, type LogLevel } from './logger.js';
export { FileTypeOracle } from './mime-oracle.js';
export { COMMON_LABEL, OperationLog, REVERT_LABEL } from './operation-log.js';
export {
  planCoverReindex,
  planDirectoryReindex,
  planFlatten,
  planReindex,
  planTypeReindex,
  validateMapping,
  type ReindexOptions,
} from './planner.js';
export { Relame, type OperationResult } from './relame.js';
export { assertSourcesExist, executeMapping, invertMapping } from './renamer.js';
export { needsConfirmation } from './safety.js';
export { commonAffixes, sequence } from './sequencer.js';
export * from './types.js';

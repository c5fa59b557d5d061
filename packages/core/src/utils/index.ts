// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  ConfigError,
  PlanError,
  CycleError,
  StepError,
  StoreError,
  DatabaseError,
  isStepError,
  errorMessage,
} from './errors.js';
export type { StepErrorKind } from './errors.js';
export { withRetry, backoffDelay } from './retry.js';
export type { RetryOptions } from './retry.js';
export { createLogger, silentLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep, isoNow, formatDuration } from './time.js';
export { stableStringify, sha256, hashValue, hashFile, hashPath } from './hash.js';
export { parseVersion, compareVersions, formatVersion, satisfiesMinimum, isSemVer } from './semver.js';
export type { SemVer } from './semver.js';
export { isErrno, pathExists, atomicWriteFile, atomicCopy, commitTemp, tempSibling } from './fs.js';
export {
  CONFIG_FILENAME,
  DEFAULT_STEP_TIMEOUT_SEC,
  LOCK_TIMEOUT_MS,
  MIN_REVISION_LENGTH,
  MS_PER_DAY,
} from './constants.js';

// packages/core/src/utils/constants.ts — Shared magic number constants

/** Config file looked up in the project directory */
export const CONFIG_FILENAME = '.kiln.yml';

/** Default per-step timeout in seconds */
export const DEFAULT_STEP_TIMEOUT_SEC = 3600;

/** Default retry ceiling for transient step failures */
export const DEFAULT_RETRY_ATTEMPTS = 3;

/** Default first backoff delay in milliseconds */
export const DEFAULT_BACKOFF_MS = 1000;

/** Default backoff cap in milliseconds */
export const DEFAULT_MAX_BACKOFF_MS = 30_000;

/** Lock acquisition timeout in milliseconds */
export const LOCK_TIMEOUT_MS = 30_000;

/** A lock older than this is considered abandoned */
export const LOCK_STALE_MS = 6 * 60 * 60 * 1000;

/** Captured output kept in memory per stream */
export const MAX_CAPTURE_BYTES = 1024 * 1024;

/** Grace period between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 5000;

/** Minimum length of a pinned revision prefix */
export const MIN_REVISION_LENGTH = 7;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

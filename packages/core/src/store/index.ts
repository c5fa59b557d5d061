// packages/core/src/store/index.ts -- barrel re-export

export { ArtifactStore } from './artifact-store.js';
export type { ArtifactStoreOptions, PutOptions, RestoreResult } from './artifact-store.js';
export { acquireLock, releaseLock, withLock, LockContentionError } from './lock.js';
export type { LockHandle, LockHolder, LockOptions } from './lock.js';
export { readManifest, writeManifest, emptyManifest, MANIFEST_FILENAME } from './manifest.js';
export type { Manifest, ManifestEntry } from './manifest.js';
export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { RunStore } from './run-store.js';
export type { RunSummary } from './run-store.js';

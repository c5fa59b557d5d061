// packages/core/src/store/artifact-store.ts — Content-addressed step outputs on disk

import { mkdir, readdir, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ArtifactRecord, EvictScope, ProducedArtifact } from '../types/artifact.js';
import { LOCK_STALE_MS, LOCK_TIMEOUT_MS } from '../utils/constants.js';
import { StoreError } from '../utils/errors.js';
import { atomicCopy, commitTemp, isErrno, tempSibling } from '../utils/fs.js';
import { hashPath, hashValue } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isoNow } from '../utils/time.js';
import { acquireLock, withLock } from './lock.js';
import { type Manifest, type ManifestEntry, readManifest, writeManifest } from './manifest.js';

export interface ArtifactStoreOptions {
  /** Cache root; each version gets its own subdirectory. */
  root: string;
  version: string;
  logger?: Logger;
  lockTimeoutMs?: number;
  staleLockMs?: number;
}

export interface PutOptions {
  /** Longest wait for another process producing the same fingerprint. */
  waitMs?: number;
  /** Sleeps between lock attempts; resolving false abandons the wait. */
  wait?: (ms: number) => Promise<boolean>;
}

/** Result of restoring a record into a work directory. */
export type RestoreResult = 'unchanged' | 'restored' | 'corrupt';

const OBJECTS_DIR = 'objects';
const LOCKS_DIR = 'locks';

/**
 * Layout: `<root>/<version>/manifest.yml`, `objects/<fingerprint>/<outputs>`
 * and `locks/`. Concurrent `put` calls for one fingerprint produce once: in
 * process through a shared promise, across processes through a lock file.
 */
export class ArtifactStore {
  private readonly root: string;
  private readonly version: string;
  private readonly logger: Logger;
  private readonly lockTimeoutMs: number;
  private readonly staleLockMs: number;
  private readonly inflight = new Map<string, Promise<ArtifactRecord>>();

  constructor(options: ArtifactStoreOptions) {
    this.root = resolve(options.root);
    this.version = options.version;
    this.logger = options.logger ?? silentLogger();
    this.lockTimeoutMs = options.lockTimeoutMs ?? LOCK_TIMEOUT_MS;
    this.staleLockMs = options.staleLockMs ?? LOCK_STALE_MS;
  }

  get scopeDir(): string {
    return join(this.root, this.version);
  }

  objectDir(fingerprint: string): string {
    return join(this.scopeDir, OBJECTS_DIR, fingerprint);
  }

  async get(fingerprint: string): Promise<ArtifactRecord | null> {
    const manifest = await readManifest(this.scopeDir, this.version);
    const entry = manifest.entries[fingerprint];
    return entry ? this.toRecord(fingerprint, entry) : null;
  }

  /**
   * Return the record for `fingerprint`, running `producer` and ingesting its
   * outputs only if no record exists yet. While another process produces the
   * same fingerprint, waits up to `options.waitMs` (default `lockTimeoutMs`).
   */
  put(
    fingerprint: string,
    producer: () => Promise<ProducedArtifact>,
    options: PutOptions = {},
  ): Promise<ArtifactRecord> {
    const pending = this.inflight.get(fingerprint);
    if (pending) return pending;
    const promise = this.produce(fingerprint, producer, options).finally(() => this.inflight.delete(fingerprint));
    this.inflight.set(fingerprint, promise);
    return promise;
  }

  /**
   * Make the work directory's copy of each output match the record. Outputs
   * already identical are left alone. A record whose stored objects no longer
   * match their hashes is evicted and reported as `corrupt`. `exclude` names
   * paths inside the outputs that other steps own; they are not compared.
   */
  async restore(record: ArtifactRecord, workDir: string, exclude: readonly string[] = []): Promise<RestoreResult> {
    const excluded = new Set(exclude.map((path) => resolve(workDir, path)));
    let restored = false;
    for (const output of record.outputs) {
      const expected = record.outputHashes[output];
      const target = resolve(workDir, output);
      if (expected !== undefined && (await hashPath(target, excluded)) === expected) continue;

      const stored = join(record.path, output);
      if (expected === undefined || (await hashPath(stored)) !== expected) {
        this.logger.warn(`Cache entry ${record.fingerprint.slice(0, 12)} (${record.stepId}) is corrupt; evicting`);
        await this.remove([record.fingerprint]);
        return 'corrupt';
      }
      await atomicCopy(stored, target);
      restored = true;
    }
    return restored ? 'restored' : 'unchanged';
  }

  /** Records of this store's version, oldest first. */
  async list(): Promise<ArtifactRecord[]> {
    const manifest = await readManifest(this.scopeDir, this.version);
    return Object.entries(manifest.entries)
      .map(([fp, entry]) => this.toRecord(fp, entry))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /** Version directories present under the cache root. */
  async scopes(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return [];
      throw err;
    }
  }

  /** Remove records in `scope`; returns how many were removed. */
  async evict(scope: EvictScope): Promise<number> {
    switch (scope.kind) {
      case 'version':
        return this.evictVersion(scope.version);
      case 'all': {
        let count = 0;
        for (const version of await this.scopes()) count += await this.evictVersion(version);
        return count;
      }
      case 'age': {
        const cutoff = Date.now() - scope.olderThanMs;
        let count = 0;
        for (const version of await this.scopes()) {
          const scopeDir = join(this.root, version);
          const manifest = await readManifest(scopeDir, version);
          const stale = Object.entries(manifest.entries)
            .filter(([, entry]) => Date.parse(entry.createdAt) < cutoff)
            .map(([fp]) => fp);
          if (stale.length > 0) count += await this.removeFrom(version, stale);
        }
        return count;
      }
    }
  }

  private async evictVersion(version: string): Promise<number> {
    const scopeDir = join(this.root, version);
    return withLock(this.manifestLock(scopeDir), async () => {
      const manifest = await readManifest(scopeDir, version);
      const count = Object.keys(manifest.entries).length;
      await rm(scopeDir, { recursive: true, force: true });
      this.logger.debug(`Evicted ${count} record(s) for version ${version}`);
      return count;
    });
  }

  private remove(fingerprints: string[]): Promise<number> {
    return this.removeFrom(this.version, fingerprints);
  }

  private async removeFrom(version: string, fingerprints: string[]): Promise<number> {
    const scopeDir = join(this.root, version);
    let removed = 0;
    await this.updateManifest(scopeDir, version, (manifest) => {
      for (const fp of fingerprints) {
        if (manifest.entries[fp]) {
          delete manifest.entries[fp];
          removed++;
        }
      }
    });
    for (const fp of fingerprints) {
      await rm(join(scopeDir, OBJECTS_DIR, fp), { recursive: true, force: true });
    }
    return removed;
  }

  private async produce(
    fingerprint: string,
    producer: () => Promise<ProducedArtifact>,
    options: PutOptions,
  ): Promise<ArtifactRecord> {
    const lock = await acquireLock({
      lockPath: join(this.scopeDir, LOCKS_DIR, `${fingerprint}.lock`),
      timeoutMs: options.waitMs ?? this.lockTimeoutMs,
      staleMs: this.staleLockMs,
      wait: options.wait,
      onWait: (holder) =>
        this.logger.debug(`Waiting for ${fingerprint.slice(0, 12)} held by pid ${holder?.pid ?? 'unknown'}`),
    });
    try {
      // Another process may have produced it while we waited
      const existing = await this.get(fingerprint);
      if (existing) return existing;
      const produced = await producer();
      return await this.ingest(fingerprint, produced);
    } finally {
      await lock.release();
    }
  }

  private async ingest(fingerprint: string, produced: ProducedArtifact): Promise<ArtifactRecord> {
    const objectDir = this.objectDir(fingerprint);
    await mkdir(join(this.scopeDir, OBJECTS_DIR), { recursive: true });
    const staging = tempSibling(objectDir);
    const outputHashes: Record<string, string> = {};
    const excluded = new Set((produced.exclude ?? []).map((path) => resolve(produced.workDir, path)));

    try {
      await mkdir(staging, { recursive: true });
      for (const output of produced.outputs) {
        const source = resolve(produced.workDir, output);
        const hash = await hashPath(source, excluded);
        if (hash === null) {
          throw new StoreError(`Step ${produced.stepId} did not leave output ${output} to store`, fingerprint);
        }
        await atomicCopy(source, join(staging, output), excluded);
        outputHashes[output] = hash;
      }
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      throw err;
    }
    await commitTemp(staging, objectDir);

    const entry: ManifestEntry = {
      stepId: produced.stepId,
      outputs: [...produced.outputs],
      outputHashes,
      digest: hashValue(outputHashes),
      createdAt: isoNow(),
      toolVersions: produced.toolVersions,
    };
    await this.updateManifest(this.scopeDir, this.version, (manifest) => {
      manifest.entries[fingerprint] = entry;
    });
    return this.toRecord(fingerprint, entry);
  }

  private manifestLock(scopeDir: string) {
    return {
      lockPath: join(scopeDir, LOCKS_DIR, 'manifest.lock'),
      timeoutMs: this.lockTimeoutMs,
      staleMs: this.staleLockMs,
    };
  }

  private async updateManifest(scopeDir: string, version: string, mutate: (manifest: Manifest) => void): Promise<void> {
    await withLock(this.manifestLock(scopeDir), async () => {
      const manifest = await readManifest(scopeDir, version);
      mutate(manifest);
      await writeManifest(scopeDir, manifest);
    });
  }

  private toRecord(fingerprint: string, entry: ManifestEntry): ArtifactRecord {
    return {
      fingerprint,
      stepId: entry.stepId,
      path: this.objectDir(fingerprint),
      outputs: entry.outputs,
      outputHashes: entry.outputHashes,
      digest: entry.digest,
      createdAt: entry.createdAt,
      toolVersions: entry.toolVersions,
      version: this.version,
    };
  }
}

// packages/core/src/store/lock.ts — Cross-process exclusive locks via O_EXCL lock files

import { mkdir, open, readFile, stat, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LOCK_STALE_MS, LOCK_TIMEOUT_MS } from '../utils/constants.js';
import { StoreError } from '../utils/errors.js';
import { isErrno } from '../utils/fs.js';
import { sleep } from '../utils/time.js';

export interface LockHandle {
  lockPath: string;
  release(): Promise<void>;
}

export interface LockOptions {
  lockPath: string;
  /** Give up after this long; 0 fails on the first contended attempt. */
  timeoutMs?: number;
  /** A holder older than this is presumed dead. */
  staleMs?: number;
  /** Recorded in the lock file for diagnostics. */
  owner?: string;
  onWait?: (holder: LockHolder | null, waitMs: number) => void;
  /** Replaces the plain timer between attempts; resolving false gives up. */
  wait?: (ms: number) => Promise<boolean>;
}

export interface LockHolder {
  pid: number;
  owner?: string;
  startedMs: number;
}

export class LockContentionError extends StoreError {
  constructor(
    public readonly lockPath: string,
    public readonly holder: LockHolder | null,
  ) {
    super(
      holder
        ? `Lock ${lockPath} is held by pid ${holder.pid}${holder.owner ? ` (${holder.owner})` : ''}`
        : `Lock ${lockPath} is held by another process`,
    );
    this.name = 'LockContentionError';
  }
}

function backoff(attempt: number): number {
  return Math.min(50 * 2 ** attempt, 1000);
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrno(err, 'EPERM');
  }
}

function parseHolder(content: string): LockHolder | null {
  try {
    const data: unknown = JSON.parse(content);
    if (data === null || typeof data !== 'object') return null;
    const pid = 'pid' in data ? data.pid : undefined;
    const startedMs = 'startedMs' in data ? data.startedMs : undefined;
    const owner = 'owner' in data ? data.owner : undefined;
    if (typeof pid !== 'number' || typeof startedMs !== 'number') return null;
    return { pid, startedMs, owner: typeof owner === 'string' ? owner : undefined };
  } catch {
    return null;
  }
}

/** Read the current holder; null when the file vanished or is still being written. */
async function readHolder(lockPath: string): Promise<{ holder: LockHolder | null; ageMs: number } | null> {
  try {
    const [content, stats] = await Promise.all([readFile(lockPath, 'utf8'), stat(lockPath)]);
    return { holder: parseHolder(content), ageMs: Date.now() - stats.mtimeMs };
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return null;
    throw err;
  }
}

/**
 * Acquire `lockPath` by exclusive creation. A lock whose holder process is
 * gone, or that is older than `staleMs`, is removed and the attempt repeated.
 * Throws LockContentionError once `timeoutMs` has elapsed or `wait` gives up.
 */
export async function acquireLock(options: LockOptions): Promise<LockHandle> {
  const { lockPath, timeoutMs = LOCK_TIMEOUT_MS, staleMs = LOCK_STALE_MS } = options;
  await mkdir(dirname(lockPath), { recursive: true });

  const started = Date.now();
  let attempt = 0;

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx');
      const holder: LockHolder = { pid: process.pid, owner: options.owner, startedMs: Date.now() };
      try {
        await handle.writeFile(JSON.stringify(holder));
      } finally {
        await handle.close();
      }
      return { lockPath, release: () => releaseLock(lockPath) };
    } catch (err) {
      if (!isErrno(err, 'EEXIST')) throw err;
    }

    const current = await readHolder(lockPath);
    if (current === null) continue;

    const { holder, ageMs } = current;
    const dead = holder !== null && !processAlive(holder.pid);
    if (dead || ageMs > staleMs) {
      await unlink(lockPath).catch((err: unknown) => {
        if (!isErrno(err, 'ENOENT')) throw err;
      });
      continue;
    }

    if (Date.now() - started >= timeoutMs) {
      throw new LockContentionError(lockPath, holder);
    }
    const wait = backoff(attempt++);
    options.onWait?.(holder, wait);
    if (options.wait) {
      if (!(await options.wait(wait))) throw new LockContentionError(lockPath, holder);
    } else {
      await sleep(wait);
    }
  }
}

export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err) {
    if (!isErrno(err, 'ENOENT')) throw err;
  }
}

/** Run `fn` while holding `lockPath`. */
export async function withLock<T>(options: LockOptions, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireLock(options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

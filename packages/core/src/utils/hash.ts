// packages/core/src/utils/hash.ts — Stable hashing of values, files and trees

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { lstat, readdir, readlink } from 'node:fs/promises';
import { join } from 'node:path';
import { isErrno } from './fs.js';

/** JSON with object keys sorted at every level. */
export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function sha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export function hashValue(value: unknown): string {
  return sha256(stableStringify(value));
}

export async function hashFile(filePath: string, algorithm = 'sha256'): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Hash a file or directory tree. Entries are visited in sorted order and the
 * executable bit is included, so the same tree hashes the same anywhere.
 * Absolute paths in `exclude` are left out. Returns null when the path does
 * not exist.
 */
export async function hashPath(path: string, exclude?: ReadonlySet<string>): Promise<string | null> {
  let stats;
  try {
    stats = await lstat(path);
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return null;
    throw err;
  }

  if (stats.isSymbolicLink()) {
    return sha256(`link:${await readlink(path)}`);
  }
  if (stats.isFile()) {
    const exec = (stats.mode & 0o111) !== 0 ? 'x' : '-';
    return sha256(`file:${exec}:${await hashFile(path)}`);
  }
  if (stats.isDirectory()) {
    const names = (await readdir(path)).sort();
    const parts: string[] = [];
    for (const name of names) {
      const child = join(path, name);
      if (exclude?.has(child)) continue;
      parts.push(`${name}:${(await hashPath(child, exclude)) ?? ''}`);
    }
    return sha256(`dir:${parts.join('\n')}`);
  }
  return sha256('other');
}

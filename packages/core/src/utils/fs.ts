// packages/core/src/utils/fs.ts — Filesystem helpers shared by steps and the store

import { randomBytes } from 'node:crypto';
import { access, chmod, cp, mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

export function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Sibling temp path, so the final rename stays on one filesystem. */
export function tempSibling(target: string): string {
  return join(dirname(target), `.${basename(target)}.tmp-${randomBytes(4).toString('hex')}`);
}

/**
 * Move a fully written temp file or directory over its target. Any previous
 * target is removed first; on failure the temp path is cleaned up.
 */
export async function commitTemp(tmp: string, target: string): Promise<void> {
  try {
    await rm(target, { recursive: true, force: true });
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { recursive: true, force: true });
    throw err;
  }
}

export async function atomicWriteFile(
  target: string,
  content: string | Buffer,
  mode?: number,
): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const tmp = tempSibling(target);
  try {
    await writeFile(tmp, content);
    if (mode !== undefined) await chmod(tmp, mode);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
  await commitTemp(tmp, target);
}

/**
 * Copy a file or tree to `target` through a temp sibling, preserving modes.
 * Absolute source paths in `exclude` are not copied.
 */
export async function atomicCopy(source: string, target: string, exclude?: ReadonlySet<string>): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const tmp = tempSibling(target);
  try {
    await cp(source, tmp, {
      recursive: true,
      preserveTimestamps: true,
      verbatimSymlinks: true,
      filter: (src) => !exclude?.has(src),
    });
    const stats = await stat(source);
    if (stats.isFile()) await chmod(tmp, stats.mode & 0o7777);
  } catch (err) {
    await rm(tmp, { recursive: true, force: true });
    throw err;
  }
  await commitTemp(tmp, target);
}

// packages/core/src/store/manifest.ts — Per-version manifest.yml of stored artifacts

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { StoreError } from '../utils/errors.js';
import { atomicWriteFile, isErrno } from '../utils/fs.js';

export const MANIFEST_FILENAME = 'manifest.yml';
const MANIFEST_FORMAT = 1;

const manifestEntrySchema = z.object({
  stepId: z.string(),
  outputs: z.array(z.string()),
  outputHashes: z.record(z.string(), z.string()),
  digest: z.string(),
  createdAt: z.string(),
  toolVersions: z.record(z.string(), z.string()).default({}),
});

const manifestSchema = z.object({
  format: z.literal(MANIFEST_FORMAT),
  version: z.string(),
  entries: z.record(z.string(), manifestEntrySchema).default({}),
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;
export type Manifest = z.infer<typeof manifestSchema>;

export function emptyManifest(version: string): Manifest {
  return { format: MANIFEST_FORMAT, version, entries: {} };
}

export async function readManifest(scopeDir: string, version: string): Promise<Manifest> {
  const path = join(scopeDir, MANIFEST_FILENAME);
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return emptyManifest(version);
    throw err;
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new StoreError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw === null || raw === undefined) return emptyManifest(version);

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new StoreError(`Invalid manifest ${path}: ${issues}`);
  }
  return result.data;
}

/** Written with sorted keys so manifests diff cleanly. */
export async function writeManifest(scopeDir: string, manifest: Manifest): Promise<void> {
  const content = stringifyYaml(manifest, { sortMapEntries: true, lineWidth: 0 });
  await atomicWriteFile(join(scopeDir, MANIFEST_FILENAME), content);
}

// packages/cli/src/commands/clean.ts — Evict cached artifacts and wipe the work directory

import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ArtifactStore, MS_PER_DAY, WORKSPACE_LOCK, withLock } from '@kiln/core';
import type { EvictScope } from '@kiln/core';
import chalk from 'chalk';
import { type CliContext, EXIT_OK, type GlobalOptions, cliLogger, loadCliConfig, withRunStore } from '../utils.js';

export interface CleanOptions {
  all?: boolean;
  olderThan?: number;
  keepCache?: boolean;
  json?: boolean;
}

export interface CleanResult {
  scope: EvictScope['kind'] | 'none';
  evicted: number;
  prunedRuns: number;
  workDir: string;
  removed: number;
}

function scopeFor(options: CleanOptions, version: string): EvictScope {
  if (options.all) return { kind: 'all' };
  if (options.olderThan !== undefined) return { kind: 'age', olderThanMs: options.olderThan * MS_PER_DAY };
  return { kind: 'version', version };
}

export async function cleanCommand(options: CleanOptions, globals: GlobalOptions, ctx: CliContext): Promise<number> {
  const config = loadCliConfig(globals, ctx);
  const logger = cliLogger(config);
  const workDir = config.paths.workDir;
  await mkdir(workDir, { recursive: true });

  const result = await withLock({ lockPath: join(workDir, WORKSPACE_LOCK), timeoutMs: 0 }, async (): Promise<CleanResult> => {
    let scope: CleanResult['scope'] = 'none';
    let evicted = 0;
    let prunedRuns = 0;

    if (!options.keepCache) {
      const evictScope = scopeFor(options, config.version);
      scope = evictScope.kind;
      const store = new ArtifactStore({ root: config.paths.cacheDir, version: config.version, logger: logger.child('store') });
      evicted = await store.evict(evictScope);
      if (options.olderThan !== undefined) {
        const cutoff = new Date(Date.now() - options.olderThan * MS_PER_DAY).toISOString();
        prunedRuns = await withRunStore(config, async (runs) => runs.prune(cutoff));
      }
    }

    const entries = (await readdir(workDir)).filter((name) => name !== WORKSPACE_LOCK);
    for (const name of entries) {
      await rm(join(workDir, name), { recursive: true, force: true });
    }
    logger.debug(`Removed ${entries.length} entries from ${workDir}`);
    return { scope, evicted, prunedRuns, workDir, removed: entries.length };
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    if (result.scope !== 'none') {
      console.log(chalk.green(`Evicted ${result.evicted} cached artifact(s) (${result.scope})`));
    }
    if (result.prunedRuns > 0) {
      console.log(chalk.green(`Pruned ${result.prunedRuns} run(s)`));
    }
    console.log(chalk.green(`Wiped ${result.workDir}`));
  }
  return EXIT_OK;
}

// packages/cli/src/commands/plan.ts — Show the ordered plan with fingerprints and cache status

import { ArtifactStore, TemplateLoader, fingerprintPlan, planFromConfig } from '@kiln/core';
import type { BuildConfig, StepKind } from '@kiln/core';
import chalk from 'chalk';
import { printPlan } from '../render.js';
import { type CliContext, EXIT_OK, type GlobalOptions, loadCliConfig } from '../utils.js';

export interface PlanOptions {
  version?: string;
  jobs?: number;
  json?: boolean;
}

export interface PlanRow {
  id: string;
  kind: StepKind;
  needs: string[];
  /** Null when an input is not on disk yet. */
  fingerprint: string | null;
  cache: 'hit' | 'miss' | 'unknown';
}

export async function describePlan(config: BuildConfig, ctx: CliContext): Promise<PlanRow[]> {
  const plan = planFromConfig(config, new TemplateLoader(ctx.templatesDir));
  const fingerprints = await fingerprintPlan(plan);
  const store = new ArtifactStore({ root: config.paths.cacheDir, version: config.version });

  const rows: PlanRow[] = [];
  for (const step of plan.topologicalOrder()) {
    const fingerprint = fingerprints.get(step.id) ?? null;
    let cache: PlanRow['cache'] = 'unknown';
    if (fingerprint) cache = (await store.get(fingerprint)) ? 'hit' : 'miss';
    rows.push({ id: step.id, kind: step.kind, needs: [...plan.dependenciesOf(step.id)], fingerprint, cache });
  }
  return rows;
}

export function emitPlan(config: BuildConfig, rows: readonly PlanRow[], json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify({ name: config.name, version: config.version, steps: rows }, null, 2));
    return;
  }
  console.log(chalk.cyan(`\n  ${config.name} ${config.version} (${config.platform}), jobs=${config.jobs}\n`));
  printPlan(rows);
}

export async function planCommand(options: PlanOptions, globals: GlobalOptions, ctx: CliContext): Promise<number> {
  const config = loadCliConfig(globals, ctx, { version: options.version, jobs: options.jobs });
  emitPlan(config, await describePlan(config, ctx), options.json);
  return EXIT_OK;
}

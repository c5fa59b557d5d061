// packages/cli/src/commands/build.ts — Run the plan

import { ArtifactStore, CancellationToken, EventBus, Executor, TemplateLoader, planFromConfig } from '@kiln/core';
import { printReport, createEventRenderer } from '../render.js';
import { type CliContext, EXIT_OK, type GlobalOptions, cliLogger, exitCodeFor, loadCliConfig, withRunStore } from '../utils.js';
import { describePlan, emitPlan } from './plan.js';

export interface BuildOptions {
  dryRun?: boolean;
  clean?: boolean;
  keepCache?: boolean;
  jobs?: number;
  version?: string;
  revision?: string;
  timeout?: number;
  json?: boolean;
}

export async function buildCommand(options: BuildOptions, globals: GlobalOptions, ctx: CliContext): Promise<number> {
  const config = loadCliConfig(globals, ctx, {
    version: options.version,
    revision: options.revision,
    jobs: options.jobs,
    timeoutSec: options.timeout,
  });

  if (options.dryRun) {
    emitPlan(config, await describePlan(config, ctx), options.json);
    return EXIT_OK;
  }

  const logger = cliLogger(config);
  const plan = planFromConfig(config, new TemplateLoader(ctx.templatesDir));
  const store = new ArtifactStore({ root: config.paths.cacheDir, version: config.version, logger: logger.child('store') });
  const events = new EventBus();
  const renderer = options.json ? null : createEventRenderer();
  if (renderer) events.on('event', (event) => renderer.render(event));

  const token = new CancellationToken();
  const onSigint = () => token.cancel('interrupted');
  const onSigterm = () => token.cancel('terminated');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    const report = await withRunStore(config, (runStore) =>
      new Executor(plan, {
        store,
        runner: ctx.runner,
        logger,
        events,
        token,
        runStore,
        clean: options.clean,
        keepCache: options.keepCache,
        env: ctx.env,
      }).run(),
    );

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
    return exitCodeFor(report);
  } finally {
    renderer?.stop();
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
    events.removeAllListeners();
  }
}

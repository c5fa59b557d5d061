// packages/core/src/plan/builder.ts — Step definitions to a validated Plan

import { resolveStepDefinitions, type TemplateLoader } from '../config/templates.js';
import { createStep } from '../steps/factory.js';
import type { BuildConfig } from '../types/config.js';
import type { StepDefinition } from '../types/step.js';
import { Plan } from './plan.js';
import { expandDefinition, portableVariables, templateVariables } from './template.js';

/**
 * Expand every definition twice (machine values and portable placeholders),
 * instantiate the steps and validate the resulting DAG.
 */
export function buildPlan(config: BuildConfig, definitions: readonly StepDefinition[]): Plan {
  const vars = templateVariables(config);
  const portableVars = portableVariables(config);
  const plan = new Plan(config);

  for (const def of definitions) {
    const step = createStep(expandDefinition(def, vars), expandDefinition(def, portableVars), config.toolchain);
    plan.addStep(step, def.needs);
  }

  plan.validate();
  return plan;
}

/** Plan for `config`: its inline steps, or its named template. */
export function planFromConfig(config: BuildConfig, loader: TemplateLoader): Plan {
  return buildPlan(config, resolveStepDefinitions(config, loader));
}

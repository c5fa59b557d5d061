// packages/core/src/plan/template.ts — {{variable}} expansion for step templates

import type { ArtifactConfig, BuildConfig } from '../types/config.js';
import type { StepDefinition } from '../types/step.js';
import { ConfigError } from '../utils/errors.js';

export type TemplateVariables = Readonly<Record<string, string>>;

const VARIABLE_PATTERN = /\{\{\s*([\w.-]+)\s*\}\}/g;

export function expandTemplate(text: string, vars: TemplateVariables): string {
  return text.replace(VARIABLE_PATTERN, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new ConfigError(`Unknown template variable "{{${name}}}" in "${text}"`, name);
    }
    return value;
  });
}

function baseVariables(config: BuildConfig): Record<string, string> {
  const vars: Record<string, string> = {
    name: config.name,
    version: config.version,
    platform: config.platform,
    revision: config.source.revision,
    repository: config.source.repository,
  };
  // ref usually refers to {{version}}
  vars.ref = expandTemplate(config.source.ref, vars);
  for (const [tool, spec] of Object.entries(config.toolchain)) {
    vars[`toolVersions.${tool}`] = spec.version ?? '';
  }
  return vars;
}

/** Values used to execute steps on this machine. */
export function templateVariables(config: BuildConfig): TemplateVariables {
  const vars = baseVariables(config);
  vars.workDir = config.paths.workDir;
  vars.jobs = String(config.jobs);
  for (const [tool, spec] of Object.entries(config.toolchain)) {
    vars[`tools.${tool}`] = spec.command;
  }
  return vars;
}

/**
 * Values used for fingerprints: machine-specific locations and the job count
 * are replaced by placeholders so identical builds hash identically anywhere.
 */
export function portableVariables(config: BuildConfig): TemplateVariables {
  const vars = baseVariables(config);
  vars.workDir = '<workDir>';
  vars.jobs = '<jobs>';
  for (const tool of Object.keys(config.toolchain)) {
    vars[`tools.${tool}`] = `<tool:${tool}>`;
  }
  return vars;
}

function mapValues(record: Record<string, string>, fn: (value: string) => string): Record<string, string> {
  return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, fn(v)]));
}

export function expandDefinition(def: StepDefinition, vars: TemplateVariables): StepDefinition {
  const x = (text: string) => expandTemplate(text, vars);
  const inputs = def.inputs.map(x);
  const outputs = def.outputs.map(x);

  switch (def.action) {
    case 'run':
      return {
        ...def,
        inputs,
        outputs,
        command: def.command === undefined ? undefined : x(def.command),
        args: def.args.map(x),
        env: mapValues(def.env, x),
        cwd: def.cwd === undefined ? undefined : x(def.cwd),
      };
    case 'fetch':
      return {
        ...def,
        inputs,
        outputs,
        repository: x(def.repository),
        ref: x(def.ref),
        revision: x(def.revision),
        dest: x(def.dest),
      };
    case 'write':
      return { ...def, inputs, outputs, path: x(def.path), content: x(def.content) };
    case 'copy':
      return { ...def, inputs, outputs, from: x(def.from), to: x(def.to) };
    case 'patch':
      return {
        ...def,
        inputs,
        outputs,
        source: x(def.source),
        dest: x(def.dest),
        rules: def.rules.map((rule) => ({ ...rule, marker: x(rule.marker) })),
      };
    case 'verify':
      return {
        ...def,
        inputs,
        outputs,
        artifact: x(def.artifact),
        minVersion: def.minVersion === undefined ? undefined : x(def.minVersion),
        versionArgs: def.versionArgs.map(x),
      };
  }
}

/** The configured final artifact with its variables expanded. */
export function resolveArtifact(config: BuildConfig): ArtifactConfig | undefined {
  const artifact = config.artifact;
  if (!artifact) return undefined;
  const vars = templateVariables(config);
  return {
    ...artifact,
    path: expandTemplate(artifact.path, vars),
    minVersion: artifact.minVersion === undefined ? undefined : expandTemplate(artifact.minVersion, vars),
    versionArgs: artifact.versionArgs.map((arg) => expandTemplate(arg, vars)),
  };
}

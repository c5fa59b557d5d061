// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_STEP_TIMEOUT_SEC,
  MIN_REVISION_LENGTH,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

// Octal modes may be written as 493, "755", "0755" or "0o755"
const modeSchema = z.union([
  z.number().int().min(0).max(0o7777),
  z
    .string()
    .regex(/^(0o|0)?[0-7]{3,4}$/, 'must be an octal mode such as "755"')
    .transform((value) => Number.parseInt(value.replace(/^0o/, ''), 8)),
]);

const stepBase = {
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, ".", "_" and "-"'),
  description: z.string().optional(),
  needs: z.array(z.string()).default([]),
  inputs: z.array(z.string().min(1)).default([]),
  outputs: z.array(z.string().min(1)).default([]),
};

const runStepSchema = z.object({
  ...stepBase,
  action: z.literal('run'),
  tool: z.string().min(1).optional(),
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  cwd: z.string().min(1).optional(),
  network: z.boolean().default(false),
  timeoutSec: z.number().positive().optional(),
});

const fetchStepSchema = z.object({
  ...stepBase,
  action: z.literal('fetch'),
  tool: z.string().min(1).default('git'),
  repository: z.string().min(1).default('{{repository}}'),
  ref: z.string().min(1).default('{{ref}}'),
  revision: z.string().min(1).default('{{revision}}'),
  dest: z.string().min(1),
});

const writeStepSchema = z.object({
  ...stepBase,
  action: z.literal('write'),
  path: z.string().min(1),
  content: z.string(),
  mode: modeSchema.optional(),
});

const copyStepSchema = z.object({
  ...stepBase,
  action: z.literal('copy'),
  from: z.string().min(1),
  to: z.string().min(1),
  mode: modeSchema.optional(),
});

const patchStepSchema = z.object({
  ...stepBase,
  action: z.literal('patch'),
  source: z.string().min(1),
  dest: z.string().min(1),
  rules: z.array(z.object({ marker: z.string().min(1), delta: z.number().int() })).min(1),
  mode: modeSchema.optional(),
});

const verifyStepSchema = z.object({
  ...stepBase,
  action: z.literal('verify'),
  artifact: z.string().min(1),
  executable: z.boolean().default(true),
  minVersion: z.string().optional(),
  versionArgs: z.array(z.string()).default(['--version']),
  sha256: z.string().regex(/^[0-9a-fA-F]{64}$/).optional(),
  sha512: z.string().regex(/^[0-9a-fA-F]{128}$/).optional(),
});

export const stepDefinitionSchema = z.discriminatedUnion('action', [
  runStepSchema,
  fetchStepSchema,
  writeStepSchema,
  copyStepSchema,
  patchStepSchema,
  verifyStepSchema,
]);

const stepListSchema = z
  .array(stepDefinitionSchema)
  .min(1)
  .superRefine((steps, ctx) => {
    const seen = new Set<string>();
    steps.forEach((step, index) => {
      if (seen.has(step.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `duplicate step id "${step.id}"` });
      }
      seen.add(step.id);
      if (step.action === 'run' && step.tool === undefined && step.command === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: 'run steps need a tool or a command' });
      }
    });
  });

export const planTemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  steps: stepListSchema,
});

const toolSpecSchema = z.object({
  command: z.string().min(1),
  version: z.string().min(1).optional(),
  minVersion: z.string().min(1).optional(),
  versionArgs: z.array(z.string()).default(['--version']),
});

const artifactSchema = z.object({
  path: z.string().min(1),
  executable: z.boolean().default(true),
  minVersion: z.string().optional(),
  versionArgs: z.array(z.string()).default(['--version']),
  sha256: z.string().regex(/^[0-9a-fA-F]{64}$/).optional(),
  sha512: z.string().regex(/^[0-9a-fA-F]{128}$/).optional(),
});

export const buildConfigSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9_.-]+$/),
    version: z.string().regex(/^\d+\.\d+\.\d+([-+][0-9A-Za-z.-]+)?$/, 'must be major.minor.patch'),
    platform: z.string().min(1),
    source: z.object({
      repository: z.string().min(1),
      ref: z.string().min(1),
      revision: z
        .string()
        .regex(new RegExp(`^[0-9a-fA-F]{${MIN_REVISION_LENGTH},40}$`), `must be ${MIN_REVISION_LENGTH}-40 hex characters`),
    }),
    toolchain: z.record(z.string().regex(/^[A-Za-z0-9_-]+$/), toolSpecSchema),
    jobs: z.number().int().positive().max(256),
    paths: z.object({
      workDir: z.string().min(1),
      cacheDir: z.string().min(1),
    }),
    retry: z
      .object({
        attempts: z.number().int().positive().max(10).default(DEFAULT_RETRY_ATTEMPTS),
        backoffMs: z.number().int().nonnegative().default(DEFAULT_BACKOFF_MS),
        maxBackoffMs: z.number().int().nonnegative().default(DEFAULT_MAX_BACKOFF_MS),
      })
      .default({}),
    timeouts: z
      .object({
        stepSec: z.number().positive().default(DEFAULT_STEP_TIMEOUT_SEC),
        planSec: z.number().positive().optional(),
      })
      .default({}),
    template: z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a template name'),
    steps: stepListSchema.optional(),
    artifact: artifactSchema.optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((config, ctx) => {
    for (const [index, step] of (config.steps ?? []).entries()) {
      if (step.action === 'run' && step.tool !== undefined && !(step.tool in config.toolchain)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'tool'],
          message: `unknown tool "${step.tool}"`,
        });
      }
    }
  });

export type BuildConfigInput = z.input<typeof buildConfigSchema>;

function formatIssues(error: z.ZodError): { message: string; field?: string } {
  const [first] = error.issues;
  return {
    message: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    field: first && first.path.length > 0 ? first.path.join('.') : undefined,
  };
}

export function validateConfig(config: unknown): z.output<typeof buildConfigSchema> {
  const result = buildConfigSchema.safeParse(config);
  if (!result.success) {
    const { message, field } = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${message}`, field);
  }
  return result.data;
}

export function validateTemplate(template: unknown, source: string): z.output<typeof planTemplateSchema> {
  const result = planTemplateSchema.safeParse(template);
  if (!result.success) {
    const { message, field } = formatIssues(result.error);
    throw new ConfigError(`Invalid template ${source}: ${message}`, field);
  }
  return result.data;
}

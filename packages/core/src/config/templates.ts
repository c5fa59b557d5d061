// packages/core/src/config/templates.ts — Plan templates from <templatesDir>/<name>.yml

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { BuildConfig } from '../types/config.js';
import type { StepDefinition } from '../types/step.js';
import { ConfigError } from '../utils/errors.js';
import { validateTemplate } from './schema.js';

export interface PlanTemplate {
  name: string;
  description?: string;
  steps: StepDefinition[];
}

export class TemplateLoader {
  constructor(private readonly templatesDir: string) {}

  load(name: string): PlanTemplate {
    const path = join(this.templatesDir, `${name}.yml`);
    if (!existsSync(path)) {
      const available = this.list();
      throw new ConfigError(
        `Template "${name}" not found in ${this.templatesDir}${available.length > 0 ? ` (available: ${available.join(', ')})` : ''}`,
        'template',
      );
    }
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`, 'template');
    }
    return validateTemplate(raw, path);
  }

  list(): string[] {
    if (!existsSync(this.templatesDir)) return [];
    return readdirSync(this.templatesDir)
      .filter((file) => file.endsWith('.yml'))
      .map((file) => file.slice(0, -'.yml'.length))
      .sort();
  }
}

/** Inline `steps` win over the named template. */
export function resolveStepDefinitions(config: BuildConfig, loader: TemplateLoader): readonly StepDefinition[] {
  return config.steps ?? loader.load(config.template).steps;
}

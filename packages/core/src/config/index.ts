// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export {
  buildConfigSchema,
  planTemplateSchema,
  stepDefinitionSchema,
  validateConfig,
  validateTemplate,
} from './schema.js';
export type { BuildConfigInput } from './schema.js';
export { loadConfig, deepMerge, deepFreeze } from './loader.js';
export type { ConfigOverrides } from './loader.js';
export { envOverrides } from './env.js';
export { TemplateLoader, resolveStepDefinitions } from './templates.js';
export type { PlanTemplate } from './templates.js';

// packages/core/src/plan/index.ts -- barrel re-export

export { Plan, pathCovers, pathsOverlap } from './plan.js';
export { buildPlan, planFromConfig } from './builder.js';
export {
  expandTemplate,
  expandDefinition,
  templateVariables,
  portableVariables,
  resolveArtifact,
} from './template.js';
export type { TemplateVariables } from './template.js';
export {
  computeFingerprint,
  fingerprintStep,
  fingerprintPlan,
  toolVersionsOf,
  FINGERPRINT_SCHEMA,
} from './fingerprint.js';
export type { FingerprintInputs, FingerprintResult } from './fingerprint.js';

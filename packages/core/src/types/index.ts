// packages/core/src/types/index.ts -- barrel re-export

export type {
  ToolSpec,
  SourceConfig,
  RetryConfig,
  TimeoutConfig,
  PathsConfig,
  ArtifactConfig,
  BuildConfig,
} from './config.js';

export type {
  StepKind,
  StepStatus,
  RunStepDefinition,
  FetchStepDefinition,
  WriteStepDefinition,
  CopyStepDefinition,
  PatchRule,
  PatchStepDefinition,
  VerifyStepDefinition,
  StepDefinition,
  StepContext,
  Readiness,
  StepOutput,
  StepResult,
  StepDescriptor,
  Step,
} from './step.js';

export type { ArtifactRecord, ProducedArtifact, EvictScope } from './artifact.js';

export type {
  RunStatus,
  StepOutcome,
  StepFailure,
  StepReport,
  RunReport,
  VerifyFailureCode,
  VerifyFailure,
  VerifyRequirements,
  VerifyReport,
} from './report.js';

export type {
  RunStartedEvent,
  RunCompletedEvent,
  StepStartedEvent,
  StepRetryEvent,
  StepSkippedEvent,
  StepCompletedEvent,
  StepFailedEvent,
  EngineEvent,
} from './events.js';

// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { StepDefinition } from './step.js';

export interface ToolSpec {
  /** Executable name or absolute path. */
  readonly command: string;
  /** Declared version; part of every fingerprint that uses the tool. */
  readonly version?: string;
  /** Lowest acceptable self-reported version, checked by `doctor`. */
  readonly minVersion?: string;
  readonly versionArgs: readonly string[];
}

export interface SourceConfig {
  readonly repository: string;
  readonly ref: string;
  /** Pinned upstream commit (full or abbreviated). */
  readonly revision: string;
}

export interface RetryConfig {
  readonly attempts: number;
  readonly backoffMs: number;
  readonly maxBackoffMs: number;
}

export interface TimeoutConfig {
  readonly stepSec: number;
  readonly planSec?: number;
}

export interface PathsConfig {
  readonly workDir: string;
  readonly cacheDir: string;
}

export interface ArtifactConfig {
  /** Final artifact, relative to the work directory. */
  readonly path: string;
  readonly executable: boolean;
  readonly minVersion?: string;
  readonly versionArgs: readonly string[];
  readonly sha256?: string;
  readonly sha512?: string;
}

export interface BuildConfig {
  readonly name: string;
  readonly version: string;
  readonly platform: string;
  readonly source: SourceConfig;
  readonly toolchain: Readonly<Record<string, ToolSpec>>;
  readonly jobs: number;
  readonly paths: PathsConfig;
  readonly retry: RetryConfig;
  readonly timeouts: TimeoutConfig;
  /** Template name under the templates directory. */
  readonly template: string;
  /** Inline steps; when present they replace the template. */
  readonly steps?: readonly StepDefinition[];
  readonly artifact?: ArtifactConfig;
  readonly logLevel: LogLevel;
}

// packages/core/src/config/defaults.ts

import { availableParallelism } from 'node:os';
import type { BuildConfig } from '../types/config.js';
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_STEP_TIMEOUT_SEC,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: BuildConfig = {
  name: 'tailwindcss',
  version: '4.0.6',
  platform: 'freebsd-x64',
  source: {
    repository: 'https://github.com/tailwindlabs/tailwindcss.git',
    ref: 'v{{version}}',
    revision: 'd045aaa75edb8ee6b69c4b1e2551c2a844377927',
  },
  toolchain: {
    git: { command: 'git', versionArgs: ['--version'] },
    node: { command: 'node', version: '22', minVersion: '22.9.0', versionArgs: ['--version'] },
    pnpm: { command: 'pnpm', version: '9.6.0', minVersion: '9.6.0', versionArgs: ['--version'] },
    python: { command: 'python3.10', version: '3.10', versionArgs: ['--version'] },
    cc: { command: '/usr/local/bin/gcc12', version: '12', versionArgs: ['--version'] },
    cxx: { command: '/usr/local/bin/g++12', version: '12', versionArgs: ['--version'] },
    ld: { command: '/usr/local/bin/ld', versionArgs: ['--version'] },
    make: { command: '/usr/local/bin/gmake', versionArgs: ['--version'] },
    patchelf: { command: 'patchelf', versionArgs: ['--version'] },
  },
  jobs: availableParallelism(),
  paths: {
    workDir: '.kiln/work',
    cacheDir: '~/.cache/kiln',
  },
  retry: {
    attempts: DEFAULT_RETRY_ATTEMPTS,
    backoffMs: DEFAULT_BACKOFF_MS,
    maxBackoffMs: DEFAULT_MAX_BACKOFF_MS,
  },
  timeouts: {
    stepSec: DEFAULT_STEP_TIMEOUT_SEC,
  },
  template: 'standalone',
  artifact: {
    path: 'out/{{name}}-{{platform}}',
    executable: true,
    minVersion: '{{version}}',
    versionArgs: ['--help'],
  },
  logLevel: 'info',
};

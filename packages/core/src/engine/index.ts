// packages/core/src/engine/index.ts -- barrel re-export

export { CancellationToken } from './cancellation.js';
export { EventBus } from './event-bus.js';
export {
  StepStateTable,
  InvalidTransitionError,
  canTransition,
  isTerminalStatus,
  isSatisfied,
} from './state-machine.js';
export { Executor, WORKSPACE_LOCK, STATE_DIR } from './executor.js';
export type { ExecutorOptions } from './executor.js';

/**
 * Execution System - shell commands and their environment
 */

export {
  ShellExecutor,
  CommandLaunchError,
  CommandCancelledError,
  MAX_TIMER_DELAY_MS,
  type ShellExecutorConfig,
} from './shell-executor.js';

export {
  buildEnvironment,
  snapshotEnvironment,
  toEnvRecord,
  isRunningInCI,
  type EnvironmentSnapshot,
} from './environment.js';

export { terminateProcessGroup } from './process-utils.js';

/**
 * Operation System - ordered steps with a failure policy
 */

export {
  OperationRunner,
  StepFailedError,
  OperationFailedError,
  DEFAULT_OUTPUT_WIDTH,
  type OperationRunnerOptions,
} from './operation-runner.js';

export { ProjectRunner, OperationError } from './project-runner.js';

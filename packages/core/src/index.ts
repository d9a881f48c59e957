/**
 * opsflow engine
 *
 * Declarative install/test/build operations run as ordered shell steps
 */

export { createLogger, levelFromVerbosity, isLogLevel, LOG_LEVELS, type LoggerOptions } from './logger.js';

export type {
  CommandResult,
  CommandExecutor,
  OutputSink,
  Operation,
  OperationName,
  Codebase,
  ProjectDefinition,
  Severity,
  ValidationEntry,
  ValidationReport,
  LogLevel,
  Logger,
} from './types.js';

// Export execution system
export * from './executor/index.js';

// Export operation runners
export * from './operations/index.js';

// Export definition loading
export * from './definition/index.js';

// Export validation
export * from './validation/index.js';

// Export lifecycle control
export * from './lifecycle/index.js';

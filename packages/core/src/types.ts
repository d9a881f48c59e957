/**
 * Core types for the opsflow engine
 */

// ============================================================================
// Execution Types
// ============================================================================

/**
 * Normalized outcome of one shell command.
 *
 * `exitCode` is -1 when the command never ran to completion (cancelled,
 * timed out or not launchable); `error` is only set in that case. A command
 * that exits with a nonzero status carries no error.
 */
export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly error?: Error;
}

/**
 * Capability the runners need from a shell backend
 */
export interface CommandExecutor {
  execute(signal: AbortSignal, command: string): Promise<CommandResult>;
  addEnv(env: string[]): void;
}

/**
 * Anything the runners and the validator can write text to
 */
export interface OutputSink {
  write(chunk: string): unknown;
  columns?: number;
}

// ============================================================================
// Definition Types
// ============================================================================

export interface Operation {
  steps: string[];
  env: Record<string, string>;
  failFast: boolean;
}

export interface Codebase {
  language?: string;
  dependencies?: string[];
  install: Operation;
  test: Operation;
  build: Operation;
}

export interface ProjectDefinition {
  id?: string;
  name?: string;
  description?: string;
  version?: string;
  repoUrl?: string;
  codebase: Codebase;
}

export type OperationName = 'install' | 'test' | 'build';

// ============================================================================
// Validation Types
// ============================================================================

export type Severity = 'pass' | 'warning' | 'fix-required';

export interface ValidationEntry {
  severity: Severity;
  message: string;
}

export interface ValidationReport {
  entries: ValidationEntry[];
  fixes: string[];
  suggestions: string[];
  ok: boolean;
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

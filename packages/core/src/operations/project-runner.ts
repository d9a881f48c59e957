import { OperationRunner, type OperationRunnerOptions } from './operation-runner.js';
import type { Logger, OperationName, ProjectDefinition } from '../types.js';

const COMPLETION_MESSAGES: Record<OperationName, string> = {
  install: 'Install completed successfully',
  test: 'Tests completed successfully',
  build: 'Build completed successfully',
};

/**
 * ProjectRunner - install/test/build entry points for a loaded definition
 *
 * An operation without steps is skipped with a warning; it never fails the run.
 */
export class ProjectRunner {
  private definition: ProjectDefinition;
  private runner: OperationRunner;
  private logger?: Logger;

  constructor(definition: ProjectDefinition, options: OperationRunnerOptions) {
    this.definition = definition;
    this.runner = new OperationRunner(options);
    this.logger = options.logger;
  }

  install(signal: AbortSignal): Promise<void> {
    return this.runOperation('install', signal);
  }

  test(signal: AbortSignal): Promise<void> {
    return this.runOperation('test', signal);
  }

  build(signal: AbortSignal): Promise<void> {
    return this.runOperation('build', signal);
  }

  async runOperation(name: OperationName, signal: AbortSignal): Promise<void> {
    const operation = this.definition.codebase[name];
    if (operation.steps.length === 0) {
      this.logger?.warn(`No ${name} steps defined in the configuration.`);
      return;
    }

    const startTime = Date.now();
    try {
      await this.runner.run(signal, operation);
    } catch (error) {
      throw new OperationError(name, error);
    }

    this.logger?.info(COMPLETION_MESSAGES[name], { duration: Date.now() - startTime });
  }
}

/**
 * Wraps the runner failure with the operation it happened in
 */
export class OperationError extends Error {
  constructor(
    public operation: OperationName,
    public cause: unknown
  ) {
    super(
      `failed to run ${operation} steps: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'OperationError';
  }
}

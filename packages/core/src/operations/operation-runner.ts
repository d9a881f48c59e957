import { buildEnvironment, type EnvironmentSnapshot } from '../executor/environment.js';
import { CommandCancelledError } from '../executor/shell-executor.js';
import type { CommandExecutor, CommandResult, Logger, Operation, OutputSink } from '../types.js';

export const DEFAULT_OUTPUT_WIDTH = 80;

export interface OperationRunnerOptions {
  executor: CommandExecutor;
  /**
   * Ambient variables the overrides are layered on
   */
  ambientEnv: EnvironmentSnapshot;
  stdout?: OutputSink;
  stderr?: OutputSink;
  logger?: Logger;
}

/**
 * OperationRunner - runs the steps of one operation in order
 *
 * With `failFast` the first failing step ends the run. Without it every step
 * runs once and the failures are reported together. A cancelled step always
 * ends the run.
 *
 * @example
 * ```typescript
 * const runner = new OperationRunner({ executor, ambientEnv: snapshotEnvironment(process.env) });
 * await runner.run(signal, { steps: ['npm ci', 'npm test'], env: { CI: '1' }, failFast: true });
 * ```
 */
export class OperationRunner {
  private executor: CommandExecutor;
  private ambientEnv: EnvironmentSnapshot;
  private stdout: OutputSink;
  private stderr: OutputSink;
  private logger?: Logger;

  constructor(options: OperationRunnerOptions) {
    this.executor = options.executor;
    this.ambientEnv = options.ambientEnv;
    this.stdout = options.stdout || process.stdout;
    this.stderr = options.stderr || process.stderr;
    this.logger = options.logger;
  }

  /**
   * Run every step of the operation
   *
   * @throws StepFailedError on the first failure with failFast, or on cancellation
   * @throws OperationFailedError listing every failed step without failFast
   */
  async run(signal: AbortSignal, operation: Operation): Promise<void> {
    if (operation.steps.length === 0) {
      return;
    }

    const overrides = Object.keys(operation.env);
    if (overrides.length > 0) {
      this.logger?.info(
        `Loading ${overrides.length} additional environment variable(s)`,
        { variables: overrides }
      );
    }
    this.executor.addEnv(buildEnvironment(this.ambientEnv, operation.env));

    const failedSteps: string[] = [];
    try {
      for (const [index, step] of operation.steps.entries()) {
        this.stdout.write(`[${index + 1}] ${step}\n`);

        const result = await this.executor.execute(signal, step);
        this.forwardOutput(result);

        if (!isFailure(result)) {
          continue;
        }

        this.logger?.debug('Step failed', { step, exitCode: result.exitCode });

        if (operation.failFast || isCancellation(result, signal)) {
          throw new StepFailedError(step, result.exitCode, result.error);
        }
        failedSteps.push(step);
      }
    } finally {
      this.stdout.write(`${'='.repeat(this.stdout.columns || DEFAULT_OUTPUT_WIDTH)}\n`);
    }

    if (failedSteps.length > 0) {
      throw new OperationFailedError(failedSteps);
    }
  }

  private forwardOutput(result: CommandResult): void {
    if (result.stdout) {
      this.stdout.write(withTrailingNewline(result.stdout));
    }
    if (result.stderr) {
      this.stderr.write(withTrailingNewline(result.stderr));
    }
  }
}

function isFailure(result: CommandResult): boolean {
  return result.error !== undefined || result.exitCode !== 0;
}

function isCancellation(result: CommandResult, signal: AbortSignal): boolean {
  return result.error instanceof CommandCancelledError || signal.aborted;
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * A step failed and the operation stopped there
 */
export class StepFailedError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public cause?: Error
  ) {
    super(
      `error while running '${command}' (exit code ${exitCode})${cause ? `: ${cause.message}` : ''}`
    );
    this.name = 'StepFailedError';
  }
}

/**
 * One or more steps failed in a collect-all run
 */
export class OperationFailedError extends Error {
  constructor(public failedSteps: string[]) {
    super(`failed to run steps: [${failedSteps.map((step) => `'${step}'`).join(', ')}]`);
    this.name = 'OperationFailedError';
  }
}

/**
 * ShellExecutor - runs one command line through a shell
 *
 * Output is buffered per stream and returned once the process has exited.
 * Cancellation (abort signal or step timeout) kills the whole process group
 * and resolves with exit code -1 only after the child is gone.
 */

import { spawn, type ChildProcess } from 'child_process';
import { toEnvRecord } from './environment.js';
import { terminateProcessGroup } from './process-utils.js';
import type { CommandExecutor, CommandResult, Logger } from '../types.js';

/**
 * Largest delay a Node timer honors; longer delays fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Shell execution configuration
 */
export interface ShellExecutorConfig {
  /**
   * Shell binary, invoked as `<shell> -c <command>`
   * Default: /bin/sh
   */
  shell?: string;

  /**
   * Per-command time limit in milliseconds
   * Default: none. A value <= 0 cancels every command immediately; values
   * above MAX_TIMER_DELAY_MS are capped to it.
   */
  timeout?: number;

  /**
   * Working directory for commands
   * Default: process.cwd()
   */
  workingDirectory?: string;

  /**
   * Delay between SIGTERM and SIGKILL on cancellation
   * Default: 250
   */
  killGraceMs?: number;

  logger?: Logger;
}

/**
 * The shell could not be started
 */
export class CommandLaunchError extends Error {
  constructor(
    public command: string,
    public cause: Error
  ) {
    super(`Failed to launch '${command}': ${cause.message}`);
    this.name = 'CommandLaunchError';
  }
}

/**
 * The command was stopped before it finished
 */
export class CommandCancelledError extends Error {
  constructor(
    public command: string,
    public reason: string
  ) {
    super(`Command '${command}' was cancelled: ${reason}`);
    this.name = 'CommandCancelledError';
  }
}

export class ShellExecutor implements CommandExecutor {
  private config: {
    shell: string;
    timeout?: number;
    workingDirectory: string;
    killGraceMs: number;
  };
  private env?: Record<string, string>;
  private logger?: Logger;

  constructor(config?: ShellExecutorConfig) {
    this.config = {
      shell: config?.shell || '/bin/sh',
      timeout: config?.timeout,
      workingDirectory: config?.workingDirectory || process.cwd(),
      killGraceMs: config?.killGraceMs ?? 250,
    };
    this.logger = config?.logger;
  }

  /**
   * Install the environment for subsequent commands.
   * Until this is called, commands inherit the parent's environment.
   */
  addEnv(env: string[]): void {
    this.env = toEnvRecord(env);
  }

  /**
   * Execute a command line. Never rejects.
   *
   * @example
   * ```typescript
   * const executor = new ShellExecutor();
   * const result = await executor.execute(signal, 'echo out && echo err >&2');
   * // result.stdout === 'out\n', result.stderr === 'err\n'
   * ```
   */
  async execute(signal: AbortSignal, command: string): Promise<CommandResult> {
    if (command.trim() === '') {
      return { stdout: '', stderr: '', exitCode: 0 };
    }

    const { timeout } = this.config;
    if (signal.aborted) {
      return cancelled(command, describeReason(signal.reason));
    }
    if (timeout !== undefined && timeout <= 0) {
      return cancelled(command, `timed out after ${timeout}ms`);
    }

    this.logger?.debug('Executing command', { command, shell: this.config.shell });

    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let cancelReason: string | undefined;
      let settled = false;

      let child: ChildProcess;
      try {
        child = spawn(this.config.shell, ['-c', command], {
          cwd: this.config.workingDirectory,
          env: this.env,
          detached: process.platform !== 'win32',
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        // invalid arguments (e.g. a NUL byte) throw before any process exists
        resolve(launchFailed(command, error));
        return;
      }

      const cancel = (reason: string) => {
        if (cancelReason !== undefined) return;
        cancelReason = reason;
        this.logger?.debug('Terminating command', { command, reason });
        terminateProcessGroup(child, this.config.killGraceMs);
      };

      const onAbort = () => cancel(describeReason(signal.reason));
      signal.addEventListener('abort', onAbort, { once: true });

      const timeoutId =
        timeout !== undefined
          ? setTimeout(
              () => cancel(`timed out after ${timeout}ms`),
              Math.min(timeout, MAX_TIMER_DELAY_MS)
            )
          : undefined;

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      };

      // decode across chunk boundaries so multi-byte characters survive
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      child.stdout?.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr?.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error) => {
        finish(launchFailed(command, error));
      });

      child.on('close', (exitCode, exitSignal) => {
        if (cancelReason !== undefined) {
          finish(cancelled(command, cancelReason));
        } else if (exitCode === null) {
          finish(cancelled(command, `terminated by ${exitSignal ?? 'unknown signal'}`));
        } else {
          finish({ stdout, stderr, exitCode });
        }
      });
    });
  }
}

function launchFailed(command: string, error: unknown): CommandResult {
  return {
    stdout: '',
    stderr: '',
    exitCode: -1,
    error: new CommandLaunchError(
      command,
      error instanceof Error ? error : new Error(String(error))
    ),
  };
}

function cancelled(command: string, reason: string): CommandResult {
  return {
    stdout: '',
    stderr: '',
    exitCode: -1,
    error: new CommandCancelledError(command, reason),
  };
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error && reason.message) {
    return reason.message;
  }
  return 'operation was aborted';
}

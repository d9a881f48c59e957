import { resolve } from 'path';
import { Command, CommanderError } from 'commander';
import {
  createLogger,
  DefinitionLoader,
  DefinitionParseError,
  isRunningInCI,
  levelFromVerbosity,
  LOG_LEVELS,
  ShellExecutor,
  type CommandExecutor,
  type EnvironmentSnapshot,
  type Logger,
  type LogLevel,
  type OutputSink,
  type ProjectDefinition,
  type ShellExecutorConfig,
  type SignalSource,
} from '@opsflow/core';
import { loadConfig, type CliConfig } from './config.js';

/**
 * Everything the CLI takes from the host process
 */
export interface CliContext {
  cwd: string;
  /**
   * Ambient environment, handed to steps and read for configuration
   */
  env: EnvironmentSnapshot;
  stdout: OutputSink;
  stderr: OutputSink;
  /**
   * Default: process
   */
  signalSource?: SignalSource;
  /**
   * Default: a ShellExecutor
   */
  createExecutor?: (config: ShellExecutorConfig) => CommandExecutor;
}

/**
 * State prepared before any command action runs
 */
export interface Invocation {
  config: CliConfig;
  definition: ProjectDefinition;
  definitionPath: string;
  logger: Logger;
}

type GlobalOptions = {
  verbose: number;
  file?: string;
};

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Pick the log level: an explicit level wins, otherwise `-v` decides and a
 * CI runner never logs below info
 */
export function resolveLogLevel(
  verbosity: number,
  override: LogLevel | undefined,
  inCI: boolean
): LogLevel {
  if (override) {
    return override;
  }
  const level = levelFromVerbosity(verbosity);
  if (inCI && LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf('info')) {
    return 'info';
  }
  return level;
}

/**
 * Command Registry - the root command, its global flags and the invocation
 * state shared by the subcommands
 */
export class CommandRegistry {
  readonly program: Command;
  readonly context: CliContext;
  private logger: Logger;
  private invocation?: Invocation;

  constructor(name: string, description: string, version: string, context: CliContext) {
    this.context = context;
    this.logger = createLogger({ level: 'error', stream: context.stderr });

    this.program = new Command(name)
      .description(description)
      .version(version)
      .option('-v, --verbose', 'Increase verbosity (-v or -vv)', increaseVerbosity, 0)
      .option('-f, --file <path>', 'Path to the definition file')
      .exitOverride()
      .configureOutput({
        writeOut: (str) => {
          context.stdout.write(str);
        },
        writeErr: (str) => {
          context.stderr.write(str);
        },
      })
      .hook('preAction', () => this.prepare());
  }

  registerCommands(commands: Command[]): void {
    for (const command of commands) {
      this.program.addCommand(command.copyInheritedSettings(this.program));
    }
  }

  /**
   * Invocation state of the running command
   */
  current(): Invocation {
    if (!this.invocation) {
      throw new Error('No definition loaded');
    }
    return this.invocation;
  }

  createExecutor(invocation: Invocation): CommandExecutor {
    const config: ShellExecutorConfig = {
      shell: invocation.config.shell,
      timeout: invocation.config.stepTimeoutMs,
      workingDirectory: this.context.cwd,
      logger: invocation.logger,
    };
    return this.context.createExecutor
      ? this.context.createExecutor(config)
      : new ShellExecutor(config);
  }

  /**
   * Parse and run. Resolves with the process exit code.
   */
  async execute(argv: string[]): Promise<number> {
    try {
      await this.program.parseAsync(argv, { from: 'user' });
      return 0;
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      this.logger.error(describeError(error));
      return 1;
    }
  }

  private async prepare(): Promise<void> {
    const options = this.program.opts<GlobalOptions>();
    const config = loadConfig(this.context.env);

    this.logger = createLogger({
      level: resolveLogLevel(options.verbose, config.logLevel, isRunningInCI(this.context.env)),
      stream: this.context.stderr,
    });

    const loader = new DefinitionLoader(this.logger);
    const explicitPath = options.file ?? config.definitionPath;
    const definitionPath = explicitPath
      ? resolve(this.context.cwd, explicitPath)
      : await loader.findDefinitionFile(this.context.cwd);

    this.invocation = {
      config,
      definition: await loader.loadDefinition(definitionPath),
      definitionPath,
      logger: this.logger,
    };
  }
}

function describeError(error: unknown): string {
  if (error instanceof DefinitionParseError && error.errors) {
    return `${error.message}\n${error.getDetails()}`;
  }
  return error instanceof Error ? error.message : String(error);
}

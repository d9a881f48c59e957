import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { Command } from 'commander';
import {
  DefinitionValidator,
  generateManifest,
  LifecycleController,
  ProjectRunner,
  type OperationName,
} from '@opsflow/core';
import type { CommandRegistry } from './registry.js';

export const DOCTOR_HEADER = '===== OPSFLOW DOCTOR =====';

const OPERATION_COMMANDS: Record<OperationName, { description: string; failure: string }> = {
  install: { description: 'Run the install operations', failure: 'install failed' },
  test: { description: 'Run the test operations', failure: 'tests failed' },
  build: { description: 'Run the build operations', failure: 'build failed' },
};

/**
 * A command failed; the message leads with what the user asked for
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public cause: unknown
  ) {
    super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'CommandFailedError';
  }
}

export function createOperationCommand(name: OperationName, registry: CommandRegistry): Command {
  const { description, failure } = OPERATION_COMMANDS[name];

  return new Command(name).description(description).action(async () => {
    const invocation = registry.current();
    const { context } = registry;
    const lifecycle = new LifecycleController({
      source: context.signalSource,
      logger: invocation.logger,
    });
    const signal = lifecycle.start();

    try {
      const runner = new ProjectRunner(invocation.definition, {
        executor: registry.createExecutor(invocation),
        ambientEnv: context.env,
        stdout: context.stdout,
        stderr: context.stderr,
        logger: invocation.logger,
      });
      await runner.runOperation(name, signal);
    } catch (error) {
      throw new CommandFailedError(failure, error);
    } finally {
      lifecycle.dispose();
    }
  });
}

export function createDoctorCommand(registry: CommandRegistry): Command {
  return new Command('doctor')
    .description('Validate your configuration')
    .action(() => {
      const { definition, logger } = registry.current();
      const { stdout } = registry.context;

      stdout.write(`${DOCTOR_HEADER}\n`);
      try {
        new DefinitionValidator(logger).validateTo(definition, stdout);
      } catch (error) {
        throw new CommandFailedError('validation failed', error);
      }
    });
}

export function createManifestCommand(registry: CommandRegistry): Command {
  return new Command('manifest')
    .description('Print the project manifest')
    .option('-o, --output <file>', 'Write the manifest to a file')
    .action(async (options: { output?: string }) => {
      const { definition } = registry.current();
      const { cwd, stdout } = registry.context;
      const manifest = `${generateManifest(definition)}\n`;

      if (!options.output) {
        stdout.write(manifest);
        return;
      }

      const outputPath = resolve(cwd, options.output);
      try {
        await writeFile(outputPath, manifest, 'utf-8');
      } catch (error) {
        throw new CommandFailedError(`failed to write manifest to ${outputPath}`, error);
      }
      stdout.write(`Manifest written to ${outputPath}\n`);
    });
}

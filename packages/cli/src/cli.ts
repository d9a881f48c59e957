import {
  createDoctorCommand,
  createManifestCommand,
  createOperationCommand,
} from './commands.js';
import { CommandRegistry, type CliContext } from './registry.js';
import { readVersion } from './version.js';

export const PROGRAM_NAME = 'opsflow';
export const PROGRAM_DESCRIPTION = 'Declarative install, test and build pipelines';

/**
 * Assemble the command tree
 *
 * @example
 * ```typescript
 * const cli = createCli({ cwd: process.cwd(), env, stdout: process.stdout, stderr: process.stderr });
 * process.exitCode = await cli.execute(['-v', 'build']);
 * ```
 */
export function createCli(context: CliContext, version = readVersion()): CommandRegistry {
  const registry = new CommandRegistry(PROGRAM_NAME, PROGRAM_DESCRIPTION, version, context);
  registry.registerCommands([
    createOperationCommand('install', registry),
    createOperationCommand('test', registry),
    createOperationCommand('build', registry),
    createDoctorCommand(registry),
    createManifestCommand(registry),
  ]);
  return registry;
}

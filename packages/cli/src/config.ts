import { z } from 'zod';
import { MAX_TIMER_DELAY_MS, type LogLevel } from '@opsflow/core';

/**
 * Runtime configuration read from the environment
 */
export interface CliConfig {
  /**
   * Definition file, relative to the working directory
   */
  definitionPath?: string;
  /**
   * Overrides the level derived from `-v`
   */
  logLevel?: LogLevel;
  shell: string;
  stepTimeoutMs?: number;
}

const ConfigSchema = z.object({
  OPSFLOW_DEFINITION: z.string().optional(),
  OPSFLOW_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  OPSFLOW_SHELL: z.string().default('/bin/sh'),
  OPSFLOW_STEP_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
});

type ConfigKey = keyof z.input<typeof ConfigSchema>;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'OPSFLOW_DEFINITION',
  'OPSFLOW_LOG_LEVEL',
  'OPSFLOW_SHELL',
  'OPSFLOW_STEP_TIMEOUT_MS',
];

/**
 * Invalid runtime configuration
 */
export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the `OPSFLOW_*` variables. Empty values count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>>): CliConfig {
  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value) {
      raw[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    );
  }

  return {
    definitionPath: result.data.OPSFLOW_DEFINITION,
    logLevel: result.data.OPSFLOW_LOG_LEVEL,
    shell: result.data.OPSFLOW_SHELL,
    stepTimeoutMs: result.data.OPSFLOW_STEP_TIMEOUT_MS,
  };
}

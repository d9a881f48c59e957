import { readFile, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { load as yamlLoad, YAMLException } from 'js-yaml';
import { DefinitionParseError, ProjectDefinitionSchema } from './schema.js';
import type { Logger, ProjectDefinition } from '../types.js';

export const DEFINITION_FILE = 'opsflow.yaml';

/**
 * Definition Loader - reads `opsflow.yaml` into a ProjectDefinition
 */
export class DefinitionLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Resolve the definition file inside a directory
   *
   * @throws DefinitionNotFoundError if the file is missing
   */
  async findDefinitionFile(dirPath: string): Promise<string> {
    const filePath = resolve(join(dirPath, DEFINITION_FILE));
    await this.ensureExists(filePath);
    return filePath;
  }

  /**
   * Load and validate a definition file
   *
   * @throws DefinitionNotFoundError if the file is missing
   * @throws DefinitionParseError if the YAML or its shape is invalid
   */
  async loadDefinition(filePath: string): Promise<ProjectDefinition> {
    await this.ensureExists(filePath);
    const content = await readFile(filePath, 'utf-8');
    const definition = parseDefinition(content, filePath);

    this.logger?.debug(`Loaded definition: ${filePath}`, {
      id: definition.id,
      language: definition.codebase.language,
    });

    return definition;
  }

  private async ensureExists(filePath: string): Promise<void> {
    try {
      await stat(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new DefinitionNotFoundError(filePath);
      }
      throw error;
    }
  }
}

/**
 * Decode definition YAML
 *
 * An empty document is a definition with every field absent.
 */
export function parseDefinition(content: string, source = DEFINITION_FILE): ProjectDefinition {
  let data: unknown;
  try {
    data = yamlLoad(content, { filename: source });
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new DefinitionParseError(`Failed to decode YAML in ${source}: ${error.reason}`);
    }
    throw error;
  }

  const result = ProjectDefinitionSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new DefinitionParseError(`Invalid definition in ${source}`, result.error);
  }
  return result.data;
}

/**
 * Definition file not found
 */
export class DefinitionNotFoundError extends Error {
  constructor(public filePath: string) {
    super(`Definition file not found: ${filePath}`);
    this.name = 'DefinitionNotFoundError';
  }
}

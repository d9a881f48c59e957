import { z } from 'zod';
import type { Codebase, Operation, ProjectDefinition } from '../types.js';

/**
 * Env values may be written as bare YAML scalars (`PORT: 8080`)
 */
const EnvValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

function emptyOperation(): Operation {
  return { steps: [], env: {}, failFast: false };
}

/**
 * Operation block: `steps`, `env`, `fail_fast`
 */
export const OperationSchema = z
  .object({
    fail_fast: z.boolean().optional(),
    env: z.record(EnvValueSchema).nullish(),
    steps: z.array(z.string()).nullish(),
  })
  .nullish()
  .transform(
    (raw): Operation => ({
      steps: raw?.steps ?? [],
      env: raw?.env ?? {},
      failFast: raw?.fail_fast ?? false,
    })
  );

export const CodebaseSchema = z
  .object({
    language: z.string().nullish(),
    dependencies: z.array(z.string()).nullish(),
    install: OperationSchema,
    test: OperationSchema,
    build: OperationSchema,
  })
  .nullish()
  .transform(
    (raw): Codebase => ({
      language: raw?.language ?? undefined,
      dependencies: raw?.dependencies ?? undefined,
      install: raw?.install ?? emptyOperation(),
      test: raw?.test ?? emptyOperation(),
      build: raw?.build ?? emptyOperation(),
    })
  );

/**
 * Project definition file schema (snake_case keys as written in YAML)
 */
export const ProjectDefinitionSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    description: z.string().nullish(),
    version: z.union([z.string(), z.number()]).transform(String).nullish(),
    repo_url: z.string().nullish(),
    codebase: CodebaseSchema,
  })
  .transform(
    (raw): ProjectDefinition => ({
      id: raw.id ?? undefined,
      name: raw.name ?? undefined,
      description: raw.description ?? undefined,
      version: raw.version ?? undefined,
      repoUrl: raw.repo_url ?? undefined,
      codebase: raw.codebase,
    })
  );

/**
 * Custom error for definition files that do not decode
 */
export class DefinitionParseError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'DefinitionParseError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('\n');
  }
}

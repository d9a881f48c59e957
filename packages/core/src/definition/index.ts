/**
 * Definition System - loading and shaping `opsflow.yaml`
 */

export {
  OperationSchema,
  CodebaseSchema,
  ProjectDefinitionSchema,
  DefinitionParseError,
} from './schema.js';

export {
  DefinitionLoader,
  DefinitionNotFoundError,
  DEFINITION_FILE,
  parseDefinition,
} from './loader.js';

export { buildManifest, generateManifest, type Manifest } from './manifest.js';

export {
  DefinitionValidator,
  DefinitionInvalidError,
  validateProjectId,
  type RenderOptions,
} from './validator.js';

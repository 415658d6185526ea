/**
 * Manifest & Validation Engine
 */

export type {
  ArgumentSpec,
  ArgumentType,
  CommandSpec,
  Manifest,
  ModelSpec,
  ResponseSpec,
  ValidationConstraints,
} from './types.js';
export { ARGUMENT_TYPES } from './types.js';
export {
  ManifestError,
  loadManifestFile,
  mergeManifests,
  parseManifest,
  serializeManifest,
} from './parser.js';
export { validateRequestArgs, type ValidationResult } from './validator.js';
export {
  validateResponseValue,
  type ResponseValidationError,
  type ResponseValidationResult,
} from './responseValidator.js';

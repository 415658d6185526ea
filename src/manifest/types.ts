/**
 * Manifest Types
 *
 * Parsed, normalized form of a manifest document. Nested specs are plain
 * object references; `$ref` and `modelRef` are both normalized to a
 * `reference` spec carrying the model name.
 */

import type { JsonValue } from '@/types.js';

export const ARGUMENT_TYPES = [
  'string',
  'integer',
  'number',
  'boolean',
  'array',
  'object',
  'null',
  'reference',
] as const;

export type ArgumentType = (typeof ARGUMENT_TYPES)[number];

/**
 * Constraints on a value. Each absent constraint leaves that axis unconstrained.
 */
export interface ValidationConstraints {
  /** Strings: character count. Arrays: element count. */
  minLength?: number;
  maxLength?: number;
  /** Regular expression, strings only */
  pattern?: string;
  minimum?: number;
  maximum?: number;
  enum?: JsonValue[];
}

export interface ArgumentSpec {
  type: ArgumentType;
  required: boolean;
  description?: string;
  defaultValue?: JsonValue;
  validation?: ValidationConstraints;
  /** Element spec for `array` */
  items?: ArgumentSpec;
  /** Model name for `reference` */
  modelRef?: string;
  /** Inline properties for `object` */
  properties?: ReadonlyMap<string, ArgumentSpec>;
}

export interface ResponseSpec {
  type?: ArgumentType;
  description?: string;
  properties?: ReadonlyMap<string, ArgumentSpec>;
  items?: ArgumentSpec;
  modelRef?: string;
}

export interface ModelSpec {
  name: string;
  description?: string;
  properties: ReadonlyMap<string, ArgumentSpec>;
  required: readonly string[];
}

export interface CommandSpec {
  name: string;
  description?: string;
  /** Declared arguments in document order */
  args: ReadonlyMap<string, ArgumentSpec>;
  response?: ResponseSpec;
  errorCodes: readonly string[];
}

export interface Manifest {
  version: string;
  name?: string;
  description?: string;
  models: ReadonlyMap<string, ModelSpec>;
  commands: ReadonlyMap<string, CommandSpec>;
}

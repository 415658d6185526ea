/**
 * Request Argument Validation
 *
 * Checks a request's arguments against its command spec. Declared arguments
 * are visited in document order and the first violation wins, so the same
 * manifest and arguments always produce the same error.
 */

import { isDeepStrictEqual } from 'node:util';

import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { isJsonObject, type JsonObject, type JsonValue } from '@/types.js';

import type { ArgumentSpec, ArgumentType, Manifest, ValidationConstraints } from './types.js';

export type ValidationResult =
  | { valid: true; args: JsonObject }
  | { valid: false; error: RpcError };

const patternCache = new Map<string, RegExp>();

/**
 * Compile a manifest pattern once. Patterns are checked at parse time.
 */
export function compilePattern(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (regex === undefined) {
    regex = new RegExp(pattern);
    patternCache.set(pattern, regex);
  }
  return regex;
}

/**
 * Describe the runtime shape of a value in manifest type terms.
 */
export function describeType(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

/**
 * Check a value's shape against a declared type. `reference` is checked as
 * an object; the model's properties are checked separately.
 */
export function matchesType(value: JsonValue, type: ArgumentType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
    case 'reference':
      return isJsonObject(value);
    case 'null':
      return value === null;
  }
}

/**
 * Length of a string in characters (code points), or of an array in elements.
 */
function lengthOf(value: JsonValue): number | undefined {
  if (typeof value === 'string') {
    return [...value].length;
  }
  if (Array.isArray(value)) {
    return value.length;
  }
  return undefined;
}

/**
 * Return a description of the first violated constraint, or null.
 * Order: length, pattern, numeric bounds, enum.
 */
export function findConstraintViolation(
  value: JsonValue,
  constraints: ValidationConstraints,
  field: string
): { details: string; constraint: Record<string, JsonValue> } | null {
  const length = lengthOf(value);
  if (length !== undefined) {
    if (constraints.minLength !== undefined && length < constraints.minLength) {
      return {
        details: `Argument '${field}' length ${length} is less than minimum ${constraints.minLength}`,
        constraint: { minLength: constraints.minLength },
      };
    }
    if (constraints.maxLength !== undefined && length > constraints.maxLength) {
      return {
        details: `Argument '${field}' length ${length} exceeds maximum ${constraints.maxLength}`,
        constraint: { maxLength: constraints.maxLength },
      };
    }
  }

  if (constraints.pattern !== undefined && typeof value === 'string') {
    if (!compilePattern(constraints.pattern).test(value)) {
      return {
        details: `Argument '${field}' does not match pattern '${constraints.pattern}'`,
        constraint: { pattern: constraints.pattern },
      };
    }
  }

  if (typeof value === 'number') {
    if (constraints.minimum !== undefined && value < constraints.minimum) {
      return {
        details: `Argument '${field}' value ${value} is less than minimum ${constraints.minimum}`,
        constraint: { minimum: constraints.minimum },
      };
    }
    if (constraints.maximum !== undefined && value > constraints.maximum) {
      return {
        details: `Argument '${field}' value ${value} exceeds maximum ${constraints.maximum}`,
        constraint: { maximum: constraints.maximum },
      };
    }
  }

  if (constraints.enum !== undefined) {
    const allowed = constraints.enum;
    if (!allowed.some((candidate) => isDeepStrictEqual(candidate, value))) {
      return {
        details: `Argument '${field}' value ${JSON.stringify(value)} is not one of ${JSON.stringify(allowed)}`,
        constraint: { enum: allowed },
      };
    }
  }

  return null;
}

function missingArgument(field: string): RpcError {
  return RpcError.invalidParams(field, `Missing required argument '${field}'`);
}

/**
 * Validate and normalize the properties of an object value, in declaration
 * order. Undeclared properties are kept as they are.
 *
 * @param required - Names that must be present besides those flagged `required`
 */
function validateProperties(
  manifest: Manifest,
  value: Readonly<JsonObject>,
  properties: ReadonlyMap<string, ArgumentSpec>,
  required: readonly string[],
  prefix: string
): JsonObject {
  const result: JsonObject = { ...value };
  for (const [name, spec] of properties) {
    const field = prefix ? `${prefix}.${name}` : name;
    const isRequired = spec.required || required.includes(name);
    const present = value[name];
    if (present === undefined) {
      if (isRequired) {
        throw missingArgument(field);
      }
      if (spec.defaultValue !== undefined) {
        result[name] = spec.defaultValue;
      }
      continue;
    }
    if (present === null && spec.type !== 'null') {
      if (isRequired) {
        throw RpcError.invalidParams(field, `Required argument '${field}' cannot be null`, null, {
          type: spec.type,
        });
      }
      continue;
    }
    result[name] = validateValue(manifest, present, spec, field);
  }
  return result;
}

/**
 * Validate one value against its spec and return it with nested defaults applied.
 *
 * @throws RpcError INVALID_PARAMS on the first violation
 */
function validateValue(
  manifest: Manifest,
  value: JsonValue,
  spec: ArgumentSpec,
  field: string
): JsonValue {
  if (!matchesType(value, spec.type)) {
    const expected = spec.type === 'reference' ? `object (${spec.modelRef ?? 'model'})` : spec.type;
    throw RpcError.invalidParams(
      field,
      `Argument '${field}' must be of type ${expected}, got ${describeType(value)}`,
      value,
      { type: expected }
    );
  }

  if (spec.validation !== undefined) {
    const violation = findConstraintViolation(value, spec.validation, field);
    if (violation !== null) {
      throw RpcError.invalidParams(field, violation.details, value, violation.constraint);
    }
  }

  if (Array.isArray(value)) {
    const items = spec.items;
    if (items === undefined) {
      return value;
    }
    return value.map((element, index) =>
      validateValue(manifest, element, items, `${field}[${index}]`)
    );
  }

  if (isJsonObject(value)) {
    if (spec.type === 'reference' && spec.modelRef !== undefined) {
      const model = manifest.models.get(spec.modelRef);
      if (model === undefined) {
        throw RpcError.withContext(
          ERROR_CODES.VALIDATION_FAILED,
          `Model '${spec.modelRef}' referenced by '${field}' is not defined`,
          { field, modelRef: spec.modelRef }
        );
      }
      return validateProperties(manifest, value, model.properties, model.required, field);
    }
    if (spec.properties !== undefined) {
      return validateProperties(manifest, value, spec.properties, [], field);
    }
  }

  return value;
}

/**
 * Validate a request's arguments against the manifest.
 *
 * Unknown commands fail with METHOD_NOT_FOUND before any argument is looked
 * at. Absent optional arguments receive their declared default. Arguments
 * the manifest does not declare are passed through unchanged. An optional
 * argument sent as `null` is kept as `null` and not checked further, at any
 * depth.
 *
 * @example
 * ```typescript
 * const result = validateRequestArgs(manifest, 'createWorkspace', { name: 'lib-1' });
 * if (!result.valid) {
 *   console.error(result.error.describe());
 * }
 * ```
 */
export function validateRequestArgs(
  manifest: Manifest,
  command: string,
  args: Readonly<JsonObject> = {}
): ValidationResult {
  const spec = manifest.commands.get(command);
  if (spec === undefined) {
    return {
      valid: false,
      error: RpcError.withContext(
        ERROR_CODES.METHOD_NOT_FOUND,
        `Command '${command}' is not defined in the manifest`,
        { command }
      ),
    };
  }

  let result: JsonObject;
  try {
    result = validateProperties(manifest, args, spec.args, [], '');
  } catch (error) {
    if (error instanceof RpcError) {
      return { valid: false, error };
    }
    throw error;
  }

  return { valid: true, args: result };
}

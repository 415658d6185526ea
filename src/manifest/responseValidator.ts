/**
 * Response Validation
 *
 * Advisory check of a handler's result against the command's response spec.
 * Every problem is collected; nothing here blocks delivery.
 */

import { isJsonObject, type JsonObject, type JsonValue } from '@/types.js';

import type { ArgumentSpec, ArgumentType, Manifest, ResponseSpec } from './types.js';
import { describeType, findConstraintViolation, matchesType } from './validator.js';

export interface ResponseValidationError {
  /** Path into the result, rooted at `result` */
  field: string;
  message: string;
  expected?: string;
  actual?: string;
}

export interface ResponseValidationResult {
  valid: boolean;
  errors: ResponseValidationError[];
}

/**
 * Shape shared by argument and response specs that the walker understands.
 */
interface ShapeSpec {
  type?: ArgumentType;
  properties?: ReadonlyMap<string, ArgumentSpec>;
  items?: ArgumentSpec;
  modelRef?: string;
}

class ResponseWalker {
  readonly errors: ResponseValidationError[] = [];

  constructor(private readonly manifest: Manifest) {}

  check(value: JsonValue, spec: ShapeSpec, field: string): void {
    if (spec.modelRef !== undefined) {
      this.checkModel(value, spec.modelRef, field);
      return;
    }

    if (spec.type !== undefined && !matchesType(value, spec.type)) {
      this.errors.push({
        field,
        message: `Expected ${spec.type}, got ${describeType(value)}`,
        expected: spec.type,
        actual: describeType(value),
      });
      return;
    }

    if (spec.properties !== undefined && isJsonObject(value)) {
      this.checkProperties(value, spec.properties, [], field);
    }
    if (spec.items !== undefined && Array.isArray(value)) {
      const items = spec.items;
      value.forEach((element, index) => this.checkArgument(element, items, `${field}[${index}]`));
    }
  }

  private checkArgument(value: JsonValue, spec: ArgumentSpec, field: string): void {
    const before = this.errors.length;
    this.check(value, spec, field);
    if (this.errors.length > before || spec.validation === undefined) {
      return;
    }
    const violation = findConstraintViolation(value, spec.validation, field);
    if (violation !== null) {
      this.errors.push({ field, message: violation.details });
    }
  }

  private checkModel(value: JsonValue, modelRef: string, field: string): void {
    const model = this.manifest.models.get(modelRef);
    if (model === undefined) {
      this.errors.push({ field, message: `Model '${modelRef}' is not defined` });
      return;
    }
    if (!isJsonObject(value)) {
      this.errors.push({
        field,
        message: `Expected object (${modelRef}), got ${describeType(value)}`,
        expected: 'object',
        actual: describeType(value),
      });
      return;
    }
    this.checkProperties(value, model.properties, model.required, field);
  }

  private checkProperties(
    value: JsonObject,
    properties: ReadonlyMap<string, ArgumentSpec>,
    required: readonly string[],
    field: string
  ): void {
    for (const [name, spec] of properties) {
      const property = value[name];
      const path = `${field}.${name}`;
      if (property === undefined) {
        if (spec.required || required.includes(name)) {
          this.errors.push({ field: path, message: `Missing required property '${name}'` });
        }
        continue;
      }
      this.checkArgument(property, spec, path);
    }
  }
}

/**
 * Validate a result against the response spec of a command.
 *
 * A command without a response spec accepts any result. A command the
 * manifest does not define yields a single error on `command`.
 *
 * @example
 * ```typescript
 * const { valid, errors } = validateResponseValue(manifest, 'getUser', { id: 'u-1' });
 * ```
 */
export function validateResponseValue(
  manifest: Manifest,
  command: string,
  value: JsonValue
): ResponseValidationResult {
  const spec = manifest.commands.get(command);
  if (spec === undefined) {
    return {
      valid: false,
      errors: [{ field: 'command', message: `Command '${command}' is not defined in the manifest` }],
    };
  }
  const response: ResponseSpec | undefined = spec.response;
  if (response === undefined) {
    return { valid: true, errors: [] };
  }

  const walker = new ResponseWalker(manifest);
  walker.check(value, response, 'result');
  return { valid: walker.errors.length === 0, errors: walker.errors };
}

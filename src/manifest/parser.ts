/**
 * Manifest Parser
 *
 * Turns a plain manifest document (already decoded from JSON) into the
 * normalized {@link Manifest} shape and rejects inconsistent documents at
 * load time, so that validation never has to deal with a broken schema.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { RESERVED_COMMAND_NAMES } from '@/constants.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { isJsonObject, type JsonObject, type JsonValue } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import {
  ARGUMENT_TYPES,
  type ArgumentSpec,
  type ArgumentType,
  type CommandSpec,
  type Manifest,
  type ModelSpec,
  type ResponseSpec,
  type ValidationConstraints,
} from './types.js';

const log = createLogger('manifest');

const MODEL_REF_PREFIX = '#/models/';

/**
 * Raised when a manifest document is malformed or internally inconsistent.
 * `data.field` holds the document path of the offending entry.
 */
export class ManifestError extends RpcError {
  public override readonly name = 'ManifestError';

  constructor(message: string, path?: string) {
    super(
      ERROR_CODES.VALIDATION_FAILED,
      { details: message, ...(path !== undefined && { field: path }) },
      message
    );
  }
}

/**
 * Collected model references, checked once every model is known.
 */
interface ParseContext {
  references: Array<{ modelRef: string; path: string }>;
}

function isArgumentType(value: string): value is ArgumentType {
  return ARGUMENT_TYPES.some((type) => type === value);
}

function expectObject(value: JsonValue | undefined, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ManifestError(`${path} must be an object`, path);
  }
  return value;
}

function optionalString(source: JsonObject, key: string, path: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ManifestError(`${path}.${key} must be a string`, `${path}.${key}`);
  }
  return value;
}

function optionalNumber(source: JsonObject, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ManifestError(`${path}.${key} must be a number`, `${path}.${key}`);
  }
  return value;
}

function optionalLength(source: JsonObject, key: string, path: string): number | undefined {
  const value = optionalNumber(source, key, path);
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ManifestError(`${path}.${key} must be a non-negative integer`, `${path}.${key}`);
  }
  return value;
}

function stringList(value: JsonValue | undefined, path: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ManifestError(`${path} must be an array of strings`, path);
  }
  return value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ManifestError(`${path}[${index}] must be a string`, `${path}[${index}]`);
    }
    return entry;
  });
}

/**
 * Extract the model name from `$ref: '#/models/Name'` or a bare `modelRef`.
 */
function readModelRef(source: JsonObject, path: string): string | undefined {
  const ref = optionalString(source, '$ref', path);
  const modelRef = optionalString(source, 'modelRef', path);
  const raw = modelRef ?? ref;
  if (raw === undefined) {
    return undefined;
  }
  const name = raw.startsWith(MODEL_REF_PREFIX) ? raw.slice(MODEL_REF_PREFIX.length) : raw;
  if (name.length === 0) {
    throw new ManifestError(`${path} has an empty model reference`, path);
  }
  return name;
}

function parseConstraints(value: JsonValue | undefined, path: string): ValidationConstraints {
  const source = expectObject(value, path);
  const minLength = optionalLength(source, 'minLength', path);
  const maxLength = optionalLength(source, 'maxLength', path);
  const minimum = optionalNumber(source, 'minimum', path);
  const maximum = optionalNumber(source, 'maximum', path);
  const pattern = optionalString(source, 'pattern', path);
  const allowed = source['enum'];

  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    throw new ManifestError(
      `${path}: minLength (${minLength}) is greater than maxLength (${maxLength})`,
      path
    );
  }
  if (minimum !== undefined && maximum !== undefined && minimum > maximum) {
    throw new ManifestError(
      `${path}: minimum (${minimum}) is greater than maximum (${maximum})`,
      path
    );
  }
  if (pattern !== undefined) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ManifestError(
        `${path}: invalid pattern ${JSON.stringify(pattern)}: ${getErrorMessage(error)}`,
        `${path}.pattern`
      );
    }
  }
  if (allowed !== undefined && allowed !== null && !Array.isArray(allowed)) {
    throw new ManifestError(`${path}.enum must be an array`, `${path}.enum`);
  }

  return {
    ...(minLength !== undefined && { minLength }),
    ...(maxLength !== undefined && { maxLength }),
    ...(pattern !== undefined && { pattern }),
    ...(minimum !== undefined && { minimum }),
    ...(maximum !== undefined && { maximum }),
    ...(Array.isArray(allowed) && { enum: allowed }),
  };
}

function parseProperties(
  value: JsonValue | undefined,
  path: string,
  context: ParseContext
): Map<string, ArgumentSpec> {
  const properties = new Map<string, ArgumentSpec>();
  if (value === undefined || value === null) {
    return properties;
  }
  for (const [name, spec] of Object.entries(expectObject(value, path))) {
    if (name.length === 0) {
      throw new ManifestError(`${path} contains an empty name`, path);
    }
    properties.set(name, parseArgumentSpec(spec, `${path}.${name}`, context));
  }
  return properties;
}

/**
 * Resolve the declared type, treating a model reference as `reference`.
 */
function parseType(source: JsonObject, path: string, modelRef: string | undefined): ArgumentType {
  const declared = optionalString(source, 'type', path);
  if (modelRef !== undefined) {
    if (declared !== undefined && declared !== 'reference' && declared !== 'object') {
      throw new ManifestError(
        `${path} references a model but declares type '${declared}'`,
        `${path}.type`
      );
    }
    return 'reference';
  }
  if (declared === undefined) {
    throw new ManifestError(`${path}.type is required`, `${path}.type`);
  }
  if (!isArgumentType(declared)) {
    throw new ManifestError(`${path}.type '${declared}' is not a known type`, `${path}.type`);
  }
  if (declared === 'reference') {
    throw new ManifestError(`${path} has type 'reference' but no model reference`, path);
  }
  return declared;
}

function parseArgumentSpec(value: JsonValue, path: string, context: ParseContext): ArgumentSpec {
  const source = expectObject(value, path);
  const modelRef = readModelRef(source, path);
  const type = parseType(source, path, modelRef);

  const required = source['required'];
  if (required !== undefined && required !== null && typeof required !== 'boolean') {
    throw new ManifestError(`${path}.required must be a boolean`, `${path}.required`);
  }

  const spec: ArgumentSpec = { type, required: required === true };
  const description = optionalString(source, 'description', path);
  if (description !== undefined) {
    spec.description = description;
  }
  const defaultValue = source['defaultValue'];
  if (defaultValue !== undefined) {
    spec.defaultValue = defaultValue;
  }
  if (source['validation'] !== undefined && source['validation'] !== null) {
    spec.validation = parseConstraints(source['validation'], `${path}.validation`);
  }
  if (source['items'] !== undefined && source['items'] !== null) {
    spec.items = parseArgumentSpec(source['items'], `${path}.items`, context);
  }
  if (source['properties'] !== undefined && source['properties'] !== null) {
    spec.properties = parseProperties(source['properties'], `${path}.properties`, context);
  }
  if (modelRef !== undefined) {
    spec.modelRef = modelRef;
    context.references.push({ modelRef, path });
  }
  return spec;
}

function parseResponseSpec(value: JsonValue, path: string, context: ParseContext): ResponseSpec {
  const source = expectObject(value, path);
  const modelRef = readModelRef(source, path);
  const declared = optionalString(source, 'type', path);

  const spec: ResponseSpec = {};
  if (modelRef !== undefined) {
    spec.type = parseType(source, path, modelRef);
    spec.modelRef = modelRef;
    context.references.push({ modelRef, path });
  } else if (declared !== undefined) {
    spec.type = parseType(source, path, undefined);
  }
  const description = optionalString(source, 'description', path);
  if (description !== undefined) {
    spec.description = description;
  }
  if (source['properties'] !== undefined && source['properties'] !== null) {
    spec.properties = parseProperties(source['properties'], `${path}.properties`, context);
  }
  if (source['items'] !== undefined && source['items'] !== null) {
    spec.items = parseArgumentSpec(source['items'], `${path}.items`, context);
  }
  return spec;
}

function parseModel(name: string, value: JsonValue, context: ParseContext): ModelSpec {
  const path = `models.${name}`;
  const source = expectObject(value, path);
  const type = optionalString(source, 'type', path);
  if (type !== undefined && type !== 'object') {
    throw new ManifestError(`${path}.type must be 'object'`, `${path}.type`);
  }
  const properties = parseProperties(source['properties'], `${path}.properties`, context);
  const required = stringList(source['required'], `${path}.required`);
  for (const property of required) {
    if (!properties.has(property)) {
      throw new ManifestError(
        `${path} requires '${property}' which is not one of its properties`,
        `${path}.required`
      );
    }
  }

  const model: ModelSpec = { name, properties, required };
  const description = optionalString(source, 'description', path);
  if (description !== undefined) {
    model.description = description;
  }
  return model;
}

function parseCommand(
  name: string,
  value: JsonValue,
  path: string,
  context: ParseContext
): CommandSpec {
  if (name.length === 0) {
    throw new ManifestError(`${path} contains an empty command name`, path);
  }
  if (RESERVED_COMMAND_NAMES.has(name)) {
    throw new ManifestError(`Command '${name}' is reserved and cannot be defined`, path);
  }
  const source = expectObject(value, path);

  const errorCodes = stringList(source['errorCodes'], `${path}.errorCodes`);
  errorCodes.forEach((code, index) => {
    if (code.trim().length === 0) {
      throw new ManifestError(
        `${path}.errorCodes[${index}] is empty`,
        `${path}.errorCodes[${index}]`
      );
    }
  });

  const command: CommandSpec = {
    name,
    args: parseProperties(source['args'], `${path}.args`, context),
    errorCodes,
  };
  const description = optionalString(source, 'description', path);
  if (description !== undefined) {
    command.description = description;
  }
  if (source['response'] !== undefined && source['response'] !== null) {
    command.response = parseResponseSpec(source['response'], `${path}.response`, context);
  }
  return command;
}

function addCommands(
  target: Map<string, CommandSpec>,
  source: JsonObject,
  path: string,
  context: ParseContext
): void {
  for (const [name, spec] of Object.entries(source)) {
    if (target.has(name)) {
      throw new ManifestError(`Command '${name}' is defined more than once`, `${path}.${name}`);
    }
    target.set(name, parseCommand(name, spec, `${path}.${name}`, context));
  }
}

/**
 * Parse and check a manifest document.
 *
 * Commands come from `commands`, or from the legacy `channels` layout
 * (`channels.<id>.commands`), which is flattened; a command name may appear
 * only once across both.
 *
 * @param document - Decoded JSON document
 * @returns Normalized manifest
 * @throws ManifestError if the document is malformed or inconsistent
 *
 * @example
 * ```typescript
 * const manifest = parseManifest({
 *   version: '1.0.0',
 *   commands: { createWorkspace: { args: { name: { type: 'string', required: true } } } },
 * });
 * ```
 */
export function parseManifest(document: unknown): Manifest {
  if (!isJsonObject(document)) {
    throw new ManifestError('Manifest must be a JSON object');
  }

  const version = optionalString(document, 'version', 'manifest');
  if (version === undefined || version.trim().length === 0) {
    throw new ManifestError('Manifest version must be a non-empty string', 'version');
  }

  const context: ParseContext = { references: [] };

  const models = new Map<string, ModelSpec>();
  const rawModels = document['models'];
  if (rawModels !== undefined && rawModels !== null) {
    for (const [name, spec] of Object.entries(expectObject(rawModels, 'models'))) {
      models.set(name, parseModel(name, spec, context));
    }
  }

  const commands = new Map<string, CommandSpec>();
  const rawCommands = document['commands'];
  if (rawCommands !== undefined && rawCommands !== null) {
    addCommands(commands, expectObject(rawCommands, 'commands'), 'commands', context);
  }
  const rawChannels = document['channels'];
  if (rawChannels !== undefined && rawChannels !== null) {
    for (const [channelId, channel] of Object.entries(expectObject(rawChannels, 'channels'))) {
      const channelPath = `channels.${channelId}`;
      const channelCommands = expectObject(channel, channelPath)['commands'];
      if (channelCommands !== undefined && channelCommands !== null) {
        addCommands(
          commands,
          expectObject(channelCommands, `${channelPath}.commands`),
          `${channelPath}.commands`,
          context
        );
      }
    }
  }

  for (const { modelRef, path } of context.references) {
    if (!models.has(modelRef)) {
      throw new ManifestError(`${path} references unknown model '${modelRef}'`, path);
    }
  }

  const manifest: Manifest = { version, models, commands };
  const name = optionalString(document, 'name', 'manifest');
  if (name !== undefined) {
    manifest.name = name;
  }
  const description = optionalString(document, 'description', 'manifest');
  if (description !== undefined) {
    manifest.description = description;
  }
  return manifest;
}

/**
 * Combine two manifests. Commands and models must not overlap.
 *
 * @throws ManifestError on a duplicate command or model name
 */
export function mergeManifests(base: Manifest, additional: Manifest): Manifest {
  const commands = new Map(base.commands);
  for (const [name, command] of additional.commands) {
    if (commands.has(name)) {
      throw new ManifestError(`Command '${name}' already exists in base manifest`, `commands.${name}`);
    }
    commands.set(name, command);
  }
  const models = new Map(base.models);
  for (const [name, model] of additional.models) {
    if (models.has(name)) {
      throw new ManifestError(`Model '${name}' already exists in base manifest`, `models.${name}`);
    }
    models.set(name, model);
  }
  return { ...base, commands, models };
}

/**
 * Read and parse a JSON manifest file.
 *
 * @throws ManifestError if the file is not `.json`, unreadable or invalid
 */
export async function loadManifestFile(path: string): Promise<Manifest> {
  const extension = extname(path).toLowerCase();
  if (extension !== '.json') {
    throw new ManifestError(
      `Unsupported manifest format '${extension || path}'; convert it to JSON first`
    );
  }

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ManifestError(`Cannot read manifest ${path}: ${getErrorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(`Manifest ${path} is not valid JSON: ${getErrorMessage(error)}`);
  }

  const manifest = parseManifest(document);
  log.debug(
    `Loaded manifest ${path} (version ${manifest.version}, ${manifest.commands.size} commands)`
  );
  return manifest;
}

/**
 * Convert a parsed manifest back to its document form, as served by the
 * built-in `manifest` command.
 */
export function serializeManifest(manifest: Manifest): JsonObject {
  const commands: JsonObject = {};
  for (const [name, command] of manifest.commands) {
    const entry: JsonObject = { args: serializeProperties(command.args) };
    if (command.description !== undefined) entry['description'] = command.description;
    if (command.response !== undefined) entry['response'] = serializeResponse(command.response);
    if (command.errorCodes.length > 0) entry['errorCodes'] = [...command.errorCodes];
    commands[name] = entry;
  }
  const models: JsonObject = {};
  for (const [name, model] of manifest.models) {
    const entry: JsonObject = {
      type: 'object',
      properties: serializeProperties(model.properties),
    };
    if (model.required.length > 0) entry['required'] = [...model.required];
    if (model.description !== undefined) entry['description'] = model.description;
    models[name] = entry;
  }

  const document: JsonObject = { version: manifest.version };
  if (manifest.name !== undefined) document['name'] = manifest.name;
  if (manifest.description !== undefined) document['description'] = manifest.description;
  document['models'] = models;
  document['commands'] = commands;
  return document;
}

function serializeProperties(properties: ReadonlyMap<string, ArgumentSpec>): JsonObject {
  const result: JsonObject = {};
  for (const [name, spec] of properties) {
    result[name] = serializeArgument(spec);
  }
  return result;
}

function serializeArgument(spec: ArgumentSpec): JsonObject {
  const entry: JsonObject = { type: spec.type };
  if (spec.required) entry['required'] = true;
  if (spec.description !== undefined) entry['description'] = spec.description;
  if (spec.defaultValue !== undefined) entry['defaultValue'] = spec.defaultValue;
  if (spec.validation !== undefined) entry['validation'] = serializeConstraints(spec.validation);
  if (spec.items !== undefined) entry['items'] = serializeArgument(spec.items);
  if (spec.modelRef !== undefined) entry['modelRef'] = spec.modelRef;
  if (spec.properties !== undefined) entry['properties'] = serializeProperties(spec.properties);
  return entry;
}

function serializeResponse(spec: ResponseSpec): JsonObject {
  const entry: JsonObject = {};
  if (spec.type !== undefined) entry['type'] = spec.type;
  if (spec.description !== undefined) entry['description'] = spec.description;
  if (spec.modelRef !== undefined) entry['modelRef'] = spec.modelRef;
  if (spec.properties !== undefined) entry['properties'] = serializeProperties(spec.properties);
  if (spec.items !== undefined) entry['items'] = serializeArgument(spec.items);
  return entry;
}

function serializeConstraints(constraints: ValidationConstraints): JsonObject {
  const entry: JsonObject = {};
  if (constraints.minLength !== undefined) entry['minLength'] = constraints.minLength;
  if (constraints.maxLength !== undefined) entry['maxLength'] = constraints.maxLength;
  if (constraints.pattern !== undefined) entry['pattern'] = constraints.pattern;
  if (constraints.minimum !== undefined) entry['minimum'] = constraints.minimum;
  if (constraints.maximum !== undefined) entry['maximum'] = constraints.maximum;
  if (constraints.enum !== undefined) entry['enum'] = [...constraints.enum];
  return entry;
}

/**
 * Paradigm files: JSON or YAML documents with a `parameters` map.
 *
 * Each entry is either a bare value (literal or formula text) or a
 * declaration object:
 *
 * ```yaml
 * parameters:
 *   frequency: { expression: "ascending([1000, 2000], cycles=2)", label: Frequency (Hz), log: true }
 *   level: 60
 * ```
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ParadigmFileError } from '@core/errors/ParadigmFileError';
import type { Value } from '@core/types/value';
import { paradigmLogger as logger } from '@core/utils/logger';
import { Paradigm } from './Paradigm';
import { ParadigmSchema, isParameterKind } from './ParadigmSchema';
import type { ParameterDeclaration, ParameterOptions } from './ParadigmSchema';

export type ParadigmFileFormat = 'json' | 'yaml';

const DECLARATION_KEYS = ['expression', 'label', 'kind', 'log', 'immediate', 'editable', 'ignore'] as const;

type DeclarationKey = typeof DECLARATION_KEYS[number];

function isDeclarationKey(key: string): key is DeclarationKey {
  return (DECLARATION_KEYS as readonly string[]).includes(key);
}

function isPlainObject(input: unknown): input is Record<string, unknown> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(input);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Narrows parsed file content to a Value, rejecting anything JSON could not
 * represent (YAML dates, functions, undefined).
 */
function toValue(input: unknown, where: string, filePath: string): Value {
  if (input === null || typeof input === 'number' || typeof input === 'string' || typeof input === 'boolean') {
    return input;
  }
  if (Array.isArray(input)) {
    return input.map((item, index) => toValue(item, `${where}[${index}]`, filePath));
  }
  if (isPlainObject(input)) {
    const record: Record<string, Value> = {};
    for (const [key, item] of Object.entries(input)) {
      record[key] = toValue(item, `${where}.${key}`, filePath);
    }
    return record;
  }
  throw new ParadigmFileError(`Unsupported value at ${where}`, filePath);
}

function toFlag(input: unknown, key: string, name: string, filePath: string): boolean | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== 'boolean') {
    throw new ParadigmFileError(`'${key}' of parameter '${name}' must be true or false`, filePath);
  }
  return input;
}

function readDeclaration(name: string, entry: unknown, filePath: string): ParameterOptions {
  if (!isPlainObject(entry)) {
    return { default: toValue(entry, name, filePath) };
  }

  for (const key of Object.keys(entry)) {
    if (!isDeclarationKey(key)) {
      throw new ParadigmFileError(`Unknown key '${key}' in parameter '${name}'`, filePath);
    }
  }

  const { expression, label, kind } = entry;
  if (label !== undefined && typeof label !== 'string') {
    throw new ParadigmFileError(`'label' of parameter '${name}' must be a string`, filePath);
  }
  if (kind !== undefined && !isParameterKind(kind)) {
    throw new ParadigmFileError(`Unknown kind '${String(kind)}' for parameter '${name}'`, filePath);
  }

  return {
    default: expression === undefined ? null : toValue(expression, `${name}.expression`, filePath),
    label,
    kind,
    log: toFlag(entry.log, 'log', name, filePath),
    immediate: toFlag(entry.immediate, 'immediate', name, filePath),
    editable: toFlag(entry.editable, 'editable', name, filePath),
    ignore: toFlag(entry.ignore, 'ignore', name, filePath)
  };
}

/**
 * Builds a paradigm from already-parsed file content
 *
 * @throws {ParadigmFileError} If the document is malformed or a formula is invalid
 */
export function paradigmFromDocument(document: unknown, filePath: string): Paradigm {
  if (!isPlainObject(document) || !isPlainObject(document.parameters)) {
    throw new ParadigmFileError("Paradigm file must contain a 'parameters' map", filePath);
  }

  try {
    const schema = new ParadigmSchema();
    for (const [name, entry] of Object.entries(document.parameters)) {
      schema.addParameter(name, readDeclaration(name, entry, filePath));
    }
    return new Paradigm(schema.build());
  } catch (error) {
    if (error instanceof ParadigmFileError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ParadigmFileError(message, filePath, error);
  }
}

export function formatFromPath(filePath: string): ParadigmFileFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') {
    return 'json';
  }
  if (extension === '.yaml' || extension === '.yml') {
    return 'yaml';
  }
  throw new ParadigmFileError(`Unsupported paradigm file extension '${extension}'`, filePath);
}

/**
 * Parses paradigm file text
 */
export function parseParadigmSource(source: string, format: ParadigmFileFormat, filePath = '<inline>'): Paradigm {
  let document: unknown;
  try {
    document = format === 'json' ? JSON.parse(source) : yaml.load(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParadigmFileError(`Cannot parse ${format.toUpperCase()}: ${message}`, filePath, error);
  }
  return paradigmFromDocument(document, filePath);
}

export async function loadParadigmFile(filePath: string): Promise<Paradigm> {
  const format = formatFromPath(filePath);
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParadigmFileError(`Cannot read paradigm file: ${message}`, filePath, error);
  }
  logger.debug('Loading paradigm', { filePath, format });
  return parseParadigmSource(source, format, filePath);
}

function isDefaultDeclaration(declaration: ParameterDeclaration): boolean {
  return declaration.label === declaration.name
    && declaration.kind === 'any'
    && !declaration.log
    && !declaration.immediate
    && declaration.editable
    && !declaration.ignore;
}

/**
 * Document form of a paradigm, with the current expressions. Parameters with
 * no settings beyond their value are written as bare values.
 */
export function paradigmToDocument(paradigm: Paradigm): { parameters: Record<string, Value> } {
  const parameters: Record<string, Value> = {};
  for (const declaration of paradigm.schema.parameters) {
    const expression = paradigm.get(declaration.name).toJSON();
    if (isDefaultDeclaration(declaration)) {
      parameters[declaration.name] = expression;
      continue;
    }
    const entry: Record<string, Value> = { expression };
    if (declaration.label !== declaration.name) entry.label = declaration.label;
    if (declaration.kind !== 'any') entry.kind = declaration.kind;
    if (declaration.log) entry.log = true;
    if (declaration.immediate) entry.immediate = true;
    if (!declaration.editable) entry.editable = false;
    if (declaration.ignore) entry.ignore = true;
    parameters[declaration.name] = entry;
  }
  return { parameters };
}

export function serializeParadigm(paradigm: Paradigm, format: ParadigmFileFormat): string {
  const document = paradigmToDocument(paradigm);
  return format === 'json' ? `${JSON.stringify(document, null, 2)}\n` : yaml.dump(document, { lineWidth: -1 });
}

export async function saveParadigmFile(filePath: string, paradigm: Paradigm): Promise<void> {
  const format = formatFromPath(filePath);
  await fs.writeFile(filePath, serializeParadigm(paradigm, format), 'utf8');
  logger.info('Saved paradigm', { filePath });
}

/**
 * Dictionary Loader
 *
 * Locates a data dictionary by identifier and executes it once into a fresh
 * Symbol Table. Script dictionaries run in an isolated vm context exposing
 * Parameter() and Signal() constructors; YAML dictionaries are parsed with
 * js-yaml. Both go through the same zod declaration schema.
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import * as vm from 'vm';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { log as logger } from '../../utils/logger.js';
import {
  DictionaryExecutionError,
  DictionaryNotFoundError,
  toDiagnostic,
} from '../../utils/errors.js';
import { createDiagnostic } from '../diagnostics/diagnostic.js';
import { DATA_TYPES } from '../../types/index.js';
import type { Diagnostic, DictionarySymbol } from '../../types/index.js';
import { DuplicateSymbolError, SymbolTable } from './symbol-table.js';

// ============================================================================
// Types
// ============================================================================

export interface DictionaryLoaderOptions {
  projectRoot: string;
  searchPath: string[];
}

export type DictionaryFormat = 'script' | 'yaml';

export interface LoadedDictionary {
  path: string;
  format: DictionaryFormat;
  table: SymbolTable;
}

/** Extensions tried, in order, for a bare identifier */
export const DICTIONARY_EXTENSIONS = ['.dict.js', '.js', '.yaml', '.yml'] as const;

const SCRIPT_TIMEOUT_MS = 5000;

// ============================================================================
// Declaration schema
// ============================================================================

const ValueSchema = z.union([z.number(), z.boolean(), z.array(z.number())]);

const BaseDeclarationSchema = z.object({
  dataType: z.enum(DATA_TYPES).default('Inferred'),
  // Validated later by the storage class resolver
  storageClass: z.string().optional(),
  identifierOverride: z.string().min(1).optional(),
  description: z.string().optional(),
});

const ParameterDeclarationSchema = BaseDeclarationSchema.extend({
  kind: z.literal('Parameter'),
  value: ValueSchema.optional(),
  expression: z.string().optional(),
}).strict();

const SignalDeclarationSchema = BaseDeclarationSchema.extend({
  kind: z.literal('Signal'),
}).strict();

const DeclarationSchema = z.discriminatedUnion('kind', [
  ParameterDeclarationSchema,
  SignalDeclarationSchema,
]);

type Declaration = z.infer<typeof DeclarationSchema>;

const YamlDictionarySchema = z.record(z.string(), z.record(z.string(), z.unknown()));

// ============================================================================
// Resolution
// ============================================================================

function looksLikePath(identifier: string): boolean {
  return path.isAbsolute(identifier) || identifier.includes('/') || identifier.includes(path.sep) || path.extname(identifier) !== '';
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a dictionary identifier to a file on the project-local search path.
 */
export async function resolveDictionaryPath(
  identifier: string,
  options: DictionaryLoaderOptions
): Promise<string> {
  const candidates: string[] = [];

  if (looksLikePath(identifier)) {
    candidates.push(path.resolve(options.projectRoot, identifier));
  } else {
    for (const dir of options.searchPath) {
      for (const ext of DICTIONARY_EXTENSIONS) {
        candidates.push(path.resolve(options.projectRoot, dir, `${identifier}${ext}`));
      }
    }
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  throw new DictionaryNotFoundError(identifier, candidates);
}

export function dictionaryFormatOf(filePath: string): DictionaryFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'script';
}

// ============================================================================
// Execution
// ============================================================================

const DECLARATION_MARK: unique symbol = Symbol('dictionary-declaration');

interface MarkedDeclaration {
  [DECLARATION_MARK]: 'Parameter' | 'Signal';
  attributes: unknown;
}

function isMarkedDeclaration(value: unknown): value is MarkedDeclaration {
  return typeof value === 'object' && value !== null && DECLARATION_MARK in value;
}

function isAttributeRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function declare(kind: 'Parameter' | 'Signal', attributes: unknown): MarkedDeclaration {
  if (!isAttributeRecord(attributes)) {
    // Left as written so validation reports it against the binding
    return { [DECLARATION_MARK]: kind, attributes };
  }
  const declaration: MarkedDeclaration = { [DECLARATION_MARK]: kind, attributes: { ...attributes, kind } };
  // Expose the attributes so scripts can reference earlier declarations,
  // e.g. `Limit = Parameter({ value: Threshold.value * 2 })`.
  Object.assign(declaration, attributes);
  return declaration;
}

function describeIssues(error: z.ZodError, symbolName: string) {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    return createDiagnostic('DictionaryExecutionError', `${symbolName}${where}: ${issue.message}`);
  });
}

function toSymbol(name: string, declaration: Declaration): DictionarySymbol {
  return { name, ...declaration };
}

const IDENTIFIER_TOKEN = /[A-Za-z_$][\w$]*/g;

/**
 * Value of a top-level `const` or `let` binding. Those live in the
 * context's lexical scope rather than on its global object.
 */
function lexicalBinding(context: vm.Context, name: string): unknown {
  try {
    return vm.runInContext(`typeof ${name} === 'undefined' ? undefined : ${name}`, context, {
      timeout: SCRIPT_TIMEOUT_MS,
    });
  } catch {
    // Reserved words are not bindings
    return undefined;
  }
}

/**
 * Run a dictionary script. Returns the raw attributes of every top-level
 * binding produced by Parameter() and Signal(), in declaration order.
 * A declaration that no top-level name holds is an error.
 */
function executeScript(source: string, filePath: string): Map<string, unknown> {
  const created: MarkedDeclaration[] = [];
  const constructorFor = (kind: 'Parameter' | 'Signal') => (attributes: unknown) => {
    const declaration = declare(kind, attributes);
    created.push(declaration);
    return declaration;
  };
  const sandbox: Record<string, unknown> = {
    Parameter: constructorFor('Parameter'),
    Signal: constructorFor('Signal'),
    Math,
  };
  const context = vm.createContext(sandbox, { name: `dictionary:${path.basename(filePath)}` });

  try {
    new vm.Script(source, { filename: filePath }).runInContext(context, { timeout: SCRIPT_TIMEOUT_MS });
  } catch (error) {
    const message = scriptErrorMessage(error);
    throw new DictionaryExecutionError(filePath, message, [
      createDiagnostic('DictionaryExecutionError', message),
    ]);
  }

  const names = new Map<MarkedDeclaration, string[]>();
  const bind = (name: string, value: unknown): void => {
    if (!isMarkedDeclaration(value)) return;
    const bound = names.get(value) ?? [];
    bound.push(name);
    names.set(value, bound);
  };

  for (const [name, value] of Object.entries(context)) {
    bind(name, value);
  }
  for (const name of new Set(source.match(IDENTIFIER_TOKEN) ?? [])) {
    if (!Object.hasOwn(context, name)) {
      bind(name, lexicalBinding(context, name));
    }
  }

  const bindings = new Map<string, unknown>();
  const unbound: Diagnostic[] = [];
  created.forEach((declaration, index) => {
    const bound = names.get(declaration);
    if (!bound) {
      unbound.push(
        createDiagnostic(
          'DictionaryExecutionError',
          `${declaration[DECLARATION_MARK]} #${index + 1} is not bound to a top-level name`
        )
      );
      return;
    }
    for (const name of bound) {
      bindings.set(name, declaration.attributes);
    }
  });

  if (unbound.length > 0) {
    throw new DictionaryExecutionError(filePath, `${unbound.length} unbound declaration(s)`, unbound);
  }
  return bindings;
}

// Errors raised inside the context belong to another realm, so
// `instanceof Error` does not hold for them.
function scriptErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${error.message}`;
  }
  return String(error);
}

function parseYaml(source: string, filePath: string): Map<string, unknown> {
  let document: unknown;
  try {
    document = yaml.load(source, { filename: filePath });
  } catch (error) {
    throw new DictionaryExecutionError(
      filePath,
      error instanceof Error ? error.message : String(error),
      [toDiagnostic(error)]
    );
  }

  if (document === undefined || document === null) {
    return new Map();
  }

  const parsed = YamlDictionarySchema.safeParse(document);
  if (!parsed.success) {
    throw new DictionaryExecutionError(
      filePath,
      'expected a mapping of symbol names to declarations',
      describeIssues(parsed.error, path.basename(filePath))
    );
  }
  return new Map(Object.entries(parsed.data));
}

/**
 * Validate the raw bindings and insert them into a new table.
 */
export function buildSymbolTable(bindings: Map<string, unknown>, source: string): SymbolTable {
  const table = new SymbolTable();
  const issues: Diagnostic[] = [];

  for (const [name, attributes] of bindings) {
    const parsed = DeclarationSchema.safeParse(attributes);
    if (!parsed.success) {
      issues.push(...describeIssues(parsed.error, name));
      continue;
    }
    try {
      table.insert(toSymbol(name, parsed.data));
    } catch (error) {
      if (error instanceof DuplicateSymbolError) {
        issues.push(createDiagnostic('DictionaryExecutionError', error.message));
        continue;
      }
      throw error;
    }
  }

  if (issues.length > 0) {
    throw new DictionaryExecutionError(source, `${issues.length} invalid declaration(s)`, issues);
  }

  table.deriveInferredTypes();
  return table;
}

/**
 * Locate and execute a data dictionary into a new Symbol Table.
 */
export async function loadDictionary(
  identifier: string,
  options: DictionaryLoaderOptions
): Promise<LoadedDictionary> {
  const filePath = await resolveDictionaryPath(identifier, options);
  const format = dictionaryFormatOf(filePath);
  const source = await fs.readFile(filePath, 'utf-8');

  logger.debug('Executing data dictionary', { dictionary: filePath, format });

  const bindings = format === 'yaml' ? parseYaml(source, filePath) : executeScript(source, filePath);
  const table = buildSymbolTable(bindings, filePath);

  logger.info(`Loaded ${table.size} symbols from ${path.basename(filePath)}`, {
    parameters: table.parameters().length,
    signals: table.size - table.parameters().length,
  });

  return { path: filePath, format, table };
}

/**
 * Storage Class Resolver
 *
 * Validates each symbol's storage classification, fills in defaults, and
 * maps the table onto a deterministic memory layout.
 */

import { log as logger } from '../../utils/logger.js';
import {
  SymbolIdentifierConflictError,
  UnknownStorageClassError,
  type StorageClassViolation,
} from '../../utils/errors.js';
import { STORAGE_CLASSES } from '../../types/index.js';
import type {
  DictionarySymbol,
  StorageClass,
  StorageLayout,
  StorageLayoutEntry,
} from '../../types/index.js';
import type { SymbolTable } from './symbol-table.js';

const STORAGE_CLASS_ALIASES = new Map<string, StorageClass>([['Local', 'Auto']]);

const C_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isStorageClass(value: string): value is StorageClass {
  return STORAGE_CLASSES.some(storageClass => storageClass === value);
}

/**
 * Parameters are tunable by default; signals stay function-local.
 */
export function defaultStorageClass(symbol: DictionarySymbol): StorageClass {
  return symbol.kind === 'Parameter' ? 'ExportedGlobal' : 'Auto';
}

export function normalizeStorageClass(symbol: DictionarySymbol): StorageClass | undefined {
  if (symbol.storageClass === undefined || symbol.storageClass === '') {
    return defaultStorageClass(symbol);
  }
  if (isStorageClass(symbol.storageClass)) {
    return symbol.storageClass;
  }
  return STORAGE_CLASS_ALIASES.get(symbol.storageClass);
}

export function emittedIdentifier(symbol: DictionarySymbol): string {
  return symbol.identifierOverride ?? symbol.name;
}

function checkIdentifiers(entries: StorageLayoutEntry[]): void {
  const problems: string[] = [];
  const owners = new Map<string, string>();

  for (const entry of entries) {
    if (!C_IDENTIFIER.test(entry.identifier)) {
      problems.push(`${entry.name}: '${entry.identifier}' is not a valid C identifier`);
      continue;
    }
    const owner = owners.get(entry.identifier);
    if (owner !== undefined) {
      problems.push(`${entry.name}: identifier '${entry.identifier}' is already used by ${owner}`);
      continue;
    }
    owners.set(entry.identifier, entry.name);
  }

  if (problems.length > 0) {
    throw new SymbolIdentifierConflictError('Symbol identifiers are invalid or collide', problems);
  }
}

const byIdentifier = (a: StorageLayoutEntry, b: StorageLayoutEntry): number =>
  a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;

/**
 * Validate and normalize every symbol's storage class in place, then
 * return the layout grouped by class.
 */
export function resolveStorageClasses(table: SymbolTable): StorageLayout {
  const violations: StorageClassViolation[] = [];
  const entries: StorageLayoutEntry[] = [];

  for (const symbol of table.all()) {
    const storageClass = normalizeStorageClass(symbol);
    if (!storageClass) {
      violations.push({ symbol: symbol.name, storageClass: String(symbol.storageClass) });
      continue;
    }
    entries.push({
      name: symbol.name,
      identifier: emittedIdentifier(symbol),
      kind: symbol.kind,
      dataType: symbol.dataType,
      storageClass,
    });
  }

  if (violations.length > 0) {
    throw new UnknownStorageClassError(violations, STORAGE_CLASSES);
  }

  checkIdentifiers(entries);

  for (const entry of entries) {
    table.setStorageClass(entry.name, entry.storageClass);
  }

  const layout: StorageLayout = {
    definitions: entries.filter(e => e.storageClass === 'ExportedGlobal').sort(byIdentifier),
    externs: entries.filter(e => e.storageClass === 'ImportedExternPointer').sort(byIdentifier),
    locals: entries.filter(e => e.storageClass === 'Auto').sort(byIdentifier),
  };

  logger.debug('Resolved storage classes', {
    definitions: layout.definitions.length,
    externs: layout.externs.length,
    locals: layout.locals.length,
  });

  return layout;
}

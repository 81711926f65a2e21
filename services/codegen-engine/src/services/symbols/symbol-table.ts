/**
 * Symbol Table
 *
 * Holds every declared Parameter and Signal for one build run. Passed by
 * reference through the pipeline; nothing about it is process-wide.
 */

import type {
  ConcreteDataType,
  DataType,
  DictionarySymbol,
  ParameterSymbol,
  ParameterValue,
  StorageClass,
} from '../../types/index.js';

export class DuplicateSymbolError extends Error {
  constructor(public readonly symbolName: string) {
    super(`Symbol ${symbolName} is declared more than once`);
    this.name = 'DuplicateSymbolError';
  }
}

export function isConcreteDataType(dataType: DataType): dataType is ConcreteDataType {
  return dataType !== 'Inferred';
}

/**
 * Derive a concrete type for an Inferred parameter from its value.
 * Returns undefined when nothing can be derived.
 */
export function deriveDataType(value: ParameterValue | undefined): ConcreteDataType | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return 'boolean';
  return 'double';
}

export class SymbolTable {
  private readonly symbols = new Map<string, DictionarySymbol>();

  get size(): number {
    return this.symbols.size;
  }

  insert(symbol: DictionarySymbol): void {
    if (this.symbols.has(symbol.name)) {
      throw new DuplicateSymbolError(symbol.name);
    }
    this.symbols.set(symbol.name, { ...symbol });
  }

  lookup(name: string): DictionarySymbol | undefined {
    return this.symbols.get(name);
  }

  has(name: string): boolean {
    return this.symbols.has(name);
  }

  /**
   * Lookup narrowed to Parameters.
   */
  lookupParameter(name: string): ParameterSymbol | undefined {
    const symbol = this.symbols.get(name);
    return symbol?.kind === 'Parameter' ? symbol : undefined;
  }

  /** Symbols in declaration order */
  all(): DictionarySymbol[] {
    return [...this.symbols.values()];
  }

  parameters(): ParameterSymbol[] {
    return this.all().filter((s): s is ParameterSymbol => s.kind === 'Parameter');
  }

  /**
   * Replace an Inferred data type with a derived concrete one. Symbols
   * with a declared type are never changed.
   */
  deriveInferredTypes(): string[] {
    const derived: string[] = [];
    for (const symbol of this.symbols.values()) {
      if (symbol.kind !== 'Parameter' || isConcreteDataType(symbol.dataType)) continue;
      const dataType = deriveDataType(symbol.value);
      if (dataType) {
        symbol.dataType = dataType;
        derived.push(symbol.name);
      }
    }
    return derived;
  }

  /**
   * Record the normalized storage class chosen by the resolver.
   */
  setStorageClass(name: string, storageClass: StorageClass): void {
    const symbol = this.symbols.get(name);
    if (!symbol) {
      throw new Error(`Cannot set storage class on undeclared symbol ${name}`);
    }
    symbol.storageClass = storageClass;
  }
}

import { describe, expect, it } from 'vitest';
import {
  DuplicateSymbolError,
  SymbolTable,
  deriveDataType,
} from '../src/services/symbols/symbol-table.js';
import type { ParameterSymbol } from '../src/types/index.js';

describe('SymbolTable', () => {
  it('keeps its own copy of inserted symbols', () => {
    const table = new SymbolTable();
    const gain: ParameterSymbol = { name: 'Gain', kind: 'Parameter', dataType: 'double', value: 2 };
    table.insert(gain);
    gain.value = 5;

    expect(table.lookupParameter('Gain')?.value).toBe(2);
    expect(table.size).toBe(1);
  });

  it('rejects a second declaration of the same name', () => {
    const table = new SymbolTable();
    table.insert({ name: 'Gain', kind: 'Parameter', dataType: 'double' });

    expect(() => table.insert({ name: 'Gain', kind: 'Signal', dataType: 'single' })).toThrow(
      new DuplicateSymbolError('Gain')
    );
    expect(() => table.insert({ name: 'Gain', kind: 'Signal', dataType: 'single' })).toThrow(
      'Symbol Gain is declared more than once'
    );
  });

  it('narrows lookups to parameters', () => {
    const table = new SymbolTable();
    table.insert({ name: 'Speed', kind: 'Signal', dataType: 'single' });

    expect(table.has('Speed')).toBe(true);
    expect(table.lookup('Speed')?.kind).toBe('Signal');
    expect(table.lookupParameter('Speed')).toBeUndefined();
    expect(table.lookup('Missing')).toBeUndefined();
  });

  it('lists symbols in declaration order', () => {
    const table = new SymbolTable();
    table.insert({ name: 'Zeta', kind: 'Parameter', dataType: 'double' });
    table.insert({ name: 'Alpha', kind: 'Signal', dataType: 'double' });
    table.insert({ name: 'Mid', kind: 'Parameter', dataType: 'int8' });

    expect(table.all().map(s => s.name)).toEqual(['Zeta', 'Alpha', 'Mid']);
    expect(table.parameters().map(s => s.name)).toEqual(['Zeta', 'Mid']);
  });

  it('derives concrete types only for inferred parameters with a value', () => {
    const table = new SymbolTable();
    table.insert({ name: 'Ratio', kind: 'Parameter', dataType: 'Inferred', value: 3 });
    table.insert({ name: 'Enabled', kind: 'Parameter', dataType: 'Inferred', value: true });
    table.insert({ name: 'Table', kind: 'Parameter', dataType: 'Inferred', value: [1, 2, 3] });
    table.insert({ name: 'Unset', kind: 'Parameter', dataType: 'Inferred' });
    table.insert({ name: 'Count', kind: 'Parameter', dataType: 'uint8', value: 4 });
    table.insert({ name: 'Speed', kind: 'Signal', dataType: 'Inferred' });

    expect(table.deriveInferredTypes()).toEqual(['Ratio', 'Enabled', 'Table']);
    expect(table.lookup('Ratio')?.dataType).toBe('double');
    expect(table.lookup('Enabled')?.dataType).toBe('boolean');
    expect(table.lookup('Table')?.dataType).toBe('double');
    expect(table.lookup('Unset')?.dataType).toBe('Inferred');
    expect(table.lookup('Count')?.dataType).toBe('uint8');
    expect(table.lookup('Speed')?.dataType).toBe('Inferred');
  });

  it('refuses to classify an undeclared symbol', () => {
    const table = new SymbolTable();
    expect(() => table.setStorageClass('Ghost', 'Auto')).toThrow(
      'Cannot set storage class on undeclared symbol Ghost'
    );
  });
});

describe('deriveDataType', () => {
  it('maps values to their natural type', () => {
    expect(deriveDataType(undefined)).toBeUndefined();
    expect(deriveDataType(false)).toBe('boolean');
    expect(deriveDataType(0.5)).toBe('double');
    expect(deriveDataType([])).toBe('double');
  });
});

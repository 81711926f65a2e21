/**
 * Type-Mismatch Scanner ("Smart Scan")
 *
 * Reconciles the declared output type of every constant-valued node with
 * the data type of the Parameter it references. Writes only where the two
 * disagree, so a second pass over a consistent model writes nothing.
 *
 * Signals are never repaired: a Signal feeding a node with a different
 * type is left as is.
 */

import { log as logger } from '../../utils/logger.js';
import { CONSTANT_NODE_KIND } from '../../types/index.js';
import type { ConcreteDataType } from '../../types/index.js';
import { isConcreteDataType, type SymbolTable } from '../symbols/symbol-table.js';
import type { ModelGraph } from './model-graph.js';

export interface NodeFix {
  nodeId: string;
  symbolName: string;
  previousType: string | undefined;
  newType: ConcreteDataType;
}

export interface ScanReport {
  scannedNodes: number;
  /** Nodes whose value named a declared symbol */
  resolvedNodes: number;
  fixes: NodeFix[];
  fixedCount: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Values that parse as identifiers but are literals in model expressions
const LITERAL_WORDS = new Set(['true', 'false', 'Inf', 'NaN', 'pi', 'eps']);

/**
 * The symbol name a node value refers to, or undefined for literals
 * such as `3.5`, `[1 2 3]` or `true`.
 */
export function candidateSymbolName(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!IDENTIFIER.test(trimmed) || LITERAL_WORDS.has(trimmed)) {
    return undefined;
  }
  return trimmed;
}

export function scanTypeMismatches(graph: ModelGraph, table: SymbolTable): ScanReport {
  const nodes = graph.findNodes(CONSTANT_NODE_KIND);
  const fixes: NodeFix[] = [];
  let resolvedNodes = 0;

  for (const node of nodes) {
    const name = candidateSymbolName(node.referencedSymbolName);
    if (!name) continue;

    const symbol = table.lookup(name);
    if (!symbol) continue;
    resolvedNodes++;

    if (symbol.kind !== 'Parameter' || !isConcreteDataType(symbol.dataType)) continue;
    if (node.declaredOutputType === symbol.dataType) continue;

    graph.setDeclaredOutputType(node.nodeId, symbol.dataType);
    fixes.push({
      nodeId: node.nodeId,
      symbolName: name,
      previousType: node.declaredOutputType,
      newType: symbol.dataType,
    });
    logger.debug(`Auto-fixed ${node.nodeId}`, {
      symbol: name,
      from: node.declaredOutputType ?? '<unset>',
      to: symbol.dataType,
    });
  }

  logger.info(`Smart scan auto-fixed ${fixes.length} node(s)`, {
    model: graph.name,
    scannedNodes: nodes.length,
    resolvedNodes,
  });

  return {
    scannedNodes: nodes.length,
    resolvedNodes,
    fixes,
    fixedCount: fixes.length,
  };
}

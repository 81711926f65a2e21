/**
 * Model Graph
 *
 * The engine reads and patches the external dataflow model through the
 * ModelGraph interface. JsonModelGraph adapts a JSON model document
 * (nested `blocks`) so that the CLI and tests have a concrete graph.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ModelLoadError, toDiagnostic } from '../../utils/errors.js';
import { createDiagnostic } from '../diagnostics/diagnostic.js';
import { SUBSYSTEM_NODE_KIND } from '../../types/index.js';
import type {
  FunctionPackaging,
  ModelNode,
  SolverMode,
  SubsystemInfo,
} from '../../types/index.js';

// ============================================================================
// Interface
// ============================================================================

export interface FunctionPackagingAttributes {
  isAtomic: boolean;
  packaging?: FunctionPackaging;
  functionName?: string;
}

export interface ModelGraph {
  readonly name: string;
  /** Every node of a kind, recursing into nested subsystems */
  findNodes(nodeKind: string): ModelNode[];
  getDeclaredOutputType(nodeId: string): string | undefined;
  setDeclaredOutputType(nodeId: string, dataType: string): void;
  /** Every subsystem, atomic or not, in depth-first order */
  subsystems(): SubsystemInfo[];
  atomicSubsystems(): SubsystemInfo[];
  getFunctionPackaging(subsystemId: string): FunctionPackagingAttributes;
  setFunctionPackaging(subsystemId: string, attributes: Required<FunctionPackagingAttributes>): void;
  getSolverMode(): SolverMode | undefined;
  setFixedStepSolver(fixedStepSize: number): void;
  toDocument(): ModelDocument;
}

// ============================================================================
// JSON model document
// ============================================================================

export interface ModelBlock {
  name: string;
  type: string;
  value?: string;
  outputDataType?: string;
  atomic?: boolean;
  functionName?: string;
  functionPackaging?: FunctionPackaging;
  blocks?: ModelBlock[];
  [key: string]: unknown;
}

const BlockSchema: z.ZodType<ModelBlock, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      type: z.string().min(1),
      value: z.string().optional(),
      outputDataType: z.string().optional(),
      atomic: z.boolean().optional(),
      functionName: z.string().optional(),
      functionPackaging: z.enum(['Nonreusable', 'Reusable']).optional(),
      blocks: z.array(BlockSchema).optional(),
    })
    .passthrough()
);

const SolverSchema = z
  .object({
    type: z.enum(['FixedStep', 'VariableStep']).optional(),
    fixedStep: z.number().positive().optional(),
  })
  .passthrough();

const ModelDocumentSchema = z
  .object({
    name: z.string().min(1),
    solver: SolverSchema.optional(),
    blocks: z.array(BlockSchema).default([]),
  })
  .passthrough();

export type ModelDocument = z.infer<typeof ModelDocumentSchema>;

export class JsonModelGraph implements ModelGraph {
  private readonly document: ModelDocument;
  private readonly index = new Map<string, ModelBlock>();
  private writes = 0;

  private constructor(document: ModelDocument) {
    this.document = document;
    this.indexBlocks(document.blocks, document.name);
  }

  /**
   * Validate a parsed model document. The graph keeps its own copy.
   */
  static fromDocument(document: unknown, source = '<memory>'): JsonModelGraph {
    const parsed = ModelDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ModelLoadError(
        source,
        'invalid model document',
        parsed.error.issues.map(issue =>
          createDiagnostic('ModelLoadError', `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        )
      );
    }
    return new JsonModelGraph(structuredClone(parsed.data));
  }

  static async load(filePath: string): Promise<JsonModelGraph> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ModelLoadError(filePath, 'file could not be read', [toDiagnostic(error)]);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new ModelLoadError(filePath, 'file is not valid JSON', [toDiagnostic(error)]);
    }
    return JsonModelGraph.fromDocument(document, filePath);
  }

  get name(): string {
    return this.document.name;
  }

  /** Number of writes applied through this graph */
  get writeCount(): number {
    return this.writes;
  }

  private indexBlocks(blocks: ModelBlock[], parentPath: string): void {
    for (const block of blocks) {
      const nodeId = `${parentPath}/${block.name}`;
      if (this.index.has(nodeId)) {
        throw new ModelLoadError(this.document.name, `duplicate block path ${nodeId}`);
      }
      this.index.set(nodeId, block);
      if (block.blocks) {
        this.indexBlocks(block.blocks, nodeId);
      }
    }
  }

  private block(nodeId: string): ModelBlock {
    const block = this.index.get(nodeId);
    if (!block) {
      throw new Error(`No block at ${nodeId} in model ${this.name}`);
    }
    return block;
  }

  private subsystemBlock(subsystemId: string): ModelBlock {
    const block = this.block(subsystemId);
    if (block.type !== SUBSYSTEM_NODE_KIND) {
      throw new Error(`${subsystemId} is a ${block.type} block, not a subsystem`);
    }
    return block;
  }

  findNodes(nodeKind: string): ModelNode[] {
    const nodes: ModelNode[] = [];
    for (const [nodeId, block] of this.index) {
      if (block.type !== nodeKind) continue;
      nodes.push({
        nodeId,
        nodeKind: block.type,
        name: block.name,
        referencedSymbolName: block.value,
        declaredOutputType: block.outputDataType,
      });
    }
    return nodes;
  }

  getDeclaredOutputType(nodeId: string): string | undefined {
    return this.block(nodeId).outputDataType;
  }

  setDeclaredOutputType(nodeId: string, dataType: string): void {
    this.block(nodeId).outputDataType = dataType;
    this.writes++;
  }

  subsystems(): SubsystemInfo[] {
    return this.findNodes(SUBSYSTEM_NODE_KIND).map(node => {
      const block = this.block(node.nodeId);
      return {
        subsystemId: node.nodeId,
        name: block.name,
        isAtomic: block.atomic === true,
        packaging: block.functionPackaging,
        functionName: block.functionName,
      };
    });
  }

  atomicSubsystems(): SubsystemInfo[] {
    return this.subsystems().filter(s => s.isAtomic);
  }

  getFunctionPackaging(subsystemId: string): FunctionPackagingAttributes {
    const block = this.subsystemBlock(subsystemId);
    return {
      isAtomic: block.atomic === true,
      packaging: block.functionPackaging,
      functionName: block.functionName,
    };
  }

  setFunctionPackaging(subsystemId: string, attributes: Required<FunctionPackagingAttributes>): void {
    const block = this.subsystemBlock(subsystemId);
    block.atomic = attributes.isAtomic;
    block.functionPackaging = attributes.packaging;
    block.functionName = attributes.functionName;
    this.writes++;
  }

  getSolverMode(): SolverMode | undefined {
    return this.document.solver?.type;
  }

  setFixedStepSolver(fixedStepSize: number): void {
    this.document.solver = { ...this.document.solver, type: 'FixedStep', fixedStep: fixedStepSize };
    this.writes++;
  }

  toDocument(): ModelDocument {
    return structuredClone(this.document);
  }
}

// ============================================================================
// Model sources
// ============================================================================

/**
 * Where model graphs come from and where patched graphs go back to.
 */
export interface ModelSource {
  load(identifier: string): Promise<ModelGraph>;
  save(graph: ModelGraph, identifier: string): Promise<void>;
}

export class JsonModelSource implements ModelSource {
  constructor(private readonly projectRoot: string) {}

  resolve(identifier: string): string {
    const withExtension = path.extname(identifier) === '' ? `${identifier}.json` : identifier;
    return path.resolve(this.projectRoot, withExtension);
  }

  async load(identifier: string): Promise<ModelGraph> {
    return JsonModelGraph.load(this.resolve(identifier));
  }

  async save(graph: ModelGraph, identifier: string): Promise<void> {
    const filePath = this.resolve(identifier);
    await fs.writeFile(filePath, `${JSON.stringify(graph.toDocument(), null, 2)}\n`, 'utf-8');
  }
}

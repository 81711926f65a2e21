/**
 * Codegen Engine - Core Type Definitions
 */

// ============================================================================
// Symbol Types
// ============================================================================

export const DATA_TYPES = [
  'double',
  'single',
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
  'boolean',
  'Inferred',
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export type ConcreteDataType = Exclude<DataType, 'Inferred'>;

export const STORAGE_CLASSES = ['ExportedGlobal', 'ImportedExternPointer', 'Auto'] as const;

export type StorageClass = (typeof STORAGE_CLASSES)[number];

export type SymbolKind = 'Parameter' | 'Signal';

export type ParameterValue = number | boolean | number[];

interface SymbolBase {
  name: string;
  dataType: DataType;
  /**
   * Declared storage classification. Held as written in the dictionary
   * until the storage class resolver validates it.
   */
  storageClass?: string;
  identifierOverride?: string;
  description?: string;
}

export interface ParameterSymbol extends SymbolBase {
  kind: 'Parameter';
  value?: ParameterValue;
  expression?: string;
}

export interface SignalSymbol extends SymbolBase {
  kind: 'Signal';
}

export type DictionarySymbol = ParameterSymbol | SignalSymbol;

export interface StorageLayoutEntry {
  name: string;
  identifier: string;
  kind: SymbolKind;
  dataType: DataType;
  storageClass: StorageClass;
}

/**
 * Storage-class-to-memory-layout mapping. Each group is sorted by
 * emitted identifier.
 */
export interface StorageLayout {
  /** ExportedGlobal: defined by the generated code */
  definitions: StorageLayoutEntry[];
  /** ImportedExternPointer: declared extern, never defined */
  externs: StorageLayoutEntry[];
  /** Auto: function-local, never exported */
  locals: StorageLayoutEntry[];
}

// ============================================================================
// Model Graph Types
// ============================================================================

export const CONSTANT_NODE_KIND = 'Constant';
export const SUBSYSTEM_NODE_KIND = 'SubSystem';

export interface ModelNode {
  nodeId: string;
  nodeKind: string;
  name: string;
  /** Textual value carried by the node; may or may not name a symbol */
  referencedSymbolName?: string;
  declaredOutputType?: string;
}

export type FunctionPackaging = 'Nonreusable' | 'Reusable';

export interface SubsystemInfo {
  subsystemId: string;
  name: string;
  isAtomic: boolean;
  packaging?: FunctionPackaging;
  functionName?: string;
}

export type SolverMode = 'FixedStep' | 'VariableStep';

// ============================================================================
// Build Configuration Types
// ============================================================================

export type NumericWideningMode = 'enabled' | 'disabled';

export interface SubsystemFunctionBinding {
  subsystemId: string;
  isAtomic: boolean;
  packaging: FunctionPackaging;
  functionName: string;
}

export interface TargetDeviceProfile {
  id: string;
  vendor: string;
  family: string;
  displayName: string;
  wordLengths: {
    char: number;
    short: number;
    int: number;
    long: number;
    longLong?: number;
  };
  supportsNativeInt64: boolean;
  supportsFloatingPoint: boolean;
}

export interface BuildConfiguration {
  modelName: string;
  targetDevice: string;
  numericWideningMode: NumericWideningMode;
  solverMode: 'FixedStep';
  fixedStepSize: number;
  outputDirectory: string;
  storageLayout: StorageLayout;
  subsystems: SubsystemFunctionBinding[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticKind =
  | 'DictionaryNotFound'
  | 'DictionaryExecutionError'
  | 'UnknownStorageClass'
  | 'SymbolIdentifierConflict'
  | 'UnknownTargetDevice'
  | 'UnsupportedHardwareOption'
  | 'AtomicSubsystemMisconfigured'
  | 'ModelLoadError'
  | 'SandboxBusy'
  | 'BackendBuildFailure'
  | 'BackendCause'
  | 'InternalError';

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly causes: readonly Diagnostic[];
}

// ============================================================================
// Pipeline
// ============================================================================

export type BuildState =
  | 'Idle'
  | 'DictionaryLoaded'
  | 'GraphConfigured'
  | 'Scanned'
  | 'ConfigurationBuilt'
  | 'Building'
  | 'Succeeded'
  | 'Failed';

export interface BuildOutcomeBase {
  runId: string;
  modelName?: string;
  fixedNodeCount: number;
  warnings: Diagnostic[];
  duration: number;
}

export interface SucceededOutcome extends BuildOutcomeBase {
  status: 'succeeded';
  outputDirectory: string;
  /** True when the run stopped after scanning and no backend ran */
  scanOnly: boolean;
}

export interface FailedOutcome extends BuildOutcomeBase {
  status: 'failed';
  failedIn: BuildState;
  diagnostic: Diagnostic;
}

export type BuildOutcome = SucceededOutcome | FailedOutcome;

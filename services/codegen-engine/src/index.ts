/**
 * Codegen Engine
 *
 * Data dictionary and model graph configuration engine for sandboxed
 * embedded code generation.
 */

export * from './types/index.js';
export { config, loadConfig, getConfig, type Config } from './config.js';
export { TARGET_DEVICES, getTargetDevice, listTargetDevices } from './config/target-devices.js';
export * from './utils/errors.js';

export { SymbolTable, DuplicateSymbolError, deriveDataType, isConcreteDataType } from './services/symbols/symbol-table.js';
export {
  loadDictionary,
  resolveDictionaryPath,
  buildSymbolTable,
  DICTIONARY_EXTENSIONS,
  type DictionaryLoaderOptions,
  type LoadedDictionary,
} from './services/symbols/dictionary-loader.js';
export {
  resolveStorageClasses,
  normalizeStorageClass,
  defaultStorageClass,
} from './services/symbols/storage-class-resolver.js';

export {
  JsonModelGraph,
  JsonModelSource,
  type ModelGraph,
  type ModelSource,
  type ModelDocument,
  type ModelBlock,
} from './services/model/model-graph.js';
export {
  scanTypeMismatches,
  candidateSymbolName,
  type ScanReport,
  type NodeFix,
} from './services/model/type-mismatch-scanner.js';

export {
  buildConfiguration,
  validateBuildConfiguration,
  deriveFunctionName,
  type BuildPolicy,
  type BuildConfigurationResult,
} from './services/build/build-configuration-builder.js';
export { loadProjectOverrides, parseProjectOverrides, type ProjectOverrides } from './services/build/project-overrides.js';
export { withWorkingDirectory, activeSandboxDirectory } from './services/build/working-directory.js';
export { SandboxedBuildOrchestrator, resolveOutputDirectory } from './services/build/sandboxed-build.js';
export { BuildPipeline, BUILD_TRANSITIONS, IllegalTransitionError, type BuildInvocation, type BuildPipelineOptions } from './services/build/build-pipeline.js';
export { runBuild, createBackend, type RunBuildOptions } from './services/build/run-build.js';

export type { CodegenBackend, BuildRequest } from './services/backend/codegen-backend.js';
export { ProcessBackend, parseBackendFailure } from './services/backend/process-backend.js';
export { ConfigExportBackend, EXPORTED_CONFIG_FILE } from './services/backend/config-export-backend.js';

export { createDiagnostic, createWarning, walkDiagnostic } from './services/diagnostics/diagnostic.js';
export { renderReport, reportOutcome, type ReportFormat } from './services/diagnostics/diagnostics-reporter.js';

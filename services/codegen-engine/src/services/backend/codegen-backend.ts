/**
 * Code generation backend contract.
 *
 * The generator is a black box: it receives the finalized configuration,
 * runs with the sandbox as its working directory, and either completes or
 * throws (a BackendBuildFailure when it reports nested causes).
 */

import type { BuildConfiguration, DictionarySymbol } from '../../types/index.js';
import type { ModelDocument } from '../model/model-graph.js';

export interface BuildRequest {
  runId: string;
  configuration: BuildConfiguration;
  symbols: DictionarySymbol[];
  model: ModelDocument;
}

export interface CodegenBackend {
  readonly name: string;
  generate(request: BuildRequest): Promise<void>;
}

/**
 * Build Pipeline
 *
 * Drives one build run through its states:
 *
 *   Idle → DictionaryLoaded → GraphConfigured → Scanned → ConfigurationBuilt
 *        → Building → Succeeded | Failed
 *
 * Failed is reachable from every non-terminal state. Every failure ends
 * the run with exactly one Diagnostic; nothing is retried.
 */

import * as path from 'path';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { log, type Logger } from '../../utils/logger.js';
import { handleError, toDiagnostic } from '../../utils/errors.js';
import type {
  BuildOutcome,
  BuildState,
  Diagnostic,
  FailedOutcome,
  SucceededOutcome,
} from '../../types/index.js';
import { loadDictionary } from '../symbols/dictionary-loader.js';
import { resolveStorageClasses } from '../symbols/storage-class-resolver.js';
import { JsonModelSource, type ModelSource } from '../model/model-graph.js';
import { scanTypeMismatches } from '../model/type-mismatch-scanner.js';
import type { CodegenBackend } from '../backend/codegen-backend.js';
import {
  buildConfiguration,
  validateBuildConfiguration,
  type BuildPolicy,
} from './build-configuration-builder.js';
import { EMPTY_OVERRIDES, loadProjectOverrides, type ProjectOverrides } from './project-overrides.js';
import { SandboxedBuildOrchestrator } from './sandboxed-build.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildInvocation {
  model: string;
  dictionary: string;
}

export interface BuildPipelineOptions {
  projectRoot: string;
  dictionarySearchPath: string[];
  policy: BuildPolicy;
  /** Invocation-level settings; these win over the overrides file */
  policyOverrides?: Partial<BuildPolicy>;
  /** Overrides file relative to the project root */
  overridesFile?: string;
  backend: CodegenBackend;
  modelSource?: ModelSource;
  /** Stop after the smart scan, without invoking the backend */
  scanOnly?: boolean;
  /** Write the patched model back to its source */
  saveModel?: boolean;
}

export const BUILD_TRANSITIONS: Record<BuildState, readonly BuildState[]> = {
  Idle: ['DictionaryLoaded', 'Failed'],
  DictionaryLoaded: ['GraphConfigured', 'Failed'],
  GraphConfigured: ['Scanned', 'Failed'],
  Scanned: ['ConfigurationBuilt', 'Succeeded', 'Failed'],
  ConfigurationBuilt: ['Building', 'Failed'],
  Building: ['Succeeded', 'Failed'],
  Succeeded: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: BuildState, to: BuildState) {
    super(`Illegal build state transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export class BuildPipeline extends EventEmitter {
  readonly runId: string = uuidv4();
  private readonly options: BuildPipelineOptions;
  private readonly modelSource: ModelSource;
  private readonly logger: Logger;
  private currentState: BuildState = 'Idle';

  constructor(options: BuildPipelineOptions) {
    super();
    this.options = options;
    this.modelSource = options.modelSource ?? new JsonModelSource(options.projectRoot);
    this.logger = log.child({ runId: this.runId });
  }

  get state(): BuildState {
    return this.currentState;
  }

  private transition(next: BuildState): void {
    const from = this.currentState;
    if (!BUILD_TRANSITIONS[from].includes(next)) {
      throw new IllegalTransitionError(from, next);
    }
    this.currentState = next;
    this.logger.debug(`State ${from} → ${next}`);
    this.emit('state-change', { from, to: next, runId: this.runId });
  }

  private async loadOverrides(): Promise<ProjectOverrides> {
    if (!this.options.overridesFile) return EMPTY_OVERRIDES;
    return loadProjectOverrides(path.resolve(this.options.projectRoot, this.options.overridesFile));
  }

  private effectivePolicy(overrides: ProjectOverrides): BuildPolicy {
    const fromFile: Partial<BuildPolicy> = {};
    if (overrides.target !== undefined) fromFile.targetDevice = overrides.target;
    if (overrides.numericWidening !== undefined) fromFile.numericWidening = overrides.numericWidening;
    if (overrides.fixedStepSize !== undefined) fromFile.fixedStepSize = overrides.fixedStepSize;
    return { ...this.options.policy, ...fromFile, ...this.options.policyOverrides };
  }

  /**
   * Run the pipeline once. Never throws: every failure becomes a failed
   * outcome carrying its diagnostic.
   */
  async run(invocation: BuildInvocation): Promise<BuildOutcome> {
    if (this.currentState !== 'Idle') {
      throw new IllegalTransitionError(this.currentState, 'DictionaryLoaded');
    }

    const startTime = Date.now();
    const warnings: Diagnostic[] = [];
    let fixedNodeCount = 0;
    let modelName: string | undefined;

    this.logger.info('Build started', { model: invocation.model, dictionary: invocation.dictionary });

    try {
      const projectOverrides = await this.loadOverrides();
      const policy = this.effectivePolicy(projectOverrides);

      const dictionary = await loadDictionary(invocation.dictionary, {
        projectRoot: this.options.projectRoot,
        searchPath: this.options.dictionarySearchPath,
      });
      const table = dictionary.table;
      this.transition('DictionaryLoaded');

      const storageLayout = resolveStorageClasses(table);
      const graph = await this.modelSource.load(invocation.model);
      modelName = graph.name;
      this.transition('GraphConfigured');

      const scan = scanTypeMismatches(graph, table);
      fixedNodeCount = scan.fixedCount;
      this.transition('Scanned');

      if (this.options.scanOnly) {
        if (this.options.saveModel) {
          await this.modelSource.save(graph, invocation.model);
        }
        this.transition('Succeeded');
        const outcome: SucceededOutcome = {
          status: 'succeeded',
          runId: this.runId,
          modelName,
          outputDirectory: path.resolve(this.options.projectRoot, policy.outputDirectory),
          scanOnly: true,
          fixedNodeCount,
          warnings,
          duration: Date.now() - startTime,
        };
        return outcome;
      }

      const built = buildConfiguration({
        graph,
        storageLayout,
        policy,
        subsystemOverrides: projectOverrides.subsystems,
      });
      warnings.push(...built.warnings);
      validateBuildConfiguration(built.configuration);
      this.transition('ConfigurationBuilt');

      this.transition('Building');
      const orchestrator = new SandboxedBuildOrchestrator({
        projectRoot: this.options.projectRoot,
        backend: this.options.backend,
      });
      const outputDirectory = await orchestrator.build({
        runId: this.runId,
        configuration: built.configuration,
        symbols: table.all(),
        model: graph.toDocument(),
      });
      // A model that failed to build stays as it was on disk
      if (this.options.saveModel) {
        await this.modelSource.save(graph, invocation.model);
      }
      this.transition('Succeeded');

      this.logger.info('Build succeeded', { outputDirectory, duration: Date.now() - startTime });

      const outcome: SucceededOutcome = {
        status: 'succeeded',
        runId: this.runId,
        modelName,
        outputDirectory,
        scanOnly: false,
        fixedNodeCount,
        warnings,
        duration: Date.now() - startTime,
      };
      return outcome;
    } catch (error) {
      const failedIn = this.currentState;
      this.transition('Failed');
      this.logger.error(`Build failed in state ${failedIn}`, handleError(error));

      const outcome: FailedOutcome = {
        status: 'failed',
        runId: this.runId,
        modelName,
        failedIn,
        diagnostic: toDiagnostic(error),
        fixedNodeCount,
        warnings,
        duration: Date.now() - startTime,
      };
      return outcome;
    }
  }
}

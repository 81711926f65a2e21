/**
 * Single entry point: runs one build from configuration defaults plus
 * invocation overrides and emits the terminal report.
 */

import type { Writable } from 'stream';
import { config as defaultConfig, type Config } from '../../config.js';
import type { BuildOutcome } from '../../types/index.js';
import type { CodegenBackend } from '../backend/codegen-backend.js';
import { ConfigExportBackend } from '../backend/config-export-backend.js';
import { ProcessBackend } from '../backend/process-backend.js';
import { reportOutcome, type ReportFormat } from '../diagnostics/diagnostics-reporter.js';
import type { ModelSource } from '../model/model-graph.js';
import type { BuildPolicy } from './build-configuration-builder.js';
import { BuildPipeline, type BuildInvocation } from './build-pipeline.js';

export interface RunBuildOptions {
  outputDirectory?: string;
  targetDevice?: string;
  numericWidening?: boolean;
  backendCommand?: string;
  backend?: CodegenBackend;
  modelSource?: ModelSource;
  scanOnly?: boolean;
  saveModel?: boolean;
  format?: ReportFormat;
  stream?: Writable;
  settings?: Config;
}

export function createBackend(settings: Config, commandOverride?: string): CodegenBackend {
  const command = commandOverride ?? settings.backend.command;
  if (!command) {
    return new ConfigExportBackend();
  }
  return new ProcessBackend({ command, args: commandOverride ? [] : settings.backend.args });
}

function invocationOverrides(options: RunBuildOptions): Partial<BuildPolicy> {
  const overrides: Partial<BuildPolicy> = {};
  if (options.outputDirectory !== undefined) overrides.outputDirectory = options.outputDirectory;
  if (options.targetDevice !== undefined) overrides.targetDevice = options.targetDevice;
  if (options.numericWidening !== undefined) overrides.numericWidening = options.numericWidening;
  return overrides;
}

export async function runBuild(
  invocation: Partial<BuildInvocation> = {},
  options: RunBuildOptions = {}
): Promise<BuildOutcome> {
  const settings = options.settings ?? defaultConfig;

  const pipeline = new BuildPipeline({
    projectRoot: settings.project.root,
    dictionarySearchPath: settings.dictionary.searchPath,
    policy: {
      targetDevice: settings.build.targetDevice,
      numericWidening: settings.build.numericWidening,
      fixedStepSize: settings.build.fixedStepSize,
      outputDirectory: settings.build.outputDir,
    },
    policyOverrides: invocationOverrides(options),
    overridesFile: settings.project.overridesFile,
    backend: options.backend ?? createBackend(settings, options.backendCommand),
    modelSource: options.modelSource,
    scanOnly: options.scanOnly,
    saveModel: options.saveModel,
  });

  const outcome = await pipeline.run({
    model: invocation.model ?? settings.defaults.model,
    dictionary: invocation.dictionary ?? settings.defaults.dictionary,
  });

  reportOutcome(outcome, options.stream, options.format);
  return outcome;
}

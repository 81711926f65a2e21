/**
 * Sandboxed Build Orchestrator
 *
 * Creates the output directory, switches into it for the backend call and
 * restores the caller's working directory on every exit path.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { log as logger } from '../../utils/logger.js';
import {
  BackendBuildFailure,
  InternalError,
  isCodegenError,
  toDiagnostic,
} from '../../utils/errors.js';
import type { BuildRequest, CodegenBackend } from '../backend/codegen-backend.js';
import { withWorkingDirectory } from './working-directory.js';

export interface SandboxedBuildOptions {
  projectRoot: string;
  backend: CodegenBackend;
}

export function resolveOutputDirectory(projectRoot: string, outputDirectory: string): string {
  const resolved = path.resolve(projectRoot, outputDirectory);
  const relative = path.relative(resolved, path.resolve(projectRoot));
  // The sandbox may not be the project root or one of its ancestors
  if (relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))) {
    throw new InternalError(`Output directory ${resolved} would contain the project source tree`, {
      operation: 'resolveOutputDirectory',
      projectRoot,
    });
  }
  return resolved;
}

export class SandboxedBuildOrchestrator {
  private readonly options: SandboxedBuildOptions;

  constructor(options: SandboxedBuildOptions) {
    this.options = options;
  }

  /**
   * Run the backend inside the output directory. Returns the absolute
   * output directory.
   */
  async build(request: BuildRequest): Promise<string> {
    const { projectRoot, backend } = this.options;
    const outputDirectory = resolveOutputDirectory(projectRoot, request.configuration.outputDirectory);

    try {
      await fs.mkdir(outputDirectory, { recursive: true });
    } catch (error) {
      throw new InternalError(
        `Output directory ${outputDirectory} could not be created`,
        { operation: 'createOutputDirectory', runId: request.runId, outputDirectory },
        [toDiagnostic(error)]
      );
    }

    try {
      await withWorkingDirectory(outputDirectory, async () => {
        logger.info(`Invoking ${backend.name} backend`, { runId: request.runId, outputDirectory });
        await backend.generate({
          ...request,
          configuration: { ...request.configuration, outputDirectory },
        });
      });
    } catch (error) {
      if (isCodegenError(error)) throw error;
      // Keep the backend's own nested reasons as the failure's causes
      const described = toDiagnostic(error);
      throw new BackendBuildFailure(described.message, described.causes, {
        runId: request.runId,
        outputDirectory,
      });
    }

    return outputDirectory;
  }
}

import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  SandboxedBuildOrchestrator,
  resolveOutputDirectory,
} from '../src/services/build/sandboxed-build.js';
import { activeSandboxDirectory, withWorkingDirectory } from '../src/services/build/working-directory.js';
import { createDiagnostic } from '../src/services/diagnostics/diagnostic.js';
import { JsonModelGraph } from '../src/services/model/model-graph.js';
import { BackendBuildFailure, InternalError, SandboxBusyError } from '../src/utils/errors.js';
import type { BuildRequest } from '../src/services/backend/codegen-backend.js';
import { RecordingBackend, createProject, exists, removeProject } from './_helpers/project.js';

function buildRequest(outputDirectory: string): BuildRequest {
  const graph = JsonModelGraph.fromDocument({ name: 'Tracker', blocks: [] });
  return {
    runId: 'run-1',
    configuration: {
      modelName: 'Tracker',
      targetDevice: 'arm-cortex-m4',
      numericWideningMode: 'enabled',
      solverMode: 'FixedStep',
      fixedStepSize: 0.01,
      outputDirectory,
      storageLayout: { definitions: [], externs: [], locals: [] },
      subsystems: [],
    },
    symbols: [],
    model: graph.toDocument(),
  };
}

describe('withWorkingDirectory', () => {
  let root = '';
  let original = '';

  beforeEach(async () => {
    original = process.cwd();
    root = await createProject();
  });

  afterEach(async () => {
    process.chdir(original);
    await removeProject(root);
  });

  it('runs the body inside the directory and restores the caller directory', async () => {
    const seen = await withWorkingDirectory(root, async () => process.cwd());

    expect(seen).toBe(root);
    expect(process.cwd()).toBe(original);
    expect(activeSandboxDirectory()).toBeNull();
  });

  it('restores the caller directory when the body throws', async () => {
    await expect(
      withWorkingDirectory(root, async () => {
        throw new Error('generator crashed');
      })
    ).rejects.toThrow('generator crashed');

    expect(process.cwd()).toBe(original);
    expect(activeSandboxDirectory()).toBeNull();
  });

  it('refuses to nest sandboxes', async () => {
    const nested = withWorkingDirectory(root, async () => {
      expect(activeSandboxDirectory()).toBe(root);
      return withWorkingDirectory(original, async () => 'unreachable');
    });

    await expect(nested).rejects.toBeInstanceOf(SandboxBusyError);
    await expect(nested).rejects.toThrow(`A sandboxed build is already running in ${root}`);
    expect(process.cwd()).toBe(original);
  });
});

describe('SandboxedBuildOrchestrator', () => {
  let root = '';
  let original = '';

  beforeEach(async () => {
    original = process.cwd();
    root = await createProject({ 'model.json': '{}' });
  });

  afterEach(async () => {
    process.chdir(original);
    await removeProject(root);
  });

  it('creates the output directory and runs the backend inside it', async () => {
    const backend = new RecordingBackend();
    const orchestrator = new SandboxedBuildOrchestrator({ projectRoot: root, backend });

    const outputDirectory = await orchestrator.build(buildRequest('out/codegen'));

    expect(outputDirectory).toBe(path.join(root, 'out', 'codegen'));
    expect(backend.directories).toEqual([outputDirectory]);
    expect(backend.requests[0].configuration.outputDirectory).toBe(outputDirectory);
    expect(await fs.readFile(path.join(outputDirectory, 'generated.c'), 'utf-8')).toBe('/* Tracker */\n');
    expect(await exists(path.join(root, 'generated.c'))).toBe(false);
    expect(process.cwd()).toBe(original);
  });

  it('propagates a backend failure with its causes in order', async () => {
    const failure = new BackendBuildFailure('generator failed', [
      createDiagnostic('BackendCause', 'missing header rtwtypes.h'),
      createDiagnostic('BackendCause', 'compiler exited with status 2'),
    ]);
    const orchestrator = new SandboxedBuildOrchestrator({
      projectRoot: root,
      backend: new RecordingBackend(failure),
    });

    await expect(orchestrator.build(buildRequest('codegen_build'))).rejects.toBe(failure);
    expect(failure.toDiagnostic().causes.map(c => c.message)).toEqual([
      'missing header rtwtypes.h',
      'compiler exited with status 2',
    ]);
    expect(process.cwd()).toBe(original);
  });

  it('wraps any other backend error as a build failure keeping nested errors', async () => {
    const orchestrator = new SandboxedBuildOrchestrator({
      projectRoot: root,
      backend: new RecordingBackend(
        new AggregateError([new Error('missing header'), new Error('link step failed')], 'generator crashed')
      ),
    });

    const error = await orchestrator.build(buildRequest('codegen_build')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendBuildFailure);
    if (error instanceof BackendBuildFailure) {
      expect(error.message).toBe('generator crashed');
      expect(error.causes.map(c => c.message)).toEqual(['missing header', 'link step failed']);
    }
    expect(process.cwd()).toBe(original);
  });

  it('refuses an output directory that contains the project', async () => {
    const backend = new RecordingBackend();
    const orchestrator = new SandboxedBuildOrchestrator({ projectRoot: root, backend });

    await expect(orchestrator.build(buildRequest('.'))).rejects.toBeInstanceOf(InternalError);
    expect(backend.requests).toEqual([]);
  });

  it('reports an output directory it cannot create as an internal error', async () => {
    await fs.writeFile(path.join(root, 'codegen_build'), 'not a directory', 'utf-8');
    const backend = new RecordingBackend();
    const orchestrator = new SandboxedBuildOrchestrator({ projectRoot: root, backend });

    const error = await orchestrator.build(buildRequest('codegen_build')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InternalError);
    if (error instanceof InternalError) {
      expect(error.message).toBe(`Output directory ${path.join(root, 'codegen_build')} could not be created`);
      expect(error.context.operation).toBe('createOutputDirectory');
      expect(error.causes).toHaveLength(1);
    }
    expect(backend.requests).toEqual([]);
    expect(process.cwd()).toBe(original);
  });
});

describe('resolveOutputDirectory', () => {
  it('resolves relative to the project root', () => {
    expect(resolveOutputDirectory('/work/robot', 'codegen_build')).toBe(path.resolve('/work/robot/codegen_build'));
    expect(resolveOutputDirectory('/work/robot', '../robot_build')).toBe(path.resolve('/work/robot_build'));
  });

  it('rejects the project root and its ancestors', () => {
    expect(() => resolveOutputDirectory('/work/robot', '.')).toThrow(
      `Output directory ${path.resolve('/work/robot')} would contain the project source tree`
    );
    expect(() => resolveOutputDirectory('/work/robot', '..')).toThrow(InternalError);
    expect(() => resolveOutputDirectory('/work/robot', '/')).toThrow(InternalError);
  });
});

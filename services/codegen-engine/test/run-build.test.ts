import * as fs from 'fs/promises';
import * as path from 'path';
import { Writable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigExportBackend, EXPORTED_CONFIG_FILE } from '../src/services/backend/config-export-backend.js';
import { ProcessBackend } from '../src/services/backend/process-backend.js';
import { createBackend, runBuild } from '../src/services/build/run-build.js';
import { createProject, modelJson, removeProject } from './_helpers/project.js';

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('runBuild', () => {
  let root = '';
  let original = '';

  beforeEach(async () => {
    original = process.cwd();
    root = await createProject({
      'data_dictionary.dict.js': "Threshold = Parameter({ value: 192, dataType: 'int32' });\n",
      'model.json': modelJson({
        name: 'Tracker',
        blocks: [{ name: 'Limit', type: 'Constant', value: 'Threshold', outputDataType: 'double' }],
      }),
    });
  });

  afterEach(async () => {
    process.chdir(original);
    await removeProject(root);
  });

  it('builds with configured defaults and exports the configuration', async () => {
    const settings = loadConfig({ NODE_ENV: 'test', CODEGEN_PROJECT_ROOT: root });
    const { stream, text } = capture();

    const outcome = await runBuild({}, { settings, stream });

    const outputDirectory = path.join(root, 'codegen_build');
    expect(outcome.status).toBe('succeeded');
    expect(text()).toBe(
      [
        `Build succeeded. Generated code is in ${outputDirectory}`,
        'Smart scan auto-fixed 1 node(s).',
        'Warning [UnsupportedHardwareOption]: Target device atmel-avr-atmega328p does not support native 64-bit integer arithmetic',
        '',
      ].join('\n')
    );

    const exported: unknown = JSON.parse(await fs.readFile(path.join(outputDirectory, EXPORTED_CONFIG_FILE), 'utf-8'));
    expect(exported).toMatchObject({
      runId: outcome.runId,
      configuration: {
        modelName: 'Tracker',
        targetDevice: 'atmel-avr-atmega328p',
        numericWideningMode: 'disabled',
        outputDirectory,
      },
      model: { blocks: [{ name: 'Limit', outputDataType: 'int32' }] },
    });
  });

  it('applies invocation options over the configuration', async () => {
    const settings = loadConfig({ NODE_ENV: 'test', CODEGEN_PROJECT_ROOT: root });
    const { stream, text } = capture();

    const outcome = await runBuild(
      { model: 'model' },
      { settings, stream, targetDevice: 'arm-cortex-m4', outputDirectory: 'out', numericWidening: false }
    );

    expect(outcome.status).toBe('succeeded');
    expect(text()).toBe(`Build succeeded. Generated code is in ${path.join(root, 'out')}\nSmart scan auto-fixed 1 node(s).\n`);
    const exported: unknown = JSON.parse(await fs.readFile(path.join(root, 'out', EXPORTED_CONFIG_FILE), 'utf-8'));
    expect(exported).toMatchObject({
      configuration: { targetDevice: 'arm-cortex-m4', numericWideningMode: 'disabled' },
    });
  });

  it('reports a failure as JSON', async () => {
    const settings = loadConfig({ NODE_ENV: 'test', CODEGEN_PROJECT_ROOT: root });
    const { stream, text } = capture();

    const outcome = await runBuild({ dictionary: 'missing' }, { settings, stream, format: 'json' });

    expect(outcome.status).toBe('failed');
    expect(JSON.parse(text())).toMatchObject({
      status: 'failed',
      failedIn: 'Idle',
      diagnostic: { kind: 'DictionaryNotFound', message: 'Data dictionary not found: missing' },
    });
  });
});

describe('createBackend', () => {
  it('exports the configuration when no generator command is set', () => {
    expect(createBackend(loadConfig({}))).toBeInstanceOf(ConfigExportBackend);
  });

  it('runs the configured generator command', () => {
    const backend = createBackend(loadConfig({ CODEGEN_BACKEND_COMMAND: 'gen', CODEGEN_BACKEND_ARGS: '--fast' }));

    expect(backend).toBeInstanceOf(ProcessBackend);
    expect(backend.name).toBe('process:gen');
  });

  it('lets an explicit command replace the configured one', () => {
    const backend = createBackend(loadConfig({ CODEGEN_BACKEND_COMMAND: 'gen' }), 'other-gen');

    expect(backend.name).toBe('process:other-gen');
  });
});

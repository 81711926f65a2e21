import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { getTargetDevice, listTargetDevices } from '../src/config/target-devices.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.logFile).toBeUndefined();
    expect(config.project).toEqual({ root: process.cwd(), overridesFile: 'codegen.yaml' });
    expect(config.defaults).toEqual({ model: 'model.json', dictionary: 'data_dictionary' });
    expect(config.dictionary.searchPath).toEqual(['.', 'dictionaries']);
    expect(config.build).toEqual({
      outputDir: 'codegen_build',
      targetDevice: 'atmel-avr-atmega328p',
      numericWidening: true,
      fixedStepSize: 0.01,
    });
    expect(config.backend).toEqual({ command: undefined, args: [] });
  });

  it('reads settings from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      CODEGEN_LOG_FILE: 'logs/codegen.log',
      CODEGEN_PROJECT_ROOT: '/work/robot',
      CODEGEN_DICTIONARY_PATH: ['dictionaries', 'shared'].join(path.delimiter),
      CODEGEN_OUTPUT_DIR: 'build/gen',
      CODEGEN_TARGET_DEVICE: 'arm-cortex-m4',
      CODEGEN_NUMERIC_WIDENING: 'false',
      CODEGEN_FIXED_STEP_SIZE: '0.002',
      CODEGEN_BACKEND_COMMAND: 'gen',
      CODEGEN_BACKEND_ARGS: '--fast  --jobs 4',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.logFile).toBe('logs/codegen.log');
    expect(config.project.root).toBe(path.resolve('/work/robot'));
    expect(config.dictionary.searchPath).toEqual(['dictionaries', 'shared']);
    expect(config.build).toEqual({
      outputDir: 'build/gen',
      targetDevice: 'arm-cortex-m4',
      numericWidening: false,
      fixedStepSize: 0.002,
    });
    expect(config.backend).toEqual({ command: 'gen', args: ['--fast', '--jobs', '4'] });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => loadConfig({ CODEGEN_FIXED_STEP_SIZE: '-1' })).toThrow();
  });
});

describe('target devices', () => {
  it('lists devices sorted by id', () => {
    const ids = listTargetDevices().map(d => d.id);

    expect(ids).toEqual([...ids].sort());
    expect(ids).toContain('atmel-avr-atmega328p');
  });

  it('knows which devices do native 64-bit arithmetic', () => {
    expect(getTargetDevice('atmel-avr-atmega328p')?.supportsNativeInt64).toBe(false);
    expect(getTargetDevice('arm-cortex-m4')?.supportsNativeInt64).toBe(true);
    expect(getTargetDevice('toString')).toBeUndefined();
  });
});

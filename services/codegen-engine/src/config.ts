/**
 * Codegen Engine - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import * as path from 'path';
import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFile: z.string().optional(),
  version: z.string().default('1.0.0'),
  serviceName: z.string().default('codegen-engine'),

  // Project layout
  project: z.object({
    root: z.string(),
    overridesFile: z.string().default('codegen.yaml'),
  }),

  // Invocation defaults
  defaults: z.object({
    model: z.string().default('model.json'),
    dictionary: z.string().default('data_dictionary'),
  }),

  // Dictionary resolution
  dictionary: z.object({
    searchPath: z.array(z.string()).min(1).default(['.', 'dictionaries']),
  }),

  // Build policy
  build: z.object({
    outputDir: z.string().default('codegen_build'),
    targetDevice: z.string().default('atmel-avr-atmega328p'),
    numericWidening: z.boolean().default(true),
    fixedStepSize: z.number().positive().default(0.01),
  }),

  // External generation backend
  backend: z.object({
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function splitList(value: string | undefined, separator: string): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(separator).map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    logFile: env.CODEGEN_LOG_FILE || undefined,
    version: env.CODEGEN_VERSION || '1.0.0',
    serviceName: env.CODEGEN_SERVICE_NAME || 'codegen-engine',

    project: {
      root: path.resolve(env.CODEGEN_PROJECT_ROOT || process.cwd()),
      overridesFile: env.CODEGEN_OVERRIDES_FILE || 'codegen.yaml',
    },

    defaults: {
      model: env.CODEGEN_MODEL || 'model.json',
      dictionary: env.CODEGEN_DICTIONARY || 'data_dictionary',
    },

    dictionary: {
      searchPath: splitList(env.CODEGEN_DICTIONARY_PATH, path.delimiter) || ['.', 'dictionaries'],
    },

    build: {
      outputDir: env.CODEGEN_OUTPUT_DIR || 'codegen_build',
      targetDevice: env.CODEGEN_TARGET_DEVICE || 'atmel-avr-atmega328p',
      numericWidening: env.CODEGEN_NUMERIC_WIDENING !== 'false',
      fixedStepSize: parseFloat(env.CODEGEN_FIXED_STEP_SIZE || '0.01'),
    },

    backend: {
      command: env.CODEGEN_BACKEND_COMMAND || undefined,
      args: splitList(env.CODEGEN_BACKEND_ARGS, ' ') || [],
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}

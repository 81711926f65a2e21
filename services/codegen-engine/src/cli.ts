#!/usr/bin/env node
/**
 * Codegen Engine - Command Line Entry Point
 */

import 'dotenv/config';
import { Command } from 'commander';
import { config } from './config.js';
import { log, setLogLevel } from './utils/logger.js';
import { listTargetDevices } from './config/target-devices.js';
import { runBuild } from './services/build/run-build.js';

interface BuildCommandOptions {
  output?: string;
  target?: string;
  widening?: boolean;
  backend?: string;
  scanOnly?: boolean;
  saveModel?: boolean;
  json?: boolean;
  verbose?: boolean;
}

function createProgram(): Command {
  const program = new Command('codegen-engine')
    .description('Configure and run sandboxed code generation from a data dictionary and model graph')
    .version(config.version);

  program
    .command('build', { isDefault: true })
    .description('load the dictionary, scan the model, configure and run the build')
    .argument('[model]', 'model document', config.defaults.model)
    .argument('[dictionary]', 'data dictionary identifier', config.defaults.dictionary)
    .option('-o, --output <dir>', 'output directory for generated code')
    .option('-t, --target <device>', 'target device id')
    .option('--no-widening', 'disable native 64-bit arithmetic')
    .option('--backend <command>', 'external generator command')
    .option('--scan-only', 'stop after the smart scan')
    .option('--save-model', 'write the patched model back')
    .option('--json', 'print the report as json')
    .option('-v, --verbose', 'make the operation more talkative')
    .action(async (model: string, dictionary: string, options: BuildCommandOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      }
      const outcome = await runBuild(
        { model, dictionary },
        {
          outputDirectory: options.output,
          targetDevice: options.target,
          // commander sets `widening` to true unless --no-widening is given
          numericWidening: options.widening === false ? false : undefined,
          backendCommand: options.backend,
          scanOnly: options.scanOnly,
          saveModel: options.saveModel,
          format: options.json ? 'json' : 'text',
        }
      );
      if (outcome.status === 'failed') {
        process.exitCode = 1;
      }
    });

  program
    .command('targets')
    .description('list known target devices')
    .action(() => {
      for (const device of listTargetDevices()) {
        const widening = device.supportsNativeInt64 ? 'int64' : 'no int64';
        process.stdout.write(`${device.id.padEnd(24)} ${device.displayName} (${widening})\n`);
      }
    });

  return program;
}

async function execute(rawArgs: string[]): Promise<void> {
  try {
    await createProgram().parseAsync(rawArgs);
  } catch (error) {
    log.error('Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  }
}

await execute(process.argv);

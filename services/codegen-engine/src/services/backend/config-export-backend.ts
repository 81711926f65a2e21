import * as fs from 'fs/promises';
import * as path from 'path';
import { log as logger } from '../../utils/logger.js';
import type { BuildRequest, CodegenBackend } from './codegen-backend.js';

export const EXPORTED_CONFIG_FILE = 'codegen-config.json';

/**
 * Default backend when no generator command is configured: writes the
 * finalized build request into the sandbox for an external generator to
 * pick up later.
 */
export class ConfigExportBackend implements CodegenBackend {
  readonly name = 'config-export';

  async generate(request: BuildRequest): Promise<void> {
    const target = path.resolve(EXPORTED_CONFIG_FILE);
    await fs.writeFile(target, `${JSON.stringify(request, null, 2)}\n`, 'utf-8');
    logger.info(`Wrote ${EXPORTED_CONFIG_FILE}`, { runId: request.runId, path: target });
  }
}

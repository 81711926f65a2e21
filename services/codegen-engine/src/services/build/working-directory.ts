/**
 * Scoped working directory switch.
 *
 * The process working directory is the only process-wide mutable state
 * the engine touches. It is entered for the duration of one callback and
 * restored in `finally`, on success and on every failure path.
 */

import { log as logger } from '../../utils/logger.js';
import { SandboxBusyError } from '../../utils/errors.js';

let activeDirectory: string | null = null;

export function activeSandboxDirectory(): string | null {
  return activeDirectory;
}

export async function withWorkingDirectory<T>(directory: string, body: () => Promise<T>): Promise<T> {
  if (activeDirectory !== null) {
    throw new SandboxBusyError(activeDirectory);
  }

  const previous = process.cwd();
  process.chdir(directory);
  activeDirectory = directory;
  logger.debug('Entered sandbox directory', { directory, previous });

  try {
    return await body();
  } finally {
    process.chdir(previous);
    activeDirectory = null;
    logger.debug('Restored working directory', { directory: previous });
  }
}

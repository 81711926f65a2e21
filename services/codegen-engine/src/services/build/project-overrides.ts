/**
 * Per-project build overrides read from `codegen.yaml` in the project root.
 *
 *   target: arm-cortex-m4
 *   fixedStepSize: 0.001
 *   subsystems:
 *     LineFollower/Controller:
 *       functionName: controller_step
 */

import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { InternalError, toDiagnostic } from '../../utils/errors.js';

const SubsystemOverrideSchema = z
  .object({
    atomic: z.boolean().optional(),
    functionName: z.string().optional(),
  })
  .strict();

const ProjectOverridesSchema = z
  .object({
    target: z.string().optional(),
    numericWidening: z.boolean().optional(),
    fixedStepSize: z.number().positive().optional(),
    subsystems: z.record(z.string(), SubsystemOverrideSchema).default({}),
  })
  .strict();

export type SubsystemOverride = z.infer<typeof SubsystemOverrideSchema>;
export type ProjectOverrides = z.infer<typeof ProjectOverridesSchema>;

export const EMPTY_OVERRIDES: ProjectOverrides = { subsystems: {} };

export function parseProjectOverrides(text: string, source: string): ProjectOverrides {
  let document: unknown;
  try {
    document = yaml.load(text, { filename: source });
  } catch (error) {
    throw new InternalError(`Invalid YAML in ${source}`, { operation: 'loadOverrides' }, [toDiagnostic(error)]);
  }
  if (document === undefined || document === null) {
    return EMPTY_OVERRIDES;
  }

  const parsed = ProjectOverridesSchema.safeParse(document);
  if (!parsed.success) {
    throw new InternalError(
      `Invalid overrides in ${source}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { operation: 'loadOverrides' }
    );
  }
  return parsed.data;
}

/**
 * Missing file means no overrides.
 */
export async function loadProjectOverrides(filePath: string): Promise<ProjectOverrides> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return EMPTY_OVERRIDES;
    }
    throw error;
  }
  return parseProjectOverrides(text, filePath);
}

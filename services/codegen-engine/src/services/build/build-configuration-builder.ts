/**
 * Build Configuration Builder
 *
 * Assembles target hardware, numeric mode, solver and function packaging
 * settings from the fixed build policy plus per-subsystem overrides.
 * Atomic subsystems are always emitted as non-reusable functions and the
 * solver is always fixed-step.
 */

import { log as logger } from '../../utils/logger.js';
import {
  AtomicSubsystemMisconfiguredError,
  UnknownTargetDeviceError,
  UnsupportedHardwareOptionError,
  type SubsystemProblem,
} from '../../utils/errors.js';
import { getTargetDevice, listTargetDevices } from '../../config/target-devices.js';
import type {
  BuildConfiguration,
  Diagnostic,
  NumericWideningMode,
  StorageLayout,
  SubsystemFunctionBinding,
  SubsystemInfo,
  TargetDeviceProfile,
} from '../../types/index.js';
import type { ModelGraph } from '../model/model-graph.js';
import type { SubsystemOverride } from './project-overrides.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildPolicy {
  targetDevice: string;
  numericWidening: boolean;
  fixedStepSize: number;
  outputDirectory: string;
}

export interface BuildConfigurationInput {
  graph: ModelGraph;
  storageLayout: StorageLayout;
  policy: BuildPolicy;
  subsystemOverrides?: Record<string, SubsystemOverride>;
}

export interface BuildConfigurationResult {
  configuration: BuildConfiguration;
  warnings: Diagnostic[];
}

const C_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================================
// Function names
// ============================================================================

/**
 * Turn a subsystem name into a C function name. Returns undefined when
 * nothing usable is left.
 */
export function deriveFunctionName(subsystemName: string): string | undefined {
  const sanitized = subsystemName
    .replace(/[^A-Za-z0-9_]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (!sanitized) return undefined;
  return /^[0-9]/.test(sanitized) ? `fcn_${sanitized}` : sanitized;
}

function explicitFunctionName(
  subsystem: SubsystemInfo,
  override: SubsystemOverride | undefined
): string | undefined {
  // An explicit name, even an empty one, is never replaced by a derived one
  if (subsystem.functionName !== undefined) return subsystem.functionName.trim();
  return override?.functionName?.trim();
}

/**
 * Derive a name not yet in `taken`: the subsystem name first, then the
 * name qualified by its enclosing subsystems, innermost first
 * (`Left_Controller`, `Arm_Left_Controller`).
 */
function deriveUniqueFunctionName(subsystem: SubsystemInfo, taken: ReadonlySet<string>): string | undefined {
  const enclosing = subsystem.subsystemId.split('/').slice(1, -1);
  const segments = [...enclosing, subsystem.name];
  for (let depth = 1; depth <= segments.length; depth++) {
    const candidate = deriveFunctionName(segments.slice(-depth).join('_'));
    if (candidate && !taken.has(candidate)) return candidate;
  }
  // Left to validation to report as a duplicate
  return deriveFunctionName(subsystem.name);
}

// ============================================================================
// Numeric widening
// ============================================================================

function resolveTargetDevice(id: string): TargetDeviceProfile {
  const device = getTargetDevice(id);
  if (!device) {
    throw new UnknownTargetDeviceError(id, listTargetDevices().map(d => d.id));
  }
  return device;
}

/**
 * Apply the requested widening mode to the device. Throws when the device
 * rejects native 64-bit arithmetic.
 */
export function applyNumericWidening(device: TargetDeviceProfile, requested: boolean): NumericWideningMode {
  if (!requested) return 'disabled';
  if (!device.supportsNativeInt64) {
    throw new UnsupportedHardwareOptionError('native 64-bit integer arithmetic', device.id);
  }
  return 'enabled';
}

// ============================================================================
// Builder
// ============================================================================

export function buildConfiguration(input: BuildConfigurationInput): BuildConfigurationResult {
  const { graph, storageLayout, policy } = input;
  const overrides = input.subsystemOverrides ?? {};
  const warnings: Diagnostic[] = [];

  const device = resolveTargetDevice(policy.targetDevice);

  let numericWideningMode: NumericWideningMode;
  try {
    numericWideningMode = applyNumericWidening(device, policy.numericWidening);
  } catch (error) {
    if (!(error instanceof UnsupportedHardwareOptionError)) throw error;
    logger.warn(`${error.message}; continuing with numeric widening disabled`, { device: device.id });
    warnings.push(error.toDiagnostic());
    numericWideningMode = 'disabled';
  }

  const solverMode = graph.getSolverMode();
  if (solverMode === 'VariableStep') {
    logger.warn('Model requests a variable-step solver; generating with fixed-step', { model: graph.name });
  }
  graph.setFixedStepSolver(policy.fixedStepSize);

  const atomic = graph
    .subsystems()
    .map(subsystem => ({
      subsystem,
      override: Object.hasOwn(overrides, subsystem.subsystemId) ? overrides[subsystem.subsystemId] : undefined,
    }))
    .filter(({ subsystem, override }) => override?.atomic ?? subsystem.isAtomic)
    .sort((a, b) => a.subsystem.subsystemId.localeCompare(b.subsystem.subsystemId));

  // Explicit names are claimed before any name is derived
  const taken = new Set<string>();
  for (const { subsystem, override } of atomic) {
    const explicit = explicitFunctionName(subsystem, override);
    if (explicit) taken.add(explicit);
  }

  const subsystems: SubsystemFunctionBinding[] = [];
  for (const { subsystem, override } of atomic) {
    const explicit = explicitFunctionName(subsystem, override);
    const functionName = explicit ?? deriveUniqueFunctionName(subsystem, taken) ?? '';
    if (explicit === undefined && functionName) taken.add(functionName);

    const binding: SubsystemFunctionBinding = {
      subsystemId: subsystem.subsystemId,
      isAtomic: true,
      packaging: 'Nonreusable',
      functionName,
    };
    graph.setFunctionPackaging(subsystem.subsystemId, {
      isAtomic: true,
      packaging: binding.packaging,
      functionName,
    });
    subsystems.push(binding);
  }

  const configuration: BuildConfiguration = {
    modelName: graph.name,
    targetDevice: device.id,
    numericWideningMode,
    solverMode: 'FixedStep',
    fixedStepSize: policy.fixedStepSize,
    outputDirectory: policy.outputDirectory,
    storageLayout,
    subsystems,
  };

  logger.info('Build configuration assembled', {
    targetDevice: device.id,
    numericWideningMode,
    atomicSubsystems: subsystems.length,
  });

  return { configuration, warnings };
}

/**
 * Every atomic subsystem must be a non-reusable function with a valid,
 * unique name before the backend is invoked.
 */
export function validateBuildConfiguration(configuration: BuildConfiguration): void {
  const problems: SubsystemProblem[] = [];
  const owners = new Map<string, string>();

  for (const binding of configuration.subsystems) {
    if (!binding.isAtomic) continue;

    if (binding.packaging !== 'Nonreusable') {
      problems.push({ subsystemId: binding.subsystemId, reason: `packaging is ${binding.packaging}, expected Nonreusable` });
    }
    if (!binding.functionName) {
      problems.push({ subsystemId: binding.subsystemId, reason: 'no function name assigned' });
      continue;
    }
    if (!C_IDENTIFIER.test(binding.functionName)) {
      problems.push({ subsystemId: binding.subsystemId, reason: `'${binding.functionName}' is not a valid C identifier` });
      continue;
    }
    const owner = owners.get(binding.functionName);
    if (owner !== undefined) {
      problems.push({ subsystemId: binding.subsystemId, reason: `function name '${binding.functionName}' is already used by ${owner}` });
      continue;
    }
    owners.set(binding.functionName, binding.subsystemId);
  }

  if (problems.length > 0) {
    throw new AtomicSubsystemMisconfiguredError(problems);
  }
}

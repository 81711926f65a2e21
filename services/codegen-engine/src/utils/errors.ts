/**
 * Codegen Engine - Custom Error Classes
 *
 * Structured error handling with full context for debugging. Every error
 * carries an ordered list of causes that becomes the diagnostic cause chain.
 */

import type { Diagnostic, DiagnosticKind } from '../types/index.js';
import { createDiagnostic } from '../services/diagnostics/diagnostic.js';

export interface ErrorContext {
  operation: string;
  timestamp: Date;
  suggestion?: string;
  [key: string]: unknown;
}

export class CodegenError extends Error {
  public readonly code: DiagnosticKind;
  public readonly context: ErrorContext;
  public readonly causes: readonly Diagnostic[];
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: DiagnosticKind,
    context?: Partial<ErrorContext>,
    causes: readonly Diagnostic[] = [],
    recoverable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.causes = causes;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, this.constructor);
  }

  toDiagnostic(): Diagnostic {
    return createDiagnostic(this.code, this.message, this.causes, this.recoverable ? 'warning' : 'error');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      causes: this.causes,
    };
  }
}

// Dictionary Errors
export class DictionaryNotFoundError extends CodegenError {
  public readonly searched: string[];

  constructor(identifier: string, searched: string[], context?: Partial<ErrorContext>) {
    super(
      `Data dictionary not found: ${identifier}`,
      'DictionaryNotFound',
      { operation: 'loadDictionary', ...context, identifier, searched },
      searched.map(location => createDiagnostic('DictionaryNotFound', `not found at ${location}`))
    );
    this.searched = searched;
  }
}

export class DictionaryExecutionError extends CodegenError {
  constructor(
    dictionaryPath: string,
    message: string,
    causes: readonly Diagnostic[],
    context?: Partial<ErrorContext>
  ) {
    super(
      `Data dictionary ${dictionaryPath} failed: ${message}`,
      'DictionaryExecutionError',
      { operation: 'loadDictionary', ...context, dictionaryPath },
      causes
    );
  }
}

// Configuration Errors (abort before any backend invocation)
export interface StorageClassViolation {
  symbol: string;
  storageClass: string;
}

export class UnknownStorageClassError extends CodegenError {
  public readonly violations: StorageClassViolation[];

  constructor(violations: StorageClassViolation[], allowed: readonly string[]) {
    super(
      violations.length === 1
        ? `Unknown storage class '${violations[0].storageClass}' on symbol ${violations[0].symbol}`
        : `Unknown storage class on ${violations.length} symbols`,
      'UnknownStorageClass',
      { operation: 'resolveStorageClasses', allowed, suggestion: `Use one of: ${allowed.join(', ')}` },
      violations.map(v =>
        createDiagnostic('UnknownStorageClass', `${v.symbol}: '${v.storageClass}' is not one of ${allowed.join(', ')}`)
      )
    );
    this.violations = violations;
  }
}

export class SymbolIdentifierConflictError extends CodegenError {
  constructor(message: string, details: string[]) {
    super(
      message,
      'SymbolIdentifierConflict',
      { operation: 'resolveStorageClasses' },
      details.map(detail => createDiagnostic('SymbolIdentifierConflict', detail))
    );
  }
}

export class UnknownTargetDeviceError extends CodegenError {
  constructor(device: string, known: string[]) {
    super(`Unknown target device: ${device}`, 'UnknownTargetDevice', {
      operation: 'buildConfiguration',
      device,
      suggestion: `Known devices: ${known.join(', ')}`,
    });
  }
}

export class UnsupportedHardwareOptionError extends CodegenError {
  constructor(option: string, device: string) {
    super(
      `Target device ${device} does not support ${option}`,
      'UnsupportedHardwareOption',
      { operation: 'buildConfiguration', option, device },
      [],
      true
    );
  }
}

export interface SubsystemProblem {
  subsystemId: string;
  reason: string;
}

export class AtomicSubsystemMisconfiguredError extends CodegenError {
  public readonly problems: SubsystemProblem[];

  constructor(problems: SubsystemProblem[]) {
    super(
      problems.length === 1
        ? `Atomic subsystem ${problems[0].subsystemId} is misconfigured`
        : `${problems.length} atomic subsystems are misconfigured`,
      'AtomicSubsystemMisconfigured',
      { operation: 'validateBuildConfiguration' },
      problems.map(p => createDiagnostic('AtomicSubsystemMisconfigured', `${p.subsystemId}: ${p.reason}`))
    );
    this.problems = problems;
  }
}

// Model Errors
export class ModelLoadError extends CodegenError {
  constructor(source: string, message: string, causes: readonly Diagnostic[] = []) {
    super(`Model ${source} could not be loaded: ${message}`, 'ModelLoadError', {
      operation: 'loadModel',
      source,
    }, causes);
  }
}

// Build Errors
export class SandboxBusyError extends CodegenError {
  constructor(activeDirectory: string) {
    super(
      `A sandboxed build is already running in ${activeDirectory}`,
      'SandboxBusy',
      { operation: 'withWorkingDirectory', activeDirectory }
    );
  }
}

export class BackendBuildFailure extends CodegenError {
  constructor(message: string, causes: readonly Diagnostic[], context?: Partial<ErrorContext>) {
    super(message, 'BackendBuildFailure', { operation: 'generate', ...context }, causes);
  }
}

// Internal Errors
export class InternalError extends CodegenError {
  constructor(message: string, context?: Partial<ErrorContext>, causes: readonly Diagnostic[] = []) {
    super(message, 'InternalError', context, causes);
  }
}

// Error type guard
export function isCodegenError(error: unknown): error is CodegenError {
  return error instanceof CodegenError;
}

/**
 * Describe any thrown value as a diagnostic. An AggregateError's errors,
 * or a plain Error's `cause` chain, become nested causes.
 */
export function toDiagnostic(error: unknown): Diagnostic {
  if (isCodegenError(error)) {
    return error.toDiagnostic();
  }

  if (error instanceof AggregateError) {
    return createDiagnostic('InternalError', error.message, error.errors.map(toDiagnostic));
  }

  if (error instanceof Error) {
    const causes = error.cause !== undefined ? [toDiagnostic(error.cause)] : [];
    return createDiagnostic('InternalError', error.message, causes);
  }

  return createDiagnostic('InternalError', String(error));
}

// Error handler helper
export function handleError(error: unknown): CodegenError {
  if (isCodegenError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(
      error.message,
      { operation: 'unknown', originalError: error.name, stack: error.stack },
      toDiagnostic(error).causes
    );
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}

import type { Diagnostic, DiagnosticKind, DiagnosticSeverity } from '../../types/index.js';

/**
 * Create a frozen diagnostic. Causes are copied so later changes to the
 * caller's array do not leak in.
 */
export function createDiagnostic(
  kind: DiagnosticKind,
  message: string,
  causes: readonly Diagnostic[] = [],
  severity: DiagnosticSeverity = 'error'
): Diagnostic {
  return Object.freeze({
    kind,
    severity,
    message,
    causes: Object.freeze([...causes]),
  });
}

export function createWarning(kind: DiagnosticKind, message: string): Diagnostic {
  return createDiagnostic(kind, message, [], 'warning');
}

/**
 * Depth-first walk over a diagnostic and its causes, in order.
 */
export function* walkDiagnostic(
  diagnostic: Diagnostic,
  depth = 0
): Generator<{ diagnostic: Diagnostic; depth: number }> {
  yield { diagnostic, depth };
  for (const cause of diagnostic.causes) {
    yield* walkDiagnostic(cause, depth + 1);
  }
}

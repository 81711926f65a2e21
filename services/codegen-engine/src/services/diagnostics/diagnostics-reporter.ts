/**
 * Diagnostics Reporter
 *
 * Renders the single terminal report of a build run. It is the last sink
 * of the pipeline, so rendering and writing never throw. A report that
 * cannot be written is logged instead.
 */

import type { Writable } from 'stream';
import type { BuildOutcome, Diagnostic } from '../../types/index.js';
import { log as logger } from '../../utils/logger.js';
import { walkDiagnostic } from './diagnostic.js';

export type ReportFormat = 'text' | 'json';

const INDENT = '  ';

function renderDiagnosticLines(diagnostic: Diagnostic, baseDepth: number): string[] {
  const lines: string[] = [];
  for (const { diagnostic: entry, depth } of walkDiagnostic(diagnostic)) {
    if (depth === 0) continue;
    lines.push(`${INDENT.repeat(baseDepth + depth)}- ${entry.message}`);
  }
  return lines;
}

function renderWarnings(warnings: Diagnostic[]): string[] {
  return warnings.flatMap(warning => [
    `Warning [${warning.kind}]: ${warning.message}`,
    ...renderDiagnosticLines(warning, 0),
  ]);
}

function renderText(outcome: BuildOutcome): string {
  const lines: string[] = [];

  if (outcome.status === 'succeeded') {
    lines.push(
      outcome.scanOnly
        ? `Scan completed for ${outcome.modelName ?? 'model'}: ${outcome.fixedNodeCount} node(s) auto-fixed. No build was run.`
        : `Build succeeded. Generated code is in ${outcome.outputDirectory}`
    );
    if (!outcome.scanOnly) {
      lines.push(`Smart scan auto-fixed ${outcome.fixedNodeCount} node(s).`);
    }
  } else {
    const { diagnostic } = outcome;
    lines.push(`Build failed [${diagnostic.kind}]: ${diagnostic.message}`);
    if (diagnostic.causes.length > 0) {
      lines.push('Caused by:');
      lines.push(...renderDiagnosticLines(diagnostic, 0));
    }
  }

  lines.push(...renderWarnings(outcome.warnings));
  return `${lines.join('\n')}\n`;
}

function renderJson(outcome: BuildOutcome): string {
  return `${JSON.stringify(outcome, null, 2)}\n`;
}

export function renderReport(outcome: BuildOutcome, format: ReportFormat = 'text'): string {
  try {
    return format === 'json' ? renderJson(outcome) : renderText(outcome);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `Build ${outcome.status} (report could not be rendered: ${reason})\n`;
  }
}

export function reportOutcome(
  outcome: BuildOutcome,
  stream: Writable = process.stdout,
  format: ReportFormat = 'text'
): void {
  const report = renderReport(outcome, format);
  if (!stream.writable) {
    logger.warn('Report stream is closed, build report dropped', { runId: outcome.runId, status: outcome.status });
    return;
  }

  // Write failures surface later as an 'error' event
  const onError = (error: Error): void => {
    logger.warn('Build report could not be written', { runId: outcome.runId, error: error.message });
  };
  stream.once('error', onError);
  stream.write(report, error => {
    if (!error) stream.off('error', onError);
  });
}

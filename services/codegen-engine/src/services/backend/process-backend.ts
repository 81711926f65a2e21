/**
 * Process Backend
 *
 * Runs an external code generator as a child process inside the sandbox
 * directory. The build request goes in as JSON on stdin. Lines of the form
 * `PROGRESS:{json}` on stdout are progress events. A failing generator may
 * print a final JSON object `{ "error": "...", "causes": [...] }`; its causes
 * become the nested causes of the BackendBuildFailure.
 *
 * No timeout is imposed: the call runs until the generator exits.
 */

import { spawn, type ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { z } from 'zod';
import { log as logger } from '../../utils/logger.js';
import { BackendBuildFailure } from '../../utils/errors.js';
import { createDiagnostic } from '../diagnostics/diagnostic.js';
import type { Diagnostic } from '../../types/index.js';
import type { BuildRequest, CodegenBackend } from './codegen-backend.js';

export interface ProcessBackendConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface ProgressEvent {
  progress_percentage?: number;
  current_step?: string;
  [key: string]: unknown;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

const PROGRESS_PREFIX = 'PROGRESS:';

type BackendCause = string | { message: string; causes?: BackendCause[] };

const BackendCauseSchema: z.ZodType<BackendCause> = z.lazy(() =>
  z.union([
    z.string(),
    z.object({
      message: z.string(),
      causes: z.array(BackendCauseSchema).optional(),
    }),
  ])
);

const FailureReportSchema = z.object({
  error: z.string().optional(),
  causes: z.array(BackendCauseSchema).default([]),
});

const ProgressEventSchema = z
  .object({
    progress_percentage: z.number().optional(),
    current_step: z.string().optional(),
  })
  .passthrough();

function toCauseDiagnostic(cause: BackendCause): Diagnostic {
  if (typeof cause === 'string') {
    return createDiagnostic('BackendCause', cause);
  }
  return createDiagnostic('BackendCause', cause.message, (cause.causes ?? []).map(toCauseDiagnostic));
}

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Build the failure for a generator that exited non-zero.
 */
export function parseBackendFailure(result: ProcessResult, command: string): BackendBuildFailure {
  const lines = result.stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith(PROGRESS_PREFIX));

  for (let i = lines.length - 1; i >= 0; i--) {
    const report = FailureReportSchema.safeParse(tryParseJson(lines[i]));
    if (report.success && (report.data.error !== undefined || report.data.causes.length > 0)) {
      return new BackendBuildFailure(
        report.data.error ?? `${command} exited with code ${result.exitCode}`,
        report.data.causes.map(toCauseDiagnostic),
        { command, exitCode: result.exitCode }
      );
    }
  }

  const stderrCauses = result.stderr
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map(line => createDiagnostic('BackendCause', line));

  return new BackendBuildFailure(`${command} exited with code ${result.exitCode}`, stderrCauses, {
    command,
    exitCode: result.exitCode,
  });
}

export class ProcessBackend extends EventEmitter implements CodegenBackend {
  private config: ProcessBackendConfig;

  constructor(config: ProcessBackendConfig) {
    super();
    this.config = config;
  }

  get name(): string {
    return `process:${this.config.command}`;
  }

  async generate(request: BuildRequest): Promise<void> {
    const result = await this.run(JSON.stringify(request));
    if (result.exitCode !== 0) {
      throw parseBackendFailure(result, this.config.command);
    }
    logger.info(`Backend completed in ${result.duration}ms`, { runId: request.runId });
  }

  private handleProgressLine(line: string): void {
    const event = ProgressEventSchema.safeParse(tryParseJson(line.slice(PROGRESS_PREFIX.length).trim()));
    if (!event.success) {
      logger.warn('Failed to parse progress line', { line: line.substring(0, 100) });
      return;
    }
    const progress: ProgressEvent = event.data;
    logger.info(`Backend progress: ${progress.current_step ?? ''}`, {
      percentage: progress.progress_percentage,
    });
    this.emit('progress', progress);
  }

  private run(stdin: string): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      let stdout = '';
      let stderr = '';
      let lineBuffer = '';

      logger.info(`Executing backend: ${this.config.command} ${this.config.args.join(' ')}`, {
        cwd: process.cwd(),
      });

      const proc: ChildProcess = spawn(this.config.command, this.config.args, {
        cwd: process.cwd(),
        env: { ...process.env, ...this.config.env },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      proc.stdin?.on('error', (error: Error) => {
        // The generator may exit without reading its input
        logger.debug('Backend stdin closed early', { error: error.message });
      });
      proc.stdin?.end(stdin);

      proc.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stdout += chunk;

        lineBuffer += chunk;
        const lines = lineBuffer.split('\n');
        lineBuffer = lines.pop() || '';

        for (const line of lines) {
          if (line.startsWith(PROGRESS_PREFIX)) {
            this.handleProgressLine(line);
          }
        }
        this.emit('stdout', chunk);
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
        this.emit('stderr', data.toString());
      });

      proc.on('close', (code: number | null) => {
        if (lineBuffer.startsWith(PROGRESS_PREFIX)) {
          this.handleProgressLine(lineBuffer);
        }
        resolve({
          exitCode: code ?? 1,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          duration: Date.now() - startTime,
        });
      });

      proc.on('error', (error: Error) => {
        reject(
          new BackendBuildFailure(`Backend ${this.config.command} could not be started`, [
            createDiagnostic('BackendCause', error.message),
          ])
        );
      });
    });
  }
}

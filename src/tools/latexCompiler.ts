/**
 * LaTeX Compiler
 *
 * Runs an external LaTeX engine (pdflatex by default) on a .tex file.
 * A missing binary is reported as 'unavailable' rather than thrown, so the
 * generator can skip the PDF and carry on.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { loggers } from '../shared/logger';

export type CompileOutcome =
  | { status: 'compiled'; pdfPath: string }
  | { status: 'unavailable'; reason: string }
  | { status: 'failed'; reason: string; exitCode: number | null };

export interface LatexCompiler {
  compile(texPath: string): Promise<CompileOutcome>;
}

export interface PdfLatexOptions {
  command?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const AUX_EXTENSIONS = ['.aux', '.log', '.out'];
const LOG_TAIL_CHARS = 2000;

export class PdfLatexCompiler implements LatexCompiler {
  private command: string;
  private timeoutMs: number;
  private log: Logger;

  constructor(options: PdfLatexOptions = {}) {
    this.command = options.command ?? 'pdflatex';
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.log = options.logger ?? loggers.generator;
  }

  async compile(texPath: string): Promise<CompileOutcome> {
    const dir = path.dirname(texPath);
    const base = path.basename(texPath, '.tex');
    const pdfPath = path.join(dir, `${base}.pdf`);

    // a PDF left over from an earlier run must not pass for this one
    await fs.promises.rm(pdfPath, { force: true });

    const run = await this.spawnCompiler(path.basename(texPath), dir);
    if (run.status !== 'exited') {
      return run.outcome;
    }

    if (run.exitCode !== 0 || !fs.existsSync(pdfPath)) {
      this.log.debug({ output: run.output }, 'LaTeX compiler output');
      return {
        status: 'failed',
        reason: run.exitCode !== 0
          ? `${this.command} exited with code ${run.exitCode}`
          : `${this.command} produced no PDF`,
        exitCode: run.exitCode
      };
    }

    await Promise.all(
      AUX_EXTENSIONS.map(ext => fs.promises.rm(path.join(dir, `${base}${ext}`), { force: true }))
    );
    return { status: 'compiled', pdfPath };
  }

  private spawnCompiler(
    fileName: string,
    cwd: string
  ): Promise<
    | { status: 'exited'; exitCode: number | null; output: string }
    | { status: 'aborted'; outcome: CompileOutcome }
  > {
    return new Promise(resolve => {
      let output = '';
      let settled = false;

      const proc = spawn(
        this.command,
        ['-interaction=nonstopmode', '-halt-on-error', fileName],
        { cwd, stdio: ['ignore', 'pipe', 'pipe'] }
      );

      const append = (chunk: Buffer) => {
        output = (output + chunk.toString('utf-8')).slice(-LOG_TAIL_CHARS);
      };
      proc.stdout.on('data', append);
      proc.stderr.on('data', append);

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        proc.kill('SIGKILL');
        resolve({
          status: 'aborted',
          outcome: {
            status: 'failed',
            reason: `${this.command} timed out after ${this.timeoutMs}ms`,
            exitCode: null
          }
        });
      }, this.timeoutMs);

      proc.on('error', (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        const missing = 'code' in error && error.code === 'ENOENT';
        resolve({
          status: 'aborted',
          outcome: missing
            ? { status: 'unavailable', reason: `${this.command} not found on PATH` }
            : { status: 'failed', reason: error.message, exitCode: null }
        });
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ status: 'exited', exitCode: code, output });
      });
    });
  }
}

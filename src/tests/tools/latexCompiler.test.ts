/**
 * Tests for the LaTeX compiler process wrapper
 *
 * Real LaTeX is not needed: small shell commands stand in for the engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { PdfLatexCompiler } from '../../tools/latexCompiler';
import { renderLatex } from '../../tools/latexRenderer';
import { makeTempDir, removeDir } from '../helpers/fakes';

/**
 * Writes the PDF and the auxiliary files an engine leaves behind
 */
const PRODUCING_ENGINE = [
  '#!/bin/sh',
  'for last; do :; done',
  'base="${last%.tex}"',
  'printf "%%PDF-1.4\\n" > "$base.pdf"',
  'echo aux > "$base.aux"',
  'echo log > "$base.log"',
  ''
].join('\n');

const HANGING_ENGINE = '#!/bin/sh\nexec sleep 5\n';

describe('PdfLatexCompiler', () => {
  let dir: string;
  let texPath: string;

  async function engine(name: string, script: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.promises.writeFile(file, script, { mode: 0o755 });
    return file;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    texPath = path.join(dir, 'resume.tex');
    await fs.promises.writeFile(texPath, renderLatex({ markdown: '- Built tools' }));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should report a missing engine as unavailable', async () => {
    const outcome = await new PdfLatexCompiler({ command: 'no-such-latex' }).compile(texPath);

    expect(outcome).toEqual({ status: 'unavailable', reason: 'no-such-latex not found on PATH' });
  });

  it('should report a non-zero exit and drop a stale PDF', async () => {
    const pdfPath = path.join(dir, 'resume.pdf');
    await fs.promises.writeFile(pdfPath, '%PDF-1.4 from an earlier run\n');

    const outcome = await new PdfLatexCompiler({ command: 'false' }).compile(texPath);

    expect(outcome).toEqual({ status: 'failed', reason: 'false exited with code 1', exitCode: 1 });
    expect(fs.existsSync(pdfPath)).toBe(false);
  });

  it('should fail when the engine exits cleanly without a PDF', async () => {
    const outcome = await new PdfLatexCompiler({ command: 'true' }).compile(texPath);

    expect(outcome).toEqual({ status: 'failed', reason: 'true produced no PDF', exitCode: 0 });
  });

  it('should return the PDF and remove auxiliary files', async () => {
    const command = await engine('fake-latex', PRODUCING_ENGINE);

    const outcome = await new PdfLatexCompiler({ command }).compile(texPath);

    expect(outcome).toEqual({ status: 'compiled', pdfPath: path.join(dir, 'resume.pdf') });
    expect(await fs.promises.readFile(path.join(dir, 'resume.pdf'), 'utf-8')).toBe('%PDF-1.4\n');
    expect(fs.existsSync(path.join(dir, 'resume.aux'))).toBe(false);
    expect(fs.existsSync(path.join(dir, 'resume.log'))).toBe(false);
    expect(fs.existsSync(texPath)).toBe(true);
  });

  it('should stop an engine that runs past the timeout', async () => {
    const command = await engine('slow-latex', HANGING_ENGINE);

    const outcome = await new PdfLatexCompiler({ command, timeoutMs: 100 }).compile(texPath);

    expect(outcome).toEqual({ status: 'failed', reason: `${command} timed out after 100ms`, exitCode: null });
  });
});

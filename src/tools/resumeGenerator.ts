/**
 * Resume Generator
 *
 * Writes the final resume to the output directory: resume.md and
 * resume.tex always, then resume.pdf, resume.docx and resume.json as
 * requested. With a Magic Resume template the Word document is laid out
 * from the Magic Resume data instead of the Markdown. A missing LaTeX engine
 * or Word library skips that output with a warning; only filesystem errors
 * fail the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { Artifact, OutputFormat, SkippedOutput } from '../types';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../shared/logger';
import { renderLatex } from './latexRenderer';
import { LatexCompiler, PdfLatexCompiler } from './latexCompiler';
import { DocxLoader, loadDocxModule, renderDocx } from './docxRenderer';
import { MagicResumeBuilder, MagicResumeBuilderOptions, MagicResumeData } from './magicResumeBuilder';
import { renderMagicResumeDocx } from './magicResumeDocx';

export const OUTPUT_FILES = {
  markdown: 'resume.md',
  latex: 'resume.tex',
  pdf: 'resume.pdf',
  docx: 'resume.docx',
  json: 'resume.json'
} as const;

export interface GenerateRequest {
  markdown: string;
  outputDir: string;
  formats: OutputFormat[];
  candidateName?: string;
  /** Magic Resume template for the json format; also styles the docx format */
  template?: string;
}

export interface GenerateResult {
  artifacts: Artifact[];
  skipped: SkippedOutput[];
}

export interface ResumeGeneratorOptions {
  compiler?: LatexCompiler;
  loadDocx?: DocxLoader;
  magicResume?: MagicResumeBuilderOptions;
  logger?: Logger;
}

export class ResumeGenerator {
  private compiler: LatexCompiler;
  private loadDocx: DocxLoader;
  private magicResume: MagicResumeBuilderOptions;
  private log: Logger;

  constructor(options: ResumeGeneratorOptions = {}) {
    this.log = options.logger ?? loggers.generator;
    this.compiler = options.compiler ?? new PdfLatexCompiler({ logger: this.log });
    this.loadDocx = options.loadDocx ?? loadDocxModule;
    this.magicResume = { logger: this.log, ...options.magicResume };
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const artifacts: Artifact[] = [];
    const skipped: SkippedOutput[] = [];
    const dir = request.outputDir;

    let magicData: MagicResumeData | null = null;
    const magicResume = (): MagicResumeData => {
      if (!magicData) {
        magicData = new MagicResumeBuilder(request.template, this.magicResume)
          .fromMarkdown(request.markdown, request.candidateName)
          .build();
      }
      return magicData;
    };

    await this.writeFile(dir, OUTPUT_FILES.markdown, request.markdown);
    artifacts.push(this.fileArtifact('resume.md', 'markdown', dir, request.markdown));

    const latex = renderLatex({ markdown: request.markdown, candidateName: request.candidateName });
    const texPath = await this.writeFile(dir, OUTPUT_FILES.latex, latex);
    artifacts.push(this.fileArtifact('resume.tex', 'latex', dir, latex));

    for (const format of request.formats) {
      switch (format) {
        case OutputFormat.PDF: {
          const outcome = await this.compiler.compile(texPath);
          if (outcome.status === 'compiled') {
            artifacts.push(this.fileArtifact('resume.pdf', 'pdf', dir));
          } else {
            this.skip(skipped, format, outcome.reason, outcome.status === 'unavailable');
          }
          break;
        }
        case OutputFormat.DOCX: {
          const docx = await this.tryLoadDocx();
          if (!docx) {
            this.skip(skipped, format, 'docx library not available', true);
            break;
          }
          const buffer = request.template
            ? await renderMagicResumeDocx(docx, magicResume())
            : await renderDocx(docx, { markdown: request.markdown, candidateName: request.candidateName });
          await this.writeFile(dir, OUTPUT_FILES.docx, buffer);
          artifacts.push(this.fileArtifact('resume.docx', 'docx', dir));
          break;
        }
        case OutputFormat.JSON: {
          const json = JSON.stringify(magicResume(), null, 2) + '\n';
          await this.writeFile(dir, OUTPUT_FILES.json, json);
          artifacts.push(this.fileArtifact('resume.json', 'json', dir, json));
          break;
        }
      }
    }

    this.log.info(
      { outputDir: dir, written: artifacts.map(a => a.name), skipped: skipped.map(s => s.format) },
      'Resume generated'
    );
    return { artifacts, skipped };
  }

  private async tryLoadDocx() {
    try {
      return await this.loadDocx();
    } catch (error) {
      this.log.debug(
        { details: error instanceof Error ? error.message : String(error) },
        'docx import failed'
      );
      return null;
    }
  }

  private skip(skipped: SkippedOutput[], format: OutputFormat, reason: string, missingDependency: boolean): void {
    const warning = missingDependency
      ? ErrorHandler.createDependencyError(format === OutputFormat.PDF ? 'LaTeX compiler' : 'docx', reason, { format })
      : ErrorHandler.createRenderingError(`Could not produce ${format} output`, reason, { format });
    this.log.warn(
      { format, category: warning.category, reason, suggestion: warning.suggestedAction },
      `Skipping ${format} output: ${reason}`
    );
    skipped.push({ format, reason });
  }

  private async writeFile(dir: string, name: string, content: string | Buffer): Promise<string> {
    const filePath = path.join(dir, name);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(filePath, content);
    } catch (error) {
      throw ErrorHandler.createRenderingError(
        `Could not write ${name}`,
        error instanceof Error ? error.message : String(error),
        { path: filePath },
        error
      );
    }
    return filePath;
  }

  private fileArtifact(
    name: Artifact['name'],
    kind: Artifact['kind'],
    dir: string,
    content?: string
  ): Artifact {
    const artifact: Artifact = {
      name,
      kind,
      producedBy: 'run_resume_generator',
      path: path.join(dir, name)
    };
    if (content !== undefined) {
      artifact.content = content;
    }
    return artifact;
  }
}

#!/usr/bin/env node
/**
 * resume-agent CLI
 *
 * Turns a career description or an existing resume into Markdown, LaTeX,
 * PDF, Word and Magic Resume JSON files.
 */

import { Command, CommanderError } from 'commander';
import { Config, ConfigurationError, EnvRecord, getConfig, loadConfig } from './shared/config';
import { loggers } from './shared/logger';
import { ErrorHandler } from './shared/errors';
import { CompletionClient, createLLMClientFromSettings } from './shared/llm';
import { CliOptions, CliOptionsSchema, formatValidationErrors, validateWith } from './shared/validation';
import { InputProcessor, ExtractorLoaders } from './tools/inputProcessor';
import { TextModifier, DEFAULT_LOCALE } from './tools/textModifier';
import { ResumeGenerator } from './tools/resumeGenerator';
import { LatexCompiler, PdfLatexCompiler } from './tools/latexCompiler';
import { DocxLoader } from './tools/docxRenderer';
import { DecisionMaker } from './agents/decisionMaker';
import { Orchestrator, RunResult } from './agents/orchestrator';

const VERSION = '0.1.0';

export interface CliDependencies {
  /** Environment to read configuration from; defaults to process.env */
  env?: EnvRecord;
  /** Overrides the client built from DEEPSEEK_API_KEY; null forces offline mode */
  llm?: CompletionClient | null;
  compiler?: LatexCompiler;
  loadDocx?: DocxLoader;
  extractors?: ExtractorLoaders;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

function resolveConfig(env?: EnvRecord): Config {
  try {
    return env ? loadConfig(env) : getConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw ErrorHandler.createConfigurationError('Invalid configuration', error.message);
    }
    throw error;
  }
}

export function createOrchestrator(config: Config, deps: CliDependencies = {}): Orchestrator {
  const llm = deps.llm !== undefined ? deps.llm : createLLMClientFromSettings(config.llm);
  if (!llm) {
    loggers.cli.warn('DEEPSEEK_API_KEY is not set, using the fixed tool order and formatting-only rewrite');
  }

  return new Orchestrator({
    inputProcessor: new InputProcessor({ loaders: deps.extractors }),
    textModifier: new TextModifier({ llm }),
    resumeGenerator: new ResumeGenerator({
      compiler: deps.compiler ?? new PdfLatexCompiler({
        command: config.latex.compiler,
        timeoutMs: config.latex.timeoutMs
      }),
      loadDocx: deps.loadDocx
    }),
    decisionMaker: new DecisionMaker({ llm })
  });
}

async function generate(options: CliOptions, config: Config, deps: CliDependencies): Promise<RunResult> {
  const orchestrator = createOrchestrator(config, deps);
  return orchestrator.run({
    payload: options.text !== undefined
      ? { text: options.text, kind: options.kind }
      : { path: options.input, kind: options.kind },
    outputDir: options.outputDir,
    formats: options.format,
    candidateName: options.name,
    targetRole: options.targetRole,
    locale: options.locale,
    maturity: options.maturity,
    template: options.template
  });
}

export function buildProgram(deps: CliDependencies = {}): Command {
  const writeOut = deps.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));

  const program = new Command();

  program
    .name('resume-agent')
    .description('Generate a polished resume from a career description or an existing resume')
    .version(VERSION)
    .option('--input <path>', 'input file (.txt, .md, .pdf or .docx)')
    .option('--text <text>', 'raw text input')
    .option('--kind <kind>', 'declared input kind: text, pdf or docx')
    .option('--format <formats>', 'comma-separated outputs: pdf, docx, json', 'pdf')
    .option('--output-dir <dir>', 'output directory (default: OUTPUT_DIR or "output")')
    .option('--target-role <role>', 'role the rewrite should emphasize')
    .option('--name <name>', 'candidate name for document headers')
    .option('--maturity <maturity>', 'skip classification: raw_text, mature or immature')
    .option('--locale <locale>', 'language of the rewrite', DEFAULT_LOCALE)
    .option('--template <id>', 'Magic Resume template: classic, modern, left-right or timeline')
    .configureOutput({ writeOut, writeErr })
    .exitOverride()
    .action(async () => {
      const config = resolveConfig(deps.env);
      const raw = program.opts();

      const validation = validateWith(CliOptionsSchema, {
        ...raw,
        outputDir: raw.outputDir ?? config.output.dir
      });
      if (!validation.isValid) {
        throw ErrorHandler.createValidationError(
          'Invalid options',
          formatValidationErrors(validation.errors)
        );
      }

      const result = await generate(validation.value, config, deps);
      for (const artifact of result.artifacts) {
        if (artifact.path) {
          writeOut(`Generated: ${artifact.path}\n`);
        }
      }
    });

  return program;
}

/**
 * Parse user arguments and run the pipeline.
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));
  const program = buildProgram(deps);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit through here with code 0
      return error.exitCode;
    }
    const appError = ErrorHandler.toAppError(error);
    ErrorHandler.logError(appError, loggers.cli);
    writeErr(`Error: ${ErrorHandler.formatUserMessage(appError)}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}

/**
 * Input Processor
 *
 * Normalizes resume input (raw text, TXT/MD, PDF, DOCX) into Markdown text.
 * The PDF and Word readers are optional: when one cannot be loaded the file
 * is read as plain UTF-8 text and a warning is logged.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { InputKind, InputPayload } from '../types';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../shared/logger';

export interface PdfExtraction {
  text: string;
  numpages: number;
  info?: Record<string, unknown>;
}

export interface DocxExtraction {
  value: string;
  messages: Array<{ type: string; message: string }>;
}

export type PdfTextExtractor = (buffer: Buffer) => Promise<PdfExtraction>;
export type DocxTextExtractor = (buffer: Buffer) => Promise<DocxExtraction>;

/**
 * Lazy loaders for the optional document readers
 */
export interface ExtractorLoaders {
  loadPdf(): Promise<PdfTextExtractor>;
  loadDocx(): Promise<DocxTextExtractor>;
}

export const defaultExtractorLoaders: ExtractorLoaders = {
  async loadPdf() {
    const { default: pdfParse } = await import('pdf-parse');
    return async (buffer: Buffer) => {
      const data = await pdfParse(buffer);
      const info: unknown = data.info;
      return {
        text: data.text,
        numpages: data.numpages,
        info: isRecord(info) ? info : undefined
      };
    };
  },
  async loadDocx() {
    const { default: mammoth } = await import('mammoth');
    return (buffer: Buffer) => mammoth.extractRawText({ buffer });
  }
};

export interface ProcessedInput {
  markdown: string;
  kind: InputKind;
  /** 'text' for inline input, otherwise the file path */
  source: string;
  pageCount?: number;
  metadata?: {
    title?: string;
    author?: string;
    creationDate?: Date;
  };
  /** Set when an optional reader was missing and the file was read as plain text */
  degraded?: boolean;
}

export interface InputProcessorOptions {
  loaders?: ExtractorLoaders;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringField(record: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * Cleans text: normalizes line endings, trims every line and collapses
 * runs of blank lines into one.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Detects the input kind from a file extension
 * @returns the kind, or null when the extension is unsupported
 */
export function detectInputKind(fileName: string): InputKind | null {
  const ext = path.extname(fileName).toLowerCase();
  switch (ext) {
    case '.txt':
    case '.md':
    case '.markdown':
      return InputKind.TEXT;
    case '.pdf':
      return InputKind.PDF;
    case '.docx':
    case '.doc':
      return InputKind.DOCX;
    default:
      return null;
  }
}

/**
 * Parses PDF date strings (D:YYYYMMDDHHmmSS format)
 */
export function parsePdfDate(pdfDate: string): Date | undefined {
  const match = pdfDate.match(/D:(\d{4})(\d{2})(\d{2})(\d{2})?(\d{2})?(\d{2})?/);
  if (!match) return undefined;

  const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;
  return new Date(
    parseInt(year, 10),
    parseInt(month, 10) - 1,
    parseInt(day, 10),
    parseInt(hour, 10),
    parseInt(minute, 10),
    parseInt(second, 10)
  );
}

export class InputProcessor {
  private loaders: ExtractorLoaders;
  private log: Logger;

  constructor(options: InputProcessorOptions = {}) {
    this.loaders = options.loaders ?? defaultExtractorLoaders;
    this.log = options.logger ?? loggers.input;
  }

  /**
   * Converts the payload into normalized Markdown text
   * @throws AppError (INPUT) when the input is missing, unsupported, unreadable or empty
   */
  async process(payload: InputPayload): Promise<ProcessedInput> {
    const hasText = payload.text !== undefined;
    const hasPath = payload.path !== undefined && payload.path !== '';

    if (hasText && hasPath) {
      throw ErrorHandler.createInputError(
        'Provide either text or a file, not both',
        'Both raw text and a source path were given'
      );
    }

    if (payload.text !== undefined) {
      return {
        markdown: this.requireContent(normalizeText(payload.text), 'text'),
        kind: InputKind.TEXT,
        source: 'text'
      };
    }

    if (!payload.path) {
      throw ErrorHandler.createInputError(
        'No input provided',
        'Either raw text or a source path must be provided'
      );
    }

    return this.processFile(payload.path, payload.kind);
  }

  private async processFile(filePath: string, declared?: InputKind): Promise<ProcessedInput> {
    if (!fs.existsSync(filePath)) {
      throw ErrorHandler.createInputError(
        'Input file not found',
        `File not found: ${filePath}`,
        { path: filePath }
      );
    }

    const kind = declared ?? detectInputKind(filePath);
    if (!kind) {
      throw ErrorHandler.createInputError(
        'Unsupported input file',
        `Unsupported input format: ${path.extname(filePath) || '(none)'}`,
        { path: filePath }
      );
    }

    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (error) {
      throw ErrorHandler.createInputError(
        'Could not read input file',
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath },
        error
      );
    }

    switch (kind) {
      case InputKind.PDF:
        return this.extractPdf(buffer, filePath);
      case InputKind.DOCX:
        return this.extractDocx(buffer, filePath);
      case InputKind.TEXT:
        return {
          markdown: this.requireContent(normalizeText(buffer.toString('utf-8')), filePath),
          kind,
          source: filePath
        };
    }
  }

  private async extractPdf(buffer: Buffer, filePath: string): Promise<ProcessedInput> {
    const extract = await this.tryLoad('pdf-parse', () => this.loaders.loadPdf());
    if (!extract) {
      return this.plainTextFallback(buffer, filePath, InputKind.PDF);
    }

    let data: PdfExtraction;
    try {
      data = await extract(buffer);
    } catch (error) {
      throw ErrorHandler.createInputError(
        'Could not read PDF file',
        `PDF appears corrupted: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath },
        error
      );
    }

    const creation = stringField(data.info, 'CreationDate');
    this.log.info({ path: filePath, pages: data.numpages }, 'Extracted text from PDF');

    return {
      markdown: this.requireContent(normalizeText(data.text), filePath),
      kind: InputKind.PDF,
      source: filePath,
      pageCount: data.numpages,
      metadata: {
        title: stringField(data.info, 'Title'),
        author: stringField(data.info, 'Author'),
        creationDate: creation ? parsePdfDate(creation) : undefined
      }
    };
  }

  private async extractDocx(buffer: Buffer, filePath: string): Promise<ProcessedInput> {
    const extract = await this.tryLoad('mammoth', () => this.loaders.loadDocx());
    if (!extract) {
      return this.plainTextFallback(buffer, filePath, InputKind.DOCX);
    }

    let result: DocxExtraction;
    try {
      result = await extract(buffer);
    } catch (error) {
      throw ErrorHandler.createInputError(
        'Could not read Word file',
        `Word document appears corrupted: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath },
        error
      );
    }

    if (result.messages.length > 0) {
      this.log.warn({ path: filePath, messages: result.messages }, 'DOCX conversion warnings');
    }

    return {
      markdown: this.requireContent(normalizeText(result.value), filePath),
      kind: InputKind.DOCX,
      source: filePath
    };
  }

  private async tryLoad<T>(library: string, load: () => Promise<T>): Promise<T | null> {
    try {
      return await load();
    } catch (error) {
      this.log.warn(
        { dependency: library, details: error instanceof Error ? error.message : String(error) },
        `${library} is not available, reading the file as plain text`
      );
      return null;
    }
  }

  private plainTextFallback(buffer: Buffer, filePath: string, kind: InputKind): ProcessedInput {
    const text = normalizeText(buffer.toString('utf-8').replace(/\u0000/g, ''));
    if (!text) {
      throw ErrorHandler.createInputError(
        'Could not read input file',
        `No readable text in ${filePath} without a ${kind} reader`,
        { path: filePath }
      );
    }
    return { markdown: text, kind, source: filePath, degraded: true };
  }

  private requireContent(text: string, source: string): string {
    if (!text) {
      throw ErrorHandler.createInputError(
        'Input is empty',
        'Input text is empty after normalization',
        { source }
      );
    }
    return text;
  }
}

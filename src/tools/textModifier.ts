/**
 * Text Modifier
 *
 * Rewrites normalized resume Markdown with a language model. Without LLM
 * credentials a deterministic formatter stands in and only tidies layout.
 */

import type { Logger } from 'pino';
import { ResumeMaturity } from '../types';
import {
  CompletionClient,
  buildStructuredPrompt,
  escapePromptText,
  stripCodeFence
} from '../shared/llm';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../shared/logger';
import { normalizeText } from './inputProcessor';

export const DEFAULT_LOCALE = 'en-US';

export interface ModifyRequest {
  markdown: string;
  maturity: ResumeMaturity;
  targetRole?: string;
  locale?: string;
}

export interface ModifyResult {
  markdown: string;
  source: 'llm' | 'dummy';
}

const GUIDANCE: Record<ResumeMaturity, string> = {
  [ResumeMaturity.RAW_TEXT]:
    'The input is an informal description. Turn it into formal resume entries, open each bullet with an action verb and use one consistent format.',
  [ResumeMaturity.MATURE]:
    'The input is already a complete resume. Keep its structure, refine the wording and make results and impact more prominent.',
  [ResumeMaturity.IMMATURE]:
    'The input is an incomplete resume. Restructure it into standard sections, add the sections its content supports and unify the style.'
};

const SYSTEM_PROMPT = `You are an experienced resume writer.
You rewrite resume content into clean, professional Markdown.
Never invent employers, dates, degrees, numbers or skills that are not in the input.`;

/**
 * Formatting-only rewrite used when no language model is configured.
 * Drops blank lines, keeps headings and turns every other line into a
 * "- " bullet. Applying it twice gives the same result as applying it once.
 */
export function formatAsBullets(markdown: string): string {
  const lines: string[] = [];

  for (const raw of markdown.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    if (/^#{1,6}\s/.test(line)) {
      lines.push(line);
    } else if (/^[-•]/.test(line) || /^\*\s/.test(line)) {
      const rest = line.slice(1).trim();
      if (rest) {
        lines.push(`- ${rest}`);
      }
    } else {
      lines.push(`- ${line}`);
    }
  }

  return lines.join('\n');
}

export function buildModifyPrompt(request: ModifyRequest): string {
  const targetRole = request.targetRole?.trim() || 'general';
  const locale = request.locale?.trim() || DEFAULT_LOCALE;

  const prompt = buildStructuredPrompt(
    GUIDANCE[request.maturity],
    [
      `Target role: ${targetRole}. Emphasize the experience most relevant to it.`,
      `Write in the language of the locale ${locale}.`,
      'Use "#" for the candidate name, "##" for section headings and "- " for bullets.',
      'Keep every fact from the input; remove repetition and filler.'
    ],
    'Return only the rewritten resume as Markdown, with no commentary and no code fence.'
  );

  return `${prompt}\n\nRESUME CONTENT:\n${escapePromptText(request.markdown)}`;
}

export interface TextModifierOptions {
  llm?: CompletionClient | null;
  logger?: Logger;
}

export class TextModifier {
  private llm: CompletionClient | null;
  private log: Logger;

  constructor(options: TextModifierOptions = {}) {
    this.llm = options.llm ?? null;
    this.log = options.logger ?? loggers.modifier;
  }

  get usesLLM(): boolean {
    return this.llm !== null;
  }

  /**
   * Rewrites the resume Markdown
   * @throws AppError (LLM) when the model call fails or returns nothing usable
   */
  async modify(request: ModifyRequest): Promise<ModifyResult> {
    if (!this.llm) {
      this.log.warn('No LLM configured, applying formatting-only rewrite');
      return { markdown: formatAsBullets(request.markdown), source: 'dummy' };
    }

    let content: string;
    try {
      const response = await this.llm.complete({
        systemPrompt: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildModifyPrompt(request) }]
      });
      content = response.content;
    } catch (error) {
      throw ErrorHandler.createLLMError(
        'Resume rewrite failed',
        error instanceof Error ? error.message : String(error),
        { maturity: request.maturity },
        error
      );
    }

    const markdown = normalizeText(stripCodeFence(content));
    if (!markdown) {
      throw ErrorHandler.createLLMError(
        'Resume rewrite failed',
        'The language model returned an empty rewrite',
        { maturity: request.maturity }
      );
    }

    this.log.info(
      { maturity: request.maturity, chars: markdown.length },
      'Rewrote resume with LLM'
    );
    return { markdown, source: 'llm' };
  }
}

/**
 * Tests for the text modifier
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TextModifier, buildModifyPrompt, formatAsBullets } from '../../tools/textModifier';
import { AppError, ErrorCategory } from '../../shared/errors';
import { ResumeMaturity } from '../../types';
import { createLogCapture } from '../helpers/logCapture';
import { ScriptedCompletionClient } from '../helpers/fakes';

describe('formatAsBullets', () => {
  it('should turn a single sentence into one bullet', () => {
    expect(formatAsBullets('Software engineer, 3 years, built internal tools')).toBe(
      '- Software engineer, 3 years, built internal tools'
    );
  });

  it('should keep headings, drop blank lines and normalize bullet markers', () => {
    const input = [
      '# Jane Doe',
      '',
      '  Backend engineer  ',
      '* Led a team of four',
      '• Shipped billing service',
      '-Cut costs',
      '-',
      '**Skills**'
    ].join('\n');

    expect(formatAsBullets(input)).toBe([
      '# Jane Doe',
      '- Backend engineer',
      '- Led a team of four',
      '- Shipped billing service',
      '- Cut costs',
      '- **Skills**'
    ].join('\n'));
  });

  it('should be idempotent', () => {
    const line = fc.oneof(
      fc.string(),
      fc.string().map(s => `- ${s}`),
      fc.string().map(s => `## ${s}`),
      fc.string().map(s => `* ${s}`)
    );

    fc.assert(
      fc.property(fc.array(line), (lines) => {
        const once = formatAsBullets(lines.join('\n'));
        expect(formatAsBullets(once)).toBe(once);
      })
    );
  });
});

describe('buildModifyPrompt', () => {
  it('should include the guidance, role and locale', () => {
    const prompt = buildModifyPrompt({
      markdown: 'Built internal tools\r\n',
      maturity: ResumeMaturity.RAW_TEXT,
      targetRole: 'Platform Engineer',
      locale: 'de-DE'
    });

    expect(prompt.startsWith('The input is an informal description.')).toBe(true);
    expect(prompt).toContain('1. Target role: Platform Engineer. Emphasize the experience most relevant to it.');
    expect(prompt).toContain('2. Write in the language of the locale de-DE.');
    expect(prompt.endsWith('RESUME CONTENT:\nBuilt internal tools')).toBe(true);
  });

  it('should default the role and locale', () => {
    const prompt = buildModifyPrompt({ markdown: 'x', maturity: ResumeMaturity.MATURE });

    expect(prompt).toContain('Target role: general.');
    expect(prompt).toContain('locale en-US.');
  });
});

describe('TextModifier', () => {
  it('should apply the formatting-only rewrite without an LLM', async () => {
    const capture = createLogCapture();
    const modifier = new TextModifier({ logger: capture.logger });

    const result = await modifier.modify({
      markdown: 'Software engineer, 3 years, built internal tools',
      maturity: ResumeMaturity.RAW_TEXT
    });

    expect(modifier.usesLLM).toBe(false);
    expect(result).toEqual({ markdown: '- Software engineer, 3 years, built internal tools', source: 'dummy' });
    expect(capture.messages('warn')).toEqual(['No LLM configured, applying formatting-only rewrite']);
  });

  it('should return the model rewrite without its code fence', async () => {
    const llm = new ScriptedCompletionClient(['```markdown\n# Jane Doe\n\n\n## Experience\n- Built internal tools\n```']);
    const modifier = new TextModifier({ llm });

    const result = await modifier.modify({
      markdown: 'Jane Doe built internal tools',
      maturity: ResumeMaturity.RAW_TEXT,
      targetRole: 'Platform Engineer'
    });

    expect(result).toEqual({ markdown: '# Jane Doe\n\n## Experience\n- Built internal tools', source: 'llm' });
    expect(llm.requests).toHaveLength(1);
    expect(llm.requests[0].messages[0].role).toBe('user');
    expect(llm.requests[0].messages[0].content).toContain('Target role: Platform Engineer.');
  });

  it('should fail with an LLM error when the call fails', async () => {
    const modifier = new TextModifier({ llm: new ScriptedCompletionClient([new Error('401 Unauthorized')]) });

    const error = await modifier
      .modify({ markdown: 'x', maturity: ResumeMaturity.IMMATURE })
      .then(() => null, (caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) {
      expect(error.category).toBe(ErrorCategory.LLM);
      expect(error.userMessage).toBe('Resume rewrite failed');
      expect(error.technicalDetails).toBe('401 Unauthorized');
    }
  });

  it('should fail with an LLM error on an empty rewrite', async () => {
    const modifier = new TextModifier({ llm: new ScriptedCompletionClient(['```\n\n```']) });

    await expect(modifier.modify({ markdown: 'x', maturity: ResumeMaturity.MATURE }))
      .rejects.toMatchObject({ category: ErrorCategory.LLM });
  });
});

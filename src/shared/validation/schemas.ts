/**
 * Validation Schemas
 *
 * Zod schemas for CLI options and the decision maker's LLM answer.
 */

import { z } from 'zod';
import { InputKind, OutputFormat, ResumeMaturity } from '../../types';

/**
 * Accepted spellings for each output format
 */
const FORMAT_ALIASES: Record<string, OutputFormat> = {
  pdf: OutputFormat.PDF,
  docx: OutputFormat.DOCX,
  word: OutputFormat.DOCX,
  json: OutputFormat.JSON
};

/**
 * Comma-separated output formats, e.g. "pdf,docx". Duplicates collapse.
 */
export const OutputFormatListSchema = z
  .string()
  .trim()
  .min(1, 'At least one output format is required')
  .transform((value, ctx) => {
    const formats: OutputFormat[] = [];
    for (const raw of value.split(',')) {
      const token = raw.trim().toLowerCase();
      if (!token) continue;
      const format = FORMAT_ALIASES[token];
      if (!format) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsupported output format: ${raw.trim()} (expected pdf, docx or json)`
        });
        return z.NEVER;
      }
      if (!formats.includes(format)) {
        formats.push(format);
      }
    }
    return formats;
  });

export const InputKindSchema = z.nativeEnum(InputKind);

export const ResumeMaturitySchema = z.nativeEnum(ResumeMaturity);

export const CliOptionsSchema = z
  .object({
    input: z.string().trim().min(1).optional(),
    text: z.string().optional(),
    kind: InputKindSchema.optional(),
    format: OutputFormatListSchema,
    outputDir: z.string().trim().min(1, 'Output directory cannot be empty'),
    targetRole: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1).optional(),
    maturity: ResumeMaturitySchema.optional(),
    locale: z.string().trim().min(2),
    template: z.string().trim().min(1).optional()
  })
  .refine(options => (options.input === undefined) !== (options.text === undefined), {
    message: 'Provide exactly one of --input or --text',
    path: ['input']
  });

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Planner answer: {"todo_list": [...], "is_complete": false}
 * Non-string entries are tolerated here and dropped by the decision maker.
 */
export const DecisionResponseSchema = z.object({
  todo_list: z.array(z.unknown()).default([]),
  is_complete: z.boolean().default(false),
  rationale: z.union([z.string(), z.record(z.string())]).optional()
});

export type DecisionResponse = z.infer<typeof DecisionResponseSchema>;

/**
 * LLM Prompts
 *
 * Common prompt utilities and templates for LLM interactions.
 */

/**
 * Build a structured prompt with clear instructions
 */
export function buildStructuredPrompt(
  task: string,
  instructions: string[],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n`;
  }

  return prompt.trimEnd();
}

/**
 * Normalize line endings and trim text before it goes into a prompt
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();
}

/**
 * Cut text to a maximum number of characters
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength);
}

/**
 * Format a list of items for inclusion in a prompt
 */
export function formatList(items: string[], numbered: boolean = false): string {
  if (numbered) {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
  }
  return items.map(item => `- ${item}`).join('\n');
}

/**
 * Remove a Markdown code fence wrapping the whole answer
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/);
  return match ? match[1].trim() : trimmed;
}

/**
 * Decision Maker
 *
 * Picks the next tool from the pipeline state. With a language model it
 * asks for a to-do list; without one, or when the answer is unusable, it
 * follows the fixed order input processor → text modifier → generator.
 */

import type { Logger } from 'pino';
import {
  Decision,
  PipelineState,
  PipelineStatus,
  TOOL_ORDER,
  ToDoEntry,
  ToolName,
  isToolName
} from '../types';
import {
  CompletionClient,
  buildStructuredPrompt,
  formatList,
  parseJsonResponse,
  truncateText
} from '../shared/llm';
import { DecisionResponse, DecisionResponseSchema, formatValidationErrors, validateWith } from '../shared/validation';
import { loggers } from '../shared/logger';

/** Characters of the current Markdown shown to the model */
export const DECISION_PREVIEW_LENGTH = 2000;

const FALLBACK_RATIONALE: Record<ToolName, string> = {
  run_input_processor: 'Convert the input into normalized Markdown',
  run_text_modifier: 'Rewrite the Markdown into polished resume content',
  run_resume_generator: 'Render the polished Markdown into the requested formats'
};

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  run_input_processor: 'run_input_processor: read the text, PDF or Word input and produce normalized Markdown',
  run_text_modifier: 'run_text_modifier: rewrite the Markdown into polished resume content',
  run_resume_generator: 'run_resume_generator: write resume.md and resume.tex and render PDF, Word or JSON'
};

const SYSTEM_PROMPT = `You plan the steps of a resume generation pipeline.
You only answer with a JSON object.`;

export interface StateFlags {
  has_markdown: boolean;
  has_polished_markdown: boolean;
  has_output: boolean;
}

export function stateFlags(state: PipelineState): StateFlags {
  return {
    has_markdown: state.completed.has('run_input_processor'),
    has_polished_markdown: state.completed.has('run_text_modifier'),
    has_output: state.completed.has('run_resume_generator')
  };
}

export function pipelineStatus(state: PipelineState): PipelineStatus {
  if (state.completed.size === 0) {
    return 'not_started';
  }
  return TOOL_ORDER.every(tool => state.completed.has(tool)) ? 'done' : 'in_progress';
}

/**
 * Tools still to run, in prerequisite order
 */
export function remainingTools(state: PipelineState): ToolName[] {
  return TOOL_ORDER.filter(tool => !state.completed.has(tool));
}

export function fallbackTodo(state: PipelineState): ToDoEntry[] {
  return remainingTools(state).map(tool => ({ tool, rationale: FALLBACK_RATIONALE[tool] }));
}

/**
 * Reduce a planned list to the tools that still have to run: unknown and
 * completed names are dropped, duplicates removed, missing tools appended,
 * and the result put back in prerequisite order.
 */
export function sanitizeTodo(planned: unknown[], state: PipelineState): ToolName[] {
  const kept = new Set<ToolName>();
  for (const entry of planned) {
    if (typeof entry !== 'string') continue;
    const name = entry.trim();
    if (isToolName(name) && !state.completed.has(name)) {
      kept.add(name);
    }
  }
  for (const tool of remainingTools(state)) {
    kept.add(tool);
  }
  return TOOL_ORDER.filter(tool => kept.has(tool));
}

export function buildDecisionPrompt(state: PipelineState): string {
  const flags = stateFlags(state);
  const preview = state.currentText ? truncateText(state.currentText, DECISION_PREVIEW_LENGTH) : '(none yet)';

  const prompt = buildStructuredPrompt(
    'Decide which tools still have to run to turn the input into a finished resume.',
    [
      `Available tools:\n${formatList(TOOL_ORDER.map(tool => TOOL_DESCRIPTIONS[tool]))}`,
      'Every tool runs exactly once, and only after the tools before it in the list above.',
      'List only the tools that have not run yet, in the order they should run.'
    ],
    '{"todo_list": ["tool_name", ...], "is_complete": false, "rationale": {"tool_name": "why"}}'
  );

  return `${prompt}\n\nSTATE:\n${JSON.stringify(flags)}\n\nCURRENT MARKDOWN:\n${preview}`;
}

export interface DecisionMakerOptions {
  llm?: CompletionClient | null;
  logger?: Logger;
}

export class DecisionMaker {
  private llm: CompletionClient | null;
  private log: Logger;

  constructor(options: DecisionMakerOptions = {}) {
    this.llm = options.llm ?? null;
    this.log = options.logger ?? loggers.decision;
  }

  status(state: PipelineState): PipelineStatus {
    return pipelineStatus(state);
  }

  /**
   * Never throws: a failed or malformed model answer falls back to the fixed order.
   */
  async decide(state: PipelineState): Promise<Decision> {
    const status = this.status(state);
    if (status === 'done') {
      // nothing left to plan, so the model is not asked
      return { todo: [], next: null, status, source: 'fallback' };
    }

    if (this.llm) {
      try {
        const todo = await this.askModel(this.llm, state);
        return { todo, next: todo[0].tool, status, source: 'llm' };
      } catch (error) {
        this.log.warn(
          { details: error instanceof Error ? error.message : String(error) },
          'LLM planning failed, using the fixed tool order'
        );
      }
    }

    const todo = fallbackTodo(state);
    return { todo, next: todo[0].tool, status, source: 'fallback' };
  }

  private async askModel(llm: CompletionClient, state: PipelineState): Promise<[ToDoEntry, ...ToDoEntry[]]> {
    const response = await llm.complete({
      systemPrompt: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildDecisionPrompt(state) }]
    });

    const validation = validateWith(DecisionResponseSchema, parseJsonResponse(response.content));
    if (!validation.isValid) {
      throw new Error(`Invalid planner answer: ${formatValidationErrors(validation.errors)}`);
    }

    const answer = validation.value;
    const tools = sanitizeTodo(answer.todo_list, state);
    this.log.debug({ planned: answer.todo_list, sanitized: tools }, 'Planner answer');

    const [first, ...rest] = tools.map(tool => ({ tool, rationale: rationaleFor(answer, tool) }));
    if (!first) {
      throw new Error('Planner left no tool to run');
    }
    return [first, ...rest];
  }
}

function rationaleFor(answer: DecisionResponse, tool: ToolName): string {
  const { rationale } = answer;
  if (typeof rationale === 'object') {
    const reason = rationale[tool];
    if (reason && reason.trim()) {
      return reason.trim();
    }
  } else if (typeof rationale === 'string' && rationale.trim()) {
    return rationale.trim();
  }
  return FALLBACK_RATIONALE[tool];
}

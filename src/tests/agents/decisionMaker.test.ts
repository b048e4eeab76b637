/**
 * Tests for the decision maker
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  DecisionMaker,
  DECISION_PREVIEW_LENGTH,
  buildDecisionPrompt,
  fallbackTodo,
  pipelineStatus,
  sanitizeTodo
} from '../../agents/decisionMaker';
import { PipelineState, TOOL_ORDER, ToolName, createPipelineState } from '../../types';
import { createLogCapture } from '../helpers/logCapture';
import { ScriptedCompletionClient } from '../helpers/fakes';

function stateWith(completed: ToolName[], currentText: string | null = null): PipelineState {
  const state = createPipelineState('output');
  for (const tool of completed) {
    state.completed.add(tool);
  }
  state.currentText = currentText;
  return state;
}

describe('pipelineStatus', () => {
  it('should follow the completed tool set', () => {
    expect(pipelineStatus(stateWith([]))).toBe('not_started');
    expect(pipelineStatus(stateWith(['run_input_processor']))).toBe('in_progress');
    expect(pipelineStatus(stateWith([...TOOL_ORDER]))).toBe('done');
  });
});

describe('sanitizeTodo', () => {
  it('should always yield the remaining tools in prerequisite order', () => {
    const entry = fc.oneof(
      fc.constantFrom<unknown>(...TOOL_ORDER),
      fc.string(),
      fc.integer(),
      fc.constant(null)
    );

    fc.assert(
      fc.property(fc.array(entry), fc.subarray([...TOOL_ORDER]), (planned, completed) => {
        const state = stateWith(completed);
        expect(sanitizeTodo(planned, state)).toEqual(TOOL_ORDER.filter(t => !completed.includes(t)));
      })
    );
  });
});

describe('DecisionMaker', () => {
  describe('without an LLM', () => {
    const decisionMaker = new DecisionMaker();

    it('should return the fixed order for a fresh run', async () => {
      const decision = await decisionMaker.decide(stateWith([]));

      expect(decision.status).toBe('not_started');
      expect(decision.source).toBe('fallback');
      expect(decision.next).toBe('run_input_processor');
      expect(decision.todo.map(e => e.tool)).toEqual([
        'run_input_processor',
        'run_text_modifier',
        'run_resume_generator'
      ]);
    });

    it('should skip completed tools', async () => {
      const decision = await decisionMaker.decide(stateWith(['run_input_processor']));

      expect(decision.status).toBe('in_progress');
      expect(decision.next).toBe('run_text_modifier');
      expect(decision.todo).toEqual([
        { tool: 'run_text_modifier', rationale: 'Rewrite the Markdown into polished resume content' },
        { tool: 'run_resume_generator', rationale: 'Render the polished Markdown into the requested formats' }
      ]);
    });

    it('should report done with nothing left', async () => {
      expect(await decisionMaker.decide(stateWith([...TOOL_ORDER]))).toEqual({
        todo: [],
        next: null,
        status: 'done',
        source: 'fallback'
      });
    });
  });

  describe('with an LLM', () => {
    it('should use a sanitized plan', async () => {
      const llm = new ScriptedCompletionClient([
        '```json\n{"todo_list": ["run_resume_generator", "bogus", "run_input_processor", "run_resume_generator"], ' +
          '"is_complete": false, "rationale": {"run_resume_generator": "render it"}}\n```'
      ]);

      const decision = await new DecisionMaker({ llm }).decide(stateWith([]));

      expect(decision.source).toBe('llm');
      expect(decision.next).toBe('run_input_processor');
      expect(decision.todo).toEqual([
        { tool: 'run_input_processor', rationale: 'Convert the input into normalized Markdown' },
        { tool: 'run_text_modifier', rationale: 'Rewrite the Markdown into polished resume content' },
        { tool: 'run_resume_generator', rationale: 'render it' }
      ]);
    });

    it('should drop tools that already ran', async () => {
      const llm = new ScriptedCompletionClient([
        '{"todo_list": ["run_input_processor", "run_text_modifier"], "rationale": "keep going"}'
      ]);

      const decision = await new DecisionMaker({ llm }).decide(stateWith(['run_input_processor'], 'Built tools'));

      expect(decision.todo).toEqual([
        { tool: 'run_text_modifier', rationale: 'keep going' },
        { tool: 'run_resume_generator', rationale: 'keep going' }
      ]);
    });

    it('should not stop early when the model claims completion', async () => {
      const llm = new ScriptedCompletionClient(['{"todo_list": [], "is_complete": true}']);

      const decision = await new DecisionMaker({ llm }).decide(stateWith(['run_input_processor']));

      expect(decision.next).toBe('run_text_modifier');
      expect(decision.status).toBe('in_progress');
    });

    it('should not call the model once every tool has run', async () => {
      const llm = new ScriptedCompletionClient([]);

      const decision = await new DecisionMaker({ llm }).decide(stateWith([...TOOL_ORDER]));

      expect(decision).toEqual({ todo: [], next: null, status: 'done', source: 'fallback' });
      expect(llm.requests).toEqual([]);
    });

    it('should fall back when the answer is not a plan', async () => {
      const capture = createLogCapture();
      const llm = new ScriptedCompletionClient(['{"todo_list": "run_text_modifier"}']);

      const decision = await new DecisionMaker({ llm, logger: capture.logger }).decide(stateWith([]));

      expect(decision.source).toBe('fallback');
      expect(decision.todo).toEqual(fallbackTodo(stateWith([])));
      expect(capture.messages('warn')).toEqual(['LLM planning failed, using the fixed tool order']);
    });

    it('should fall back when the call fails', async () => {
      const capture = createLogCapture();
      const llm = new ScriptedCompletionClient([new Error('connect ECONNREFUSED')]);

      const decision = await new DecisionMaker({ llm, logger: capture.logger }).decide(stateWith([]));

      expect(decision.source).toBe('fallback');
      expect(decision.next).toBe('run_input_processor');
      expect(capture.entries.find(e => e.level === 'warn')?.fields.details).toBe('connect ECONNREFUSED');
    });

    it('should send the state flags and a preview of the Markdown', async () => {
      const llm = new ScriptedCompletionClient(['{"todo_list": []}']);
      const longText = 'x'.repeat(DECISION_PREVIEW_LENGTH + 500);

      await new DecisionMaker({ llm }).decide(stateWith(['run_input_processor'], longText));

      const prompt = llm.requests[0].messages[0].content;
      expect(prompt).toContain(
        'STATE:\n{"has_markdown":true,"has_polished_markdown":false,"has_output":false}'
      );
      expect(prompt.endsWith(`CURRENT MARKDOWN:\n${'x'.repeat(DECISION_PREVIEW_LENGTH)}`)).toBe(true);
    });
  });
});

describe('buildDecisionPrompt', () => {
  it('should list every tool', () => {
    const prompt = buildDecisionPrompt(stateWith([]));

    for (const tool of TOOL_ORDER) {
      expect(prompt).toContain(`- ${tool}: `);
    }
    expect(prompt.endsWith('CURRENT MARKDOWN:\n(none yet)')).toBe(true);
  });
});

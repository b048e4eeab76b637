/**
 * Tests for the shared LLM client and prompt helpers
 *
 * No request leaves the process: only construction, argument checks and
 * response parsing are exercised.
 */

import { describe, it, expect } from 'vitest';
import {
  LLMClient,
  DEFAULT_LLM_CONFIG,
  buildStructuredPrompt,
  createLLMClientFromSettings,
  formatList,
  llmConfigFromSettings,
  parseJsonResponse,
  resolveApiBaseUrl,
  stripCodeFence,
  truncateText
} from '../shared/llm';
import { loadConfig } from '../shared/config';

describe('resolveApiBaseUrl', () => {
  it('should append /v1 to the DeepSeek host', () => {
    expect(resolveApiBaseUrl('https://api.deepseek.com')).toBe('https://api.deepseek.com/v1');
  });

  it('should keep an existing /v1 and drop trailing slashes', () => {
    expect(resolveApiBaseUrl('https://api.deepseek.com/v1/')).toBe('https://api.deepseek.com/v1');
    expect(resolveApiBaseUrl('http://localhost:8080//')).toBe('http://localhost:8080/v1');
  });
});

describe('LLM Client', () => {
  it('should require a user message', async () => {
    const client = new LLMClient({ apiKey: 'test-secret' });

    await expect(
      client.complete({ systemPrompt: 'system', messages: [{ role: 'assistant', content: 'hi' }] })
    ).rejects.toThrow('Request must include at least one user message');
  });

  it('should not be created without an API key', () => {
    expect(createLLMClientFromSettings(loadConfig({}).llm)).toBeNull();
  });

  it('should be created from configured settings', () => {
    const settings = loadConfig({ DEEPSEEK_API_KEY: 'test-secret', DEEPSEEK_TIMEOUT: '12' }).llm;
    const client = createLLMClientFromSettings(settings);

    expect(client).toBeInstanceOf(LLMClient);
  });

  it('should map environment settings onto the client config', () => {
    const settings = loadConfig({ DEEPSEEK_API_KEY: 'test-secret', DEEPSEEK_TIMEOUT: '12' }).llm;

    expect(llmConfigFromSettings(settings)).toEqual({
      ...DEFAULT_LLM_CONFIG,
      apiKey: 'test-secret',
      baseUrl: 'https://api.deepseek.com',
      model: 'deepseek-chat',
      temperature: 0.2,
      timeout: 12000
    });
  });
});

describe('parseJsonResponse', () => {
  it('should parse plain JSON', () => {
    expect(parseJsonResponse('{"todo_list": [], "is_complete": true}')).toEqual({
      todo_list: [],
      is_complete: true
    });
  });

  it('should strip a json code fence', () => {
    expect(parseJsonResponse('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should find an object inside prose', () => {
    expect(parseJsonResponse('Here is the plan: {"a": [1, 2]} Good luck.')).toEqual({ a: [1, 2] });
  });

  it('should repair small syntax slips', () => {
    expect(parseJsonResponse("{todo_list: ['run_text_modifier',], is_complete: false}")).toEqual({
      todo_list: ['run_text_modifier'],
      is_complete: false
    });
  });
});

describe('prompt helpers', () => {
  it('should build a numbered structured prompt', () => {
    expect(buildStructuredPrompt('Task.', ['First', 'Second'], 'JSON')).toBe(
      'Task.\n\nINSTRUCTIONS:\n1. First\n2. Second\n\nOUTPUT FORMAT:\nJSON'
    );
  });

  it('should omit empty sections', () => {
    expect(buildStructuredPrompt('Task.', [])).toBe('Task.');
  });

  it('should format lists', () => {
    expect(formatList(['a', 'b'])).toBe('- a\n- b');
    expect(formatList(['a', 'b'], true)).toBe('1. a\n2. b');
  });

  it('should truncate to the limit', () => {
    expect(truncateText('abcdef', 4)).toBe('abcd');
    expect(truncateText('abc', 4)).toBe('abc');
  });

  it('should strip a wrapping code fence only', () => {
    expect(stripCodeFence('```markdown\n# Jane\n- item\n```')).toBe('# Jane\n- item');
    expect(stripCodeFence('  - item  ')).toBe('- item');
  });
});

/**
 * LLM Client
 *
 * Minimal client for OpenAI-compatible chat completion endpoints
 * (DeepSeek by default). One request per call: failures are not retried.
 */

import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import type { Logger } from 'pino';
import {
  CompletionClient,
  DEFAULT_LLM_CONFIG,
  LLMConfig,
  LLMRequest,
  LLMResponse
} from './types';
import type { LLMSettings } from '../config';
import { loggers } from '../logger';

/**
 * The SDK appends `/chat/completions`; DeepSeek serves it under `/v1`.
 */
export function resolveApiBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

export class LLMClient implements CompletionClient {
  private config: LLMConfig;
  private client: OpenAI;
  private log: Logger;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    log: Logger = loggers.llm
  ) {
    this.config = {
      ...DEFAULT_LLM_CONFIG,
      ...config
    };
    this.log = log;

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: resolveApiBaseUrl(this.config.baseUrl),
      timeout: this.config.timeout,
      maxRetries: 0
    });
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model;

    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const start = Date.now();
    this.log.debug(
      { model, temperature, maxTokens, messages: messages.length },
      'LLM request start'
    );

    const response = await this.client.chat.completions.create({
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in LLM response');
    }

    const result: LLMResponse = {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };

    this.log.debug(
      {
        model: result.model,
        finish: result.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: result.usage
      },
      'LLM request end'
    );

    return result;
  }
}

/**
 * Parse a JSON object out of an LLM answer, tolerating code fences,
 * surrounding prose and small syntax slips.
 */
export function parseJsonResponse(text: string): unknown {
  let cleanText = text.trim();
  cleanText = cleanText.replace(/^```json\s*/i, '');
  cleanText = cleanText.replace(/^```\s*/, '');
  cleanText = cleanText.replace(/\s*```$/, '');

  try {
    return JSON.parse(cleanText.trim());
  } catch (error) {
    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    const candidate = firstBrace !== -1 && lastBrace > firstBrace
      ? text.substring(firstBrace, lastBrace + 1)
      : cleanText;

    try {
      return JSON.parse(candidate);
    } catch {
      // fall through to repair
    }

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      const errorMsg = error instanceof Error ? error.message : 'Unknown error';
      const preview = text.substring(0, 200);
      throw new Error(`Failed to parse LLM response as JSON: ${errorMsg}\nResponse preview: ${preview}`);
    }
  }
}

/**
 * Client configuration for the environment's LLM settings
 */
export function llmConfigFromSettings(settings: LLMSettings): LLMConfig {
  return {
    ...DEFAULT_LLM_CONFIG,
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    model: settings.model,
    temperature: settings.temperature,
    timeout: settings.timeoutMs
  };
}

/**
 * Create an LLM client from configuration, or null when no API key is set
 */
export function createLLMClientFromSettings(
  settings: LLMSettings,
  log: Logger = loggers.llm
): LLMClient | null {
  if (!settings.hasApiKey) {
    return null;
  }
  return new LLMClient(llmConfigFromSettings(settings), log);
}

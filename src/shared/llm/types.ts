/**
 * LLM Types
 *
 * Type definitions for LLM configuration and responses.
 * Targets OpenAI-compatible chat completion endpoints (DeepSeek by default).
 */

/**
 * LLM configuration
 */
export interface LLMConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
}

/**
 * Default configuration
 */
export const DEFAULT_LLM_CONFIG: Omit<LLMConfig, 'apiKey'> = {
  baseUrl: 'https://api.deepseek.com',
  model: 'deepseek-chat',
  temperature: 0.2,
  maxTokens: 4096,
  timeout: 30000
};

/**
 * Message role for chat-based LLM interactions
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Message structure for LLM interactions
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string;
}

/**
 * LLM response structure
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

/**
 * Anything that can answer a completion request. The decision maker and the
 * text modifier depend on this rather than on the HTTP client.
 */
export interface CompletionClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

/**
 * Shared Infrastructure
 *
 * Modules:
 * - config: Typed environment configuration
 * - logger: pino logger and component loggers
 * - llm: OpenAI-compatible LLM client
 * - validation: Zod schemas and helpers
 * - errors: Error types and handling
 */

export * from './config';
export * from './logger';
export * from './llm';
export * from './validation';
export * from './errors';

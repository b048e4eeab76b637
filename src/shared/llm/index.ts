/**
 * LLM Module
 *
 * OpenAI-compatible LLM client and prompt utilities.
 */

export * from './types';
export * from './client';
export * from './prompts';

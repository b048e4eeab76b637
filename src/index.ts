/**
 * resume-agent
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types';
export * from './shared';
export * from './tools';
export * from './agents';
export { runCli, buildProgram, createOrchestrator } from './cli';
export type { CliDependencies } from './cli';

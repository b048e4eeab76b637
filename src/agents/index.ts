/**
 * Agents Module Exports
 */

export * from './decisionMaker';
export * from './maturity';
export * from './orchestrator';

/**
 * Errors Module
 *
 * Standardized error types and handling utilities.
 */

export * from './handler';
export * from './types';

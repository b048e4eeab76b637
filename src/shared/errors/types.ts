/**
 * Error Types
 *
 * Type definitions for error codes and error structures.
 */

/**
 * Error categories for the kinds of failure a pipeline run can hit
 */
export enum ErrorCategory {
  /** Missing, unsupported or unreadable input. Fatal. */
  INPUT = 'INPUT',
  /** An optional library or external tool is unavailable. Degrades output. */
  DEPENDENCY = 'DEPENDENCY',
  /** The language model call failed or returned unusable content */
  LLM = 'LLM',
  RENDERING = 'RENDERING',
  CONFIGURATION = 'CONFIGURATION',
  VALIDATION = 'VALIDATION',
  UNEXPECTED = 'UNEXPECTED'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage, info.cause === undefined ? undefined : { cause: info.cause });
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }
}

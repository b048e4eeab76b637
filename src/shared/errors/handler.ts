/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management.
 */

import type { Logger } from 'pino';
import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { loggers, serializeError } from '../logger';

type ErrorContext = Record<string, unknown>;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler class for managing errors throughout the pipeline
 */
export class ErrorHandler {
  /**
   * Create an input error. Input errors stop the pipeline.
   */
  static createInputError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext,
    cause?: unknown
  ): AppError {
    return new AppError({
      category: ErrorCategory.INPUT,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: this.getInputErrorSuggestion(technicalDetails),
      cause
    });
  }

  /**
   * Create a missing-dependency error (optional library or external binary)
   */
  static createDependencyError(
    dependency: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.DEPENDENCY,
      severity: ErrorSeverity.LOW,
      userMessage: `${dependency} is not available`,
      technicalDetails,
      timestamp: new Date(),
      context: { dependency, ...context },
      recoverable: true,
      suggestedAction: `Install ${dependency} to enable this output.`
    });
  }

  /**
   * Create an LLM error
   */
  static createLLMError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext,
    cause?: unknown
  ): AppError {
    return new AppError({
      category: ErrorCategory.LLM,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check DEEPSEEK_API_KEY and DEEPSEEK_BASE_URL, or unset the key to run offline.',
      cause
    });
  }

  static createRenderingError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext,
    cause?: unknown
  ): AppError {
    return new AppError({
      category: ErrorCategory.RENDERING,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check that the output directory is writable.',
      cause
    });
  }

  static createConfigurationError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Fix the value in your .env file or environment.'
    });
  }

  /**
   * Create a validation error
   */
  static createValidationError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Run with --help to see the accepted options.'
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: describe(error),
      timestamp: new Date(),
      context,
      recoverable: false,
      cause: error
    });
  }

  /**
   * Pass AppErrors through; wrap anything else as unexpected
   */
  static toAppError(error: unknown, context?: ErrorContext): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return this.createUnexpectedError(error, context);
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error, log: Logger = loggers.errors): void {
    if (error instanceof AppError) {
      log.error(
        {
          category: error.category,
          severity: error.severity,
          details: error.technicalDetails,
          context: error.context,
          recoverable: error.recoverable
        },
        error.userMessage
      );
      return;
    }
    log.error({ err: serializeError(error) }, error.message);
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.technicalDetails && error.technicalDetails !== error.userMessage) {
        message += `: ${error.technicalDetails}`;
      }
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Get suggested action for input errors
   */
  private static getInputErrorSuggestion(technicalDetails: string): string {
    if (technicalDetails.includes('format')) {
      return 'Please provide a .txt, .md, .pdf or .docx file.';
    }
    if (technicalDetails.includes('not found')) {
      return 'Please check the --input path and try again.';
    }
    if (technicalDetails.includes('empty')) {
      return 'The input contains no text. Please provide resume content.';
    }
    if (technicalDetails.includes('corrupted') || technicalDetails.includes('read')) {
      return 'The file may be corrupted. Please try a different file or pass the content with --text.';
    }
    return 'Please check the input and try again.';
  }
}

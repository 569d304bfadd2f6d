/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code?: string;
  isOperational: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(
  error: unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    // Operational errors - log as warn
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      // Programming errors - log as error
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return { handled: true, message: err.message, code: err.code, isOperational: err.isOperational };
  }

  // Unknown errors - log as error
  logger.error('Unknown error occurred', err, context);

  return { handled: true, message: err.message, isOperational: false };
}

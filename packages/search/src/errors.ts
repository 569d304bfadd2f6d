/**
 * Search Error Classes
 *
 * Errors raised by the search core. Configuration problems reuse
 * ConfigurationError from @tunekit/utils.
 */

import { AppError } from '@tunekit/utils';

/**
 * Coordinate/dimension arity or shape mismatch (programmer error)
 */
export class DimensionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DIMENSION_ERROR', context, false);
  }
}

/**
 * A global min bound exceeds its paired max
 */
export class BoundsError extends AppError {
  constructor(bound: string, min: number, max: number) {
    super(`${bound}: min (${min}) exceeds max (${max})`, 'BOUNDS_ERROR', { bound, min, max }, false);
  }
}

/**
 * One variant name would map to two distinct payloads
 */
export class NamingCollisionError extends AppError {
  constructor(variantName: string, context?: Record<string, unknown>) {
    super(
      `Variant name '${variantName}' is already assigned to a different configuration`,
      'NAMING_COLLISION',
      { variantName, ...context },
      false
    );
  }
}

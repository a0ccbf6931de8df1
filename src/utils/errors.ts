/**
 * Resolver Error Handling
 *
 * FAIL FAST: every failure is terminal for the run. Errors carry a category
 * so the entry point can report them uniformly and exit non-zero.
 *
 * @module utils/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for resolver failures
 */
export type ErrorCategory =
  // Input errors
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'

  // Data source errors
  | 'CONNECTION_ERROR'
  | 'LOAD_ERROR'
  | 'QUERY_ERROR'

  // Hierarchy errors
  | 'CYCLE_ERROR'

  // Selection errors
  | 'NO_SELECTION'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * ResolverError - Structured base class for all resolver failures
 */
export class ResolverError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ResolverError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): ResolverError {
    if (error instanceof ResolverError) {
      return error;
    }

    if (error instanceof Error) {
      return new ResolverError(defaultCategory, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new ResolverError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SPECIFIC ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The data source could not be opened or did not answer the ping.
 */
export class ConnectionError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONNECTION_ERROR', message, details);
    this.name = 'ConnectionError';
  }
}

/**
 * A startup relation (pages or domains) could not be read or decoded.
 * No partial index is ever built after one of these.
 */
export class LoadError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('LOAD_ERROR', message, details);
    this.name = 'LoadError';
  }
}

export class QueryError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('QUERY_ERROR', message, details);
    this.name = 'QueryError';
  }
}

/**
 * Parent pointers loop back on themselves.
 */
export class CycleError extends ResolverError {
  public readonly path: readonly number[];

  constructor(startId: number, path: readonly number[]) {
    super('CYCLE_ERROR', `Parent chain of page ${startId} forms a cycle: ${path.join(' -> ')}`, {
      startId,
      path: [...path],
    });
    this.name = 'CycleError';
    this.path = path;
  }
}

export class NoSelectionError extends ResolverError {
  constructor(message = 'No page ids selected', details?: Record<string, unknown>) {
    super('NO_SELECTION', message, details);
    this.name = 'NoSelectionError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR MESSAGE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stringify an unknown caught value for log lines
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error for stderr. Details are included only when verbose.
 */
export function formatErrorMessage(error: ResolverError, verbose = false): string {
  const head = `Error [${error.category}]: ${error.message}`;
  if (!verbose || !error.details) {
    return head;
  }
  const { stack: _stack, ...rest } = error.details;
  if (Object.keys(rest).length === 0) {
    return head;
  }
  return `${head}\n${JSON.stringify(rest, null, 2)}`;
}

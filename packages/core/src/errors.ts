/**
 * Error Taxonomy
 *
 * Standard error types for workflow invocations.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error maps to a CLI exit code
 * - Capability and structured-output failures are fatal for the
 *   invocation and reach the caller unmodified
 * - Configuration errors are setup defects and are never swallowed
 *
 * @module @docqa/core/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard docqa error codes
 */
export type DocqaErrorCode =
  | 'CAPABILITY_ERROR'
  | 'STRUCTURED_OUTPUT_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNHANDLED_ERROR';

/**
 * Capability a failure originated from
 */
export type CapabilityName = 'retriever' | 'generator' | 'web_search';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Docqa error options
 */
export interface DocqaErrorOptions {
  /** Error code */
  code: DocqaErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base docqa error class
 */
export class DocqaError extends Error {
  readonly code: DocqaErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: DocqaErrorOptions) {
    super(message);
    this.name = 'DocqaError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * A retriever, generator or web search call failed
 */
export class CapabilityError extends DocqaError {
  readonly capability: CapabilityName;

  constructor(
    capability: CapabilityName,
    message: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'CAPABILITY_ERROR',
      cause: options?.cause,
      context: { capability, ...options?.context },
    });
    this.name = 'CapabilityError';
    this.capability = capability;
  }
}

/**
 * A structured generator response did not match its schema
 */
export class StructuredOutputError extends DocqaError {
  readonly issues: string[];
  readonly raw?: string;

  constructor(
    message: string,
    options?: {
      issues?: string[];
      raw?: string;
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'STRUCTURED_OUTPUT_ERROR',
      cause: options?.cause,
      context: options?.context,
    });
    this.name = 'StructuredOutputError';
    this.issues = options?.issues ?? [];
    this.raw = options?.raw;
  }
}

/**
 * Invalid graph or workflow setup (unknown node, unregistered route label, ...)
 */
export class ConfigurationError extends DocqaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'CONFIGURATION_ERROR', context });
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller input failed validation
 */
export class ValidationError extends DocqaError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      context: options?.context,
    });
    this.name = 'ValidationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Type guard for docqa errors
 */
export function isDocqaError(error: unknown): error is DocqaError {
  return error instanceof DocqaError;
}

/**
 * Wrap a provider failure as a CapabilityError.
 *
 * Docqa errors raised inside a provider (a StructuredOutputError from a
 * decode step, for instance) pass through untouched.
 */
export function wrapCapabilityError(
  capability: CapabilityName,
  error: unknown,
  context?: Record<string, unknown>
): DocqaError {
  if (error instanceof DocqaError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CapabilityError(capability, `${capability} call failed: ${message}`, {
    cause: error instanceof Error ? error : undefined,
    context,
  });
}

/**
 * Map error to CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof DocqaError)) {
    return 1;
  }

  switch (error.code) {
    case 'VALIDATION_ERROR':
      return 20;
    case 'CAPABILITY_ERROR':
      return 40;
    case 'CONFIGURATION_ERROR':
      return 41;
    case 'STRUCTURED_OUTPUT_ERROR':
      return 42;
    default:
      return 1;
  }
}

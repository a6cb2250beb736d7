/**
 * CollabError - structured error with a wire-stable code
 */

import { type ErrorCategory, type ErrorCode, getErrorCategory, getErrorInfo } from './error-codes.js';

/**
 * Options for creating a CollabError
 */
export interface CollabErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a CollabError
 */
export interface SerializedCollabError {
  name: string;
  code: ErrorCode;
  message: string;
  suggestion: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  cause?: { name: string; message: string };
}

/**
 * Error raised anywhere in the collaboration core.
 *
 * Validation failures are normally returned as results rather than thrown;
 * this class is what travels through `catch` blocks and what
 * {@link CollabError.toWire} turns into a client-facing error envelope.
 *
 * @example
 * ```typescript
 * throw new CollabError({
 *   code: 'STORE_TIMEOUT',
 *   context: { operation: 'publish', timeoutMs: 2000 },
 * });
 *
 * if (CollabError.isCode(error, 'STORE_TIMEOUT')) {
 *   health.markDegraded();
 * }
 * ```
 */
export class CollabError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: CollabErrorOptions) {
    const info = getErrorInfo(options.code);
    super(options.message ?? info.message, { cause: options.cause });

    this.name = 'CollabError';
    this.code = options.code;
    this.suggestion = info.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CollabError);
    }
  }

  /**
   * Wrap an existing error with a CollabError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): CollabError {
    return new CollabError({ code, message: error.message, context, cause: error });
  }

  static isCollabError(error: unknown): error is CollabError {
    return error instanceof CollabError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return CollabError.isCollabError(error) && error.code === code;
  }

  /**
   * The `{ code, message }` pair sent to clients. Internal errors never
   * leak their message.
   */
  toWire(): { code: ErrorCode; message: string } {
    if (this.category === 'internal') {
      return { code: this.code, message: getErrorInfo(this.code).message };
    }
    return { code: this.code, message: this.message };
  }

  toJSON(): SerializedCollabError {
    const result: SerializedCollabError = {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      category: this.category,
      context: this.context,
    };

    if (this.cause) {
      result.cause = { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Helper function to ensure errors are CollabErrors
 */
export function ensureCollabError(error: unknown, defaultCode: ErrorCode = 'INTERNAL_ERROR'): CollabError {
  if (CollabError.isCollabError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return CollabError.wrap(error, defaultCode);
  }

  return new CollabError({ code: defaultCode, message: String(error) });
}

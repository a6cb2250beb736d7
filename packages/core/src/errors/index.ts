/**
 * Tessera Error System
 *
 * @example
 * ```typescript
 * import { CollabError } from '@tessera/core';
 *
 * try {
 *   await coordinator.broadcast(roomId, event);
 * } catch (error) {
 *   if (CollabError.isCode(error, 'STORE_TIMEOUT')) {
 *     log.warn('Backplane degraded', { roomId });
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  isErrorCode,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CollabError,
  ensureCollabError,
  type CollabErrorOptions,
  type SerializedCollabError,
} from './collab-error.js';

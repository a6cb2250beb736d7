/**
 * @tessera/core - shared vocabulary of the collaboration core
 *
 * Canonical commands and events, wire-independent server messages, the
 * error taxonomy, the structured logger and the collaborator interfaces
 * the other packages depend on.
 *
 * @packageDocumentation
 */

export * from './async.js';
export * from './commands.js';
export * from './errors/index.js';
export * from './events.js';
export * from './ids.js';
export * from './messages.js';
export * from './schemas.js';
export * from './observability/index.js';
export * from './types.js';

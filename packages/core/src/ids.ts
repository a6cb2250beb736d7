/**
 * Identifier helpers
 */

import { randomUUID } from 'node:crypto';

/** Generate a unique identifier */
export function generateId(): string {
  return randomUUID();
}

/** Generate a connection id. Connection ids are never reused. */
export function generateConnectionId(): string {
  return `c_${randomUUID().replace(/-/g, '')}`;
}

/** Generate an id for one server process in a cluster */
export function generateInstanceId(): string {
  return `i_${randomUUID().slice(0, 8)}`;
}

/**
 * @fileoverview Session types
 */

import type { BootstrapError } from '../errors/index.js';

/**
 * A validated credential bound to one organization. Immutable once bootstrap
 * returns it; every conversation operation requires one.
 */
export interface Session {
  readonly credential: string;
  readonly organizationId: string;
}

export interface Organization {
  uuid: string;
  [key: string]: unknown;
}

export type BootstrapResult =
  | { ok: true; session: Session }
  | { ok: false; error: BootstrapError };

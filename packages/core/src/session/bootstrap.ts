/**
 * @fileoverview Session bootstrap
 *
 * Exchanges a session key for a Session: validate the key, list the
 * account's organizations, and bind the session to the first one.
 * Two reads, no retries, no side effects.
 */

import {
  AuthFailureError,
  ConnectionFailureError,
  CredentialMissingError,
  EmptyOrganizationListError,
  HttpStatusError,
  ResponseFormatError,
  toError,
  type BootstrapError,
} from '../errors/index.js';
import type { Logger } from '../logging/types.js';
import type { SessionApi } from '../api/title-api.js';
import type { BootstrapResult, Organization, Session } from './types.js';

export interface BootstrapOptions {
  logger: Logger;
}

/**
 * Validate a credential and resolve its organization.
 *
 * Never throws; every failure comes back as `{ ok: false, error }` and the
 * caller must not start handling requests.
 */
export async function bootstrapSession(
  api: SessionApi,
  credential: string,
  options: BootstrapOptions
): Promise<BootstrapResult> {
  const { logger } = options;
  const key = credential.trim();

  if (!key) {
    return fail(logger, new CredentialMissingError());
  }

  logger.info('Validating session');
  try {
    await logger.timed('Session validation', () => api.validateSession(key));
  } catch (error) {
    return fail(logger, classify(error, 'validate'));
  }

  logger.info('Fetching organizations');
  let organizations: Organization[];
  try {
    organizations = await logger.timed('Organization listing', () => api.listOrganizations(key));
  } catch (error) {
    return fail(logger, classify(error, 'organizations'));
  }

  if (organizations.length === 0) {
    return fail(logger, new EmptyOrganizationListError());
  }

  // Single-tenant: the first organization listed is the active one
  const session: Session = Object.freeze({ credential: key, organizationId: organizations[0].uuid });
  logger.info('Session ready', {
    organizationId: session.organizationId,
    organizationCount: organizations.length,
  });
  return { ok: true, session };
}

/**
 * 401/403 mean the key was refused; anything else is a connection problem
 */
function classify(error: unknown, stage: 'validate' | 'organizations'): BootstrapError {
  if (error instanceof HttpStatusError && error.isAuthRejection) {
    return new AuthFailureError(error.status, error);
  }

  const err = toError(error);
  if (error instanceof ResponseFormatError) {
    return new ConnectionFailureError(`Unexpected response while ${describeStage(stage)}`, {
      stage,
      code: error.code,
      cause: err,
    });
  }
  return new ConnectionFailureError(`Connection failed while ${describeStage(stage)}: ${err.message}`, {
    stage,
    cause: err,
  });
}

function describeStage(stage: 'validate' | 'organizations'): string {
  return stage === 'validate' ? 'validating the session' : 'listing organizations';
}

function fail(logger: Logger, error: BootstrapError): BootstrapResult {
  logger.error('Bootstrap failed', error.toStructuredLog());
  return { ok: false, error };
}

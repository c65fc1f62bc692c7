import { FatalError } from '../orchestration/errors';

const AUTH_ERRORS = ['ExpiredToken', 'ExpiredTokenException', 'InvalidClientTokenId', 'UnrecognizedClientException'];

export function hasErrorName(error: unknown, ...names: string[]): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return typeof error.name === 'string' && names.includes(error.name);
}

/**
 * Re-raises credential failures as FatalError so pollers stop instead of
 * retrying with the same expired token.
 */
export function rethrowAuthErrors(error: unknown): never {
  if (hasErrorName(error, ...AUTH_ERRORS)) {
    const message = error instanceof Error ? error.message : 'AWS rejected the credentials';
    throw new FatalError(message, {
      cause: error,
      remediation: 'Refresh your AWS credentials or re-run the assume-admin-role stage'
    });
  }
  throw error;
}

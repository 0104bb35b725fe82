// Authentication error taxonomy

import {
  AggregateAuthenticationError,
  AuthenticationError,
  CredentialUnavailableError,
} from '@azure/identity';

export type AuthErrorReason =
  | 'NotLoggedIn'
  | 'InvalidCredentials'
  | 'NetworkFailure'
  | 'NoInteractiveSession'
  | 'ManualTokenInvalid';

/**
 * Raised by the session core whenever no usable bearer token can be produced.
 * These reach the CLI boundary unmodified; nothing in the core retries them.
 */
export class AuthError extends Error {
  constructor(
    public readonly reason: AuthErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Translate an @azure/identity failure into an AuthError.
 *
 * @param unavailableReason - reason used when the credential reports it cannot run at all
 *   (no ambient session, missing configuration)
 */
export function fromIdentityError(
  error: unknown,
  unavailableReason: AuthErrorReason,
  context: string
): AuthError {
  if (error instanceof AuthError) {
    return error;
  }

  if (error instanceof AuthenticationError) {
    const detail = error.errorResponse.errorDescription || error.errorResponse.error || error.message;
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return new AuthError('InvalidCredentials', `${context}: identity endpoint rejected the credentials (${error.statusCode}): ${detail}`, { cause: error });
    }
    return new AuthError('NetworkFailure', `${context}: identity endpoint returned ${error.statusCode}: ${detail}`, { cause: error });
  }

  if (error instanceof CredentialUnavailableError || error instanceof AggregateAuthenticationError) {
    return new AuthError(unavailableReason, `${context}: ${error.message}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AuthError('NetworkFailure', `${context}: ${message}`, { cause: error });
}

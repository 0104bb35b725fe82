import { DefaultAzureCredential } from '@azure/identity';
import type { AccessToken, TokenCredential } from '@azure/identity';
import { scopeFor } from '../audiences.js';
import type { Audience } from '../audiences.js';
import { AuthError, fromIdentityError } from '../errors.js';
import type { AcquireOptions, IssuedCredential, LoginSource } from '../types.js';
import { log } from '../../utils/logger.js';

export type AmbientCredentialFactory = () => TokenCredential;

// Azure CLI, azd, PowerShell, managed identity and environment credentials, in that chain's order
export const createAmbientCredential: AmbientCredentialFactory = () => new DefaultAzureCredential();

/**
 * Reuses an identity the machine already has (`az login` and friends).
 * Holds no secrets of its own.
 */
export class InteractiveSource implements LoginSource {
  readonly kind = 'interactive' as const;
  private credential: TokenCredential | null = null;

  constructor(private readonly credentialFactory: AmbientCredentialFactory = createAmbientCredential) {}

  async acquire(audience: Audience, options: AcquireOptions = {}): Promise<IssuedCredential> {
    // A fresh chain starts without the in-memory tokens of the previous one
    if (options.forceRefresh || !this.credential) {
      this.credential = this.credentialFactory();
    }
    log.debug(`Requesting token from ambient session (scope ${scopeFor(audience)})`);

    let accessToken: AccessToken | null;
    try {
      accessToken = await this.credential.getToken(scopeFor(audience));
    } catch (error) {
      throw fromIdentityError(error, 'NoInteractiveSession', 'No usable local session');
    }

    if (!accessToken) {
      throw new AuthError('NoInteractiveSession', 'No usable local session: run `az login` first');
    }

    return {
      kind: 'interactive',
      token: accessToken.token,
      expiresAt: accessToken.expiresOnTimestamp,
    };
  }
}

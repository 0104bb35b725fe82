import { ClientSecretCredential } from '@azure/identity';
import type { AccessToken, TokenCredential } from '@azure/identity';
import { z } from 'zod';
import { scopeFor } from '../audiences.js';
import type { Audience } from '../audiences.js';
import { AuthError, fromIdentityError } from '../errors.js';
import type { AcquireOptions, IssuedCredential, LoginSource, ServicePrincipalConfig } from '../types.js';
import { log } from '../../utils/logger.js';

export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';

export const servicePrincipalConfigSchema = z.object({
  clientId: z.string().trim().min(1, 'client id is required'),
  clientSecret: z.string().min(1, 'client secret is required'),
  tenantId: z.string().trim().min(1, 'tenant id is required'),
});

export type ServicePrincipalCredentialFactory = (
  config: Readonly<ServicePrincipalConfig>,
  authorityHost: string
) => TokenCredential;

export const createClientSecretCredential: ServicePrincipalCredentialFactory = (config, authorityHost) =>
  new ClientSecretCredential(config.tenantId, config.clientId, config.clientSecret, { authorityHost });

export interface ServicePrincipalSourceOptions {
  authorityHost?: string;
  credentialFactory?: ServicePrincipalCredentialFactory;
}

/**
 * Client-credential flow for an app registration (client id + secret + tenant).
 */
export class ServicePrincipalSource implements LoginSource {
  readonly kind = 'servicePrincipal' as const;
  readonly config: Readonly<ServicePrincipalConfig>;
  private readonly createCredential: () => TokenCredential;
  private credential: TokenCredential;

  constructor(config: ServicePrincipalConfig, options: ServicePrincipalSourceOptions = {}) {
    const parsed = servicePrincipalConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join(', ');
      throw new AuthError('InvalidCredentials', `Invalid service principal configuration: ${issues}`);
    }

    this.config = Object.freeze({ ...parsed.data });
    const factory = options.credentialFactory ?? createClientSecretCredential;
    const authorityHost = options.authorityHost ?? DEFAULT_AUTHORITY_HOST;
    this.createCredential = () => factory(this.config, authorityHost);
    this.credential = this.createCredential();
  }

  /**
   * A forced refresh replaces the credential: ClientSecretCredential serves
   * tokens from its own MSAL cache until they expire, even one the API rejected.
   */
  async acquire(audience: Audience, options: AcquireOptions = {}): Promise<IssuedCredential> {
    const scope = scopeFor(audience);
    if (options.forceRefresh) {
      this.credential = this.createCredential();
    }
    log.debug(`Requesting service principal token for ${this.config.clientId} (scope ${scope})`);

    let accessToken: AccessToken | null;
    try {
      accessToken = await this.credential.getToken(scope);
    } catch (error) {
      throw fromIdentityError(error, 'InvalidCredentials', 'Service principal login failed');
    }

    if (!accessToken) {
      throw new AuthError('NetworkFailure', 'Service principal login failed: identity endpoint returned no token');
    }

    return {
      kind: 'servicePrincipal',
      token: accessToken.token,
      expiresAt: accessToken.expiresOnTimestamp,
    };
  }
}

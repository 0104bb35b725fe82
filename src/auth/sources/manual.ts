import { AuthError } from '../errors.js';
import type { CredentialSource, ManualCredential } from '../types.js';

export const MANUAL_TOKEN_ENV_VAR = 'POWER_BI_ACCESS_TOKEN';

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Bearer token supplied through the environment. When present it overrides
 * every logged-in source, for every audience.
 */
export class ManualTokenSource implements CredentialSource {
  readonly kind = 'manual' as const;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    readonly variable: string = MANUAL_TOKEN_ENV_VAR
  ) {}

  /** True when the variable is set to a non-empty string, even one `acquire` will reject. */
  isPresent(): boolean {
    const value = this.env[this.variable];
    return value !== undefined && value !== '';
  }

  async acquire(): Promise<ManualCredential> {
    const raw = this.env[this.variable] ?? '';
    const token = raw.trim().replace(BEARER_PREFIX, '');

    if (token === '') {
      throw new AuthError('ManualTokenInvalid', `${this.variable} is set but empty`);
    }
    if (/\s/.test(token)) {
      throw new AuthError('ManualTokenInvalid', `${this.variable} does not look like a bearer token (contains whitespace)`);
    }

    return { kind: 'manual', token, expiresAt: null };
  }
}

// Authentication type definitions

import type { Audience } from './audiences.js';

export type CredentialKind = 'manual' | 'servicePrincipal' | 'interactive';

/** Sources a `login` command can make active. The manual override is never logged in. */
export type LoginKind = Exclude<CredentialKind, 'manual'>;

export interface ManualCredential {
  kind: 'manual';
  token: string;
  /** Manual tokens are used as-is; their expiry is never known to the CLI. */
  expiresAt: null;
}

export interface IssuedCredential {
  kind: LoginKind;
  token: string;
  /** Epoch milliseconds, or null when the issuer did not say. */
  expiresAt: number | null;
}

export type Credential = ManualCredential | IssuedCredential;

export interface ServicePrincipalConfig {
  clientId: string;
  clientSecret: string;
  tenantId: string;
}

export interface CredentialSource {
  readonly kind: CredentialKind;
  acquire(audience: Audience): Promise<Credential>;
}

export interface AcquireOptions {
  /** Skip every cached token and go back to the identity endpoint */
  forceRefresh?: boolean;
}

/** A source a login can make active; it always issues refreshable credentials. */
export interface LoginSource extends CredentialSource {
  readonly kind: LoginKind;
  acquire(audience: Audience, options?: AcquireOptions): Promise<IssuedCredential>;
}

export type LoginParams =
  | { kind: 'servicePrincipal'; config: ServicePrincipalConfig }
  | { kind: 'interactive' };

export type SessionState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; sourceKind: LoginKind }
  | { status: 'expired'; sourceKind: LoginKind };

/**
 * Durable form of a session. Contains the service principal secret when one
 * is logged in, so it is written with owner-only permissions.
 */
export interface PersistedSession {
  version: 1;
  sourceKind: LoginKind;
  servicePrincipal?: ServicePrincipalConfig;
  credentials: Partial<Record<Audience, IssuedCredential>>;
}

export interface SessionSummary {
  state: SessionState;
  manualOverride: boolean;
  credentials: Partial<Record<Audience, { expiresAt: number | null; expired: boolean }>>;
}

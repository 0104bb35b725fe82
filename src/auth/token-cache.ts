// In-memory credential cache with an optional persistence hook

import type { Credential } from './types.js';

/** Lead time before `expiresAt` at which a credential already counts as expired. */
export const EXPIRY_SAFETY_MARGIN_MS = 60_000;

export interface TokenCachePersistence {
  save(credential: Credential | null): Promise<void>;
}

export class TokenCache {
  private credential: Credential | null = null;

  constructor(
    private readonly persistence?: TokenCachePersistence,
    private readonly safetyMarginMs: number = EXPIRY_SAFETY_MARGIN_MS
  ) {}

  async store(credential: Credential): Promise<void> {
    this.credential = credential;
    await this.persistence?.save(credential);
  }

  /**
   * Seed the cache from its durable form without writing it back.
   */
  hydrate(credential: Credential): void {
    this.credential = credential;
  }

  get(): Credential | null {
    return this.credential;
  }

  /**
   * An empty cache is expired. A credential with unknown expiry never is.
   */
  isExpired(now: number = Date.now()): boolean {
    if (!this.credential) {
      return true;
    }
    if (this.credential.expiresAt === null) {
      return false;
    }
    return now >= this.credential.expiresAt - this.safetyMarginMs;
  }

  async clear(): Promise<void> {
    this.credential = null;
    await this.persistence?.save(null);
  }
}

// Session manager - decides which credential serves each request

import { AUDIENCES, DEFAULT_AUDIENCE } from './audiences.js';
import type { Audience } from './audiences.js';
import { AuthError } from './errors.js';
import type { SessionStore } from './session-store.js';
import { createSourceFactory, ManualTokenSource, ServicePrincipalSource } from './sources/index.js';
import type { SourceFactory } from './sources/index.js';
import { EXPIRY_SAFETY_MARGIN_MS, TokenCache } from './token-cache.js';
import type {
  Credential,
  IssuedCredential,
  LoginKind,
  LoginParams,
  LoginSource,
  PersistedSession,
  SessionState,
  SessionSummary,
} from './types.js';
import { log, maskToken } from '../utils/logger.js';

export interface SessionManagerOptions {
  /** Where the manual override is read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  manualTokenEnvVar?: string;
  /** Durable backing; without one the session lives and dies with the process */
  store?: SessionStore;
  sourceFactory?: SourceFactory;
  now?: () => number;
  safetyMarginMs?: number;
}

/**
 * Single owner of the session state.
 *
 * Precedence, checked in this order on every `getBearerToken` call:
 * 1. a manual token in the environment wins over everything, including a fresh login;
 * 2. otherwise the most recently completed login is used, refreshed when its token expires;
 * 3. otherwise the caller is not logged in.
 *
 * There is never an automatic switch from one identity to another.
 * Refreshes are single-flight per audience, so concurrent callers share one exchange.
 */
export class SessionManager {
  private state: SessionState = { status: 'unauthenticated' };
  private activeSource: LoginSource | null = null;
  private caches = new Map<Audience, TokenCache>();
  private inflight = new Map<Audience, Promise<Credential>>();
  private restoration: Promise<void> | null = null;

  private readonly manualSource: ManualTokenSource;
  private readonly store?: SessionStore;
  private readonly sourceFactory: SourceFactory;
  private readonly now: () => number;
  private readonly safetyMarginMs: number;

  constructor(options: SessionManagerOptions = {}) {
    this.manualSource = new ManualTokenSource(options.env ?? process.env, options.manualTokenEnvVar);
    this.store = options.store;
    this.sourceFactory = options.sourceFactory ?? createSourceFactory();
    this.now = options.now ?? Date.now;
    this.safetyMarginMs = options.safetyMarginMs ?? EXPIRY_SAFETY_MARGIN_MS;
  }

  getState(): SessionState {
    return this.state;
  }

  isManualOverrideActive(): boolean {
    return this.manualSource.isPresent();
  }

  /**
   * Make `params` the active source. The first token is fetched eagerly so a
   * bad secret or tenant fails here; on failure nothing about the session changes.
   */
  async login(params: LoginParams): Promise<IssuedCredential> {
    await this.ensureRestored();

    const source = this.sourceFactory(params);
    const credential = await source.acquire(DEFAULT_AUDIENCE);

    if (this.store) {
      await this.store.save(this.toPersisted(source, credential));
    }

    this.activeSource = source;
    this.caches = new Map();
    this.inflight = new Map();
    this.cacheFor(DEFAULT_AUDIENCE).hydrate(credential);
    this.state = { status: 'authenticated', sourceKind: source.kind };

    log.debug(`Logged in with ${params.kind} (token ${maskToken(credential.token)})`);
    return credential;
  }

  async logout(): Promise<void> {
    this.restoration = Promise.resolve();
    this.activeSource = null;
    this.caches = new Map();
    this.inflight = new Map();
    this.state = { status: 'unauthenticated' };
    await this.store?.clear();
  }

  /**
   * The one call every resource command makes before an HTTP request.
   */
  async getBearerToken(audience: Audience = DEFAULT_AUDIENCE): Promise<string> {
    if (this.manualSource.isPresent()) {
      const manual = await this.manualSource.acquire();
      log.debug(`Using ${this.manualSource.variable} override for ${audience}`);
      return manual.token;
    }

    await this.ensureRestored();
    if (!this.activeSource) {
      throw new AuthError('NotLoggedIn', 'Not logged in: run `fabric login-spn` or `fabric login default`, or set ' + this.manualSource.variable);
    }

    const cache = this.cacheFor(audience);
    const cached = cache.get();
    if (cached && !cache.isExpired(this.now())) {
      return cached.token;
    }

    const refreshed = await this.refresh(audience);
    return refreshed.token;
  }

  /**
   * Drop the cached token for `audience` and fetch a new one, after the API
   * rejected it. The source bypasses any token cache of its own. Returns null when the manual override is in force, since
   * there is nothing the CLI can refresh.
   */
  async forceRefresh(audience: Audience = DEFAULT_AUDIENCE): Promise<string | null> {
    if (this.manualSource.isPresent()) {
      return null;
    }

    await this.ensureRestored();
    if (!this.activeSource) {
      throw new AuthError('NotLoggedIn', 'Not logged in');
    }

    if (!this.inflight.has(audience)) {
      await this.cacheFor(audience).clear();
    }
    const refreshed = await this.refresh(audience, true);
    return refreshed.token;
  }

  async describe(): Promise<SessionSummary> {
    await this.ensureRestored();
    const now = this.now();
    const credentials: SessionSummary['credentials'] = {};

    for (const audience of AUDIENCES) {
      const cache = this.caches.get(audience);
      const credential = cache?.get();
      if (cache && credential) {
        credentials[audience] = { expiresAt: credential.expiresAt, expired: cache.isExpired(now) };
      }
    }

    return {
      state: this.state,
      manualOverride: this.manualSource.isPresent(),
      credentials,
    };
  }

  private refresh(audience: Audience, forceRefresh: boolean = false): Promise<Credential> {
    const pending = this.inflight.get(audience);
    if (pending) {
      return pending;
    }

    const source = this.activeSource;
    if (!source) {
      return Promise.reject(new AuthError('NotLoggedIn', 'Not logged in'));
    }

    const sourceKind: LoginKind = source.kind;
    const cache = this.cacheFor(audience);
    const inflight = this.inflight;
    this.state = { status: 'expired', sourceKind };
    log.debug(`Refreshing ${sourceKind} token for ${audience}${forceRefresh ? ' (forced)' : ''}`);

    const promise = (async () => {
      const credential = await source.acquire(audience, { forceRefresh });
      // A login that completed meanwhile replaced the cache map; this result is stale
      if (this.activeSource === source) {
        await cache.store(credential);
        this.state = { status: 'authenticated', sourceKind };
      }
      return credential;
    })().finally(() => {
      if (inflight.get(audience) === promise) {
        inflight.delete(audience);
      }
    });

    inflight.set(audience, promise);
    return promise;
  }

  private cacheFor(audience: Audience): TokenCache {
    let cache = this.caches.get(audience);
    if (!cache) {
      const store = this.store;
      cache = new TokenCache(
        store ? { save: (credential) => store.saveCredential(audience, credential) } : undefined,
        this.safetyMarginMs
      );
      this.caches.set(audience, cache);
    }
    return cache;
  }

  private ensureRestored(): Promise<void> {
    this.restoration ??= this.restore();
    return this.restoration;
  }

  private async restore(): Promise<void> {
    if (!this.store) {
      return;
    }

    const persisted = await this.store.load();
    if (!persisted) {
      return;
    }

    const params: LoginParams | null =
      persisted.sourceKind === 'servicePrincipal'
        ? persisted.servicePrincipal
          ? { kind: 'servicePrincipal', config: persisted.servicePrincipal }
          : null
        : { kind: 'interactive' };

    if (!params) {
      log.warn('Stored service principal session has no credentials; log in again');
      return;
    }

    try {
      this.activeSource = this.sourceFactory(params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Ignoring stored ${persisted.sourceKind} session: ${message}; log in again`);
      return;
    }
    for (const audience of AUDIENCES) {
      const credential = persisted.credentials[audience];
      if (credential) {
        this.cacheFor(audience).hydrate(credential);
      }
    }
    this.state = { status: 'authenticated', sourceKind: persisted.sourceKind };
    log.debug(`Restored ${persisted.sourceKind} session`);
  }

  private toPersisted(source: LoginSource, credential: IssuedCredential): PersistedSession {
    return {
      version: 1,
      sourceKind: source.kind,
      servicePrincipal: source instanceof ServicePrincipalSource ? { ...source.config } : undefined,
      credentials: { [DEFAULT_AUDIENCE]: credential },
    };
  }
}

// Everything a command handler needs, built once per invocation

import { ApiClient } from '../api/client.js';
import type { FetchLike } from '../api/client.js';
import { SessionManager } from '../auth/session-manager.js';
import { FileSessionStore } from '../auth/session-store.js';
import type { SessionStore } from '../auth/session-store.js';
import { createSourceFactory } from '../auth/sources/index.js';
import type { SourceFactory } from '../auth/sources/index.js';
import { getSessionFile } from '../utils/app-paths.js';
import type { AppConfig } from '../utils/config.js';

export interface CommandContext {
  config: AppConfig;
  env: NodeJS.ProcessEnv;
  session: SessionManager;
  api: ApiClient;
}

export interface ContextOptions {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  sourceFactory?: SourceFactory;
  /** null keeps the session in memory only, whatever the configuration says */
  store?: SessionStore | null;
  now?: () => number;
}

export function createContext(config: AppConfig, options: ContextOptions = {}): CommandContext {
  const env = options.env ?? process.env;
  const store =
    options.store === undefined
      ? config.auth.persistSession
        ? new FileSessionStore(getSessionFile(env))
        : undefined
      : options.store ?? undefined;

  const session = new SessionManager({
    env,
    manualTokenEnvVar: config.auth.manualTokenEnvVar,
    store,
    sourceFactory: options.sourceFactory ?? createSourceFactory({ authorityHost: config.endpoints.authorityHost }),
    now: options.now,
  });

  const api = new ApiClient(session, {
    baseUrls: {
      fabric: config.endpoints.fabric,
      management: config.endpoints.management,
    },
    fetch: options.fetch,
  });

  return { config, env, session, api };
}

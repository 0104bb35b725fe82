// Durable form of the session, for logins that must survive the process

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Audience } from './audiences.js';
import type { Credential, IssuedCredential, PersistedSession } from './types.js';
import { servicePrincipalConfigSchema } from './sources/service-principal.js';
import { isNotFoundError } from '../utils/filesystem-errors.js';
import { log } from '../utils/logger.js';

export interface SessionStore {
  load(): Promise<PersistedSession | null>;
  save(session: PersistedSession): Promise<void>;
  saveCredential(audience: Audience, credential: Credential | null): Promise<void>;
  clear(): Promise<void>;
}

const issuedCredentialSchema = z.object({
  kind: z.enum(['servicePrincipal', 'interactive']),
  token: z.string().min(1),
  expiresAt: z.number().nullable(),
});

const persistedSessionSchema = z.object({
  version: z.literal(1),
  sourceKind: z.enum(['servicePrincipal', 'interactive']),
  servicePrincipal: servicePrincipalConfigSchema.optional(),
  credentials: z
    .object({
      fabric: issuedCredentialSchema.optional(),
      management: issuedCredentialSchema.optional(),
    })
    .default({}),
});

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

/**
 * JSON file store. The file may hold a client secret: it is created 0600 in a
 * 0700 directory and re-chmodded on every write in case it pre-existed.
 */
export class FileSessionStore implements SessionStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<PersistedSession | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      log.warn(`Ignoring unreadable session file ${this.filePath}; run a login command again`);
      return null;
    }

    const parsed = persistedSessionSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`Ignoring malformed session file ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return null;
    }
    return parsed.data;
  }

  async save(session: PersistedSession): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: DIR_MODE });
    await fs.writeFile(this.filePath, JSON.stringify(session, null, 2), { encoding: 'utf-8', mode: FILE_MODE });
    await fs.chmod(this.filePath, FILE_MODE);
  }

  async saveCredential(audience: Audience, credential: Credential | null): Promise<void> {
    // Manual tokens belong to the environment, never to disk
    if (credential?.kind === 'manual') {
      return;
    }

    const session = await this.load();
    if (!session) {
      return;
    }

    const credentials: Partial<Record<Audience, IssuedCredential>> = { ...session.credentials };
    if (credential) {
      credentials[audience] = credential;
    } else {
      delete credentials[audience];
    }
    await this.save({ ...session, credentials });
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileSessionStore } from './session-store.js';
import type { PersistedSession } from './types.js';
import { logger } from '../utils/logger.js';

const session: PersistedSession = {
  version: 1,
  sourceKind: 'servicePrincipal',
  servicePrincipal: { clientId: 'client-1', clientSecret: 'test-secret', tenantId: 'tenant-1' },
  credentials: {
    fabric: { kind: 'servicePrincipal', token: 'token-1', expiresAt: 5_000 },
  },
};

describe('FileSessionStore', () => {
  let dir: string;
  let file: string;
  let store: FileSessionStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fabric-cli-store-'));
    file = path.join(dir, 'nested', 'session.json');
    store = new FileSessionStore(file);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads nothing when no file exists', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('saves and loads a session', async () => {
    await store.save(session);
    await expect(store.load()).resolves.toEqual(session);
  });

  it('writes the file readable by the owner only', async () => {
    await store.save(session);

    const fileStat = await fs.stat(file);
    const dirStat = await fs.stat(path.dirname(file));
    expect(fileStat.mode & 0o777).toBe(0o600);
    expect(dirStat.mode & 0o777).toBe(0o700);
  });

  it('tightens the mode of a file that already existed', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{}', { mode: 0o644 });

    await store.save(session);

    expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
  });

  it('ignores a corrupt file with a warning', async () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{not json');

    await expect(store.load()).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(`Ignoring unreadable session file ${file}; run a login command again`);
  });

  it('ignores a file of the wrong shape', async () => {
    jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ version: 2, sourceKind: 'servicePrincipal' }));

    await expect(store.load()).resolves.toBeNull();
  });

  it('ignores a stored service principal with an empty secret', async () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(
      file,
      JSON.stringify({ ...session, servicePrincipal: { clientId: 'client-1', clientSecret: '', tenantId: 'tenant-1' } })
    );

    await expect(store.load()).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(`Ignoring malformed session file ${file}: client secret is required`);
  });

  it('updates and removes a single audience', async () => {
    await store.save(session);
    const management = { kind: 'servicePrincipal' as const, token: 'token-2', expiresAt: 9_000 };

    await store.saveCredential('management', management);
    await expect(store.load()).resolves.toEqual({
      ...session,
      credentials: { ...session.credentials, management },
    });

    await store.saveCredential('fabric', null);
    await expect(store.load()).resolves.toEqual({ ...session, credentials: { management } });
  });

  it('does not create a session from a lone credential', async () => {
    await store.saveCredential('fabric', { kind: 'interactive', token: 'token-1', expiresAt: null });
    await expect(fs.access(file)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('never writes a manual credential', async () => {
    await store.save(session);
    await store.saveCredential('management', { kind: 'manual', token: 'abc', expiresAt: null });
    await expect(store.load()).resolves.toEqual(session);
  });

  it('clears the file, and clearing twice is harmless', async () => {
    await store.save(session);
    await store.clear();
    await store.clear();
    await expect(store.load()).resolves.toBeNull();
  });
});

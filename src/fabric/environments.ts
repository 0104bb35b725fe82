// Spark environments: list, publish, and staging library upload

import { promises as fs } from 'fs';
import path from 'path';
import type { ApiClient } from '../api/client.js';
import { log } from '../utils/logger.js';
import { listItems } from './items.js';
import type { FabricItem } from './types.js';

export function listEnvironments(api: ApiClient, workspaceId: string): Promise<FabricItem[]> {
  return listItems(api, 'environments', workspaceId);
}

export async function publishEnvironment(api: ApiClient, workspaceId: string, environmentId: string): Promise<void> {
  await api.post(
    'fabric',
    `/workspaces/${encodeURIComponent(workspaceId)}/environments/${encodeURIComponent(environmentId)}/staging/publish`
  );
}

/**
 * Strip every semantic version from a library file name, then collapse the
 * double hyphens that leaves behind: `pkg-1.2.3-py3-none-any.whl` → `pkg-py3-none-any.whl`.
 */
export function normalizeLibraryName(fileName: string): string {
  return fileName.replace(/\d+\.\d+\.\d+/g, '').replace(/--/g, '-');
}

export interface UploadLibraryOptions {
  readFile?: (filePath: string) => Promise<Buffer>;
}

/**
 * Upload a library into an environment's staging area and publish the environment.
 */
export async function uploadStagingLibrary(
  api: ApiClient,
  workspaceId: string,
  environmentName: string,
  libraryPath: string,
  options: UploadLibraryOptions = {}
): Promise<void> {
  const environments = await listEnvironments(api, workspaceId);
  const environment = environments.find((env) => env.displayName === environmentName);
  if (!environment) {
    throw new Error(`Environment with name '${environmentName}' is not known.`);
  }

  const readFile = options.readFile ?? ((filePath: string) => fs.readFile(filePath));
  const content = await readFile(libraryPath);
  const libraryName = path.basename(libraryPath);

  const form = new FormData();
  form.append('file', new Blob([new Uint8Array(content)], { type: 'application/octet-stream' }), normalizeLibraryName(libraryName));

  log.debug(`Uploading library: ${libraryName}`);
  await api.post(
    'fabric',
    `/workspaces/${encodeURIComponent(workspaceId)}/environments/${encodeURIComponent(environment.id)}/staging/libraries`,
    { form }
  );

  await publishEnvironment(api, workspaceId, environment.id);
}

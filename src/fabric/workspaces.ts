// Workspace operations

import type { ApiClient } from '../api/client.js';
import { log } from '../utils/logger.js';
import { completeItems, workspaceListSchema } from './types.js';
import type { Workspace } from './types.js';
import { z } from 'zod';

const createdWorkspaceSchema = z.object({ id: z.string().min(1) }).partial();

/**
 * Create a workspace and return its id.
 *
 * The id comes from the response body when the API returns one, otherwise
 * from the last path segment of the `Location` header.
 */
export async function createWorkspace(api: ApiClient, displayName: string, capacityId?: string): Promise<string> {
  const payload: Record<string, string> = { displayName };
  if (capacityId) {
    payload.capacityId = capacityId;
  }

  log.debug(`Creating workspace with payload: ${JSON.stringify(payload)}`);
  const response = await api.post('fabric', '/workspaces', { json: payload });

  const body = createdWorkspaceSchema.safeParse(response.data);
  if (body.success && body.data.id) {
    return body.data.id;
  }

  const location = response.headers.get('location');
  if (!location) {
    throw new Error(`Workspace '${displayName}' was created but the response carried neither an id nor a Location header`);
  }

  const workspaceId = new URL(location, 'https://localhost').pathname.split('/').filter(Boolean).pop();
  if (!workspaceId) {
    throw new Error(`Could not read a workspace id from Location header '${location}'`);
  }
  log.debug(`Workspace created with ID: ${workspaceId}`);
  return workspaceId;
}

export async function listWorkspaces(api: ApiClient): Promise<Workspace[]> {
  const response = await api.get('fabric', '/workspaces');
  const { value } = workspaceListSchema.parse(response.data ?? {});
  const workspaces = completeItems(value).map(({ id, displayName, capacityId }) => ({ id, displayName, capacityId: capacityId ?? undefined }));
  log.debug(`Number of workspaces found: ${workspaces.length}`);
  return workspaces;
}

export async function provisionWorkspaceIdentity(api: ApiClient, workspaceId: string): Promise<void> {
  log.debug(`Provisioning identity for workspace ${workspaceId}`);
  await api.post('fabric', `/workspaces/${encodeURIComponent(workspaceId)}/provisionIdentity`);
}

export async function assignWorkspaceToCapacity(api: ApiClient, workspaceId: string, capacityId: string): Promise<void> {
  log.debug(`Assigning workspace ${workspaceId} to capacity ${capacityId}`);
  await api.post('fabric', `/workspaces/${encodeURIComponent(workspaceId)}/assignToCapacity`, {
    json: { capacityId },
  });
}

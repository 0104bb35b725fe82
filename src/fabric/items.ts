// Shared create/list for workspace items (lakehouses, warehouses, environments)

import type { ApiClient } from '../api/client.js';
import { log } from '../utils/logger.js';
import { completeItems, createdItemSchema, itemListSchema } from './types.js';
import type { FabricItem } from './types.js';

export type ItemCollection = 'lakehouses' | 'warehouses' | 'environments';

export async function createItem(
  api: ApiClient,
  collection: ItemCollection,
  workspaceId: string,
  displayName: string,
  description?: string
): Promise<string> {
  const payload: Record<string, string> = { displayName };
  if (description) {
    payload.description = description;
  }

  log.debug(`Creating ${collection} item with payload: ${JSON.stringify(payload)}`);
  const response = await api.post('fabric', `/workspaces/${encodeURIComponent(workspaceId)}/${collection}`, { json: payload });
  const { id } = createdItemSchema.parse(response.data);
  log.debug(`Created ${collection} item ${id}`);
  return id;
}

export async function listItems(api: ApiClient, collection: ItemCollection, workspaceId: string): Promise<FabricItem[]> {
  const response = await api.get('fabric', `/workspaces/${encodeURIComponent(workspaceId)}/${collection}`);
  const { value } = itemListSchema.parse(response.data ?? {});
  const items = completeItems(value).map(({ id, displayName }) => ({ id, displayName }));
  log.debug(`Fetched ${items.length} ${collection} in workspace ${workspaceId}`);
  return items;
}

import type { ApiClient } from '../api/client.js';
import { createItem, listItems } from './items.js';
import type { FabricItem } from './types.js';

export function createLakehouse(api: ApiClient, workspaceId: string, displayName: string, description?: string): Promise<string> {
  return createItem(api, 'lakehouses', workspaceId, displayName, description);
}

export function listLakehouses(api: ApiClient, workspaceId: string): Promise<FabricItem[]> {
  return listItems(api, 'lakehouses', workspaceId);
}

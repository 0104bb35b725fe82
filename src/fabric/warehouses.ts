import type { ApiClient } from '../api/client.js';
import { createItem, listItems } from './items.js';
import type { FabricItem } from './types.js';

export function createWarehouse(api: ApiClient, workspaceId: string, displayName: string, description?: string): Promise<string> {
  return createItem(api, 'warehouses', workspaceId, displayName, description);
}

export function listWarehouses(api: ApiClient, workspaceId: string): Promise<FabricItem[]> {
  return listItems(api, 'warehouses', workspaceId);
}

// Shapes returned by the Fabric REST API

import { z } from 'zod';

export const itemSchema = z.object({
  id: z.string().optional(),
  displayName: z.string().optional(),
  description: z.string().nullish(),
});

export const workspaceSchema = itemSchema.extend({
  capacityId: z.string().nullish(),
});

export const itemListSchema = z.object({
  value: z.array(itemSchema).default([]),
});

export const workspaceListSchema = z.object({
  value: z.array(workspaceSchema).default([]),
});

export const createdItemSchema = z.object({ id: z.string().min(1) });

export interface FabricItem {
  id: string;
  displayName: string;
}

export interface Workspace extends FabricItem {
  capacityId?: string;
}

export type GitProviderType = 'AzureDevOps' | 'GitHub';

export interface GitProviderDetails {
  gitProviderType: GitProviderType;
  organizationName?: string;
  projectName?: string;
  ownerName?: string;
  repositoryName: string;
  branchName: string;
  directoryName: string;
}

/**
 * Keep only entries that carry both an id and a display name.
 */
export function completeItems<T extends { id?: string; displayName?: string }>(
  items: T[]
): Array<T & FabricItem> {
  const result: Array<T & FabricItem> = [];
  for (const item of items) {
    const { id, displayName } = item;
    if (id && displayName) {
      result.push({ ...item, id, displayName });
    }
  }
  return result;
}

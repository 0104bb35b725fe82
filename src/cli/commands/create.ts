import type { CommandContext } from '../context.js';
import { createLakehouse } from '../../fabric/lakehouses.js';
import { createWarehouse } from '../../fabric/warehouses.js';
import { createWorkspace, provisionWorkspaceIdentity } from '../../fabric/workspaces.js';
import { print } from '../../utils/output.js';

export async function createWorkspaceCommand(
  ctx: CommandContext,
  name: string,
  options: { capacityId?: string; provisionIdentity?: boolean }
): Promise<void> {
  const workspaceId = await createWorkspace(ctx.api, name, options.capacityId);
  print(`Created workspace '${name}' with ID: ${workspaceId}`);
  if (options.capacityId) {
    print(`Assigned workspace to capacity ${options.capacityId}`);
  }

  if (options.provisionIdentity) {
    await provisionWorkspaceIdentity(ctx.api, workspaceId);
    print(`Provisioned identity for workspace '${name}'`);
  }
}

export async function createLakehouseCommand(
  ctx: CommandContext,
  name: string,
  options: { workspaceId: string; description?: string }
): Promise<void> {
  const lakehouseId = await createLakehouse(ctx.api, options.workspaceId, name, options.description);
  print(`Created lakehouse '${name}' with ID: ${lakehouseId}`);
}

export async function createWarehouseCommand(
  ctx: CommandContext,
  name: string,
  options: { workspaceId: string; description?: string }
): Promise<void> {
  const warehouseId = await createWarehouse(ctx.api, options.workspaceId, name, options.description);
  print(`Created warehouse '${name}' with ID: ${warehouseId}`);
}

import chalk from 'chalk';
import type { CommandContext } from '../context.js';
import { listEnvironments } from '../../fabric/environments.js';
import { listLakehouses } from '../../fabric/lakehouses.js';
import type { FabricItem } from '../../fabric/types.js';
import { listWarehouses } from '../../fabric/warehouses.js';
import { listWorkspaces } from '../../fabric/workspaces.js';
import { print } from '../../utils/output.js';

export async function displayWorkspacesCommand(ctx: CommandContext): Promise<void> {
  const workspaces = await listWorkspaces(ctx.api);
  if (workspaces.length === 0) {
    print('No workspaces found');
    return;
  }

  print(chalk.bold('Workspaces:'));
  for (const workspace of workspaces) {
    const capacity = workspace.capacityId ? ` (Capacity ID: ${workspace.capacityId})` : '';
    print(`  • ${workspace.displayName} (ID: ${workspace.id})${capacity}`);
  }
}

function printItems(label: string, workspaceId: string, items: FabricItem[]): void {
  if (items.length === 0) {
    print(`No ${label} found in workspace ${workspaceId}`);
    return;
  }

  print(chalk.bold(`${label[0].toUpperCase()}${label.slice(1)} in workspace ${workspaceId}:`));
  for (const item of items) {
    print(`  • ${item.displayName} (ID: ${item.id})`);
  }
}

export async function displayLakehousesCommand(ctx: CommandContext, options: { workspaceId: string }): Promise<void> {
  printItems('lakehouses', options.workspaceId, await listLakehouses(ctx.api, options.workspaceId));
}

export async function displayWarehousesCommand(ctx: CommandContext, options: { workspaceId: string }): Promise<void> {
  printItems('warehouses', options.workspaceId, await listWarehouses(ctx.api, options.workspaceId));
}

export async function displayEnvironmentsCommand(ctx: CommandContext, options: { workspaceId: string }): Promise<void> {
  printItems('environments', options.workspaceId, await listEnvironments(ctx.api, options.workspaceId));
}

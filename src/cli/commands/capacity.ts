import type { CommandContext } from '../context.js';
import { resumeCapacity, suspendCapacity } from '../../fabric/capacity.js';
import type { CapacityRef } from '../../fabric/capacity.js';
import { assignWorkspaceToCapacity } from '../../fabric/workspaces.js';
import { print } from '../../utils/output.js';

export interface CapacityOptions {
  subscriptionId: string;
  resourceGroupName: string;
  dedicatedCapacityName: string;
}

function toRef(options: CapacityOptions): CapacityRef {
  return {
    subscriptionId: options.subscriptionId,
    resourceGroupName: options.resourceGroupName,
    capacityName: options.dedicatedCapacityName,
  };
}

export async function suspendCapacityCommand(ctx: CommandContext, options: CapacityOptions): Promise<void> {
  const result = await suspendCapacity(ctx.api, toRef(options), ctx.config.capacity.apiVersion);
  print(result.accepted
    ? `Suspend of capacity '${options.dedicatedCapacityName}' accepted`
    : `Suspended capacity '${options.dedicatedCapacityName}'`);
}

export async function resumeCapacityCommand(ctx: CommandContext, options: CapacityOptions): Promise<void> {
  const result = await resumeCapacity(ctx.api, toRef(options), ctx.config.capacity.apiVersion);
  print(result.accepted
    ? `Resume of capacity '${options.dedicatedCapacityName}' accepted`
    : `Resumed capacity '${options.dedicatedCapacityName}'`);
}

export async function assignCapacityCommand(
  ctx: CommandContext,
  options: { workspaceId: string; capacityId: string }
): Promise<void> {
  await assignWorkspaceToCapacity(ctx.api, options.workspaceId, options.capacityId);
  print(`Assigned workspace ${options.workspaceId} to capacity ${options.capacityId}`);
}

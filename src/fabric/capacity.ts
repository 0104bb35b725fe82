// Capacity pause/resume through Azure Resource Manager

import type { ApiClient } from '../api/client.js';
import { log } from '../utils/logger.js';

export const DEFAULT_CAPACITY_API_VERSION = '2022-07-01-preview';

export interface CapacityRef {
  subscriptionId: string;
  resourceGroupName: string;
  capacityName: string;
}

export type CapacityAction = 'suspend' | 'resume';

export interface CapacityActionResult {
  /** true when ARM answered 202 and finishes the operation asynchronously */
  accepted: boolean;
  data: unknown;
}

export function capacityPath(ref: CapacityRef, action: CapacityAction): string {
  return [
    '/subscriptions',
    encodeURIComponent(ref.subscriptionId),
    'resourceGroups',
    encodeURIComponent(ref.resourceGroupName),
    'providers/Microsoft.Fabric/capacities',
    encodeURIComponent(ref.capacityName),
    action,
  ].join('/');
}

async function runCapacityAction(
  api: ApiClient,
  ref: CapacityRef,
  action: CapacityAction,
  apiVersion: string
): Promise<CapacityActionResult> {
  log.info(`Requesting ${action} of capacity ${ref.capacityName}`);
  const response = await api.post('management', capacityPath(ref, action), {
    query: { 'api-version': apiVersion },
  });
  if (response.status === 202) {
    log.debug('Request accepted and is being processed asynchronously');
  }
  return { accepted: response.status === 202, data: response.data };
}

export function suspendCapacity(api: ApiClient, ref: CapacityRef, apiVersion: string = DEFAULT_CAPACITY_API_VERSION): Promise<CapacityActionResult> {
  return runCapacityAction(api, ref, 'suspend', apiVersion);
}

export function resumeCapacity(api: ApiClient, ref: CapacityRef, apiVersion: string = DEFAULT_CAPACITY_API_VERSION): Promise<CapacityActionResult> {
  return runCapacityAction(api, ref, 'resume', apiVersion);
}

import type { ApiClient } from '../api/client.js';
import { log } from '../utils/logger.js';
import type { GitProviderDetails } from './types.js';

export async function connectWorkspaceToGit(
  api: ApiClient,
  workspaceId: string,
  gitProviderDetails: GitProviderDetails
): Promise<void> {
  const payload = { gitProviderDetails };
  log.debug(`Connecting workspace ${workspaceId} to Git repository with payload: ${JSON.stringify(payload)}`);
  await api.post('fabric', `/workspaces/${encodeURIComponent(workspaceId)}/git/connect`, { json: payload });
  log.debug(`Workspace ${workspaceId} connected to Git repository`);
}

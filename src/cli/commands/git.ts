import type { CommandContext } from '../context.js';
import { connectWorkspaceToGit } from '../../fabric/git.js';
import type { GitProviderDetails, GitProviderType } from '../../fabric/types.js';
import { HandledError } from '../../utils/error-handler.js';
import { print } from '../../utils/output.js';

export interface GitConnectOptions {
  workspaceId: string;
  providerType: GitProviderType;
  organizationName?: string;
  projectName?: string;
  ownerName?: string;
  repositoryName: string;
  branchName: string;
  directoryName: string;
}

/**
 * Azure DevOps repositories live under an organization and project; GitHub ones under an owner.
 */
export function toGitProviderDetails(options: GitConnectOptions): GitProviderDetails {
  const base = {
    gitProviderType: options.providerType,
    repositoryName: options.repositoryName,
    branchName: options.branchName,
    directoryName: options.directoryName,
  };

  if (options.providerType === 'AzureDevOps') {
    if (!options.organizationName || !options.projectName) {
      throw new HandledError('--organization-name and --project-name are required for AzureDevOps', 'git connect');
    }
    return { ...base, organizationName: options.organizationName, projectName: options.projectName };
  }

  if (!options.ownerName) {
    throw new HandledError('--owner-name is required for GitHub', 'git connect');
  }
  return { ...base, ownerName: options.ownerName };
}

export async function gitConnectCommand(ctx: CommandContext, options: GitConnectOptions): Promise<void> {
  const details = toGitProviderDetails(options);
  await connectWorkspaceToGit(ctx.api, options.workspaceId, details);
  print(`Connected workspace ${options.workspaceId} to ${details.repositoryName} (${details.branchName})`);
}

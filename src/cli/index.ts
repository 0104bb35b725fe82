// CLI setup with Commander

import { Command, Option } from 'commander';
import type { CommandContext } from './context.js';
import { assignCapacityCommand, resumeCapacityCommand, suspendCapacityCommand } from './commands/capacity.js';
import type { CapacityOptions } from './commands/capacity.js';
import { configCommand } from './commands/config.js';
import { createLakehouseCommand, createWarehouseCommand, createWorkspaceCommand } from './commands/create.js';
import {
  displayEnvironmentsCommand,
  displayLakehousesCommand,
  displayWarehousesCommand,
  displayWorkspacesCommand,
} from './commands/display.js';
import { uploadLibraryCommand } from './commands/environment.js';
import { gitConnectCommand } from './commands/git.js';
import type { GitConnectOptions } from './commands/git.js';
import { loginDefaultCommand, loginSpnCommand, logoutCommand, statusCommand } from './commands/login.js';
import type { LoginSpnOptions } from './commands/login.js';
import { log, LogLevel } from '../utils/logger.js';

export type ContextResolver = () => Promise<CommandContext>;

function addSpnOptions(command: Command): Command {
  return command
    .requiredOption('--client-id <id>', 'Application (client) ID of the service principal')
    .requiredOption('--client-secret <secret>', 'Client secret of the service principal')
    .requiredOption('--tenant-id <id>', 'Directory (tenant) ID');
}

function addCapacityOptions(command: Command): Command {
  return command
    .requiredOption('--subscription-id <id>', 'Azure subscription ID')
    .requiredOption('--resource-group-name <name>', 'Resource group holding the capacity')
    .requiredOption('--dedicated-capacity-name <name>', 'Name of the Fabric capacity');
}

/**
 * Build the program. The context (config, session, API client) is resolved
 * once, on the first command that needs it, so `--help` works without any setup.
 */
export function createCLI(resolveContext: ContextResolver): Command {
  let pending: Promise<CommandContext> | null = null;
  const context = (): Promise<CommandContext> => {
    pending ??= resolveContext();
    return pending;
  };

  const program = new Command();

  program
    .name('fabric')
    .description('Provision and manage Microsoft Fabric resources')
    .version('0.1.0', '-v, --version', 'Show the CLI version')
    .option('--verbose', 'Log requests and token handling to stderr')
    .exitOverride()
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        log.setLevel(LogLevel.DEBUG);
      }
    });

  // Authentication
  addSpnOptions(
    program.command('login-spn').description('Log in with a service principal (client credentials)')
  ).action(async (options: LoginSpnOptions) => loginSpnCommand(await context(), options));

  const login = program.command('login').description('Log in to Microsoft Fabric');
  addSpnOptions(
    login.command('spn').description('Log in with a service principal (client credentials)')
  ).action(async (options: LoginSpnOptions) => loginSpnCommand(await context(), options));
  login
    .command('default')
    .description('Reuse the identity of an existing local session (az login, azd, PowerShell, managed identity)')
    .action(async () => loginDefaultCommand(await context()));

  program
    .command('logout')
    .description('Forget the active login and its cached tokens')
    .action(async () => logoutCommand(await context()));

  program
    .command('status')
    .description('Show which identity requests are made with')
    .action(async () => statusCommand(await context()));

  // Resources
  const create = program.command('create').description('Create Fabric resources');
  create
    .command('workspace <name>')
    .description('Create a new workspace')
    .option('--capacity-id <id>', 'Capacity to assign the workspace to')
    .option('--provision-identity', 'Provision a workspace identity after creation')
    .action(async (name: string, options: { capacityId?: string; provisionIdentity?: boolean }) =>
      createWorkspaceCommand(await context(), name, options));
  create
    .command('lakehouse <name>')
    .description('Create a new lakehouse in a workspace')
    .requiredOption('--workspace-id <id>', 'Workspace to create the lakehouse in')
    .option('--description <text>', 'Description of the lakehouse')
    .action(async (name: string, options: { workspaceId: string; description?: string }) =>
      createLakehouseCommand(await context(), name, options));
  create
    .command('warehouse <name>')
    .description('Create a new warehouse in a workspace')
    .requiredOption('--workspace-id <id>', 'Workspace to create the warehouse in')
    .option('--description <text>', 'Description of the warehouse')
    .action(async (name: string, options: { workspaceId: string; description?: string }) =>
      createWarehouseCommand(await context(), name, options));

  const display = program.command('display').description('Display Microsoft Fabric resources');
  display
    .command('workspaces')
    .description('List all workspaces')
    .action(async () => displayWorkspacesCommand(await context()));
  display
    .command('lakehouses')
    .description('List the lakehouses of a workspace')
    .requiredOption('--workspace-id <id>', 'Workspace to list')
    .action(async (options: { workspaceId: string }) => displayLakehousesCommand(await context(), options));
  display
    .command('warehouses')
    .description('List the warehouses of a workspace')
    .requiredOption('--workspace-id <id>', 'Workspace to list')
    .action(async (options: { workspaceId: string }) => displayWarehousesCommand(await context(), options));
  display
    .command('environments')
    .description('List the Spark environments of a workspace')
    .requiredOption('--workspace-id <id>', 'Workspace to list')
    .action(async (options: { workspaceId: string }) => displayEnvironmentsCommand(await context(), options));

  const capacity = program.command('capacity').description('Pause, resume and assign Fabric capacities');
  addCapacityOptions(capacity.command('suspend').description('Suspend (pause) a capacity'))
    .action(async (options: CapacityOptions) => suspendCapacityCommand(await context(), options));
  addCapacityOptions(capacity.command('resume').description('Resume a suspended capacity'))
    .action(async (options: CapacityOptions) => resumeCapacityCommand(await context(), options));
  capacity
    .command('assign')
    .description('Assign a workspace to a capacity')
    .requiredOption('--workspace-id <id>', 'Workspace to assign')
    .requiredOption('--capacity-id <id>', 'Target capacity')
    .action(async (options: { workspaceId: string; capacityId: string }) => assignCapacityCommand(await context(), options));

  const git = program.command('git').description('Source control integration');
  git
    .command('connect')
    .description('Connect a workspace to a Git repository')
    .requiredOption('--workspace-id <id>', 'Workspace to connect')
    .addOption(new Option('--provider-type <type>', 'Git provider').choices(['AzureDevOps', 'GitHub']).default('AzureDevOps'))
    .option('--organization-name <name>', 'Azure DevOps organization')
    .option('--project-name <name>', 'Azure DevOps project')
    .option('--owner-name <name>', 'GitHub repository owner')
    .requiredOption('--repository-name <name>', 'Repository name')
    .requiredOption('--branch-name <name>', 'Branch to sync with')
    .requiredOption('--directory-name <path>', 'Folder in the repository holding the workspace items')
    .action(async (options: GitConnectOptions) => gitConnectCommand(await context(), options));

  const environment = program.command('environment').description('Spark environments');
  environment
    .command('upload-library')
    .description('Upload a library to an environment and publish it')
    .requiredOption('--workspace-id <id>', 'Workspace holding the environment')
    .requiredOption('--environment-name <name>', 'Display name of the environment')
    .requiredOption('--library-path <path>', 'Path to the library file (wheel, jar, ...)')
    .action(async (options: { workspaceId: string; environmentName: string; libraryPath: string }) =>
      uploadLibraryCommand(await context(), options));

  program
    .command('config')
    .description('Manage CLI configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .action(async (options: { set?: string; get?: string; list?: boolean }) =>
      configCommand((await context()).env, options));

  program.configureHelp({ sortSubcommands: true });
  program.addHelpText('after', `
Examples:
  $ fabric login-spn --client-id <id> --client-secret <secret> --tenant-id <tenant>
  $ fabric display workspaces
  $ fabric capacity suspend --subscription-id <sub> --resource-group-name <rg> --dedicated-capacity-name <name>
`);

  return program;
}

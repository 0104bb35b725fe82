import path from 'path';
import type { CommandContext } from '../context.js';
import { normalizeLibraryName, uploadStagingLibrary } from '../../fabric/environments.js';
import { print } from '../../utils/output.js';

export async function uploadLibraryCommand(
  ctx: CommandContext,
  options: { workspaceId: string; environmentName: string; libraryPath: string }
): Promise<void> {
  await uploadStagingLibrary(ctx.api, options.workspaceId, options.environmentName, options.libraryPath);
  const uploadedAs = normalizeLibraryName(path.basename(options.libraryPath));
  print(`Uploaded ${uploadedAs} to environment '${options.environmentName}' and published it`);
}

import path from 'path';
import os from 'os';

/**
 * Base directory for fabric-cli state on disk.
 *
 * Override with `FABRIC_CLI_HOME` (useful for CI runners, sandboxes and tests).
 * Default: `~/.fabric-cli`
 */
export function getFabricCliHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.FABRIC_CLI_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.fabric-cli');
}

export function getConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getFabricCliHomeDir(env), 'config.json');
}

/** Holds the service principal secret when one is logged in; written 0600. */
export function getSessionFile(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getFabricCliHomeDir(env), 'session.json');
}

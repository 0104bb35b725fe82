// Configuration management command

import chalk from 'chalk';
import { getConfigFile } from '../../utils/app-paths.js';
import { getConfigValue, loadConfig, setConfigValue } from '../../utils/config.js';
import { HandledError } from '../../utils/error-handler.js';
import { print } from '../../utils/output.js';

export async function configCommand(
  env: NodeJS.ProcessEnv,
  options: { set?: string; get?: string; list?: boolean }
): Promise<void> {
  if (options.set) {
    const separator = options.set.indexOf('=');
    if (separator <= 0) {
      throw new HandledError('Expected --set <key=value>', 'config');
    }
    const key = options.set.slice(0, separator);
    const value = options.set.slice(separator + 1);
    await setConfigValue(key, value, env);
    print(chalk.green(`✓ Set ${key}`));
    return;
  }

  if (options.get) {
    const value = await getConfigValue(options.get, env);
    if (value === undefined) {
      throw new HandledError(`Unknown configuration key '${options.get}'`, 'config');
    }
    print(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
    return;
  }

  const config = await loadConfig(env);
  print(chalk.bold(`Configuration (${getConfigFile(env)}):`));
  print(JSON.stringify(config, null, 2));
}

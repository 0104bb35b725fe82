// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_AUTHORITY_HOST, MANUAL_TOKEN_ENV_VAR } from '../auth/sources/index.js';
import { DEFAULT_CAPACITY_API_VERSION } from '../fabric/capacity.js';
import { getConfigFile } from './app-paths.js';
import { isNotFoundError } from './filesystem-errors.js';

export const appConfigSchema = z.object({
  endpoints: z.object({
    fabric: z.string().url(),
    management: z.string().url(),
    authorityHost: z.string().url(),
  }),
  capacity: z.object({
    apiVersion: z.string().min(1),
  }),
  auth: z.object({
    manualTokenEnvVar: z.string().min(1),
    /** Keep logins in <home>/session.json so later invocations reuse them */
    persistSession: z.boolean(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

type ConfigObject = { [key: string]: unknown };

function isObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load `.env` from the working directory. Called once by the entry point,
 * never on import, so tests see only the environment they build.
 */
export function loadDotenv(): void {
  dotenv.config();
}

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    endpoints: {
      fabric: env.FABRIC_API_URL || 'https://api.fabric.microsoft.com/v1',
      management: env.AZURE_MANAGEMENT_URL || 'https://management.azure.com',
      authorityHost: env.AZURE_AUTHORITY_HOST || DEFAULT_AUTHORITY_HOST,
    },
    capacity: {
      apiVersion: DEFAULT_CAPACITY_API_VERSION,
    },
    auth: {
      manualTokenEnvVar: MANUAL_TOKEN_ENV_VAR,
      persistSession: true,
    },
  };
}

async function readConfigFile(env: NodeJS.ProcessEnv): Promise<ConfigObject> {
  const file = getConfigFile(env);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) {
    throw new Error(`Configuration file ${file} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Defaults (with environment overrides) merged with `<home>/config.json`.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const merged = deepMerge(getDefaultConfig(env), await readConfigFile(env));
  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid configuration at '${issue?.path.join('.') ?? ''}': ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

async function writeConfigFile(config: ConfigObject, env: NodeJS.ProcessEnv): Promise<void> {
  const file = getConfigFile(env);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(config, null, 2), 'utf-8');
}

export async function getConfigValue(key: string, env: NodeJS.ProcessEnv = process.env): Promise<unknown> {
  const config = await loadConfig(env);
  let value: unknown = config;

  for (const k of key.split('.')) {
    value = isObject(value) ? value[k] : undefined;
  }

  return value;
}

/**
 * Set a dotted key. The value is parsed as JSON when it parses, otherwise kept
 * as a string; the result must still be a valid configuration.
 *
 * Only the file's own entries plus `key` are written back, so defaults and
 * environment overrides keep applying to every other key.
 */
export async function setConfigValue(key: string, value: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  if (!hasPath(getDefaultConfig(env), key)) {
    throw new Error(`Unknown configuration key '${key}'`);
  }

  const stored: ConfigObject = { ...(await readConfigFile(env)) };
  const keys = key.split('.');
  const last = keys.pop();
  if (!last) {
    throw new Error('Configuration key must not be empty');
  }

  let obj: ConfigObject = stored;
  for (const k of keys) {
    const next = obj[k];
    const copy: ConfigObject = isObject(next) ? { ...next } : {};
    obj[k] = copy;
    obj = copy;
  }

  let parsedValue: unknown;
  try {
    parsedValue = JSON.parse(value);
  } catch {
    parsedValue = value;
  }
  obj[last] = parsedValue;

  const result = appConfigSchema.safeParse(deepMerge(getDefaultConfig(env), stored));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Cannot set '${key}': ${issue?.message ?? 'invalid value'}`);
  }

  await writeConfigFile(stored, env);
  return result.data;
}

function hasPath(config: ConfigObject, key: string): boolean {
  let value: unknown = config;
  for (const k of key.split('.')) {
    if (!isObject(value) || !(k in value)) {
      return false;
    }
    value = value[k];
  }
  return true;
}

function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = result[key];
    if (isObject(incoming) && isObject(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}

import fs from 'fs';
import path from 'path';
import type { RunConfig } from '../types.js';
import { DEFAULT_RUN_CONFIG } from './defaults.js';

export const RC_FILENAME = '.tlsauditrc.json';

interface RcFile {
  timeout?: unknown;
  nbRetries?: unknown;
  plugins?: unknown;
}

function isRcFile(value: unknown): value is RcFile {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string') {
    const parsed = parseInt(value, 10);
    if (!isNaN(parsed)) return parsed;
  }
  return undefined;
}

function toStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string');
}

/**
 * Loads run defaults from the rc file, then applies environment overrides.
 * Command-line flags are applied on top of the result by the caller.
 */
export function loadRunConfig(
  configPath?: string,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  // TLSAUDIT_CONFIG env var can specify an alternative config path
  const resolvedConfigPath = configPath
    ? path.resolve(cwd, configPath)
    : env.TLSAUDIT_CONFIG
      ? path.resolve(cwd, env.TLSAUDIT_CONFIG)
      : path.join(cwd, RC_FILENAME);

  let rc: RcFile = {};
  if (fs.existsSync(resolvedConfigPath)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(resolvedConfigPath, 'utf8'));
      if (isRcFile(parsed)) rc = parsed;
      else console.warn(`Warning: Ignoring config file at ${resolvedConfigPath}: expected a JSON object`);
    } catch {
      console.warn(`Warning: Could not parse config file at ${resolvedConfigPath}`);
    }
  }

  const base: RunConfig = {
    timeout: toInteger(rc.timeout) ?? DEFAULT_RUN_CONFIG.timeout,
    nbRetries: toInteger(rc.nbRetries) ?? DEFAULT_RUN_CONFIG.nbRetries,
    plugins: toStringList(rc.plugins) ?? DEFAULT_RUN_CONFIG.plugins,
  };

  // Priority: CLI > env > config > default
  const envTimeout = toInteger(env.TLSAUDIT_TIMEOUT);
  if (envTimeout !== undefined) base.timeout = envTimeout;
  const envRetries = toInteger(env.TLSAUDIT_NB_RETRIES);
  if (envRetries !== undefined) base.nbRetries = envRetries;
  if (env.TLSAUDIT_PLUGINS) {
    base.plugins = env.TLSAUDIT_PLUGINS.split(',').map(p => p.trim()).filter(Boolean);
  }

  return base;
}

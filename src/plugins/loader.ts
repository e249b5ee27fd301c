import fg from 'fast-glob';
import { errorMessage } from '../errors.js';
import { isPluginOptionProvider } from './types.js';
import type { PluginOptionProvider } from './types.js';

function collectProviders(exported: unknown): PluginOptionProvider[] | null {
  if (Array.isArray(exported)) {
    return exported.every(isPluginOptionProvider) ? exported : null;
  }
  return isPluginOptionProvider(exported) ? [exported] : null;
}

/**
 * Loads plugin option providers from the modules matching `patterns`.
 * Modules are loaded in path order; a module that fails to load or exports
 * something else is skipped with a warning.
 */
export function loadPluginProviders(patterns: readonly string[], cwd: string): PluginOptionProvider[] {
  if (patterns.length === 0) return [];

  const files = fg.sync([...patterns], {
    cwd,
    absolute: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  }).sort();

  const providers: PluginOptionProvider[] = [];
  for (const file of files) {
    try {
      // eslint-disable-next-line @typescript-eslint/no-require-imports
      const mod: unknown = require(file);
      const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
      const found = collectProviders(exported);
      if (found) {
        providers.push(...found);
      } else {
        console.warn(`Warning: plugin ${file} did not export a plugin option provider`);
      }
    } catch (err) {
      console.warn(`Warning: failed to load plugin ${file}: ${errorMessage(err)}`);
    }
  }
  return providers;
}

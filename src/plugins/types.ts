export interface OptionDefinition {
  /** Commander flag syntax, e.g. `--certinfo_basic` or `--ca_file <file>`. */
  flags: string;
  description: string;
  defaultValue?: string | boolean | number;
  /** Parse the option argument as an integer. */
  integer?: boolean;
}

/** The command-line options a scan plugin contributes. */
export interface PluginOptionProvider {
  getTitle(): string;
  getDescription(): string;
  getCliOptions(): readonly OptionDefinition[];
}

export function isPluginOptionProvider(value: unknown): value is PluginOptionProvider {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'getTitle' in value && typeof value.getTitle === 'function' &&
    'getDescription' in value && typeof value.getDescription === 'function' &&
    'getCliOptions' in value && typeof value.getCliOptions === 'function'
  );
}

export function definePlugin(
  title: string,
  description: string,
  options: readonly OptionDefinition[],
): PluginOptionProvider {
  const frozen = Object.freeze([...options]);
  return {
    getTitle: () => title,
    getDescription: () => description,
    getCliOptions: () => frozen,
  };
}

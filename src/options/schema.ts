import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_RUN_CONFIG, REGULAR_COMMANDS, VERSION } from '../config/defaults.js';
import type { OptionDefinition, PluginOptionProvider } from '../plugins/types.js';
import type { RawOptionValues, RunConfig } from '../types.js';
import { clientCertificateGroup, connectivityGroup, inputOutputGroup } from './core.js';

export interface OptionGroup {
  readonly title: string;
  readonly description: string;
  readonly options: readonly OptionDefinition[];
}

export interface OptionSchema {
  readonly groups: readonly OptionGroup[];
  /** The --regular flag, registered after every group. */
  readonly shortcut: OptionDefinition;
}

export interface ParsedCommandLine {
  options: RawOptionValues;
  targets: string[];
}

export const USAGE = '[options] target1.com target2.com:443 target3.com:443{ip} etc...';

export const REGULAR_SHORTCUT: OptionDefinition = Object.freeze({
  flags: '--regular',
  description: `Regular HTTPS scan; shortcut for --${REGULAR_COMMANDS.join(' --')}`,
});

export function flagName(flags: string): string {
  return flags.match(/--[\w-]+/)?.[0] ?? flags.trim();
}

function toGroup(provider: PluginOptionProvider): OptionGroup {
  return {
    title: provider.getTitle(),
    description: provider.getDescription(),
    options: provider.getCliOptions(),
  };
}

/**
 * Merges the core option groups with one group per plugin, in order.
 * When two groups register the same flag the last registration wins and the
 * earlier definition is dropped from its group.
 */
export function buildOptionSchema(
  plugins: readonly PluginOptionProvider[],
  defaults: Pick<RunConfig, 'timeout' | 'nbRetries'> = DEFAULT_RUN_CONFIG,
): OptionSchema {
  const registered = [
    clientCertificateGroup,
    inputOutputGroup,
    connectivityGroup(defaults),
    ...plugins,
  ].map(toGroup);

  // flag name -> [group index, option index] of the last registration
  const winners = new Map<string, [number, number]>();
  registered.forEach((group, g) => {
    group.options.forEach((option, o) => winners.set(flagName(option.flags), [g, o]));
  });
  winners.set(flagName(REGULAR_SHORTCUT.flags), [-1, -1]);

  const groups = registered.map((group, g) => Object.freeze({
    ...group,
    options: Object.freeze(group.options.filter((option, o) => {
      const winner = winners.get(flagName(option.flags));
      return winner !== undefined && winner[0] === g && winner[1] === o;
    })),
  }));

  return Object.freeze({ groups: Object.freeze(groups), shortcut: REGULAR_SHORTCUT });
}

/** Effective flag names in registration order. */
export function listFlags(schema: OptionSchema): string[] {
  return [
    ...schema.groups.flatMap(g => g.options.map(o => flagName(o.flags))),
    flagName(schema.shortcut.flags),
  ];
}

function parseInteger(value: string): number {
  if (!/^\s*[+-]?\d+\s*$/.test(value)) throw new InvalidArgumentError('Not an integer.');
  return parseInt(value, 10);
}

function toCommanderOption(definition: OptionDefinition, heading?: string): Option {
  const option = new Option(definition.flags, definition.description);
  if (definition.integer) option.argParser(parseInteger);
  if (definition.defaultValue !== undefined) option.default(definition.defaultValue);
  if (heading) option.helpGroup(heading);
  return option;
}

export function createProgram(schema: OptionSchema): Command {
  const program = new Command();
  program
    .name('tlsaudit')
    .description('Resolve TLS scan targets and validate scan settings')
    .usage(USAGE)
    .version(VERSION)
    .argument('[targets...]', 'host[:port], [ipv6][:port], optionally followed by {ip}');

  for (const group of schema.groups) {
    const heading = group.description ? `${group.title}: ${group.description}` : `${group.title}:`;
    for (const definition of group.options) program.addOption(toCommanderOption(definition, heading));
  }
  program.addOption(toCommanderOption(schema.shortcut));
  return program;
}

export function parseCommandLine(program: Command, argv: readonly string[]): ParsedCommandLine {
  program.parse([...argv], { from: 'user' });
  return { options: program.opts(), targets: [...program.args] };
}

import { CommanderError } from 'commander';
import type { CredentialLoader } from './config/credentials.js';
import { loadRunConfig } from './config/loader.js';
import { resolveConfiguration } from './config/resolver.js';
import type { ResolvedCommandLine } from './config/resolver.js';
import {
  COMMAND_LINE_ERROR_FORMAT,
  ConfigurationError,
  CrossTargetMisconfigurationError,
} from './errors.js';
import { buildOptionSchema, createProgram, parseCommandLine } from './options/schema.js';
import type { ParsedCommandLine } from './options/schema.js';
import { builtinPlugins } from './plugins/builtin.js';
import { loadPluginProviders } from './plugins/loader.js';
import { formatAvailabilityReport } from './report/console.js';
import { resolveTargets } from './targets/batch.js';
import { detectIpv6Support, ServerStringParser } from './targets/parser.js';
import { DnsConnectivityProber } from './targets/prober.js';
import type { ConnectivityProber } from './targets/prober.js';
import type { ScanConfiguration, TargetResolution } from './types.js';

export interface CliDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Builds the prober once the configuration is known. */
  createProber?: (config: ScanConfiguration) => ConnectivityProber;
  loadCredentials?: CredentialLoader;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  color?: boolean;
  /** Defaults to whether the host has an IPv6 interface. */
  ipv6Supported?: boolean;
}

export interface CliResult {
  exitCode: number;
  resolved?: ResolvedCommandLine;
  resolution?: TargetResolution;
}

const defaultProber = (config: ScanConfiguration): ConnectivityProber =>
  new DnsConnectivityProber({ timeoutSeconds: config.timeoutSeconds, retryCount: config.retryCount });

/**
 * Parses argv, validates the settings and resolves every target. Fatal
 * errors are reported on stderr and turned into a nonzero exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<CliResult> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => { process.stdout.write(text); });
  const stderr = deps.stderr ?? ((text: string) => { process.stderr.write(text); });
  const color = deps.color ?? (Boolean(process.stdout.isTTY) && !env.NO_COLOR);

  const runConfig = loadRunConfig(undefined, cwd, env);
  const plugins = [...builtinPlugins, ...loadPluginProviders(runConfig.plugins, cwd)];
  const program = createProgram(buildOptionSchema(plugins, runConfig))
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  let commandLine: ParsedCommandLine;
  try {
    commandLine = parseCommandLine(program, argv);
  } catch (err) {
    if (err instanceof CommanderError) return { exitCode: err.exitCode };
    throw err;
  }

  try {
    const resolved = resolveConfiguration(commandLine.options, commandLine.targets, {
      loadCredentials: deps.loadCredentials,
    });
    const prober = (deps.createProber ?? defaultProber)(resolved.config);
    const parser = new ServerStringParser({ ipv6Supported: deps.ipv6Supported ?? detectIpv6Support() });
    const resolution = await resolveTargets(resolved.targets, resolved.config, prober, parser);

    if (!resolved.config.quiet) stdout(`${formatAvailabilityReport(resolution, { color })}\n`);
    return { exitCode: 0, resolved, resolution };
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof CrossTargetMisconfigurationError) {
      stderr(`${COMMAND_LINE_ERROR_FORMAT(err.message)}\n`);
      return { exitCode: 1 };
    }
    throw err;
  }
}

import { ConfigurationError, errorMessage } from '../errors.js';
import type {
  ClientAuthCredentials,
  HttpTunnelSettings,
  KeyFormat,
  RawOptionValues,
  ScanConfiguration,
  StartTlsLiteral,
  StartTlsMode,
  TlsWrappedProtocol,
} from '../types.js';
import { loadClientAuthCredentials } from './credentials.js';
import type { CredentialLoader } from './credentials.js';
import {
  DEFAULT_RETRY_COUNT,
  DEFAULT_TIMEOUT_SECONDS,
  REGULAR_COMMANDS,
  STARTTLS_LITERALS,
  STARTTLS_PROTOCOL_BY_NAME,
  STARTTLS_USAGE,
  STDOUT_SINK,
} from './defaults.js';
import { parseHttpTunnelUrl } from './proxy.js';
import { readTargetsFile } from './targets.js';

export interface ResolvedCommandLine {
  config: ScanConfiguration;
  /** Raw target strings, in the order they were given. */
  targets: readonly string[];
  /** Option values after shortcut expansion, plugin flags included. */
  options: RawOptionValues;
}

export interface ResolverDeps {
  loadCredentials?: CredentialLoader;
}

function stringOption(options: RawOptionValues, name: string): string | undefined {
  const value = options[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function numberOption(options: RawOptionValues, name: string, fallback: number): number {
  const value = options[name];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return parseInt(value, 10);
  return fallback;
}

function isStartTlsLiteral(value: string): value is StartTlsLiteral {
  return STARTTLS_LITERALS.some(literal => literal === value);
}

function isKeyFormat(value: string): value is KeyFormat {
  return value === 'DER' || value === 'PEM';
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) deepFreeze(nested);
  }
  return Object.freeze(value);
}

function collectTargets(options: RawOptionValues, positional: readonly string[]): string[] {
  const targetsFile = stringOption(options, 'targets_in');
  let targets = [...positional];

  if (targetsFile) {
    if (targets.length > 0) {
      throw new ConfigurationError(
        'MutuallyExclusiveInputs',
        'Cannot use --targets_in and specify targets within the command line.',
      );
    }
    targets = readTargetsFile(targetsFile);
  }

  if (targets.length === 0) throw new ConfigurationError('NoTargets', 'No targets to scan.');
  return targets;
}

function expandShortcut(options: RawOptionValues): RawOptionValues {
  if (options.regular !== true) return { ...options };
  const expanded: Record<string, unknown> = { ...options, regular: false };
  for (const command of REGULAR_COMMANDS) expanded[command] = true;
  return expanded;
}

function checkOutputSinks(xmlSink: string | undefined, jsonSink: string | undefined, quiet: boolean): void {
  if (xmlSink === STDOUT_SINK && quiet) {
    throw new ConfigurationError('OutputSinkConflict', 'Cannot use --quiet with --xml_out -.');
  }
  if (jsonSink === STDOUT_SINK && quiet) {
    throw new ConfigurationError('OutputSinkConflict', 'Cannot use --quiet with --json_out -.');
  }
  if (xmlSink === STDOUT_SINK && jsonSink === STDOUT_SINK) {
    throw new ConfigurationError('OutputSinkConflict', 'Cannot use --xml_out - with --json_out -.');
  }
}

function resolveClientAuth(options: RawOptionValues, loadCredentials: CredentialLoader): ClientAuthCredentials | undefined {
  const cert = stringOption(options, 'cert');
  const key = stringOption(options, 'key');

  if (Boolean(cert) !== Boolean(key)) {
    throw new ConfigurationError(
      'ClientAuthMismatch',
      'No private key or certificate file were given. See --cert and --key.',
    );
  }
  if (!cert || !key) return undefined;

  const keyForm = stringOption(options, 'keyform') ?? 'PEM';
  if (!isKeyFormat(keyForm)) {
    throw new ConfigurationError('InvalidKeyFormat', '--keyform should be DER or PEM.');
  }

  try {
    return loadCredentials(cert, key, keyForm, stringOption(options, 'pass') ?? '');
  } catch (err) {
    throw new ConfigurationError(
      'InvalidCredential',
      `Invalid client authentication settings: ${errorMessage(err)}.`,
      { cause: err },
    );
  }
}

function resolveHttpTunnel(options: RawOptionValues): HttpTunnelSettings | undefined {
  const proxyUrl = stringOption(options, 'https_tunnel');
  if (!proxyUrl) return undefined;
  try {
    return parseHttpTunnelUrl(proxyUrl);
  } catch (err) {
    throw new ConfigurationError(
      'InvalidProxyUrl',
      `Invalid proxy URL for --https_tunnel: ${errorMessage(err)}.`,
      { cause: err },
    );
  }
}

function resolveStartTls(options: RawOptionValues): { mode: StartTlsMode; protocol: TlsWrappedProtocol } {
  const value = stringOption(options, 'starttls');
  if (!value) return { mode: { kind: 'none' }, protocol: 'plain_tls' };
  if (!isStartTlsLiteral(value)) {
    throw new ConfigurationError('InvalidStartTlsValue', STARTTLS_USAGE);
  }
  if (value === 'auto') return { mode: { kind: 'auto' }, protocol: 'plain_tls' };

  const protocol = STARTTLS_PROTOCOL_BY_NAME.get(value) ?? 'plain_tls';
  return { mode: { kind: 'explicit', protocol }, protocol };
}

/**
 * Validates the command-line flags and builds the scan configuration shared
 * by every target. Checks run in a fixed order and the first failure throws
 * a ConfigurationError; nothing is resolved until all of them pass.
 */
export function resolveConfiguration(
  rawOptions: RawOptionValues,
  positionalTargets: readonly string[],
  deps: ResolverDeps = {},
): ResolvedCommandLine {
  const targets = collectTargets(rawOptions, positionalTargets);
  const options = expandShortcut(rawOptions);

  const quiet = options.quiet === true;
  const xmlSink = stringOption(options, 'xml_out');
  const jsonSink = stringOption(options, 'json_out');
  checkOutputSinks(xmlSink, jsonSink, quiet);

  const clientAuth = resolveClientAuth(options, deps.loadCredentials ?? loadClientAuthCredentials);
  const httpTunnel = resolveHttpTunnel(options);
  const startTls = resolveStartTls(options);

  const retryCount = numberOption(options, 'nb_retries', DEFAULT_RETRY_COUNT);
  if (retryCount < 1) {
    throw new ConfigurationError('InvalidRetryCount', 'Cannot have a number smaller than 1 for --nb_retries.');
  }

  const config: ScanConfiguration = {
    tlsWrappedProtocol: startTls.protocol,
    startTlsMode: startTls.mode,
    sniOverride: stringOption(options, 'sni'),
    xmppTo: stringOption(options, 'xmpp_to'),
    clientAuth,
    httpTunnel,
    timeoutSeconds: numberOption(options, 'timeout', DEFAULT_TIMEOUT_SECONDS),
    retryCount,
    quiet,
    xmlSink,
    jsonSink,
    httpGetShortcut: options.http_get === true,
  };

  return {
    config: deepFreeze(config),
    targets: Object.freeze(targets),
    options: Object.freeze(options),
  };
}

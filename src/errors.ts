export type ServerStringErrorKind = 'BadPort' | 'PlatformUnsupported';

export type ConnectivityErrorKind = 'UnresolvableHost' | 'UnreachablePort' | 'IpMismatch';

export type ConfigurationErrorKind =
  | 'MutuallyExclusiveInputs'
  | 'NoTargets'
  | 'UnreadableTargetsFile'
  | 'OutputSinkConflict'
  | 'ClientAuthMismatch'
  | 'InvalidKeyFormat'
  | 'InvalidCredential'
  | 'InvalidProxyUrl'
  | 'InvalidStartTlsValue'
  | 'InvalidRetryCount';

const SERVER_STRING_MESSAGES: Record<ServerStringErrorKind, string> = {
  BadPort: 'Not a valid host:port',
  PlatformUnsupported: 'IPv6 is not supported on this platform',
};

/** A target string that cannot be split into host, forced IP and port. */
export class ServerStringError extends Error {
  readonly kind: ServerStringErrorKind;

  constructor(kind: ServerStringErrorKind) {
    super(SERVER_STRING_MESSAGES[kind]);
    this.name = 'ServerStringError';
    this.kind = kind;
  }
}

/** Raised by a connectivity prober for a single unreachable target. */
export class ConnectivityError extends Error {
  readonly kind: ConnectivityErrorKind;

  constructor(kind: ConnectivityErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectivityError';
    this.kind = kind;
  }
}

/** Invalid global settings; always raised before any target is resolved. */
export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;

  constructor(kind: ConfigurationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.kind = kind;
  }
}

/**
 * A global setting that turns out to be invalid for a target, e.g. --xmpp_to
 * on a non-XMPP connection. Aborts the whole batch.
 */
export class CrossTargetMisconfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrossTargetMisconfigurationError';
  }
}

export const COMMAND_LINE_ERROR_FORMAT = (message: string): string =>
  `  Command line error: ${message}\n  Use -h for help.`;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

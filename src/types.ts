import type { ConnectivityError, ServerStringError } from './errors.js';

export type TlsWrappedProtocol =
  | 'plain_tls'
  | 'https'
  | 'starttls_smtp'
  | 'starttls_xmpp'
  | 'starttls_xmpp_server'
  | 'starttls_pop3'
  | 'starttls_imap'
  | 'starttls_ftp'
  | 'starttls_ldap'
  | 'starttls_rdp'
  | 'starttls_postgres';

export type StartTlsLiteral =
  | 'smtp'
  | 'xmpp'
  | 'xmpp_server'
  | 'pop3'
  | 'ftp'
  | 'imap'
  | 'ldap'
  | 'rdp'
  | 'postgres'
  | 'auto';

export type KeyFormat = 'DER' | 'PEM';

export type StartTlsMode =
  | { kind: 'none' }
  | { kind: 'explicit'; protocol: TlsWrappedProtocol }
  | { kind: 'auto' };

export interface ParsedTarget {
  host: string;
  forcedIp?: string;
  port?: number;
}

export interface ClientAuthCredentials {
  readonly certificatePath: string;
  readonly privateKeyPath: string;
  readonly keyFormat: KeyFormat;
  readonly passphrase: string;
}

export interface HttpTunnelSettings {
  readonly host: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
}

export interface ScanConfiguration {
  readonly tlsWrappedProtocol: TlsWrappedProtocol;
  readonly startTlsMode: Readonly<StartTlsMode>;
  readonly sniOverride?: string;
  readonly xmppTo?: string;
  readonly clientAuth?: ClientAuthCredentials;
  readonly httpTunnel?: HttpTunnelSettings;
  readonly timeoutSeconds: number;
  readonly retryCount: number;
  readonly quiet: boolean;
  readonly xmlSink?: string;
  readonly jsonSink?: string;
  readonly httpGetShortcut: boolean;
}

export interface ServerConnectivityDescriptor {
  /** Target exactly as the user typed it, kept for diagnostics. */
  readonly originalString: string;
  readonly hostname: string;
  readonly resolvedIp?: string;
  readonly port: number;
  readonly tlsWrappedProtocol: TlsWrappedProtocol;
  readonly tlsServerNameIndication: string;
  readonly xmppTo?: string;
  readonly clientAuth?: ClientAuthCredentials;
  readonly httpTunnel?: HttpTunnelSettings;
}

export interface FailedTarget {
  readonly originalString: string;
  readonly reason: ServerStringError | ConnectivityError;
}

export interface TargetResolution {
  descriptors: ServerConnectivityDescriptor[];
  failures: FailedTarget[];
}

/** Raw flag values as produced by the command-line parser. */
export type RawOptionValues = Readonly<Record<string, unknown>>;

export interface RunConfig {
  timeout: number;
  nbRetries: number;
  plugins: string[];
}

import type { RunConfig, StartTlsLiteral, TlsWrappedProtocol } from '../types.js';

export const VERSION = '1.0.0';

export const DEFAULT_TIMEOUT_SECONDS = 5;
export const DEFAULT_RETRY_COUNT = 3;

export const DEFAULT_RUN_CONFIG: RunConfig = {
  timeout: DEFAULT_TIMEOUT_SECONDS,
  nbRetries: DEFAULT_RETRY_COUNT,
  plugins: [],
};

// What --regular expands to
export const REGULAR_COMMANDS: readonly string[] = Object.freeze([
  'sslv2',
  'sslv3',
  'tlsv1',
  'tlsv1_1',
  'tlsv1_2',
  'reneg',
  'resum',
  'certinfo_basic',
  'http_get',
  'hide_rejected_ciphers',
  'compression',
  'heartbleed',
  'openssl_ccs',
  'fallback',
]);

export const STARTTLS_LITERALS: readonly StartTlsLiteral[] = Object.freeze([
  'smtp',
  'xmpp',
  'xmpp_server',
  'pop3',
  'ftp',
  'imap',
  'ldap',
  'rdp',
  'postgres',
  'auto',
] as const);

export const STARTTLS_USAGE =
  `StartTLS should be one of: ${STARTTLS_LITERALS.join(' , ')}. ` +
  "The 'auto' option will cause tlsaudit to deduce the protocol (ftp, imap, etc.) " +
  'from the supplied port number, for each target servers.';

export const STARTTLS_PROTOCOL_BY_NAME: ReadonlyMap<Exclude<StartTlsLiteral, 'auto'>, TlsWrappedProtocol> =
  new Map([
    ['smtp', 'starttls_smtp'],
    ['xmpp', 'starttls_xmpp'],
    ['xmpp_server', 'starttls_xmpp_server'],
    ['pop3', 'starttls_pop3'],
    ['imap', 'starttls_imap'],
    ['ftp', 'starttls_ftp'],
    ['ldap', 'starttls_ldap'],
    ['rdp', 'starttls_rdp'],
    ['postgres', 'starttls_postgres'],
  ]);

// Used by --starttls auto
export const STARTTLS_PROTOCOL_BY_PORT: ReadonlyMap<number, TlsWrappedProtocol> = new Map([
  [25, 'starttls_smtp'],
  [587, 'starttls_smtp'],
  [5222, 'starttls_xmpp'],
  [5269, 'starttls_xmpp_server'],
  [109, 'starttls_pop3'],
  [110, 'starttls_pop3'],
  [143, 'starttls_imap'],
  [220, 'starttls_imap'],
  [21, 'starttls_ftp'],
  [389, 'starttls_ldap'],
  [3268, 'starttls_ldap'],
  [3389, 'starttls_rdp'],
  [5432, 'starttls_postgres'],
]);

export const DEFAULT_PORTS: Readonly<Record<TlsWrappedProtocol, number>> = Object.freeze({
  plain_tls: 443,
  https: 443,
  starttls_smtp: 25,
  starttls_xmpp: 5222,
  starttls_xmpp_server: 5269,
  starttls_pop3: 110,
  starttls_imap: 143,
  starttls_ftp: 21,
  starttls_ldap: 389,
  starttls_rdp: 3389,
  starttls_postgres: 5432,
});

export const XMPP_PROTOCOLS: readonly TlsWrappedProtocol[] = Object.freeze([
  'starttls_xmpp',
  'starttls_xmpp_server',
] as const);

export const STDOUT_SINK = '-';

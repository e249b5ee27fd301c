import { definePlugin } from './types.js';
import type { PluginOptionProvider } from './types.js';

const cipherSuitesPlugin = definePlugin(
  'OpenSslCipherSuitesPlugin',
  'Scans the server(s) for supported OpenSSL cipher suites.',
  [
    { flags: '--sslv2', description: 'Lists the SSL 2.0 OpenSSL cipher suites supported by the server(s).' },
    { flags: '--sslv3', description: 'Lists the SSL 3.0 OpenSSL cipher suites supported by the server(s).' },
    { flags: '--tlsv1', description: 'Lists the TLS 1.0 OpenSSL cipher suites supported by the server(s).' },
    { flags: '--tlsv1_1', description: 'Lists the TLS 1.1 OpenSSL cipher suites supported by the server(s).' },
    { flags: '--tlsv1_2', description: 'Lists the TLS 1.2 OpenSSL cipher suites supported by the server(s).' },
    {
      flags: '--http_get',
      description: 'Option - For each cipher suite, sends an HTTP GET request after completing the handshake and returns the HTTP status code.',
    },
    {
      flags: '--hide_rejected_ciphers',
      description: 'Option - Hides the (usually long) list of cipher suites that were rejected by the server(s).',
    },
  ],
);

const certificateInfoPlugin = definePlugin(
  'CertificateInfoPlugin',
  'Verifies the validity of the server(s) certificate(s) against various trust stores.',
  [
    { flags: '--certinfo_basic', description: 'Verifies the validity of the certificate chain and prints basic information.' },
    { flags: '--certinfo_full', description: 'Verifies the validity of the certificate chain and prints the full certificate.' },
    { flags: '--ca_file <file>', description: 'Local Certificate Authority file (in PEM format), to verify the validity of the server(s) certificate(s) against.' },
  ],
);

const compressionPlugin = definePlugin(
  'CompressionPlugin',
  'Tests the server(s) for Zlib compression support.',
  [{ flags: '--compression', description: 'Tests the server(s) for Zlib compression support.' }],
);

const fallbackScsvPlugin = definePlugin(
  'FallbackScsvPlugin',
  'Scans the server(s) to check if they support TLS_FALLBACK_SCSV.',
  [{ flags: '--fallback', description: 'Checks support for the TLS_FALLBACK_SCSV cipher suite to prevent downgrade attacks.' }],
);

const heartbleedPlugin = definePlugin(
  'HeartbleedPlugin',
  'Tests the server(s) for the OpenSSL Heartbleed vulnerability.',
  [{ flags: '--heartbleed', description: 'Tests the server(s) for the OpenSSL Heartbleed vulnerability.' }],
);

const httpHeadersPlugin = definePlugin(
  'HttpHeadersPlugin',
  'Checks for the HTTP Strict Transport Security and HTTP Public Key Pinning headers.',
  [{ flags: '--http_headers', description: 'Checks for the HSTS and HPKP HTTP headers within the response sent back by the server(s).' }],
);

const ccsInjectionPlugin = definePlugin(
  'OpenSslCcsInjectionPlugin',
  'Tests the server(s) for the OpenSSL CCS injection vulnerability.',
  [{ flags: '--openssl_ccs', description: 'Tests the server(s) for the OpenSSL CCS injection vulnerability (CVE-2014-0224).' }],
);

const renegotiationPlugin = definePlugin(
  'SessionRenegotiationPlugin',
  'Tests the server(s) for client-initiated renegotiation and secure renegotiation support.',
  [{ flags: '--reneg', description: 'Tests the server(s) for client-initiated renegotiation and secure renegotiation support.' }],
);

const resumptionPlugin = definePlugin(
  'SessionResumptionPlugin',
  'Analyzes the server(s) SSL session resumption capabilities.',
  [
    { flags: '--resum', description: 'Tests the server(s) for session resumption support using session IDs and TLS session tickets.' },
    { flags: '--resum_rate', description: 'Performs 100 session resumptions with the server(s), in order to estimate the session resumption rate.' },
  ],
);

export const builtinPlugins: readonly PluginOptionProvider[] = Object.freeze([
  cipherSuitesPlugin,
  certificateInfoPlugin,
  compressionPlugin,
  fallbackScsvPlugin,
  heartbleedPlugin,
  httpHeadersPlugin,
  ccsInjectionPlugin,
  renegotiationPlugin,
  resumptionPlugin,
]);

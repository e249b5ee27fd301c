import { STARTTLS_USAGE } from '../config/defaults.js';
import { definePlugin } from '../plugins/types.js';
import type { PluginOptionProvider } from '../plugins/types.js';

export const clientCertificateGroup = definePlugin('Client certificate options', '', [
  {
    flags: '--cert <file>',
    description:
      "Client certificate chain filename. The certificates must be in PEM format and must be sorted starting with the subject's client certificate, followed by intermediate CA certificates if applicable.",
  },
  { flags: '--key <file>', description: 'Client private key filename.' },
  { flags: '--keyform <format>', description: 'Client private key format. DER or PEM (default).', defaultValue: 'PEM' },
  { flags: '--pass <passphrase>', description: 'Client private key passphrase.', defaultValue: '' },
]);

export const inputOutputGroup = definePlugin('Input and output options', '', [
  {
    flags: '--xml_out <file>',
    description: 'Write the scan results as an XML document to the file XML_FILE. If XML_FILE is set to "-", the XML output will instead be printed to stdout.',
  },
  {
    flags: '--json_out <file>',
    description: 'Write the scan results as a JSON document to the file JSON_FILE. If JSON_FILE is set to "-", the JSON output will instead be printed to stdout.',
  },
  {
    flags: '--targets_in <file>',
    description: 'Read the list of targets to scan from the file TARGETS_IN. It should contain one host:port per line.',
  },
  { flags: '--quiet', description: 'Do not output anything to stdout; useful when using --xml_out or --json_out.' },
]);

export function connectivityGroup(defaults: { timeout: number; nbRetries: number }): PluginOptionProvider {
  return definePlugin('Connectivity options', '', [
    {
      flags: '--timeout <seconds>',
      description: `Set the timeout value in seconds used for every socket connection made to the target server(s). Default is ${defaults.timeout}s.`,
      defaultValue: defaults.timeout,
      integer: true,
    },
    {
      flags: '--nb_retries <n>',
      description: `Set the number retry attempts for all network connections initiated throughout the scan. Default is ${defaults.nbRetries} connection attempts.`,
      defaultValue: defaults.nbRetries,
      integer: true,
    },
    {
      flags: '--https_tunnel <url>',
      description: "Tunnel all traffic to the target server(s) through an HTTP CONNECT proxy. HTTP_TUNNEL should be the proxy's URL: 'http://USER:PW@HOST:PORT/'. For proxies requiring authentication, only Basic Authentication is supported.",
    },
    {
      flags: '--starttls <protocol>',
      description: `Perform a StartTLS handshake when connecting to the target server(s). ${STARTTLS_USAGE}`,
    },
    {
      flags: '--xmpp_to <hostname>',
      description: "Optional setting for STARTTLS XMPP. XMPP_TO should be the hostname to be put in the 'to' attribute of the XMPP stream. Default is the server's hostname.",
    },
    {
      flags: '--sni <hostname>',
      description: 'Use Server Name Indication to specify the hostname to connect to. Will only affect TLS 1.0+ connections.',
    },
  ]);
}

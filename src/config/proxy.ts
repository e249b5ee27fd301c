import type { HttpTunnelSettings } from '../types.js';

const DEFAULT_PROXY_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443,
};

/**
 * Parses `http://USER:PW@HOST:PORT/` into tunnel settings. Throws on a
 * malformed URL, a missing host or a scheme other than http/https.
 */
export function parseHttpTunnelUrl(proxyUrl: string): HttpTunnelSettings {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch (err) {
    throw new Error('Invalid proxy URL', { cause: err });
  }

  const defaultPort = DEFAULT_PROXY_PORTS[url.protocol];
  if (defaultPort === undefined) throw new Error('Invalid URL scheme');
  if (!url.hostname) throw new Error('Invalid proxy URL');

  // IPv6 hosts come back bracketed
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const settings: HttpTunnelSettings = {
    host,
    port: url.port ? parseInt(url.port, 10) : defaultPort,
    ...(url.username ? { user: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
  };
  return Object.freeze(settings);
}

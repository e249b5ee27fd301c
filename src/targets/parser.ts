import os from 'os';
import { ServerStringError } from '../errors.js';
import type { ParsedTarget } from '../types.js';

export interface ServerStringParserOptions {
  /** Whether bracketed IPv6 targets can be used on this host. Defaults to true. */
  ipv6Supported?: boolean;
}

/** True when any network interface, loopback included, has an IPv6 address. */
export function detectIpv6Support(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces(),
): boolean {
  return Object.values(interfaces).some(infos => (infos ?? []).some(info => info.family === 'IPv6'));
}

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

function toPort(raw: string): number {
  if (!INTEGER_RE.test(raw)) throw new ServerStringError('BadPort');
  const port = parseInt(raw, 10);
  if (port < 1 || port > 65535) throw new ServerStringError('BadPort');
  return port;
}

/**
 * Parses `host[:port]`, `[ipv6][:port]`, and either form suffixed with
 * `{ip}`, into host, forced IP and port.
 *
 * Host and port are not validated beyond the port being an integer in range;
 * resolvability is left to the connectivity prober.
 */
export class ServerStringParser {
  private readonly ipv6Supported: boolean;

  constructor(options: ServerStringParserOptions = {}) {
    this.ipv6Supported = options.ipv6Supported ?? true;
  }

  parse(serverString: string): ParsedTarget {
    let hostString = serverString;
    let forcedIp: string | undefined;

    if (serverString.includes('{') && serverString.includes('}')) {
      const segments = serverString.split('{');
      hostString = segments[0] ?? '';
      forcedIp = (segments[1] ?? '').replace(/\}/g, '');
    }

    if (hostString.includes('[')) {
      const { host, port } = this.parseIpv6(hostString);
      return { host, forcedIp, port };
    }

    // A bracketed forced IP supplies a port that beats the one after the hostname
    let forcedIpPort: number | undefined;
    if (forcedIp !== undefined && forcedIp.includes('[')) {
      const parsed = this.parseIpv6(forcedIp);
      forcedIp = parsed.host;
      forcedIpPort = parsed.port;
    }

    const { host, port } = this.parseIpv4(hostString);
    return { host, forcedIp, port: forcedIpPort ?? port };
  }

  private parseIpv4(hostString: string): { host: string; port?: number } {
    if (!hostString.includes(':')) return { host: hostString };
    const segments = hostString.split(':');
    return { host: segments[0] ?? '', port: toPort(segments[1] ?? '') };
  }

  private parseIpv6(hostString: string): { host: string; port?: number } {
    if (!this.ipv6Supported) throw new ServerStringError('PlatformUnsupported');

    const closing = hostString.indexOf(']');
    const bracketed = closing === -1 ? hostString : hostString.slice(0, closing);
    const remainder = closing === -1 ? '' : hostString.slice(closing + 1);
    const host = bracketed.slice(bracketed.indexOf('[') + 1);

    if (!remainder.includes(':')) return { host };
    return { host, port: toPort(remainder.split(':')[1] ?? '') };
  }
}

const defaultParser = new ServerStringParser();

export function parseServerString(serverString: string): ParsedTarget {
  return defaultParser.parse(serverString);
}

import dns from 'dns/promises';
import net from 'net';
import { ConnectivityError, errorMessage } from '../errors.js';
import type { HttpTunnelSettings } from '../types.js';

export interface ProbeRequest {
  hostname: string;
  port: number;
  forcedIp?: string;
  httpTunnel?: HttpTunnelSettings;
}

/** Resolves the IP to connect to for a target, or throws ConnectivityError. */
export interface ConnectivityProber {
  resolve(request: ProbeRequest): Promise<string | undefined>;
}

export interface LookupAddress {
  address: string;
  family: number;
}

export type LookupFn = (hostname: string) => Promise<LookupAddress[]>;
export type ConnectFn = (host: string, port: number, timeoutMs: number) => Promise<void>;

export interface DnsProberOptions {
  timeoutSeconds: number;
  retryCount: number;
  lookup?: LookupFn;
  connect?: ConnectFn;
}

const defaultLookup: LookupFn = hostname => dns.lookup(hostname, { all: true });

const defaultConnect: ConnectFn = (host, port, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error('timeout'));
    });
    socket.once('error', err => {
      socket.destroy();
      reject(err);
    });
  });

/**
 * Looks the hostname up (IPv4 first) and checks the port accepts TCP
 * connections. Targets reached through an HTTP CONNECT proxy are left for
 * the proxy to resolve.
 */
export class DnsConnectivityProber implements ConnectivityProber {
  private readonly timeoutMs: number;
  private readonly retryCount: number;
  private readonly lookup: LookupFn;
  private readonly connect: ConnectFn;

  constructor(options: DnsProberOptions) {
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.retryCount = Math.max(1, options.retryCount);
    this.lookup = options.lookup ?? defaultLookup;
    this.connect = options.connect ?? defaultConnect;
  }

  async resolve(request: ProbeRequest): Promise<string | undefined> {
    const { hostname, port, forcedIp, httpTunnel } = request;

    if (forcedIp !== undefined) {
      if (!net.isIP(forcedIp)) {
        throw new ConnectivityError('IpMismatch', `${forcedIp} is not a valid IP address`);
      }
      if (net.isIP(hostname) && hostname !== forcedIp) {
        throw new ConnectivityError('IpMismatch', `${hostname} does not match the supplied IP address ${forcedIp}`);
      }
    }
    if (httpTunnel) return forcedIp;

    const ip = forcedIp ?? await this.lookupHost(hostname);
    await this.checkReachable(ip, port);
    return ip;
  }

  private async lookupHost(hostname: string): Promise<string> {
    if (!hostname) throw new ConnectivityError('UnresolvableHost', 'Could not resolve an empty hostname');
    if (net.isIP(hostname)) return hostname;

    let addresses: LookupAddress[];
    try {
      addresses = await this.lookup(hostname);
    } catch (err) {
      throw new ConnectivityError('UnresolvableHost', `Could not resolve ${hostname}`, { cause: err });
    }
    const preferred = addresses.find(a => a.family === 4) ?? addresses[0];
    if (!preferred) throw new ConnectivityError('UnresolvableHost', `Could not resolve ${hostname}`);
    return preferred.address;
  }

  private async checkReachable(ip: string, port: number): Promise<void> {
    let lastErr: unknown;
    for (let attempt = 1; attempt <= this.retryCount; attempt++) {
      try {
        await this.connect(ip, port, this.timeoutMs);
        return;
      } catch (err) {
        lastErr = err;
      }
    }
    throw new ConnectivityError(
      'UnreachablePort',
      `Could not connect to ${ip}:${port} (${errorMessage(lastErr)})`,
      { cause: lastErr },
    );
  }
}

import { ConnectivityError } from '../src/errors';
import type { ConnectivityProber, ProbeRequest } from '../src/targets/prober';
import type { ScanConfiguration } from '../src/types';

export function makeConfig(overrides: Partial<ScanConfiguration> = {}): ScanConfiguration {
  return {
    tlsWrappedProtocol: 'plain_tls',
    startTlsMode: { kind: 'none' },
    timeoutSeconds: 5,
    retryCount: 3,
    quiet: false,
    httpGetShortcut: false,
    ...overrides,
  };
}

/** Resolves hostnames from a fixed table; unknown names are unresolvable. */
export class FakeProber implements ConnectivityProber {
  readonly requests: ProbeRequest[] = [];

  constructor(private readonly table: Record<string, string> = {}) {}

  async resolve(request: ProbeRequest): Promise<string | undefined> {
    this.requests.push(request);
    if (request.forcedIp) return request.forcedIp;
    if (request.httpTunnel) return undefined;
    const ip = this.table[request.hostname];
    if (!ip) throw new ConnectivityError('UnresolvableHost', `Could not resolve ${request.hostname}`);
    return ip;
  }
}

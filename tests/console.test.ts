import { ConnectivityError, ServerStringError } from '../src/errors';
import { formatAvailabilityReport, serverLabel } from '../src/report/console';
import type { ServerConnectivityDescriptor } from '../src/types';

function descriptor(overrides: Partial<ServerConnectivityDescriptor> = {}): ServerConnectivityDescriptor {
  return {
    originalString: 'example.test',
    hostname: 'example.test',
    resolvedIp: '192.0.2.10',
    port: 443,
    tlsWrappedProtocol: 'plain_tls',
    tlsServerNameIndication: 'example.test',
    ...overrides,
  };
}

describe('serverLabel', () => {
  it('joins host and port', () => {
    expect(serverLabel({ hostname: 'example.test', port: 443 })).toBe('example.test:443');
  });

  it('brackets IPv6 hosts', () => {
    expect(serverLabel({ hostname: '2001:db8::1', port: 8443 })).toBe('[2001:db8::1]:8443');
  });
});

describe('formatAvailabilityReport', () => {
  it('lists resolved servers then failures', () => {
    const report = formatAvailabilityReport(
      {
        descriptors: [descriptor()],
        failures: [{ originalString: 'nowhere.test', reason: new ConnectivityError('UnresolvableHost', 'Could not resolve nowhere.test') }],
      },
      { color: false },
    );

    expect(report.split('\n')).toEqual([
      '',
      ' CHECKING HOST(S) AVAILABILITY',
      ' -----------------------------',
      '',
      `   ${'example.test:443'.padEnd(37)} => 192.0.2.10`,
      `   ${'nowhere.test'.padEnd(37)} => WARNING: Could not resolve nowhere.test; discarding corresponding tasks.`,
      '',
    ]);
  });

  it('appends the protocol for wrapped connections', () => {
    const report = formatAvailabilityReport(
      { descriptors: [descriptor({ port: 587, tlsWrappedProtocol: 'starttls_smtp' })], failures: [] },
      { color: false },
    );
    expect(report.split('\n')[4]).toBe(`   ${'example.test:587'.padEnd(37)} => 192.0.2.10 (starttls_smtp)`);
  });

  it('shows the tunnel for proxied servers', () => {
    const report = formatAvailabilityReport(
      {
        descriptors: [descriptor({ resolvedIp: undefined, httpTunnel: { host: 'proxy.test', port: 3128 } })],
        failures: [],
      },
      { color: false },
    );
    expect(report.split('\n')[4]).toBe(`   ${'example.test:443'.padEnd(37)} => proxied through proxy.test:3128`);
  });

  it('reports parse failures with the original string', () => {
    const report = formatAvailabilityReport(
      { descriptors: [], failures: [{ originalString: 'host:port', reason: new ServerStringError('BadPort') }] },
      { color: false },
    );
    expect(report.split('\n')[4]).toBe(
      `   ${'host:port'.padEnd(37)} => WARNING: Not a valid host:port; discarding corresponding tasks.`,
    );
  });

  it('colors the title and results by default', () => {
    const lines = formatAvailabilityReport({ descriptors: [descriptor()], failures: [] }).split('\n');
    expect(lines[1]).toBe(' \x1b[1mCHECKING HOST(S) AVAILABILITY\x1b[0m');
    expect(lines[4]).toBe(`   ${'example.test:443'.padEnd(37)} => \x1b[32m192.0.2.10\x1b[0m`);
  });
});

import net from 'net';
import type { FailedTarget, ServerConnectivityDescriptor, TargetResolution } from '../types.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const YELLOW = '\x1b[33m';
const GREEN = '\x1b[32m';

const TITLE = 'CHECKING HOST(S) AVAILABILITY';
const COLUMN_WIDTH = 37;

export interface ReportOptions {
  color?: boolean;
}

export function serverLabel(descriptor: Pick<ServerConnectivityDescriptor, 'hostname' | 'port'>): string {
  const host = net.isIPv6(descriptor.hostname) ? `[${descriptor.hostname}]` : descriptor.hostname;
  return `${host}:${descriptor.port}`;
}

function describeServer(d: ServerConnectivityDescriptor): string {
  let destination: string;
  if (d.resolvedIp) destination = d.resolvedIp;
  else if (d.httpTunnel) destination = `proxied through ${d.httpTunnel.host}:${d.httpTunnel.port}`;
  else destination = 'unresolved';
  return d.tlsWrappedProtocol === 'plain_tls' ? destination : `${destination} (${d.tlsWrappedProtocol})`;
}

function failureText(f: FailedTarget): string {
  return `WARNING: ${f.reason.message}; discarding corresponding tasks.`;
}

export function formatAvailabilityReport(result: TargetResolution, options: ReportOptions = {}): string {
  const color = options.color ?? true;
  const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);

  const lines = ['', ` ${paint(BOLD, TITLE)}`, ` ${'-'.repeat(TITLE.length)}`, ''];

  for (const d of result.descriptors) {
    lines.push(`   ${serverLabel(d).padEnd(COLUMN_WIDTH)} => ${paint(GREEN, describeServer(d))}`);
  }
  for (const f of result.failures) {
    lines.push(`   ${f.originalString.padEnd(COLUMN_WIDTH)} => ${paint(YELLOW, failureText(f))}`);
  }
  lines.push('');
  return lines.join('\n');
}

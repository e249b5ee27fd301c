import net from 'net';
import { domainToASCII } from 'url';
import { DEFAULT_PORTS, STARTTLS_PROTOCOL_BY_PORT, XMPP_PROTOCOLS } from '../config/defaults.js';
import { CrossTargetMisconfigurationError } from '../errors.js';
import type { ParsedTarget, ScanConfiguration, ServerConnectivityDescriptor } from '../types.js';
import type { ConnectivityProber } from './prober.js';

/** Internationalized hostnames are stored in their ASCII (punycode) form. */
export function toAsciiHostname(hostname: string): string {
  if (!hostname || net.isIP(hostname)) return hostname;
  return domainToASCII(hostname) || hostname;
}

export async function createServerDescriptor(
  originalString: string,
  target: ParsedTarget,
  config: ScanConfiguration,
  prober: ConnectivityProber,
): Promise<ServerConnectivityDescriptor> {
  const hostname = toAsciiHostname(target.host);
  const protocol = config.tlsWrappedProtocol;
  const port = target.port ?? DEFAULT_PORTS[protocol];

  const resolvedIp = await prober.resolve({
    hostname,
    port,
    forcedIp: target.forcedIp,
    httpTunnel: config.httpTunnel,
  });

  if (config.xmppTo && !XMPP_PROTOCOLS.includes(protocol)) {
    throw new CrossTargetMisconfigurationError('Can only specify xmpp_to for the XMPP StartTLS protocol.');
  }

  return Object.freeze({
    originalString,
    hostname,
    resolvedIp,
    port,
    tlsWrappedProtocol: protocol,
    tlsServerNameIndication: config.sniOverride ?? hostname,
    xmppTo: config.xmppTo,
    clientAuth: config.clientAuth,
    httpTunnel: config.httpTunnel,
  });
}

/**
 * Settles the protocol of a resolved server: `--starttls auto` picks it from
 * the port, then `--http_get` turns port 443 into HTTPS. Returns a new
 * descriptor when the protocol changes.
 */
export function finalizeDescriptor(
  descriptor: ServerConnectivityDescriptor,
  config: ScanConfiguration,
): ServerConnectivityDescriptor {
  let protocol = descriptor.tlsWrappedProtocol;
  if (config.startTlsMode.kind === 'auto') {
    protocol = STARTTLS_PROTOCOL_BY_PORT.get(descriptor.port) ?? protocol;
  }
  if (config.httpGetShortcut && descriptor.port === 443) {
    protocol = 'https';
  }
  if (protocol === descriptor.tlsWrappedProtocol) return descriptor;
  return Object.freeze({ ...descriptor, tlsWrappedProtocol: protocol });
}

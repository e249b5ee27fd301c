import { ConnectivityError, ServerStringError } from '../errors.js';
import type { FailedTarget, ScanConfiguration, ServerConnectivityDescriptor, TargetResolution } from '../types.js';
import { createServerDescriptor, finalizeDescriptor } from './descriptor.js';
import { ServerStringParser } from './parser.js';
import type { ConnectivityProber } from './prober.js';

/**
 * Resolves every target string, one after the other, into either a
 * descriptor or a failure. Parse and connectivity errors stay with their
 * target; anything else (e.g. --xmpp_to on a non-XMPP connection) aborts the
 * batch.
 */
export async function resolveTargets(
  targets: readonly string[],
  config: ScanConfiguration,
  prober: ConnectivityProber,
  parser: ServerStringParser = new ServerStringParser(),
): Promise<TargetResolution> {
  const descriptors: ServerConnectivityDescriptor[] = [];
  const failures: FailedTarget[] = [];

  for (const serverString of targets) {
    try {
      const parsed = parser.parse(serverString);
      descriptors.push(await createServerDescriptor(serverString, parsed, config, prober));
    } catch (err) {
      if (err instanceof ServerStringError || err instanceof ConnectivityError) {
        failures.push(Object.freeze({ originalString: serverString, reason: err }));
        continue;
      }
      throw err;
    }
  }

  return {
    descriptors: descriptors.map(d => finalizeDescriptor(d, config)),
    failures,
  };
}

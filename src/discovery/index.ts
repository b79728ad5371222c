import type { LogFns } from "../logging.js";
import { broadcastProbe } from "./broadcast.js";
import { probeSubnet } from "./subnet.js";
import type { DiscoverFn, DiscoveryOptions } from "./types.js";

export { broadcastProbe } from "./broadcast.js";
export { enumerateHosts, parseCidr, probeHost, probeSubnet, type Ipv4Network } from "./subnet.js";
export * from "./types.js";

export type DiscoveryParams = DiscoveryOptions & {
  subnets: readonly string[];
};

/**
 * Broadcast probe plus one sweep per configured subnet, run concurrently.
 * The result is the de-duplicated union in first-seen order.
 */
export function createDiscovery(params: DiscoveryParams, log: LogFns): DiscoverFn {
  return async (signal) => {
    const scans = await Promise.all([
      broadcastProbe(params, log, signal),
      ...params.subnets.map((cidr) => probeSubnet(cidr, params, log, signal)),
    ]);
    const hosts = [...new Set(scans.flat())];
    log.info(`discovery found ${hosts.length} candidate address(es)`);
    return hosts;
  };
}

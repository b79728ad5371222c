// ---------------------------------------------------------------------------
// Discovery Engine – Core Types
// ---------------------------------------------------------------------------

import { DEVICE_PORT, DISCOVERY_PORT } from "../protocol/types.js";

export type DiscoveryOptions = {
  // UDP broadcast probe
  broadcastAddress: string;
  broadcastPort: number;
  sendCount: number;
  sendIntervalMs: number;
  /** Receive waits allowed for the first reply before giving up. */
  firstReplyAttempts: number;
  receiveTimeoutMs: number;
  /** Distinct source addresses after which collection stops. */
  maxReplies: number;

  // TCP subnet probe
  port: number;
  subnetProbeTimeoutMs: number;
  /** Ranges enumerating more hosts than this are refused. */
  maxSubnetHosts: number;
};

export type BroadcastOptions = Pick<
  DiscoveryOptions,
  | "broadcastAddress"
  | "broadcastPort"
  | "sendCount"
  | "sendIntervalMs"
  | "firstReplyAttempts"
  | "receiveTimeoutMs"
  | "maxReplies"
>;

export type SubnetProbeOptions = Pick<DiscoveryOptions, "port" | "subnetProbeTimeoutMs" | "maxSubnetHosts">;

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
  broadcastAddress: "255.255.255.255",
  broadcastPort: DISCOVERY_PORT,
  sendCount: 3,
  sendIntervalMs: 30,
  firstReplyAttempts: 5,
  receiveTimeoutMs: 100,
  maxReplies: 255,
  port: DEVICE_PORT,
  subnetProbeTimeoutMs: 1_000,
  maxSubnetHosts: 4_096,
};

/** Candidate device hosts, de-duplicated. */
export type DiscoverFn = (signal?: AbortSignal) => Promise<string[]>;

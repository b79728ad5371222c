// ---------------------------------------------------------------------------
// Subnet probe – TCP connect sweep over an IPv4 CIDR range
// ---------------------------------------------------------------------------
// Covers networks where broadcast does not reach the devices (VLANs,
// routed segments). A host counts as found when the device port accepts a
// connection; nothing is sent.
// ---------------------------------------------------------------------------

import { createConnection } from "node:net";
import type { LogFns } from "../logging.js";
import type { SubnetProbeOptions } from "./types.js";

export type Ipv4Network = {
  /** Network address as an unsigned 32-bit integer. */
  network: number;
  prefix: number;
};

const OCTET_RE = /^(0|[1-9]\d{0,2})$/;

function parseIpv4(value: string): number | null {
  const parts = value.split(".");
  if (parts.length !== 4) {
    return null;
  }
  let result = 0;
  for (const part of parts) {
    if (!OCTET_RE.test(part)) {
      return null;
    }
    const octet = Number(part);
    if (octet > 255) {
      return null;
    }
    result = result * 256 + octet;
  }
  return result;
}

function formatIpv4(value: number): string {
  return [value >>> 24, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join(".");
}

/** Host bits are masked off, so `192.168.1.7/24` parses as `192.168.1.0/24`. */
export function parseCidr(cidr: string): Ipv4Network {
  const trimmed = cidr.trim();
  const [addressPart, prefixPart, ...rest] = trimmed.split("/");
  const address = addressPart === undefined ? null : parseIpv4(addressPart);
  if (address === null || rest.length > 0) {
    throw new Error(`malformed CIDR "${cidr}"`);
  }

  let prefix = 32;
  if (prefixPart !== undefined) {
    if (!/^\d{1,2}$/.test(prefixPart) || Number(prefixPart) > 32) {
      throw new Error(`malformed CIDR "${cidr}": bad prefix length`);
    }
    prefix = Number(prefixPart);
  }

  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  return { network: (address & mask) >>> 0, prefix };
}

/**
 * Usable host addresses of a range: network and broadcast addresses are
 * skipped, except for /31 (both addresses) and /32 (the single address).
 */
export function enumerateHosts(cidr: string, maxHosts = Number.POSITIVE_INFINITY): string[] {
  const { network, prefix } = parseCidr(cidr);
  const size = 2 ** (32 - prefix);

  let first = network;
  let last = network + size - 1;
  if (prefix < 31) {
    first += 1;
    last -= 1;
  }

  const count = last - first + 1;
  if (count > maxHosts) {
    throw new Error(`subnet ${cidr} has ${count} hosts, more than the limit of ${maxHosts}`);
  }

  const hosts: string[] = [];
  for (let value = first; value <= last; value++) {
    hosts.push(formatIpv4(value));
  }
  return hosts;
}

/** Resolves true when `host:port` accepts a TCP connection within the timeout. */
export function probeHost(
  host: string,
  port: number,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const socket = createConnection({ host, port });

    const finish = (found: boolean) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      resolve(found);
    };
    const onAbort = () => finish(false);
    const timer = setTimeout(() => finish(false), timeoutMs);

    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function probeSubnet(
  cidr: string,
  options: SubnetProbeOptions,
  log: LogFns,
  signal?: AbortSignal,
): Promise<string[]> {
  let hosts: string[];
  try {
    hosts = enumerateHosts(cidr, options.maxSubnetHosts);
  } catch (err) {
    log.error(`skipping subnet: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }

  log.debug(`probing ${hosts.length} host(s) in ${cidr} on port ${options.port}`);
  const results = await Promise.all(
    hosts.map((host) => probeHost(host, options.port, options.subnetProbeTimeoutMs, signal)),
  );
  const found = hosts.filter((_, i) => results[i]);
  log.debug(`subnet ${cidr}: ${found.length} device(s) answered`);
  return found;
}

// ---------------------------------------------------------------------------
// ReconcileLoop – periodic discovery and registry maintenance
// ---------------------------------------------------------------------------
// One background task: tick, idle for the scan interval, repeat. Each tick
// diffs discovered addresses against the previous tick, connects and
// registers new devices, drops vanished ones and reconnects unavailable
// sessions. stop() aborts whatever step is running and waits for it, so a
// session is never left half-registered.
// ---------------------------------------------------------------------------

import { setTimeout as sleep } from "node:timers/promises";
import type { DiscoverFn } from "../discovery/types.js";
import type { LogFns } from "../logging.js";
import type { DeviceRegistry } from "../registry/registry.js";
import { formatAddress, type ManagedDeviceSession } from "../session/types.js";
import { diffAddresses } from "./diff.js";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type ReconcileLoopDeps<S extends ManagedDeviceSession> = {
  registry: DeviceRegistry<S>;
  discover: DiscoverFn;
  createSession: () => S;
  log: LogFns;
  intervalMs: number;
  /** Device TCP port used for every discovered host. */
  port: number;
  staticAddresses?: readonly string[];
};

export type TickSummary = {
  /** Every candidate address of this tick (discovered plus static). */
  discovered: string[];
  /** Device ids registered this tick. */
  added: string[];
  /** Device ids dropped because their address vanished. */
  removed: string[];
  /** Device ids brought back after being unavailable. */
  reconnected: string[];
  /** Hosts that could not be connected or identified. */
  failed: string[];
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// ReconcileLoop
// ---------------------------------------------------------------------------

export class ReconcileLoop<S extends ManagedDeviceSession> {
  private readonly deps: ReconcileLoopDeps<S>;
  private previous = new Set<string>();
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private running: Promise<TickSummary> | null = null;

  constructor(deps: ReconcileLoopDeps<S>) {
    this.deps = deps;
  }

  get started(): boolean {
    return this.task !== null;
  }

  // -------------------------------------------------------------------------
  // Start / Stop
  // -------------------------------------------------------------------------

  start(): void {
    if (this.task) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.run(controller.signal);
    this.deps.log.info(`reconcile loop started (every ${Math.round(this.deps.intervalMs / 1000)}s)`);
  }

  async stop(): Promise<void> {
    const task = this.task;
    if (!task) {
      return;
    }
    this.controller?.abort();
    await task;
    this.task = null;
    this.controller = null;
    this.deps.log.info("reconcile loop stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const summary = await this.tick(signal);
        this.deps.log.info(
          `scan complete: ${summary.discovered.length} address(es), ` +
            `${summary.added.length} added, ${summary.removed.length} removed, ` +
            `${summary.reconnected.length} reconnected, ${summary.failed.length} failed`,
        );
      } catch (err) {
        if (signal.aborted) {
          break;
        }
        this.deps.log.error(`reconcile tick failed: ${errorMessage(err)}`);
      }

      if (!(await this.idle(signal))) {
        break;
      }
    }
  }

  private async idle(signal: AbortSignal): Promise<boolean> {
    try {
      await sleep(this.deps.intervalMs, undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) {
        return false;
      }
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Main tick
  // -------------------------------------------------------------------------

  /** Run one reconciliation pass. Overlapping calls share the pass in flight. */
  tick(signal?: AbortSignal): Promise<TickSummary> {
    if (this.running) {
      return this.running;
    }
    const pass = this.reconcile(signal).finally(() => {
      this.running = null;
    });
    this.running = pass;
    return pass;
  }

  private async reconcile(signal?: AbortSignal): Promise<TickSummary> {
    const { registry } = this.deps;
    const summary: TickSummary = { discovered: [], added: [], removed: [], reconnected: [], failed: [] };

    const found = await this.deps.discover(signal);
    signal?.throwIfAborted();

    const current = new Set([...found, ...(this.deps.staticAddresses ?? [])]);
    summary.discovered = [...current];
    const { added, gone } = diffAddresses(this.previous, current);

    // New hosts that fail stay out of `previous` so the next tick retries them
    const retry = new Set<string>();
    for (const host of added) {
      signal?.throwIfAborted();
      if (this.isOwned(host)) {
        continue;
      }
      if (!(await this.connectNew(host, current, summary, signal))) {
        retry.add(host);
      }
    }

    const goneHosts = new Set(gone);
    for (const session of registry.list()) {
      const host = session.endpoint?.host;
      if (host !== undefined && goneHosts.has(host)) {
        signal?.throwIfAborted();
        await this.drop(session, summary);
      }
    }

    for (const session of registry.list()) {
      if (!session.device.available) {
        signal?.throwIfAborted();
        await this.reconnect(session, summary, signal);
      }
    }

    this.previous = new Set([...current].filter((host) => !retry.has(host)));
    return summary;
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private isOwned(host: string): boolean {
    return this.deps.registry.list().some((session) => session.endpoint?.host === host);
  }

  /** False when the host should be tried again on the next tick. */
  private async connectNew(
    host: string,
    current: ReadonlySet<string>,
    summary: TickSummary,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const { registry, log } = this.deps;
    const address = { host, port: this.deps.port };
    const session = this.deps.createSession();

    const result = await session.connect(address, { signal });
    if (signal?.aborted) {
      await session.disconnect();
      signal.throwIfAborted();
    }
    if (!result.ok) {
      log.warn(`could not connect to ${formatAddress(address)} (${result.error.kind}); retrying next scan`);
      await session.disconnect();
      summary.failed.push(host);
      return false;
    }

    const id = session.device.id;
    if (id === null) {
      log.warn(`device at ${formatAddress(address)} did not identify itself; retrying next scan`);
      await session.disconnect();
      summary.failed.push(host);
      return false;
    }

    const incumbent = registry.get(id);
    if (incumbent) {
      // An incumbent whose address vanished is replaced even if it still reads available
      const incumbentHost = incumbent.endpoint?.host;
      const stillListed = incumbentHost !== undefined && current.has(incumbentHost);
      if (incumbent.device.available && stillListed) {
        log.info(`device ${id} is already connected; closing duplicate session to ${formatAddress(address)}`);
        await session.disconnect();
        return true;
      }
      log.info(`device ${id} moved to ${formatAddress(address)}`);
      registry.remove(id);
      await incumbent.disconnect();
    }

    registry.add(session);
    summary.added.push(id);
    return true;
  }

  private async drop(session: S, summary: TickSummary): Promise<void> {
    const id = session.device.id;
    await session.disconnect();
    if (id !== null && this.deps.registry.remove(id)) {
      summary.removed.push(id);
    }
  }

  private async reconnect(session: S, summary: TickSummary, signal?: AbortSignal): Promise<void> {
    const endpoint = session.endpoint;
    const id = session.device.id;
    if (!endpoint || id === null) {
      return;
    }

    const result = await session.connect(endpoint, { signal });
    if (signal?.aborted) {
      await session.disconnect();
      signal.throwIfAborted();
    }
    if (result.ok) {
      this.deps.log.info(`reconnected ${id} at ${formatAddress(endpoint)}`);
      summary.reconnected.push(id);
    } else {
      this.deps.log.warn(`reconnect of ${id} at ${formatAddress(endpoint)} failed (${result.error.kind})`);
      summary.failed.push(endpoint.host);
    }
  }
}

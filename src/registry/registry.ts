// ---------------------------------------------------------------------------
// DeviceRegistry – device id -> live session
// ---------------------------------------------------------------------------
// Written only by the reconciliation loop; readers always receive snapshot
// arrays, never the backing map.
// ---------------------------------------------------------------------------

import type { LogFns } from "../logging.js";
import type { ManagedDeviceSession } from "../session/types.js";

export type DeviceRegistryDeps = {
  log: Pick<LogFns, "info" | "warn">;
  broadcast?: (event: string, payload: unknown) => void;
};

export type RegistryEvent = "device.added" | "device.removed";

export class DeviceRegistry<S extends ManagedDeviceSession = ManagedDeviceSession> {
  private readonly deps: DeviceRegistryDeps;
  private readonly sessions = new Map<string, S>();

  constructor(deps: DeviceRegistryDeps) {
    this.deps = deps;
  }

  private emit(event: RegistryEvent, payload: unknown): void {
    this.deps.broadcast?.(event, payload);
  }

  /** Register an identified session. False when unidentified or the id is taken. */
  add(session: S): boolean {
    const id = session.device.id;
    if (id === null) {
      this.deps.log.warn("refusing to register an unidentified device");
      return false;
    }
    if (this.sessions.has(id)) {
      return false;
    }
    this.sessions.set(id, session);
    this.deps.log.info(`registered device ${id}`);
    this.emit("device.added", { id, device: { ...session.device } });
    return true;
  }

  remove(id: string): S | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    this.sessions.delete(id);
    this.deps.log.info(`removed device ${id}`);
    this.emit("device.removed", { id });
    return session;
  }

  get(id: string): S | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  getByType(typeCode: string): S[] {
    return this.list().filter((session) => session.device.typeCode === typeCode);
  }

  list(): S[] {
    return [...this.sessions.values()];
  }

  size(): number {
    return this.sessions.size;
  }

  /** Drops every entry without touching connections. */
  clear(): void {
    const ids = [...this.sessions.keys()];
    this.sessions.clear();
    for (const id of ids) {
      this.emit("device.removed", { id });
    }
  }
}

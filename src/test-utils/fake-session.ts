// ---------------------------------------------------------------------------
// Scriptable ManagedDeviceSession for registry and loop tests
// ---------------------------------------------------------------------------

import type { DatapointValues } from "../protocol/types.js";
import {
  createEmptyDevice,
  type ConnectOptions,
  type Device,
  type DeviceAddress,
  type ManagedDeviceSession,
  type QueryResult,
  type SessionErrorKind,
  type SessionResult,
  type SessionState,
} from "../session/types.js";

export type FakeSessionOptions = {
  /** `did` the device reports on connect; null leaves it unidentified. */
  id?: string | null;
  typeCode?: string | null;
  failWith?: SessionErrorKind | null;
};

export class FakeSession implements ManagedDeviceSession {
  readonly device: Device = createEmptyDevice();
  readonly connects: DeviceAddress[] = [];
  state: SessionState = "disconnected";
  endpoint: DeviceAddress | null = null;
  disconnects = 0;

  reportedId: string | null;
  typeCode: string | null;
  failWith: SessionErrorKind | null;

  constructor(opts: FakeSessionOptions = {}) {
    this.reportedId = opts.id === undefined ? "dev-1" : opts.id;
    this.typeCode = opts.typeCode ?? "01";
    this.failWith = opts.failWith ?? null;
  }

  async connect(address: DeviceAddress, opts: ConnectOptions = {}): Promise<SessionResult<Readonly<Device>>> {
    this.connects.push({ ...address });
    this.endpoint = { ...address };

    const kind: SessionErrorKind | null = opts.signal?.aborted ? "aborted" : this.failWith;
    if (kind) {
      this.markDown();
      return { ok: false, error: { kind, message: `fake ${kind}` } };
    }

    this.state = "connected";
    this.device.address = { ...address };
    this.device.available = true;
    if (this.reportedId !== null) {
      this.device.id = this.reportedId;
      this.device.typeCode = this.typeCode;
    }
    return { ok: true, value: this.device };
  }

  async disconnect(): Promise<void> {
    this.disconnects += 1;
    this.markDown();
  }

  async query(): Promise<QueryResult> {
    if (this.state !== "connected") {
      return { ok: false, data: {}, error: { kind: "not-connected", message: "fake not connected" } };
    }
    return { ok: true, data: { 1: 255 } };
  }

  async control(_payload: DatapointValues): Promise<SessionResult<void>> {
    if (this.state !== "connected") {
      return { ok: false, error: { kind: "not-connected", message: "fake not connected" } };
    }
    return { ok: true, value: undefined };
  }

  private markDown(): void {
    this.state = "disconnected";
    this.device.available = false;
    this.device.address = null;
  }
}

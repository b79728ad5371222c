// ---------------------------------------------------------------------------
// Device Session – Core Types
// ---------------------------------------------------------------------------

import type { DatapointValues } from "../protocol/types.js";

export type DeviceAddress = {
  host: string;
  port: number;
};

export type Device = {
  /** `did` reported by the device; null until the first INFO exchange. */
  id: string | null;
  productId: string | null;

  // Capability fields, resolved from the catalog
  typeCode: string | null;
  modelName: string | null;
  icon: string | null;
  datapointIds: readonly number[] | null;

  softwareVersion: string;
  address: DeviceAddress | null;
  available: boolean;
};

export type SessionState = "disconnected" | "connecting" | "connected";

export type SessionErrorKind =
  | "timeout"
  | "io"
  | "protocol"
  | "not-connected"
  | "invalid-payload"
  | "aborted";

export type SessionError = {
  kind: SessionErrorKind;
  message: string;
};

export type SessionResult<T> = { ok: true; value: T } | { ok: false; error: SessionError };

/** `data` is always present; it is empty whenever `ok` is false. */
export type QueryResult =
  | { ok: true; data: DatapointValues }
  | { ok: false; data: DatapointValues; error: SessionError };

export type ConnectOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type SessionOptions = {
  connectTimeoutMs: number;
  /** Per-read timeout while waiting for a matching response. */
  requestTimeoutMs: number;
  requestAttempts: number;
  writeTimeoutMs: number;
};

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  connectTimeoutMs: 10_000,
  requestTimeoutMs: 5_000,
  requestAttempts: 3,
  writeTimeoutMs: 5_000,
};

/** What the registry, the reconciliation loop and entity layers rely on. */
export interface ManagedDeviceSession {
  readonly device: Readonly<Device>;
  readonly state: SessionState;
  /** Last address this session was asked to connect to. */
  readonly endpoint: DeviceAddress | null;
  connect(address: DeviceAddress, opts?: ConnectOptions): Promise<SessionResult<Readonly<Device>>>;
  disconnect(): Promise<void>;
  query(): Promise<QueryResult>;
  control(payload: DatapointValues): Promise<SessionResult<void>>;
}

export function createEmptyDevice(): Device {
  return {
    id: null,
    productId: null,
    typeCode: null,
    modelName: null,
    icon: null,
    datapointIds: null,
    softwareVersion: "Unknown",
    address: null,
    available: false,
  };
}

export function formatAddress(address: DeviceAddress): string {
  return `${address.host}:${address.port}`;
}

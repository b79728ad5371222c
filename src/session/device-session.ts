// ---------------------------------------------------------------------------
// DeviceSession – one device's TCP connection and request discipline
// ---------------------------------------------------------------------------
// The wire protocol has no multiplexing: a response is tied to its request
// only by echoing `sn`. Every exchange therefore runs under a per-session
// promise-chain lock, so at most one request is in flight per connection.
//
// Reachability problems never throw out of the public methods; they come
// back as SessionResult / QueryResult values with a distinct error kind.
// ---------------------------------------------------------------------------

import { createConnection, type Socket } from "node:net";
import type { Catalog, ModelInfo } from "../catalog/types.js";
import type { LogFns } from "../logging.js";
import {
  buildRequest,
  createSequenceGenerator,
  decodeFrame,
  encodeFrame,
  FrameReader,
  parseInfoMessage,
  parseQueryData,
  ProtocolError,
} from "../protocol/codec.js";
import { formatRejections, sanitizeDatapoints } from "../protocol/datapoints.js";
import type { ResponseEnvelope } from "../protocol/schema.js";
import { Command, type CommandCode, type DatapointValues } from "../protocol/types.js";
import {
  createEmptyDevice,
  DEFAULT_SESSION_OPTIONS,
  formatAddress,
  type ConnectOptions,
  type Device,
  type DeviceAddress,
  type ManagedDeviceSession,
  type QueryResult,
  type SessionError,
  type SessionErrorKind,
  type SessionOptions,
  type SessionResult,
  type SessionState,
} from "./types.js";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type DeviceSessionDeps = {
  catalog: Catalog;
  log: LogFns;
  options?: Partial<SessionOptions>;
  nowMs?: () => number;
};

// ---------------------------------------------------------------------------
// Failures raised inside the session and converted to results at the edge
// ---------------------------------------------------------------------------

class SessionFailure extends Error {
  readonly kind: SessionErrorKind;

  constructor(kind: SessionErrorKind, message: string) {
    super(message);
    this.name = "SessionFailure";
    this.kind = kind;
  }
}

function toSessionError(err: unknown): SessionError {
  if (err instanceof SessionFailure) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof ProtocolError) {
    return { kind: "protocol", message: err.message };
  }
  return { kind: "io", message: err instanceof Error ? err.message : String(err) };
}

// ---------------------------------------------------------------------------
// Serialised lock
// ---------------------------------------------------------------------------

type LockState = { op: Promise<unknown> };

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

function locked<T>(state: LockState, fn: () => Promise<T>): Promise<T> {
  const next = resolveChain(state.op).then(fn);
  state.op = resolveChain(next);
  return next;
}

// ---------------------------------------------------------------------------
// Socket helpers
// ---------------------------------------------------------------------------

function openSocket(address: DeviceAddress, timeoutMs: number, signal?: AbortSignal): Promise<Socket> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SessionFailure("aborted", "connect aborted"));
      return;
    }

    const socket = createConnection({ host: address.host, port: address.port });

    const cleanup = () => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onError);
      signal?.removeEventListener("abort", onAbort);
    };
    const fail = (err: SessionFailure) => {
      cleanup();
      socket.destroy();
      reject(err);
    };
    const onConnect = () => {
      cleanup();
      resolve(socket);
    };
    const onError = (err: Error) => {
      fail(new SessionFailure("io", `connect to ${formatAddress(address)} failed: ${err.message}`));
    };
    const onAbort = () => {
      fail(new SessionFailure("aborted", "connect aborted"));
    };

    const timer = setTimeout(() => {
      fail(
        new SessionFailure("timeout", `connect to ${formatAddress(address)} timed out after ${timeoutMs}ms`),
      );
    }, timeoutMs);

    socket.once("connect", onConnect);
    socket.once("error", onError);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// DeviceSession
// ---------------------------------------------------------------------------

export class DeviceSession implements ManagedDeviceSession {
  private readonly deps: DeviceSessionDeps;
  private readonly options: SessionOptions;
  private readonly lock: LockState = { op: Promise.resolve() };
  private readonly nextSn: () => string;
  private readonly info: Device = createEmptyDevice();

  private currentState: SessionState = "disconnected";
  private socket: Socket | null = null;
  private reader: FrameReader | null = null;
  private lastEndpoint: DeviceAddress | null = null;

  constructor(deps: DeviceSessionDeps) {
    this.deps = deps;
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...deps.options };
    this.nextSn = createSequenceGenerator(deps.nowMs);
  }

  get device(): Readonly<Device> {
    return this.info;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get endpoint(): DeviceAddress | null {
    return this.lastEndpoint;
  }

  get available(): boolean {
    return this.info.available;
  }

  // -------------------------------------------------------------------------
  // connect
  // -------------------------------------------------------------------------

  async connect(
    address: DeviceAddress,
    opts: ConnectOptions = {},
  ): Promise<SessionResult<Readonly<Device>>> {
    return locked(this.lock, async () => {
      if (this.socket) {
        await this.disconnect();
      }

      const target: DeviceAddress = { host: address.host, port: address.port };
      const { signal } = opts;
      const onAbort = () => {
        this.socket?.destroy();
      };

      this.lastEndpoint = target;
      this.currentState = "connecting";
      signal?.addEventListener("abort", onAbort, { once: true });

      try {
        const socket = await openSocket(
          target,
          opts.timeoutMs ?? this.options.connectTimeoutMs,
          signal,
        );
        this.attach(socket, target);
        this.info.address = target;

        await this.identify(target);
        if (signal?.aborted) {
          throw new SessionFailure("aborted", "connect aborted");
        }
        if (this.socket !== socket) {
          throw new SessionFailure("io", `connection to ${formatAddress(target)} closed during INFO`);
        }

        this.currentState = "connected";
        this.info.available = true;
        this.deps.log.info(`connected to ${this.describe()}`);
        return { ok: true, value: this.info };
      } catch (err) {
        const error: SessionError = signal?.aborted
          ? { kind: "aborted", message: "connect aborted" }
          : toSessionError(err);
        await this.disconnect();
        if (error.kind === "aborted") {
          this.deps.log.debug(`connect to ${formatAddress(target)} aborted`);
        } else {
          this.deps.log.warn(`connect to ${formatAddress(target)} failed (${error.kind}): ${error.message}`);
        }
        return { ok: false, error };
      } finally {
        signal?.removeEventListener("abort", onAbort);
      }
    });
  }

  // -------------------------------------------------------------------------
  // disconnect – idempotent; interrupts a request waiting on the socket
  // -------------------------------------------------------------------------

  async disconnect(): Promise<void> {
    const socket = this.socket;
    this.reader?.fail(new SessionFailure("io", "session disconnected"));
    this.markDisconnected();

    if (!socket || socket.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.destroy();
    });
  }

  // -------------------------------------------------------------------------
  // query – QUERY, wait for the matching response
  // -------------------------------------------------------------------------

  async query(): Promise<QueryResult> {
    if (this.currentState !== "connected") {
      return { ok: false, data: {}, error: this.notConnected() };
    }

    return locked(this.lock, async () => {
      try {
        const response = await this.exchange(Command.Query);
        if (!response) {
          this.info.available = false;
          const error: SessionError = {
            kind: "timeout",
            message: `no matching QUERY response from ${this.describe()} after ${this.options.requestAttempts} attempt(s)`,
          };
          this.deps.log.warn(error.message);
          return { ok: false, data: {}, error };
        }

        const raw = parseQueryData(response.msg);
        if (!raw) {
          this.info.available = false;
          const error: SessionError = {
            kind: "protocol",
            message: `QUERY response from ${this.describe()} carries no data map`,
          };
          this.deps.log.warn(error.message);
          return { ok: false, data: {}, error };
        }

        const { values, rejected } = sanitizeDatapoints(raw, "report");
        if (rejected.length > 0) {
          this.deps.log.warn(
            `dropping invalid datapoints from ${this.describe()}: ${formatRejections(rejected)}`,
          );
        }
        this.info.available = true;
        return { ok: true, data: values };
      } catch (err) {
        const error = await this.fail(err);
        return { ok: false, data: {}, error };
      }
    });
  }

  // -------------------------------------------------------------------------
  // control – SET, fire-and-forget
  // -------------------------------------------------------------------------

  async control(payload: DatapointValues): Promise<SessionResult<void>> {
    if (this.currentState !== "connected") {
      return { ok: false, error: this.notConnected() };
    }

    const { values, rejected } = sanitizeDatapoints(payload);
    if (rejected.length > 0 || Object.keys(values).length === 0) {
      const error: SessionError = {
        kind: "invalid-payload",
        message:
          rejected.length > 0 ? formatRejections(rejected) : "control payload has no datapoints",
      };
      this.deps.log.warn(`rejected control for ${this.describe()}: ${error.message}`);
      return { ok: false, error };
    }

    return locked(this.lock, async () => {
      try {
        const { socket } = this.requireConnection();
        const request = buildRequest(Command.Set, this.nextSn(), values);
        await this.write(socket, encodeFrame(request));
        this.info.available = true;
        return { ok: true, value: undefined };
      } catch (err) {
        const error = await this.fail(err);
        return { ok: false, error };
      }
    });
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private attach(socket: Socket, target: DeviceAddress): void {
    const reader = new FrameReader();
    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => reader.push(chunk));
    socket.on("error", (err) => {
      this.deps.log.debug(`socket error on ${formatAddress(target)}: ${err.message}`);
      reader.fail(new SessionFailure("io", err.message));
    });
    socket.on("close", () => {
      reader.fail(new SessionFailure("io", "connection closed"));
      if (this.socket === socket) {
        this.deps.log.info(`connection to ${this.describe()} closed`);
        this.markDisconnected();
      }
    });
    this.socket = socket;
    this.reader = reader;
  }

  private markDisconnected(): void {
    this.socket = null;
    this.reader = null;
    this.currentState = "disconnected";
    this.info.available = false;
    this.info.address = null;
  }

  private requireConnection(): { socket: Socket; reader: FrameReader } {
    if (!this.socket || !this.reader) {
      throw new SessionFailure("not-connected", `${this.describe()} is not connected`);
    }
    return { socket: this.socket, reader: this.reader };
  }

  private notConnected(): SessionError {
    return { kind: "not-connected", message: `${this.describe()} is not connected` };
  }

  /** Convert a caught failure; anything but a missing connection drops the socket. */
  private async fail(err: unknown): Promise<SessionError> {
    const error = toSessionError(err);
    if (error.kind !== "not-connected") {
      this.deps.log.warn(`request to ${this.describe()} failed (${error.kind}): ${error.message}`);
      await this.disconnect();
    }
    return error;
  }

  private write(socket: Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new SessionFailure("timeout", `write timed out after ${this.options.writeTimeoutMs}ms`));
      }, this.options.writeTimeoutMs);
      socket.write(data, (err) => {
        clearTimeout(timer);
        if (err) {
          reject(new SessionFailure("io", `write failed: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Send one request and wait for the response echoing its `sn`. Each read
   * is one attempt: a timeout, an undecodable frame or a foreign `sn` all
   * use one up. Returns null when the attempts run out.
   */
  private async exchange(cmd: CommandCode): Promise<ResponseEnvelope | null> {
    const { socket, reader } = this.requireConnection();

    const stale = reader.discardBuffered();
    if (stale > 0) {
      this.deps.log.debug(`discarded ${stale} stale frame(s) from ${this.describe()}`);
    }

    const sn = this.nextSn();
    await this.write(socket, encodeFrame(buildRequest(cmd, sn)));

    const { requestAttempts, requestTimeoutMs } = this.options;
    for (let attempt = 1; attempt <= requestAttempts; attempt++) {
      const line = await reader.next(requestTimeoutMs);
      if (line === undefined) {
        this.deps.log.debug(
          `no response to sn ${sn} from ${this.describe()} (attempt ${attempt}/${requestAttempts})`,
        );
        continue;
      }

      let response: ResponseEnvelope;
      try {
        response = decodeFrame(line);
      } catch (err) {
        this.deps.log.debug(
          `discarding frame from ${this.describe()}: ${err instanceof Error ? err.message : String(err)}`,
        );
        continue;
      }

      if (response.sn !== sn) {
        this.deps.log.debug(`discarding response with sn ${response.sn}, expected ${sn}`);
        continue;
      }
      return response;
    }
    return null;
  }

  private async identify(target: DeviceAddress): Promise<void> {
    const response = await this.exchange(Command.Info);
    if (!response) {
      this.deps.log.warn(`no INFO response from ${formatAddress(target)}; device left unidentified`);
      return;
    }

    const info = parseInfoMessage(response.msg);
    if (!info?.did || !info.pid) {
      this.deps.log.warn(
        `INFO response from ${formatAddress(target)} is missing did or pid; device left unidentified`,
      );
      return;
    }

    if (this.info.id !== null && this.info.id !== info.did) {
      throw new SessionFailure(
        "protocol",
        `expected device ${this.info.id} at ${formatAddress(target)} but ${info.did} answered`,
      );
    }

    this.info.id = info.did;
    this.info.productId = info.pid;
    this.info.softwareVersion = info.sv || "Unknown";

    if (this.info.typeCode === null) {
      await this.resolveModel(info.pid);
    }
  }

  private async resolveModel(productId: string): Promise<void> {
    let model: ModelInfo | undefined;
    try {
      model = await this.deps.catalog.lookup(productId);
    } catch (err) {
      this.deps.log.error(
        `catalog lookup for ${productId} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return;
    }

    if (!model) {
      this.deps.log.warn(`no catalog entry for product ${productId} (device ${this.describe()})`);
      return;
    }

    this.info.typeCode = model.typeCode;
    this.info.modelName = model.modelName;
    this.info.icon = model.icon;
    this.info.datapointIds = [...model.datapointIds];
    this.deps.log.info(
      `device ${this.describe()}: model ${model.modelName}, type ${model.typeCode}`,
    );
  }

  private describe(): string {
    if (this.info.id) {
      return this.info.id;
    }
    return this.lastEndpoint ? formatAddress(this.lastEndpoint) : "device";
  }
}

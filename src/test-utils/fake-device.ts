// ---------------------------------------------------------------------------
// In-process stand-in for a device's TCP service, used by tests
// ---------------------------------------------------------------------------

import { createServer, type Server, type Socket } from "node:net";

export type FakeDeviceRequest = {
  cmd: number;
  pv: number;
  sn: string;
  msg: Record<string, unknown>;
};

/** Returns raw lines to send back (CRLF is appended), or nothing. */
export type FakeDeviceHandler = (request: FakeDeviceRequest, socket: Socket) => string[] | void;

export type FakeDevice = {
  port: number;
  requests: FakeDeviceRequest[];
  setHandler: (handler: FakeDeviceHandler) => void;
  connectionCount: () => number;
  close: () => Promise<void>;
};

export const FAKE_INFO = {
  did: "dev-1",
  dtp: "01",
  pid: "e2s64v",
  mac: "00aabbccddee",
  ip: "127.0.0.1",
  rssi: -40,
  sv: "1.0.0",
  hv: "0.0.1",
};

export function reply(sn: string, msg: unknown, cmd?: number): string {
  return JSON.stringify(cmd === undefined ? { sn, msg } : { cmd, pv: 0, sn, msg, res: 0 });
}

export const defaultHandler: FakeDeviceHandler = (request) => {
  if (request.cmd === 0) {
    return [reply(request.sn, FAKE_INFO, 0)];
  }
  if (request.cmd === 2) {
    return [reply(request.sn, { data: { "1": 255, "4": 500 } }, 2)];
  }
  return undefined;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRequest(value: unknown): FakeDeviceRequest | null {
  if (!isRecord(value)) {
    return null;
  }
  const { cmd, pv, sn, msg } = value;
  if (typeof cmd !== "number" || typeof pv !== "number" || typeof sn !== "string" || !isRecord(msg)) {
    return null;
  }
  return { cmd, pv, sn, msg };
}

export async function startFakeDevice(handler: FakeDeviceHandler = defaultHandler): Promise<FakeDevice> {
  let current = handler;
  const requests: FakeDeviceRequest[] = [];
  const sockets = new Set<Socket>();

  const server: Server = createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    let buffer = "";
    socket.on("data", (chunk: Buffer) => {
      buffer += chunk.toString("utf-8");
      let idx = buffer.indexOf("\r\n");
      while (idx !== -1) {
        const line = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 2);
        idx = buffer.indexOf("\r\n");

        const request = toRequest(JSON.parse(line));
        if (!request) {
          continue;
        }
        requests.push(request);
        const lines = current(request, socket);
        if (lines && !socket.destroyed) {
          for (const out of lines) {
            socket.write(out + "\r\n");
          }
        }
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("fake device did not bind a TCP port");
  }

  return {
    port: address.port,
    requests,
    setHandler: (next) => {
      current = next;
    },
    connectionCount: () => sockets.size,
    close: async () => {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/** A port on loopback that nothing listens on. */
export async function findClosedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (address === null || typeof address === "string") {
    throw new Error("could not reserve a TCP port");
  }
  return address.port;
}

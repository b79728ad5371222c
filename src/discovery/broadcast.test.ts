import { createSocket, type Socket } from "node:dgram";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FAKE_INFO } from "../test-utils/fake-device.js";
import { broadcastProbe } from "./broadcast.js";
import type { BroadcastOptions } from "./types.js";

// ---------------------------------------------------------------------------
// Loopback responder standing in for devices on the LAN
// ---------------------------------------------------------------------------

let responder: Socket;
let received: Array<Record<string, unknown>>;
let logs: string[];

const log = {
  debug: (msg: string) => logs.push(`DEBUG: ${msg}`),
  info: (msg: string) => logs.push(`INFO: ${msg}`),
  warn: (msg: string) => logs.push(`WARN: ${msg}`),
  error: (msg: string) => logs.push(`ERROR: ${msg}`),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function responderPort(): number {
  return responder.address().port;
}

function options(overrides?: Partial<BroadcastOptions>): BroadcastOptions {
  return {
    broadcastAddress: "127.0.0.1",
    broadcastPort: responderPort(),
    sendCount: 3,
    sendIntervalMs: 5,
    firstReplyAttempts: 5,
    receiveTimeoutMs: 100,
    maxReplies: 255,
    ...overrides,
  };
}

beforeEach(async () => {
  logs = [];
  received = [];
  responder = createSocket("udp4");
  responder.on("message", (data, rinfo) => {
    const request: unknown = JSON.parse(data.toString("utf-8"));
    if (!isRecord(request)) {
      return;
    }
    received.push(request);
    const reply = JSON.stringify({ cmd: 0, pv: 0, sn: request.sn, msg: FAKE_INFO, res: 0 });
    responder.send(reply, rinfo.port, rinfo.address);
  });
  await new Promise<void>((resolve) => responder.bind(0, "127.0.0.1", () => resolve()));
});

afterEach(async () => {
  await new Promise<void>((resolve) => responder.close(() => resolve()));
});

describe("broadcastProbe", () => {
  it("sends INFO datagrams and de-duplicates reply sources", async () => {
    const hosts = await broadcastProbe(options(), log);

    expect(hosts).toEqual(["127.0.0.1"]);
    await vi.waitFor(() => expect(received).toHaveLength(3));
    expect(received[0]).toMatchObject({ cmd: 0, pv: 0, msg: {} });
    expect(received.every((r) => r.sn === received[0]?.sn)).toBe(true);
  });

  it("caps collection by distinct sources, not by datagrams", async () => {
    const second = createSocket("udp4");
    await new Promise<void>((resolve) => second.bind(0, "127.0.0.2", () => resolve()));
    responder.removeAllListeners("message");
    responder.on("message", (_data, rinfo) => {
      for (let i = 0; i < 3; i++) {
        responder.send("{}", rinfo.port, rinfo.address);
      }
      second.send("{}", rinfo.port, rinfo.address);
    });

    try {
      const hosts = await broadcastProbe(options({ sendCount: 1, maxReplies: 2 }), log);
      expect([...hosts].sort()).toEqual(["127.0.0.1", "127.0.0.2"]);
    } finally {
      await new Promise<void>((resolve) => second.close(() => resolve()));
    }
  });

  it("sends the configured number of datagrams", async () => {
    await broadcastProbe(options({ sendCount: 1 }), log);

    await vi.waitFor(() => expect(received).toHaveLength(1));
  });

  it("returns an empty list when nobody answers", async () => {
    responder.removeAllListeners("message");
    const hosts = await broadcastProbe(options({ firstReplyAttempts: 2, receiveTimeoutMs: 20 }), log);

    expect(hosts).toEqual([]);
    expect(logs).toContain(`DEBUG: no broadcast replies on 127.0.0.1:${responderPort()}`);
  });

  it("returns nothing when aborted before starting", async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await broadcastProbe(options(), log, controller.signal)).toEqual([]);
    expect(received).toHaveLength(0);
  });

  it("stops early when aborted mid-probe", async () => {
    responder.removeAllListeners("message");
    const controller = new AbortController();
    const probe = broadcastProbe(options({ receiveTimeoutMs: 1_000 }), log, controller.signal);
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    expect(await probe).toEqual([]);
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(logs).toContain("DEBUG: broadcast probe aborted");
  });

  it("logs a send failure and returns what it has", async () => {
    const hosts = await broadcastProbe(options({ broadcastPort: 0 }), log);

    expect(hosts).toEqual([]);
    expect(logs.some((l) => l.startsWith("WARN: broadcast probe failed: "))).toBe(true);
  });
});

import { createSocket, type Socket } from "node:dgram";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createCatalog, findBundledCatalog } from "./catalog/catalog.js";
import type { LanpullConfig } from "./config/config.js";
import { DEFAULT_DISCOVERY_OPTIONS } from "./discovery/types.js";
import { startGateway, type Gateway } from "./gateway.js";
import { configureLogging } from "./logging.js";
import { startFakeDevice, type FakeDevice } from "./test-utils/fake-device.js";

let fake: FakeDevice;
let silent: Socket;
let gateway: Gateway | null;

const catalog = createCatalog({
  version: 1,
  types: [{ typeCode: "01", models: [{ productId: "e2s64v", modelName: "Bulb", icon: "", datapointIds: [1, 4] }] }],
});

function makeConfig(): LanpullConfig {
  return {
    source: null,
    scanIntervalMs: 60_000,
    addresses: ["127.0.0.1"],
    subnets: [],
    catalogPath: null,
    discovery: {
      ...DEFAULT_DISCOVERY_OPTIONS,
      broadcastAddress: "127.0.0.1",
      broadcastPort: silent.address().port,
      sendIntervalMs: 1,
      firstReplyAttempts: 1,
      receiveTimeoutMs: 10,
      port: fake.port,
    },
    session: { connectTimeoutMs: 1_000, requestTimeoutMs: 500, requestAttempts: 2, writeTimeoutMs: 1_000 },
    logging: { level: "fatal", format: "hidden" },
  };
}

beforeAll(() => {
  configureLogging({ level: "fatal", format: "hidden" });
});

beforeEach(async () => {
  gateway = null;
  fake = await startFakeDevice();
  silent = createSocket("udp4");
  await new Promise<void>((resolve) => silent.bind(0, "127.0.0.1", () => resolve()));
});

afterEach(async () => {
  await gateway?.stop();
  await new Promise<void>((resolve) => silent.close(() => resolve()));
  await fake.close();
});

describe("startGateway", () => {
  it("registers a statically configured device and answers queries through it", async () => {
    const events: string[] = [];
    gateway = await startGateway({
      config: makeConfig(),
      catalog,
      broadcast: (event) => events.push(event),
    });
    const { registry } = gateway.context;

    await vi.waitFor(() => expect(registry.size()).toBe(1));
    const session = registry.get("dev-1");
    expect(session?.device.modelName).toBe("Bulb");
    expect(registry.getByType("01")).toHaveLength(1);
    expect(events).toEqual(["device.added"]);

    expect(await session?.query()).toEqual({ ok: true, data: { 1: 255, 4: 500 } });
  });

  it("closes every session and empties the registry on stop", async () => {
    const started = await startGateway({ config: makeConfig(), catalog });
    await vi.waitFor(() => expect(started.context.registry.size()).toBe(1));
    const session = started.context.registry.get("dev-1");

    await started.stop();

    expect(started.loop.started).toBe(false);
    expect(started.context.registry.size()).toBe(0);
    expect(session?.state).toBe("disconnected");
    await vi.waitFor(() => expect(fake.connectionCount()).toBe(0));
  });

  it("loads the catalog named in the config when none is passed", async () => {
    gateway = await startGateway({ config: { ...makeConfig(), catalogPath: findBundledCatalog() } });
    const { registry } = gateway.context;

    await vi.waitFor(() => expect(registry.size()).toBe(1));
    expect(registry.get("dev-1")?.device.modelName).toBe("Color Bulb A19");
  });

  it("fails to start when the configured catalog file is missing", async () => {
    const config = { ...makeConfig(), catalogPath: "/nonexistent/lanpull/products.json" };
    await expect(startGateway({ config })).rejects.toThrow(/ENOENT/);
  });
});

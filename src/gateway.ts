// ---------------------------------------------------------------------------
// Gateway runtime – builds discovery, sessions and the loop from config
// ---------------------------------------------------------------------------

import { EMPTY_CATALOG, loadCatalogFile } from "./catalog/catalog.js";
import type { Catalog } from "./catalog/types.js";
import type { LanpullConfig } from "./config/config.js";
import { createGatewayContext, type GatewayContext } from "./context.js";
import { createDiscovery } from "./discovery/index.js";
import type { DiscoverFn } from "./discovery/types.js";
import { getChildLogger, toLogFns } from "./logging.js";
import { ReconcileLoop } from "./reconcile/loop.js";
import { DeviceSession } from "./session/device-session.js";

export type Gateway = {
  context: GatewayContext;
  loop: ReconcileLoop<DeviceSession>;
  discover: DiscoverFn;
  /** Stop the loop, close every session and empty the registry. */
  stop: () => Promise<void>;
};

async function resolveCatalog(config: LanpullConfig, catalog?: Catalog): Promise<Catalog> {
  if (catalog) {
    return catalog;
  }
  if (!config.catalogPath) {
    getChildLogger({ module: "catalog" }).warn("no product catalog found; devices will stay unclassified");
    return EMPTY_CATALOG;
  }
  return loadCatalogFile(config.catalogPath);
}

export async function startGateway(params: {
  config: LanpullConfig;
  catalog?: Catalog;
  broadcast?: (event: string, payload: unknown) => void;
}): Promise<Gateway> {
  const { config } = params;
  const catalog = await resolveCatalog(config, params.catalog);
  const context = createGatewayContext({ config, catalog, broadcast: params.broadcast });

  const discoveryLog = toLogFns(getChildLogger({ module: "discovery" }));
  const sessionLog = toLogFns(getChildLogger({ module: "session" }));
  const loopLog = toLogFns(getChildLogger({ module: "reconcile" }));

  const discover = createDiscovery({ ...config.discovery, subnets: config.subnets }, discoveryLog);

  const loop = new ReconcileLoop<DeviceSession>({
    registry: context.registry,
    discover,
    createSession: () => new DeviceSession({ catalog, log: sessionLog, options: config.session }),
    log: loopLog,
    intervalMs: config.scanIntervalMs,
    port: config.discovery.port,
    staticAddresses: config.addresses,
  });
  loop.start();

  const stop = async () => {
    await loop.stop();
    await Promise.all(context.registry.list().map((session) => session.disconnect()));
    context.registry.clear();
    context.logger.info("gateway stopped");
  };

  context.logger.info(
    `gateway started: ${config.addresses.length} static address(es), ${config.subnets.length} subnet(s)`,
  );
  return { context, loop, discover, stop };
}

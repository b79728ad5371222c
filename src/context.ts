// ---------------------------------------------------------------------------
// Gateway context – the state every component is handed explicitly
// ---------------------------------------------------------------------------

import type { ILogObj, Logger } from "tslog";
import type { Catalog } from "./catalog/types.js";
import type { LanpullConfig } from "./config/config.js";
import { getChildLogger, toLogFns } from "./logging.js";
import { DeviceRegistry } from "./registry/registry.js";
import type { DeviceSession } from "./session/device-session.js";

export type GatewayContext = {
  config: LanpullConfig;
  catalog: Catalog;
  registry: DeviceRegistry<DeviceSession>;
  logger: Logger<ILogObj>;
};

export function createGatewayContext(params: {
  config: LanpullConfig;
  catalog: Catalog;
  broadcast?: (event: string, payload: unknown) => void;
}): GatewayContext {
  const logger = getChildLogger({ module: "gateway" });
  const registryLogger = getChildLogger({ module: "device-registry" });

  const registry = new DeviceRegistry<DeviceSession>({
    log: toLogFns(registryLogger),
    broadcast: params.broadcast,
  });

  return { config: params.config, catalog: params.catalog, registry, logger };
}

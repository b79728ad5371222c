export { createCatalog, EMPTY_CATALOG, findBundledCatalog, loadCatalogFile, parseCatalogFile } from "./catalog/catalog.js";
export { DeviceTypeCode, type Catalog, type CatalogFile, type ModelInfo } from "./catalog/types.js";
export { ConfigError, loadConfig, parseListOption, resolveConfigPath, type LanpullConfig } from "./config/config.js";
export { createGatewayContext, type GatewayContext } from "./context.js";
export {
  broadcastProbe,
  createDiscovery,
  DEFAULT_DISCOVERY_OPTIONS,
  enumerateHosts,
  parseCidr,
  probeHost,
  probeSubnet,
  type DiscoverFn,
  type DiscoveryOptions,
  type DiscoveryParams,
} from "./discovery/index.js";
export { startGateway, type Gateway } from "./gateway.js";
export { configureLogging, getChildLogger, toLogFns, type LogFns, type LogLevel } from "./logging.js";
export * from "./protocol/index.js";
export { diffAddresses, type AddressDiff } from "./reconcile/diff.js";
export { ReconcileLoop, type ReconcileLoopDeps, type TickSummary } from "./reconcile/loop.js";
export { DeviceRegistry, type DeviceRegistryDeps, type RegistryEvent } from "./registry/registry.js";
export { DeviceSession, type DeviceSessionDeps } from "./session/device-session.js";
export * from "./session/types.js";

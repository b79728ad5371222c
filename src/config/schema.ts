// ---------------------------------------------------------------------------
// Configuration file schema
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { DEFAULT_DISCOVERY_OPTIONS } from "../discovery/types.js";
import { LOG_LEVELS } from "../logging.js";
import { DEFAULT_SESSION_OPTIONS } from "../session/types.js";

export const MIN_SCAN_INTERVAL_SECONDS = 60;
export const DEFAULT_SCAN_INTERVAL_SECONDS = 300;

/** A YAML list, or one string of comma- or space-separated entries. */
const AddressList = Type.Union([Type.Array(Type.String()), Type.String()], { default: [] });

const PositiveInt = (def: number) => Type.Integer({ minimum: 1, default: def });
const Port = (def: number) => Type.Integer({ minimum: 1, maximum: 65_535, default: def });

const d = DEFAULT_DISCOVERY_OPTIONS;
const s = DEFAULT_SESSION_OPTIONS;

export const DiscoveryConfigSchema = Type.Object(
  {
    broadcastAddress: Type.String({ minLength: 1, default: d.broadcastAddress }),
    broadcastPort: Port(d.broadcastPort),
    sendCount: PositiveInt(d.sendCount),
    sendIntervalMs: Type.Integer({ minimum: 0, default: d.sendIntervalMs }),
    firstReplyAttempts: PositiveInt(d.firstReplyAttempts),
    receiveTimeoutMs: PositiveInt(d.receiveTimeoutMs),
    maxReplies: PositiveInt(d.maxReplies),
    port: Port(d.port),
    subnetProbeTimeoutMs: PositiveInt(d.subnetProbeTimeoutMs),
    maxSubnetHosts: PositiveInt(d.maxSubnetHosts),
  },
  { default: {}, additionalProperties: false },
);

export const SessionConfigSchema = Type.Object(
  {
    connectTimeoutMs: PositiveInt(s.connectTimeoutMs),
    requestTimeoutMs: PositiveInt(s.requestTimeoutMs),
    requestAttempts: PositiveInt(s.requestAttempts),
    writeTimeoutMs: PositiveInt(s.writeTimeoutMs),
  },
  { default: {}, additionalProperties: false },
);

export const LoggingConfigSchema = Type.Object(
  {
    level: Type.Union(
      LOG_LEVELS.map((level) => Type.Literal(level)),
      { default: "info" },
    ),
    format: Type.Union([Type.Literal("pretty"), Type.Literal("json"), Type.Literal("hidden")], {
      default: "pretty",
    }),
  },
  { default: {}, additionalProperties: false },
);

export const ConfigFileSchema = Type.Object(
  {
    scanIntervalSeconds: PositiveInt(DEFAULT_SCAN_INTERVAL_SECONDS),
    addresses: AddressList,
    subnets: AddressList,
    catalogPath: Type.Optional(Type.String({ minLength: 1 })),
    discovery: DiscoveryConfigSchema,
    session: SessionConfigSchema,
    logging: LoggingConfigSchema,
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// Configuration – YAML file + environment overrides, validated with TypeBox
// ---------------------------------------------------------------------------

import { Value } from "@sinclair/typebox/value";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { findBundledCatalog } from "../catalog/catalog.js";
import type { DiscoveryOptions } from "../discovery/types.js";
import type { LogFns, LogFormat, LogLevel } from "../logging.js";
import type { SessionOptions } from "../session/types.js";
import { ConfigFileSchema, MIN_SCAN_INTERVAL_SECONDS } from "./schema.js";

export type LanpullConfig = {
  /** File the config was read from; null when defaults were used. */
  source: string | null;
  scanIntervalMs: number;
  addresses: string[];
  subnets: string[];
  catalogPath: string | null;
  discovery: DiscoveryOptions;
  session: SessionOptions;
  logging: { level: LogLevel; format: LogFormat };
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Split a comma- and/or whitespace-separated list, dropping empties. */
export function parseListOption(value: string | readonly string[]): string[] {
  const items = typeof value === "string" ? [value] : value;
  return items.flatMap((item) => item.split(/[\s,]+/)).filter((item) => item.length > 0);
}

export function resolveConfigPath(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromArgs = argv[2];
  if (fromArgs) {
    return path.resolve(fromArgs);
  }
  if (env.LANPULL_CONFIG) {
    return path.resolve(env.LANPULL_CONFIG);
  }
  return path.join(os.homedir(), ".lanpull", "config.yaml");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const next: Record<string, unknown> = { ...raw };
  if (env.LANPULL_ADDRESSES !== undefined) {
    next.addresses = env.LANPULL_ADDRESSES;
  }
  if (env.LANPULL_SUBNETS !== undefined) {
    next.subnets = env.LANPULL_SUBNETS;
  }
  if (env.LANPULL_SCAN_INTERVAL !== undefined) {
    const seconds = Number(env.LANPULL_SCAN_INTERVAL.trim());
    if (!Number.isInteger(seconds)) {
      throw new ConfigError("LANPULL_SCAN_INTERVAL must be a whole number of seconds", [
        `got "${env.LANPULL_SCAN_INTERVAL}"`,
      ]);
    }
    next.scanIntervalSeconds = seconds;
  }
  if (env.LANPULL_LOG_LEVEL !== undefined) {
    const logging = isRecord(raw.logging) ? raw.logging : {};
    next.logging = { ...logging, level: env.LANPULL_LOG_LEVEL.trim() };
  }
  return next;
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

export type LoadConfigOptions = {
  configPath: string;
  env?: NodeJS.ProcessEnv;
  log?: Pick<LogFns, "warn">;
};

/**
 * Read, default and validate the configuration. A missing file means
 * defaults; an invalid one throws ConfigError listing every issue.
 */
export async function loadConfig(opts: LoadConfigOptions): Promise<LanpullConfig> {
  const env = opts.env ?? process.env;
  const fromFile = await readConfigFile(opts.configPath);
  const raw = applyEnvOverrides(fromFile ?? {}, env);

  const value = Value.Default(ConfigFileSchema, Value.Clone(raw));
  if (!Value.Check(ConfigFileSchema, value)) {
    const issues = [...Value.Errors(ConfigFileSchema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`invalid configuration ${opts.configPath}`, issues);
  }

  let intervalSeconds = value.scanIntervalSeconds;
  if (intervalSeconds < MIN_SCAN_INTERVAL_SECONDS) {
    opts.log?.warn(
      `scanIntervalSeconds ${intervalSeconds} is below the minimum; using ${MIN_SCAN_INTERVAL_SECONDS}`,
    );
    intervalSeconds = MIN_SCAN_INTERVAL_SECONDS;
  }

  const catalogPath = value.catalogPath
    ? path.resolve(path.dirname(opts.configPath), value.catalogPath)
    : findBundledCatalog();

  return {
    source: fromFile === null ? null : opts.configPath,
    scanIntervalMs: intervalSeconds * 1000,
    addresses: parseListOption(value.addresses),
    subnets: parseListOption(value.subnets),
    catalogPath,
    discovery: { ...value.discovery },
    session: { ...value.session },
    logging: { ...value.logging },
  };
}

// ---------------------------------------------------------------------------
// Datapoints – numbered device attributes and their value ranges
// ---------------------------------------------------------------------------

import type { DatapointValues } from "./types.js";

export const Datapoint = {
  Power: 1,
  Mode: 2,
  ColorTemperature: 3,
  Brightness: 4,
  Hue: 5,
  /** Saturation × 10. */
  Saturation: 6,
} as const;

export const POWER_OFF = 0;
export const POWER_ON = 255;
export const MODE_NORMAL = 0;
export const MODE_EFFECTS = 1;

type DatapointRule = {
  name: string;
  min: number;
  max: number;
  /** Discrete values; when set, only these are accepted. */
  allowed?: readonly number[];
};

export const DATAPOINT_RULES: Readonly<Record<number, DatapointRule>> = {
  [Datapoint.Power]: { name: "power", min: POWER_OFF, max: POWER_ON, allowed: [POWER_OFF, POWER_ON] },
  [Datapoint.Mode]: { name: "mode", min: MODE_NORMAL, max: MODE_EFFECTS, allowed: [MODE_NORMAL, MODE_EFFECTS] },
  [Datapoint.ColorTemperature]: { name: "color temperature", min: 0, max: 1000 },
  [Datapoint.Brightness]: { name: "brightness", min: 0, max: 1000 },
  [Datapoint.Hue]: { name: "hue", min: 0, max: 360 },
  [Datapoint.Saturation]: { name: "saturation", min: 0, max: 1000 },
};

export type DatapointRejection = {
  id: string;
  value: unknown;
  reason: string;
};

export type SanitizedDatapoints = {
  values: DatapointValues;
  rejected: DatapointRejection[];
};

const DATAPOINT_ID_RE = /^\d+$/;

/**
 * `command` holds outgoing values to the discrete set where a datapoint has
 * one. `report` only range-checks: devices report power on as any level above 0.
 */
export type DatapointDirection = "command" | "report";

/**
 * Validate a datapoint map at the protocol boundary. Ids must be
 * non-negative integers and values integers; known datapoints are also
 * range-checked. Ids without a rule pass through unchanged.
 */
export function sanitizeDatapoints(raw: object, direction: DatapointDirection = "command"): SanitizedDatapoints {
  const values: DatapointValues = {};
  const rejected: DatapointRejection[] = [];
  const entries: Array<[string, unknown]> = Object.entries(raw);

  for (const [id, value] of entries) {
    if (!DATAPOINT_ID_RE.test(id)) {
      rejected.push({ id, value, reason: "datapoint id is not a non-negative integer" });
      continue;
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      rejected.push({ id, value, reason: "value is not an integer" });
      continue;
    }
    const dpId = Number(id);
    const rule = DATAPOINT_RULES[dpId];
    if (rule) {
      const allowed = direction === "command" ? rule.allowed : undefined;
      const inRange = allowed ? allowed.includes(value) : value >= rule.min && value <= rule.max;
      if (!inRange) {
        rejected.push({
          id,
          value,
          reason: allowed
            ? `${rule.name} must be one of ${allowed.join(", ")}`
            : `${rule.name} must be within ${rule.min}..${rule.max}`,
        });
        continue;
      }
    }
    values[dpId] = value;
  }

  return { values, rejected };
}

export function formatRejections(rejected: DatapointRejection[]): string {
  return rejected.map((r) => `dp ${r.id}=${JSON.stringify(r.value)} (${r.reason})`).join("; ");
}

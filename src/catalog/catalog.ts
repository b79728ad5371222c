// ---------------------------------------------------------------------------
// Product Catalog – in-memory lookup and JSON file loader
// ---------------------------------------------------------------------------

import { Value } from "@sinclair/typebox/value";
import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { CatalogFileSchema, type Catalog, type CatalogFile, type ModelInfo } from "./types.js";

export const EMPTY_CATALOG: Catalog = {
  lookup: () => undefined,
};

export function createCatalog(file: CatalogFile): Catalog {
  const byProductId = new Map<string, ModelInfo>();
  for (const type of file.types) {
    for (const model of type.models) {
      // First entry wins when a product id is listed twice
      if (byProductId.has(model.productId)) {
        continue;
      }
      byProductId.set(model.productId, {
        modelName: model.modelName,
        icon: model.icon,
        typeCode: type.typeCode,
        datapointIds: [...model.datapointIds],
      });
    }
  }

  return {
    lookup: (productId) => {
      const model = byProductId.get(productId);
      return model ? { ...model, datapointIds: [...model.datapointIds] } : undefined;
    },
  };
}

export function parseCatalogFile(raw: unknown, source = "catalog"): CatalogFile {
  const value = Value.Default(CatalogFileSchema, Value.Clone(raw));
  if (!Value.Check(CatalogFileSchema, value)) {
    const issues = [...Value.Errors(CatalogFileSchema, value)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new Error(`invalid catalog ${source}: ${issues.join("; ")}`);
  }
  return value;
}

export async function loadCatalogFile(filePath: string): Promise<Catalog> {
  const resolved = path.resolve(filePath);
  const raw = await fs.readFile(resolved, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`invalid catalog ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return createCatalog(parseCatalogFile(parsed, resolved));
}

/**
 * Locate the product catalog shipped with the package by walking up from
 * this module; the depth differs between sources and the build output.
 */
export function findBundledCatalog(
  startDir = path.dirname(fileURLToPath(import.meta.url)),
): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, "catalog", "products.json");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

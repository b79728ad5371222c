// ---------------------------------------------------------------------------
// Product Catalog – Core Types
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

export const DeviceTypeCode = {
  Switch: "00",
  Light: "01",
} as const;

export type ModelInfo = {
  modelName: string;
  icon: string;
  typeCode: string;
  datapointIds: number[];
};

/**
 * Product id -> model metadata. Lookups may be synchronous or not; a miss
 * is `undefined`.
 */
export interface Catalog {
  lookup(productId: string): ModelInfo | undefined | Promise<ModelInfo | undefined>;
}

// ---------------------------------------------------------------------------
// Catalog file
// ---------------------------------------------------------------------------

export const CatalogModelSchema = Type.Object({
  productId: Type.String({ minLength: 1 }),
  modelName: Type.String(),
  icon: Type.String({ default: "" }),
  datapointIds: Type.Array(Type.Integer({ minimum: 0 })),
});

export const CatalogTypeSchema = Type.Object({
  typeCode: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  models: Type.Array(CatalogModelSchema, { default: [] }),
});

export const CatalogFileSchema = Type.Object({
  version: Type.Literal(1),
  types: Type.Array(CatalogTypeSchema, { default: [] }),
});

export type CatalogFile = Static<typeof CatalogFileSchema>;

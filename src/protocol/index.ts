export * from "./codec.js";
export * from "./datapoints.js";
export * from "./schema.js";
export * from "./types.js";

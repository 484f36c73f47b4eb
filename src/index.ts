export const STACKBRIDGE_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./runtime/index.js";
export * from "./api.js";

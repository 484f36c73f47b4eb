export * from "./engine.js";
export * from "./scopes.js";
export * from "./navigator.js";
export * from "./extraction.js";
export * from "./accessors.js";
export * from "./references.js";
export * from "./invocation.js";

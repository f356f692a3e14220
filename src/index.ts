export * from "./core/index.js";
export * from "./execution/index.js";
export * from "./repo/index.js";
export * from "./tracking/index.js";

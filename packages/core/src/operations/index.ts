export * from "./operation.js";
export * from "./types.js";
export * from "./wire.js";

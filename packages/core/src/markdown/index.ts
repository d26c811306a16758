export * from "./inline.js";
export * from "./lowering.js";

export * from "./batchFile.js";
export * from "./sequencer.js";
export * from "./types.js";

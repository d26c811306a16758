export * from "./batch/index.js";
export * from "./document/index.js";
export * from "./editor/documentEditor.js";
export * from "./errors.js";
export * from "./markdown/index.js";
export * from "./observability/logger.js";
export * from "./operations/index.js";
export type { DocumentService } from "./service/types.js";
export * from "./staleness/guard.js";
export * from "./text/utf16.js";
export * from "./testing/memoryDocumentService.js";

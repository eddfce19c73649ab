export * from "./domain.js";
export * from "./errors.js";
export * from "./timestamp.js";
export * from "./spec-block.js";
export * from "./drift-spec.js";
export * from "./file-lock.js";
export * from "./ports.js";
export * from "./telemetry.js";
export * from "./task-store.js";
export * from "./automation-store.js";
export * from "./mcp-contracts.js";

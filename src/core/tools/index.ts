export * from "./types.js";
export { BaseToolAdapter, hostOf, urlOf, type AdapterOptions } from "./base-adapter.js";
export { findBinary } from "./binary.js";
export { runCommand, formatCommand, type ProcessOutcome, type RunCommandOptions } from "./command-runner.js";
export { executeAdapter, resolveTimeoutSeconds, DEFAULT_RUN_OPTIONS } from "./executor.js";
export { ToolRegistry, createDefaultRegistry } from "./registry.js";
export { SafetyChecker, invalidTargetReason, type SafetyVerdict } from "./safety.js";
export { ToolGateway, type ExecutionContext, type ToolGatewayOptions } from "./gateway.js";
export * from "./adapters/index.js";

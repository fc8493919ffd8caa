/**
 * Holder snapshot monitor: library entry point
 */

export * from "./types";
export * from "./core/scheduler";
export * from "./core/aggregator";
export * from "./core/snapshot";
export * from "./network";
export * from "./progress";
export * from "./managers/holder-client";
export * from "./monitor";
export * from "./utils/env-validator";
export * from "./utils/snapshot-writer";
export { createLogger, setGlobalLogLevel, getGlobalLogLevel } from "./utils/logger";
export type { LogLevel } from "./utils/logger";

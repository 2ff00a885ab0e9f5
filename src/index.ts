/**
 * PillTrack Edge
 *
 * Decodes RAPT Pill hydrometer advertisements, derives fermentation
 * telemetry and syncs it to a brew tracker, one session per Pill.
 *
 * The CLI entry point is src/main.ts.
 */

export { config, type Config, type LogLevel } from "./config.ts";
export * from "./errors.ts";
export type * from "./types/index.ts";
export * from "./devices/index.ts";
export * from "./cloud/index.ts";
export * from "./sessions/index.ts";
export {
  ConfigStore,
  toSessionConfig,
  fromSessionConfig,
  type AccountDetails,
  type StoredSession,
  type ConfigFile,
} from "./storage/config-store.ts";
export { createLogger, type Logger } from "./utils/logger.ts";

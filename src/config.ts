/**
 * PillTrack Edge Configuration
 *
 * All configuration settings for the Edge service.
 * Values can be overridden via environment variables (a local .env file is
 * loaded on startup).
 *
 * Per-session settings (brew name, MAC address, poll interval, units) and the
 * brew tracker account live in the JSON config file, see storage/config-store.ts.
 */

import "dotenv/config";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

// Base paths
const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

/** Non-negative integer from the environment, an explicit 0 included */
function envCount(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export const config = {
  // ═══════════════════════════════════════════════════════════════════════════
  // BREW TRACKER API (REST)
  // ═══════════════════════════════════════════════════════════════════════════
  cloud: {
    /** Brew tracker API base URL (overridden by MTUrl in the config file) */
    apiUrl: process.env.BREW_TRACKER_URL || "https://brew-tracker.example.com/api",

    /** Request timeout (ms) */
    requestTimeoutMs: Number(process.env.CLOUD_REQUEST_TIMEOUT_MS) || 15_000,

    /** Upper bound for the end-brew call made while a session stops (ms) */
    endBrewTimeoutMs: Number(process.env.CLOUD_END_BREW_TIMEOUT_MS) || 5_000,

    /** Max retry attempts for network errors, 429 and 5xx */
    maxRetries: envCount(process.env.CLOUD_MAX_RETRIES, 2),

    /** Initial delay between retries (ms) */
    retryDelayMs: 1_000,

    /** Backoff multiplier applied per retry */
    retryBackoffMultiplier: 2,

    /** Maximum delay between retries (ms) */
    maxRetryDelayMs: 10_000,
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // DATA POINT PUBLISHING
  // ═══════════════════════════════════════════════════════════════════════════
  publishing: {
    /** Minimum time between two data points sent for one session (ms) */
    minIntervalMs: Number(process.env.PUBLISH_MIN_INTERVAL_MS) || 5_000,
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // BLE SCANNING (duty cycle per session)
  // ═══════════════════════════════════════════════════════════════════════════
  scanning: {
    /** Poll interval used when a session has none configured (seconds) */
    defaultPollIntervalSeconds: 120,

    /** Pause between two scan windows (ms) */
    interScanPauseMs: Number(process.env.SCAN_PAUSE_MS) || 10_000,
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // BLE ADVERTISEMENT FORMAT
  // ═══════════════════════════════════════════════════════════════════════════
  ble: {
    /** Manufacturer id the Pill advertises under ("PT" as a little-endian u16) */
    manufacturerId: 16722,

    /** Non-data broadcast the Pill sends alongside its metrics */
    sentinelPayload: "PTdPillG1",
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // STORAGE
  // ═══════════════════════════════════════════════════════════════════════════
  storage: {
    /** JSON file holding account details and session definitions */
    configPath: process.env.CONFIG_PATH || join(PROJECT_ROOT, "data", "data.json"),
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════════════
  logging: {
    /** Log level: debug, info, warn, error */
    level: parseLogLevel(process.env.LOG_LEVEL),

    /** Enable console output */
    console: true,
  },
} as const;

export type Config = typeof config;
export default config;

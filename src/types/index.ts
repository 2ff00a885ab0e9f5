/**
 * PillTrack Edge Type Definitions
 *
 * Core types for Pill advertisements, session state, telemetry and the
 * brew tracker account.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ADVERTISEMENT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Manufacturer-specific data of one BLE advertisement, keyed by vendor id */
export type ManufacturerData = ReadonlyMap<number, Uint8Array>;

/** Pill payload wire version (anything but 1 is read with the version 2 layout) */
export type PillPayloadVersion = 1 | 2;

/** Metrics decoded from one 23-byte Pill payload, still in device units */
export interface DecodedMetrics {
  version: PillPayloadVersion;

  /** Version 2 flag; always false for version 1 */
  hasGravityVelocity: boolean;

  /** Gravity change rate reported by the Pill (0 for version 1) */
  gravityVelocity: number;

  /** Temperature in 1/128 Kelvin */
  temperatureRaw: number;

  /** Specific gravity × 1000, as transmitted (float) */
  gravityRaw: number;

  /** Accelerometer axes in 1/16 g */
  x: number;
  y: number;
  z: number;

  /** Battery in 1/256 percent */
  batteryRaw: number;
}

/**
 * Callback used by scanners to deliver advertisements.
 * Unrelated devices are delivered too; filtering happens downstream.
 */
export type AdvertisementListener = (deviceAddress: string, manufacturerData: ManufacturerData) => void;

/**
 * BLE scanning capability.
 *
 * `scan` listens for `windowMs` (or until `signal` aborts) and reports every
 * advertisement it sees to `onAdvertisement`.
 */
export interface PillScanner {
  scan(windowMs: number, onAdvertisement: AdvertisementListener, signal: AbortSignal): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Session definition (edited and persisted outside the engine) */
export interface SessionConfig {
  /** Brew name on the tracker, also used to find an ongoing brew */
  brewName: string;

  /** Address of the Pill to listen for */
  macAddress: string;

  /** Scan window length; ideally a bit longer than the Pill's send interval */
  pollIntervalSeconds: number;

  /** false reports temperatures in Fahrenheit */
  temperatureUnitIsCelsius: boolean;

  /** Tracker recipe to link the brew to (null, "" or -1 mean none) */
  recipeId?: number | string | null;

  /** Hydrometer name on the tracker (defaults to the MAC address) */
  pillName?: string | null;

  /** Set false to only decode locally */
  remoteSync?: boolean;
}

/** Session lifecycle */
export type SessionState =
  | "created"       // Added to the registry, never started
  | "initializing"  // Logging in and resolving hydrometer/brew
  | "running"       // Capturing advertisements
  | "stopped";      // Stopped explicitly (may be restarted)

/** Whether data points are sent to the tracker */
export type SyncMode = "remote" | "local_only";

/**
 * Starting-gravity anchor for ABV.
 * Once calibrated it never changes for the life of the session.
 */
export type SessionCalibration =
  | { kind: "uncalibrated" }
  | { kind: "calibrated"; startingGravity: number };

export type TemperatureUnit = "C" | "F";

/** Latest values derived from the most recent advertisement */
export interface LiveTelemetry {
  apiVersion: PillPayloadVersion;
  gravityVelocity: number;
  currentGravity: number;
  abv: number;
  temperature: number;
  temperatureUnit: TemperatureUnit;
  batteryPercent: number;
  x: number;
  y: number;
  z: number;
  /** ISO timestamp of the advertisement, second precision */
  lastEventTimestamp: string;
}

/** Tracker entities a session is bound to after remote setup */
export interface RemoteBinding {
  hydrometerId: string;
  brewId: string;
}

/** Session counters and state for status reporting */
export interface SessionStatus {
  state: SessionState;
  syncMode: SyncMode | null;
  binding: RemoteBinding | null;
  advertisementsProcessed: number;
  advertisementsIgnored: number;
  decodeErrors: number;
  publishCount: number;
  publishFailures: number;
  lastPublishedAt: Date | null;
  lastError: string | null;
}

export type StatusLevel = "info" | "warn" | "error";

/** Human-readable status line for the presentation layer */
export interface StatusMessage {
  level: StatusLevel;
  message: string;
  timestamp: Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BREW TRACKER ACCOUNT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Tokens held by the sync client; persisted whenever they change */
export interface RemoteIdentity {
  /** Hydrometer (device) token used to register Pills and post data points */
  deviceToken: string | null;
  accessToken: string | null;
  refreshToken: string | null;
}

/** Account credentials */
export interface TrackerCredentials {
  email: string | null;
  password: string | null;
}

/** Data point body for POST /hydrometer/rapt-pill */
export interface DataPoint {
  name: string;
  gravity: number;
  temperature: number;
  temperatureUnit: TemperatureUnit;
  battery: number;
}

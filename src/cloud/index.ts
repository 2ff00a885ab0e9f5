/**
 * PillTrack Edge - Brew Tracker Module
 *
 * Handles all communication with the brew tracker service:
 * - REST client with login/refresh, timeouts and retry
 * - Device token, hydrometer and brew reconciliation
 * - Response schemas
 */

export {
  BrewTrackerClient,
  type BrewTrackerClientOptions,
  type RequestOptions,
  type ConnectionStatus,
  type ConnectionStateInfo,
  type BrewRecord,
  type HydrometerRecord,
} from "./rest-client.ts";

export {
  ensureDeviceToken,
  resolveHydrometer,
  resolveBrew,
  bindSession,
  configuredRecipeId,
  type BrewTarget,
  type SessionTarget,
} from "./brew-registration.ts";

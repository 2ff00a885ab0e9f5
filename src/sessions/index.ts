/**
 * PillTrack Edge - Sessions Module
 *
 * Exports for the per-Pill session engine and the session registry.
 */

export { PillSession } from "./pill-session.ts";
export type {
  PillSessionEvent,
  PillSessionEvents,
  PillSessionEventCallback,
  PillSessionOptions,
  StopResult,
} from "./pill-session.ts";

export { SessionRegistry } from "./session-registry.ts";
export type {
  SessionHandle,
  RegistryStatusMessage,
  BatchResult,
  SessionRegistryOptions,
} from "./session-registry.ts";

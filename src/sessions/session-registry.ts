/**
 * PillTrack Edge - Session Registry
 *
 * Owns every Pill session, routes advertisements to them and forwards their
 * status messages. The session table is only touched synchronously on the
 * event loop.
 */

import { randomUUID } from "node:crypto";
import {
  DuplicateSessionError,
  InvalidSessionStateError,
  SessionNotFoundError,
  errorMessage,
} from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import { extractPillPayload, macAddressesMatch } from "../devices/pill-decoder.ts";
import { PillSession, type PillSessionOptions, type StopResult } from "./pill-session.ts";
import type { ManufacturerData, SessionConfig, StatusMessage } from "../types/index.ts";

const log = createLogger("SessionRegistry");

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Opaque session identifier */
export type SessionHandle = string;

/** Status message tagged with the session it came from */
export interface RegistryStatusMessage extends StatusMessage {
  handle: SessionHandle;
  brewName: string;
}

type StatusCallback = (message: RegistryStatusMessage) => void;

/** Outcome of starting or stopping one session in a batch */
export interface BatchResult {
  handle: SessionHandle;
  ok: boolean;
  error: string | null;
}

/** Options shared by every session the registry creates */
export type SessionRegistryOptions = PillSessionOptions;

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION REGISTRY CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class SessionRegistry {
  private sessions: Map<SessionHandle, PillSession> = new Map();

  /** Handles whose start() has been requested but not settled */
  private starting: Set<SessionHandle> = new Set();

  private statusListeners: Set<StatusCallback> = new Set();

  constructor(private readonly sessionOptions: SessionRegistryOptions = {}) {}

  // ─────────────────────────────────────────────────────────────────────────────
  // TABLE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Create a session in state `created`.
   */
  add(sessionConfig: SessionConfig, options: PillSessionOptions = {}): SessionHandle {
    const handle = randomUUID();
    const session = new PillSession(sessionConfig, { ...this.sessionOptions, ...options });
    session.on("status", (message) => this.emitStatus({
      ...message,
      handle,
      brewName: session.brewName,
    }));
    this.sessions.set(handle, session);
    log.info(`Added session "${session.brewName}" for ${session.macAddress} (${handle})`);
    return handle;
  }

  /**
   * Drop a session that is not active.
   * @throws InvalidSessionStateError while the session is starting or running
   */
  remove(handle: SessionHandle): void {
    const session = this.require(handle);
    if (this.starting.has(handle) || (session.getState() !== "created" && session.getState() !== "stopped")) {
      throw new InvalidSessionStateError(
        `Session "${session.brewName}" is ${session.getState()}; stop it before removing`
      );
    }
    this.sessions.delete(handle);
    log.info(`Removed session "${session.brewName}" (${handle})`);
  }

  /**
   * @throws SessionNotFoundError
   */
  get(handle: SessionHandle): PillSession {
    return this.require(handle);
  }

  list(): Array<{ handle: SessionHandle; session: PillSession }> {
    return Array.from(this.sessions, ([handle, session]) => ({ handle, session }));
  }

  get size(): number {
    return this.sessions.size;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws SessionNotFoundError for an unknown handle
   * @throws DuplicateSessionError when another active session tracks the same MAC
   */
  async start(handle: SessionHandle): Promise<void> {
    const session = this.require(handle);

    for (const [otherHandle, other] of this.sessions) {
      if (otherHandle === handle) {
        continue;
      }
      const otherActive = other.isActive() || this.starting.has(otherHandle);
      if (otherActive && macAddressesMatch(other.macAddress, session.macAddress)) {
        throw new DuplicateSessionError(session.macAddress);
      }
    }

    this.starting.add(handle);
    try {
      await session.start();
    } finally {
      this.starting.delete(handle);
    }
  }

  /**
   * @throws SessionNotFoundError for an unknown handle
   */
  async stop(handle: SessionHandle): Promise<StopResult> {
    return this.require(handle).stop();
  }

  /**
   * Start every session that is not active. Failures are reported per session.
   */
  async startAll(): Promise<BatchResult[]> {
    const targets = this.list().filter(({ session }) => !session.isActive());
    const results: BatchResult[] = [];
    for (const { handle, session } of targets) {
      try {
        await this.start(handle);
        results.push({ handle, ok: true, error: null });
      } catch (error) {
        log.error(`Failed to start "${session.brewName}":`, errorMessage(error));
        results.push({ handle, ok: false, error: errorMessage(error) });
      }
    }
    return results;
  }

  /**
   * Stop every session.
   */
  async stopAll(): Promise<BatchResult[]> {
    const entries = this.list();
    const settled = await Promise.allSettled(entries.map(({ session }) => session.stop()));
    return settled.map((outcome, i) => {
      const handle = entries[i]?.handle ?? "";
      if (outcome.status === "fulfilled") {
        return { handle, ok: true, error: null };
      }
      log.error(`Failed to stop session ${handle}:`, errorMessage(outcome.reason));
      return { handle, ok: false, error: errorMessage(outcome.reason) };
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ADVERTISEMENT ROUTING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Route a raw Pill payload to the running session tracking `deviceAddress`.
   * @returns the handle it was routed to, or null when no session matched
   */
  dispatch(deviceAddress: string, rawBytes: Uint8Array): Promise<SessionHandle | null> {
    for (const [handle, session] of this.sessions) {
      if (session.getState() === "running" && macAddressesMatch(session.macAddress, deviceAddress)) {
        return session.onAdvertisement(rawBytes).then(() => handle);
      }
    }
    return Promise.resolve(null);
  }

  /**
   * BLE boundary: drop advertisements without a Pill payload, route the rest.
   */
  handleAdvertisement(deviceAddress: string, manufacturerData: ManufacturerData): Promise<SessionHandle | null> {
    const payload = extractPillPayload(manufacturerData);
    if (!payload) {
      return Promise.resolve(null);
    }
    return this.dispatch(deviceAddress, payload);
  }

  /**
   * Wait until every session is idle.
   */
  async whenIdle(): Promise<void> {
    await Promise.all(Array.from(this.sessions.values(), (session) => session.whenIdle()));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EVENTS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Subscribe to status messages of every session
   */
  on(_event: "status", callback: StatusCallback): void {
    this.statusListeners.add(callback);
  }

  off(_event: "status", callback: StatusCallback): void {
    this.statusListeners.delete(callback);
  }

  private emitStatus(message: RegistryStatusMessage): void {
    for (const callback of this.statusListeners) {
      try {
        callback(message);
      } catch (error) {
        log.error("Event listener error (status):", error);
      }
    }
  }

  private require(handle: SessionHandle): PillSession {
    const session = this.sessions.get(handle);
    if (!session) {
      throw new SessionNotFoundError(handle);
    }
    return session;
  }
}

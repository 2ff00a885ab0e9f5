/**
 * PillTrack Edge - Pill Session
 *
 * One tracked Pill from session start through data capture to session end.
 *
 * Lifecycle:
 *   created → initializing → running → stopped (→ initializing on restart)
 *
 * Lifecycle commands and advertisement processing go through one command
 * queue per session, so a session never handles two of them at once.
 * Data points are published outside the queue and tracked; `stop()` aborts
 * them together with any in-flight setup and the scan loop.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../config.ts";
import {
  AuthError,
  InvalidSessionStateError,
  MalformedPayloadError,
  NotConfiguredError,
  errorMessage,
} from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import { bindSession } from "../cloud/brew-registration.ts";
import type { BrewTrackerClient } from "../cloud/rest-client.ts";
import {
  decodePillAdvertisement,
  extractPillPayload,
  macAddressesMatch,
} from "../devices/pill-decoder.ts";
import { deriveTelemetry } from "../devices/derived-metrics.ts";
import type {
  DataPoint,
  DecodedMetrics,
  LiveTelemetry,
  ManufacturerData,
  PillScanner,
  RemoteBinding,
  SessionCalibration,
  SessionConfig,
  SessionState,
  SessionStatus,
  StatusLevel,
  StatusMessage,
  SyncMode,
} from "../types/index.ts";

const log = createLogger("PillSession");

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Payload of each session event */
export interface PillSessionEvents {
  state_change: { state: SessionState; previous: SessionState };
  telemetry: LiveTelemetry;
  published: DataPoint;
  status: StatusMessage;
}

export type PillSessionEvent = keyof PillSessionEvents;

export type PillSessionEventCallback<E extends PillSessionEvent> = (payload: PillSessionEvents[E]) => void;

export interface PillSessionOptions {
  /** Brew tracker client; omit for a local-only session */
  client?: BrewTrackerClient | null;

  /** BLE scanner driving the session's own scan loop */
  scanner?: PillScanner | null;

  /** Clock (defaults to `() => new Date()`) */
  now?: () => Date;

  /** Minimum time between data points (defaults to config.publishing.minIntervalMs) */
  publishMinIntervalMs?: number;

  /** Pause between scan windows (defaults to config.scanning.interScanPauseMs) */
  scanPauseMs?: number;

  /** Upper bound for ending the brew on stop (defaults to config.cloud.endBrewTimeoutMs) */
  endBrewTimeoutMs?: number;
}

export interface StopResult {
  /** Whether the brew was ended on the tracker */
  remoteEnded: boolean;
}

/** Client and tracker ids of a session in remote mode */
interface RemoteContext {
  client: BrewTrackerClient;
  binding: RemoteBinding;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PILL SESSION CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class PillSession {
  readonly config: Readonly<SessionConfig>;

  private client: BrewTrackerClient | null;
  private scanner: PillScanner | null;
  private now: () => Date;
  private publishMinIntervalMs: number;
  private scanPauseMs: number;
  private endBrewTimeoutMs: number;

  private state: SessionState = "created";
  private syncMode: SyncMode | null = null;
  private remote: RemoteContext | null = null;
  private calibration: SessionCalibration = { kind: "uncalibrated" };
  private telemetry: LiveTelemetry | null = null;

  /** Time of the last data point sent (or logged, in local-only mode) */
  private lastPublishAt: Date | null = null;

  private counters = {
    advertisementsProcessed: 0,
    advertisementsIgnored: 0,
    decodeErrors: 0,
    publishCount: 0,
    publishFailures: 0,
  };
  private lastPublishedAt: Date | null = null;
  private lastError: string | null = null;

  /** Tail of the command queue */
  private queue: Promise<void> = Promise.resolve();

  /** Publishes and scan deliveries that have not settled yet */
  private pending: Set<Promise<void>> = new Set();

  /** Aborts setup, publishes and the scan loop of the current run */
  private controller: AbortController | null = null;

  /** Signal of the run that reached `running` */
  private runSignal: AbortSignal | null = null;

  private scanLoop: Promise<void> | null = null;

  private listeners: { [E in PillSessionEvent]: Set<PillSessionEventCallback<E>> } = {
    state_change: new Set(),
    telemetry: new Set(),
    published: new Set(),
    status: new Set(),
  };

  constructor(sessionConfig: SessionConfig, options: PillSessionOptions = {}) {
    const pollIntervalSeconds = sessionConfig.pollIntervalSeconds > 0
      ? sessionConfig.pollIntervalSeconds
      : config.scanning.defaultPollIntervalSeconds;
    this.config = { ...sessionConfig, pollIntervalSeconds };
    this.client = options.client ?? null;
    this.scanner = options.scanner ?? null;
    this.now = options.now ?? (() => new Date());
    this.publishMinIntervalMs = options.publishMinIntervalMs ?? config.publishing.minIntervalMs;
    this.scanPauseMs = options.scanPauseMs ?? config.scanning.interScanPauseMs;
    this.endBrewTimeoutMs = options.endBrewTimeoutMs ?? config.cloud.endBrewTimeoutMs;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // ACCESSORS
  // ═══════════════════════════════════════════════════════════════════════════════

  get brewName(): string {
    return this.config.brewName;
  }

  get macAddress(): string {
    return this.config.macAddress;
  }

  /** Hydrometer name on the tracker and data point `name` */
  get hydrometerName(): string {
    return this.config.pillName?.trim() || this.config.macAddress;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Running or about to run */
  isActive(): boolean {
    return this.state === "initializing" || this.state === "running";
  }

  getTelemetry(): LiveTelemetry | null {
    return this.telemetry ? { ...this.telemetry } : null;
  }

  getCalibration(): SessionCalibration {
    return { ...this.calibration };
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      syncMode: this.syncMode,
      binding: this.remote ? { ...this.remote.binding } : null,
      ...this.counters,
      lastPublishedAt: this.lastPublishedAt,
      lastError: this.lastError,
    };
  }

  /**
   * Multi-line summary of the session for logs.
   */
  describe(): string {
    const t = this.telemetry;
    const startingGravity = this.calibration.kind === "calibrated" ? this.calibration.startingGravity : "-";
    return [
      `Brew: ${this.brewName} (${this.state}, ${this.syncMode ?? "not started"})`,
      `Pill: ${this.hydrometerName} [${this.macAddress}]`,
      `Firmware version: ${t?.apiVersion ?? "-"}`,
      `Starting gravity: ${startingGravity}`,
      `Current gravity: ${t?.currentGravity ?? "-"}`,
      `ABV: ${t?.abv ?? "-"}`,
      `Temperature: ${t ? `${t.temperature} ${t.temperatureUnit}` : "-"}`,
      `Accel x/y/z: ${t ? `${t.x} / ${t.y} / ${t.z}` : "-"}`,
      `Battery: ${t ? `${t.batteryPercent}%` : "-"}`,
      `Last event: ${t?.lastEventTimestamp ?? "-"}`,
    ].join("\n");
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Start (or restart) the session.
   *
   * Login failures that are about credentials leave the session running in
   * local-only mode. Any other setup failure returns the session to its
   * previous state and rejects.
   *
   * @throws InvalidSessionStateError when the session is already running
   * @throws RemoteUnavailableError / RegistrationConflictError on setup failure
   */
  start(): Promise<void> {
    const controller = this.controller ?? new AbortController();
    this.controller = controller;
    return this.enqueue(() => this.runStart(controller));
  }

  /**
   * Stop the session. In-flight setup, publishes and scans are aborted
   * right away; in remote mode the brew is then ended on the tracker.
   * Stopping a session that is not running does nothing.
   */
  stop(): Promise<StopResult> {
    const controller = this.controller;
    this.controller = null;
    controller?.abort();
    return this.enqueue(() => this.runStop());
  }

  /**
   * Resolves once the command queue is empty and every tracked publish has
   * settled.
   */
  async whenIdle(): Promise<void> {
    let queue: Promise<void>;
    do {
      queue = this.queue;
      await Promise.all([queue, ...this.pending]);
    } while (this.pending.size > 0 || queue !== this.queue);
  }

  private async runStart(controller: AbortController): Promise<void> {
    if (this.state !== "created" && this.state !== "stopped") {
      throw new InvalidSessionStateError(`Session "${this.brewName}" is already ${this.state}`);
    }
    if (controller.signal.aborted) {
      log.info(`Start of "${this.brewName}" cancelled`);
      return;
    }

    const previous = this.state;
    this.setState("initializing");
    this.lastError = null;

    try {
      const remote = await this.initializeRemote(controller.signal);
      if (controller.signal.aborted) {
        this.setState(previous);
        log.info(`Start of "${this.brewName}" cancelled`);
        return;
      }
      this.remote = remote;
      this.syncMode = remote ? "remote" : "local_only";
    } catch (error) {
      this.setState(previous);
      if (controller.signal.aborted) {
        log.info(`Start of "${this.brewName}" cancelled`);
        return;
      }
      if (this.controller === controller) {
        this.controller = null;
      }
      this.report("error", `Could not start "${this.brewName}": ${errorMessage(error)}`);
      throw error;
    }

    this.runSignal = controller.signal;
    this.setState("running");
    this.report("info", `Started "${this.brewName}" (${this.syncMode})`);

    if (this.scanner) {
      this.scanLoop = this.runScanLoop(this.scanner, controller.signal);
    }
  }

  /**
   * Log in and bind the session to a hydrometer and brew.
   * @returns null for local-only mode
   */
  private async initializeRemote(signal: AbortSignal): Promise<RemoteContext | null> {
    const client = this.client;
    if (!client || this.config.remoteSync === false) {
      return null;
    }

    try {
      await client.ensureLoggedIn({ signal });
    } catch (error) {
      if (error instanceof AuthError || error instanceof NotConfiguredError) {
        this.report("warn", `Not logged in to the brew tracker, "${this.brewName}" runs locally: ${error.message}`);
        return null;
      }
      throw error;
    }

    const binding = await bindSession(client, {
      brewName: this.brewName,
      hydrometerName: this.hydrometerName,
      recipeId: this.config.recipeId,
    }, { signal });
    return { client, binding };
  }

  private async runStop(): Promise<StopResult> {
    if (this.state !== "running") {
      return { remoteEnded: false };
    }

    if (this.scanLoop) {
      await this.scanLoop;
      this.scanLoop = null;
    }

    this.setState("stopped");

    let remoteEnded = false;
    if (this.syncMode === "remote" && this.remote) {
      const { client, binding } = this.remote;
      try {
        await client.endBrew(binding.hydrometerId, binding.brewId, { timeoutMs: this.endBrewTimeoutMs });
        remoteEnded = true;
      } catch (error) {
        this.report("warn", `Could not end brew "${this.brewName}" on the tracker: ${errorMessage(error)}`);
      }
    }

    this.report("info", `Stopped "${this.brewName}"`);
    return { remoteEnded };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // ADVERTISEMENTS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Process one raw Pill payload. Ignored unless the session is running.
   * Malformed payloads are counted, never thrown.
   */
  onAdvertisement(rawBytes: Uint8Array): Promise<void> {
    return this.enqueue(async () => this.processAdvertisement(rawBytes));
  }

  /**
   * Scan callback: keep advertisements from this session's Pill.
   * @returns whether the advertisement was accepted
   */
  acceptScanResult(deviceAddress: string, manufacturerData: ManufacturerData): boolean {
    if (!macAddressesMatch(deviceAddress, this.macAddress)) {
      return false;
    }
    const payload = extractPillPayload(manufacturerData);
    if (!payload) {
      return false;
    }
    this.track(this.onAdvertisement(payload));
    return true;
  }

  private processAdvertisement(rawBytes: Uint8Array): void {
    if (this.state !== "running") {
      this.counters.advertisementsIgnored++;
      return;
    }

    let decoded: DecodedMetrics;
    try {
      decoded = decodePillAdvertisement(rawBytes);
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) {
        throw error;
      }
      this.counters.decodeErrors++;
      this.report("warn", `Ignoring advertisement for "${this.brewName}": ${error.message}`);
      return;
    }

    const now = this.now();
    const derived = deriveTelemetry(decoded, this.calibration, this.config.temperatureUnitIsCelsius, now);
    this.calibration = derived.calibration;
    this.telemetry = derived.telemetry;
    this.counters.advertisementsProcessed++;
    this.emit("telemetry", { ...derived.telemetry });

    if (!this.publishDue(now)) {
      return;
    }
    this.lastPublishAt = now;

    if (this.syncMode === "remote" && this.remote) {
      this.track(this.publish(this.remote.client, derived.telemetry));
    } else {
      log.info(`Local only:\n${this.describe()}`);
    }
  }

  private publishDue(now: Date): boolean {
    return this.lastPublishAt === null || now.getTime() - this.lastPublishAt.getTime() >= this.publishMinIntervalMs;
  }

  private async publish(client: BrewTrackerClient, telemetry: LiveTelemetry): Promise<void> {
    const signal = this.runSignal ?? undefined;
    const point: DataPoint = {
      name: this.hydrometerName,
      gravity: telemetry.currentGravity,
      temperature: telemetry.temperature,
      temperatureUnit: telemetry.temperatureUnit,
      battery: telemetry.batteryPercent,
    };

    try {
      const accepted = await client.publishDataPoint(point, { signal });
      if (!accepted) {
        this.counters.publishFailures++;
        this.report("warn", `Brew tracker rejected data point for "${this.brewName}"`);
        return;
      }
    } catch (error) {
      if (signal?.aborted) {
        log.debug(`Publish for "${this.brewName}" cancelled`);
        return;
      }
      this.counters.publishFailures++;
      this.report("error", `Failed to publish data point for "${this.brewName}": ${errorMessage(error)}`);
      return;
    }

    this.counters.publishCount++;
    this.lastPublishedAt = this.now();
    this.emit("published", point);
    this.report(
      "info",
      `Logged data for "${this.brewName}" - SG: ${telemetry.currentGravity}, Temp: ${telemetry.temperature}, ~ABV: ${telemetry.abv}`
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCAN LOOP
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Scan for `pollIntervalSeconds`, pause, repeat until aborted.
   */
  private async runScanLoop(scanner: PillScanner, signal: AbortSignal): Promise<void> {
    const windowMs = this.config.pollIntervalSeconds * 1000;
    const onAdvertisement = (address: string, data: ManufacturerData) => {
      this.acceptScanResult(address, data);
    };

    try {
      while (!signal.aborted) {
        await scanner.scan(windowMs, onAdvertisement, signal);
        if (signal.aborted) {
          break;
        }
        await sleep(this.scanPauseMs, undefined, { signal });
      }
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      this.report("error", `Scanning for "${this.brewName}" stopped: ${errorMessage(error)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private enqueue<T>(command: () => Promise<T>): Promise<T> {
    const result = this.queue.then(command);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Keep a background task until it settles; failures are reported */
  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.report("error", `Background task for "${this.brewName}" failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private setState(state: SessionState): void {
    const previous = this.state;
    if (previous === state) {
      return;
    }
    this.state = state;
    log.debug(`"${this.brewName}": ${previous} → ${state}`);
    this.emit("state_change", { state, previous });
  }

  private report(level: StatusLevel, message: string): void {
    log[level](message);
    if (level !== "info") {
      this.lastError = message;
    }
    this.emit("status", { level, message, timestamp: this.now() });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // EVENTS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Subscribe to session events
   */
  on<E extends PillSessionEvent>(event: E, callback: PillSessionEventCallback<E>): void {
    this.listeners[event].add(callback);
  }

  /**
   * Unsubscribe from session events
   */
  off<E extends PillSessionEvent>(event: E, callback: PillSessionEventCallback<E>): void {
    this.listeners[event].delete(callback);
  }

  private emit<E extends PillSessionEvent>(event: E, payload: PillSessionEvents[E]): void {
    for (const callback of this.listeners[event]) {
      try {
        callback(payload);
      } catch (error) {
        log.error(`Event listener error (${event}):`, error);
      }
    }
  }
}

/**
 * Pill Session Tests
 *
 * Lifecycle, advertisement processing, publishing throttle, stop behaviour
 * and the scan loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BrewTrackerClient } from "../src/cloud/rest-client.ts";
import { PillSession, type PillSessionOptions } from "../src/sessions/pill-session.ts";
import { InvalidSessionStateError, RemoteUnavailableError } from "../src/errors.ts";
import type {
  AdvertisementListener,
  PillScanner,
  SessionConfig,
  SessionState,
  StatusMessage,
} from "../src/types/index.ts";
import { FakeBrewTracker, TEST_API_URL, TEST_EMAIL, TEST_PASSWORD } from "./helpers/fake-brew-tracker.ts";
import { OTHER_MAC, PILL_MAC, buildPillPayload } from "./helpers/pill-payloads.ts";

const SESSION: SessionConfig = {
  brewName: "Cyser",
  macAddress: PILL_MAC,
  pollIntervalSeconds: 60,
  temperatureUnitIsCelsius: true,
  pillName: "Fermenter 1",
};

let tracker: FakeBrewTracker;
let nowMs: number;

function clock(): Date {
  return new Date(nowMs);
}

function client(password: string | null = TEST_PASSWORD): BrewTrackerClient {
  return new BrewTrackerClient({
    apiUrl: TEST_API_URL,
    maxRetries: 0,
    credentials: { email: TEST_EMAIL, password },
  });
}

function createSession(config: Partial<SessionConfig> = {}, options: PillSessionOptions = {}): PillSession {
  return new PillSession({ ...SESSION, ...config }, { now: clock, ...options });
}

function collectStates(session: PillSession): SessionState[] {
  const states: SessionState[] = [];
  session.on("state_change", ({ state }) => states.push(state));
  return states;
}

function collectStatus(session: PillSession): StatusMessage[] {
  const messages: StatusMessage[] = [];
  session.on("status", (message) => messages.push(message));
  return messages;
}

beforeEach(() => {
  tracker = new FakeBrewTracker().install();
  nowMs = Date.parse("2026-01-30T10:00:00Z");
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ═══════════════════════════════════════════════════════════════════════════════
// LOCAL-ONLY SESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

describe("PillSession: local only", () => {
  it("runs without a client", async () => {
    const session = createSession();
    const states = collectStates(session);

    await session.start();

    expect(session.getState()).toBe("running");
    expect(session.getStatus().syncMode).toBe("local_only");
    expect(states).toEqual(["initializing", "running"]);
  });

  it("runs locally when remote sync is disabled", async () => {
    const session = createSession({ remoteSync: false }, { client: client() });

    await session.start();

    expect(session.getStatus().syncMode).toBe("local_only");
    expect(tracker.requests).toHaveLength(0);
  });

  it("derives telemetry and anchors the starting gravity on the first sample", async () => {
    const session = createSession();
    const received: number[] = [];
    session.on("telemetry", (telemetry) => received.push(telemetry.currentGravity));
    await session.start();

    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1050 }));
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1010 }));

    expect(session.getCalibration()).toEqual({ kind: "calibrated", startingGravity: 1.05 });
    expect(session.getTelemetry()).toEqual({
      apiVersion: 2,
      gravityVelocity: 0,
      currentGravity: 1.01,
      abv: 5.25,
      temperature: 26.85,
      temperatureUnit: "C",
      batteryPercent: 100,
      x: -10,
      y: 2,
      z: 1,
      lastEventTimestamp: "2026-01-30T10:00:00Z",
    });
    expect(received).toEqual([1.05, 1.01]);
    expect(session.getStatus().advertisementsProcessed).toBe(2);
  });

  it("ignores advertisements unless running", async () => {
    const session = createSession();

    await session.onAdvertisement(buildPillPayload());

    expect(session.getTelemetry()).toBeNull();
    expect(session.getCalibration()).toEqual({ kind: "uncalibrated" });
    expect(session.getStatus().advertisementsIgnored).toBe(1);
  });

  it("counts malformed payloads and keeps running", async () => {
    const session = createSession();
    const messages = collectStatus(session);
    await session.start();

    await session.onAdvertisement(new Uint8Array(10));

    expect(session.getState()).toBe("running");
    expect(session.getStatus().decodeErrors).toBe(1);
    expect(session.getTelemetry()).toBeNull();
    expect(messages.at(-1)).toMatchObject({
      level: "warn",
      message: 'Ignoring advertisement for "Cyser": Advertisement payload must be 23 bytes, got 10',
    });
  });

  it("keeps the calibration across a restart", async () => {
    const session = createSession();
    await session.start();
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1050 }));
    await session.stop();

    await session.start();
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1010 }));

    expect(session.getCalibration()).toEqual({ kind: "calibrated", startingGravity: 1.05 });
    expect(session.getTelemetry()?.abv).toBe(5.25);
  });

  it("refuses to start twice", async () => {
    const session = createSession();
    await session.start();

    await expect(session.start()).rejects.toBeInstanceOf(InvalidSessionStateError);
    expect(session.getState()).toBe("running");
  });

  it("treats stop on a session that never started as a no-op", async () => {
    const session = createSession();

    await expect(session.stop()).resolves.toEqual({ remoteEnded: false });
    expect(session.getState()).toBe("created");
  });

  it("describes its current readings", async () => {
    const session = createSession();
    await session.start();
    await session.onAdvertisement(buildPillPayload());

    const lines = session.describe().split("\n");

    expect(lines).toContain("Brew: Cyser (running, local_only)");
    expect(lines).toContain(`Pill: Fermenter 1 [${PILL_MAC}]`);
    expect(lines).toContain("Starting gravity: 1.05");
    expect(lines).toContain("Temperature: 26.85 C");
    expect(lines).toContain("Battery: 100%");
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// REMOTE START
// ═══════════════════════════════════════════════════════════════════════════════

describe("PillSession: remote start", () => {
  it("logs in and binds the session to a hydrometer and brew", async () => {
    const session = createSession({}, { client: client() });

    await session.start();

    expect(session.getState()).toBe("running");
    expect(session.getStatus()).toMatchObject({
      syncMode: "remote",
      binding: { hydrometerId: "100", brewId: "101" },
    });
    expect(tracker.hydrometers).toEqual([{ id: 100, device_name: "Fermenter 1" }]);
    expect(tracker.brews.map((brew) => brew.name)).toEqual(["Cyser"]);
  });

  it("names the hydrometer after the MAC address when no Pill name is set", async () => {
    const session = createSession({ pillName: null }, { client: client() });

    await session.start();

    expect(tracker.hydrometers[0]?.device_name).toBe(PILL_MAC);
  });

  it("falls back to local only when the login is rejected", async () => {
    const session = createSession({}, { client: client("wrong-password") });
    const messages = collectStatus(session);

    await session.start();
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1050 }));
    await session.whenIdle();

    expect(session.getState()).toBe("running");
    expect(session.getStatus()).toMatchObject({ syncMode: "local_only", publishCount: 0, publishFailures: 0 });
    expect(session.getTelemetry()?.currentGravity).toBe(1.05);
    expect(tracker.dataPoints).toEqual([]);
    expect(tracker.requestsTo("POST /hydrometer/rapt-pill")).toHaveLength(0);
    expect(tracker.routes()).toEqual(["POST /auth/login"]);
    expect(messages[0]?.level).toBe("warn");
  });

  it("falls back to local only when there are no credentials", async () => {
    const session = createSession({}, { client: client(null) });

    await session.start();

    expect(session.getStatus().syncMode).toBe("local_only");
    expect(tracker.requests).toHaveLength(0);
  });

  it("fails and returns to its previous state when the tracker is unreachable", async () => {
    tracker.offline = true;
    const session = createSession({}, { client: client() });
    const states = collectStates(session);

    await expect(session.start()).rejects.toBeInstanceOf(RemoteUnavailableError);

    expect(session.getState()).toBe("created");
    expect(states).toEqual(["initializing", "created"]);
    expect(session.getStatus().lastError).toMatch(/^Could not start "Cyser": Network error on POST \/auth\/login/);
  });

  it("fails when brew setup fails", async () => {
    tracker.failOnce("GET /hydrometer/brew", 500);
    const session = createSession({}, { client: client() });

    await expect(session.start()).rejects.toMatchObject({ name: "RemoteUnavailableError", status: 500 });
    expect(session.getState()).toBe("created");
  });

  it("returns to stopped when a restart fails", async () => {
    const session = createSession({}, { client: client() });
    await session.start();
    await session.stop();
    tracker.offline = true;

    await expect(session.start()).rejects.toBeInstanceOf(RemoteUnavailableError);

    expect(session.getState()).toBe("stopped");
    expect(session.isActive()).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLISHING
// ═══════════════════════════════════════════════════════════════════════════════

describe("PillSession: publishing", () => {
  it("publishes the first sample and then at most once per interval", async () => {
    const session = createSession({}, { client: client() });
    const published: number[] = [];
    session.on("published", (point) => published.push(point.gravity));
    await session.start();

    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1050 }));
    nowMs += 4_999;
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1040 }));
    nowMs += 1;
    await session.onAdvertisement(buildPillPayload({ gravityRaw: 1030 }));
    await session.whenIdle();

    expect(published).toEqual([1.05, 1.03]);
    expect(tracker.dataPoints[0]).toEqual({
      token: "device-token-2",
      name: "Fermenter 1",
      gravity: 1.05,
      temperature: 26.85,
      temp_units: "C",
      battery: 100,
    });
    expect(session.getStatus()).toMatchObject({
      publishCount: 2,
      publishFailures: 0,
      advertisementsProcessed: 3,
      lastPublishedAt: new Date("2026-01-30T10:00:05Z"),
    });
  });

  it("reports the Fahrenheit unit", async () => {
    const session = createSession({ temperatureUnitIsCelsius: false }, { client: client() });
    await session.start();

    await session.onAdvertisement(buildPillPayload());
    await session.whenIdle();

    expect(tracker.dataPoints[0]?.temp_units).toBe("F");
  });

  it("counts rejected data points without stopping", async () => {
    const session = createSession({}, { client: client() });
    const messages = collectStatus(session);
    await session.start();
    tracker.failOnce("POST /hydrometer/rapt-pill", 500);

    await session.onAdvertisement(buildPillPayload());
    await session.whenIdle();

    expect(session.getState()).toBe("running");
    expect(session.getStatus()).toMatchObject({ publishCount: 0, publishFailures: 1 });
    expect(messages.at(-1)).toMatchObject({
      level: "warn",
      message: 'Brew tracker rejected data point for "Cyser"',
    });
  });

  it("does not publish in local-only mode", async () => {
    const session = createSession({}, { client: client(null) });
    await session.start();

    await session.onAdvertisement(buildPillPayload());
    await session.whenIdle();

    expect(tracker.dataPoints).toEqual([]);
    expect(session.getStatus().publishCount).toBe(0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// STOP
// ═══════════════════════════════════════════════════════════════════════════════

describe("PillSession: stop", () => {
  it("ends the brew on the tracker", async () => {
    const session = createSession({}, { client: client() });
    await session.start();

    await expect(session.stop()).resolves.toEqual({ remoteEnded: true });

    expect(session.getState()).toBe("stopped");
    expect(tracker.requestsTo("PATCH /hydrometer/brew")[0]?.body).toEqual({ device_id: "100", brew_id: "101" });
    expect(tracker.brews[0]?.end_date).not.toBeNull();
  });

  it("stops locally when the brew cannot be ended", async () => {
    const session = createSession({}, { client: client() });
    const messages = collectStatus(session);
    await session.start();
    tracker.failOnce("PATCH /hydrometer/brew", 500);

    await expect(session.stop()).resolves.toEqual({ remoteEnded: false });

    expect(session.getState()).toBe("stopped");
    expect(messages.some((m) => m.level === "warn" && m.message.startsWith('Could not end brew "Cyser"'))).toBe(true);
  });

  it("aborts a start that is waiting on the tracker", async () => {
    tracker.hang("GET /hydrometer/brew");
    const session = createSession({}, { client: client() });

    const starting = session.start();
    await vi.waitFor(() => expect(tracker.requestsTo("GET /hydrometer/brew")).toHaveLength(1));
    const stopping = session.stop();

    await expect(starting).resolves.toBeUndefined();
    await expect(stopping).resolves.toEqual({ remoteEnded: false });
    expect(session.getState()).toBe("created");
    expect(tracker.requestsTo("POST /hydrometer/brew")).toHaveLength(0);
  });

  it("gives up on ending the brew after the end-brew timeout", async () => {
    const session = createSession({}, { client: client(), endBrewTimeoutMs: 20 });
    await session.start();
    tracker.hang("PATCH /hydrometer/brew");

    await expect(session.stop()).resolves.toEqual({ remoteEnded: false });

    expect(session.getState()).toBe("stopped");
    expect(session.getStatus().lastError).toMatch(/^Could not end brew "Cyser" on the tracker: Request timeout after 20ms/);
  });

  it("aborts a start that is waiting on the login", async () => {
    tracker.hang("POST /auth/login");
    const slowClient = new BrewTrackerClient({
      apiUrl: TEST_API_URL,
      maxRetries: 2,
      requestTimeoutMs: 60_000,
      credentials: { email: TEST_EMAIL, password: TEST_PASSWORD },
    });
    const session = createSession({}, { client: slowClient });

    const starting = session.start();
    await vi.waitFor(() => expect(tracker.requestsTo("POST /auth/login")).toHaveLength(1));
    const stoppedAt = Date.now();

    await expect(session.stop()).resolves.toEqual({ remoteEnded: false });
    await expect(starting).resolves.toBeUndefined();

    expect(Date.now() - stoppedAt).toBeLessThan(1_000);
    expect(session.getState()).toBe("created");
    expect(tracker.requestsTo("POST /auth/login")).toHaveLength(1);
  });

  it("ignores advertisements after stopping", async () => {
    const session = createSession();
    await session.start();
    await session.stop();

    await session.onAdvertisement(buildPillPayload());

    expect(session.getTelemetry()).toBeNull();
    expect(session.getStatus().advertisementsIgnored).toBe(1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SCAN LOOP
// ═══════════════════════════════════════════════════════════════════════════════

/** Scanner that reports a fixed set of advertisements, then waits for the window or the abort */
class FakeScanner implements PillScanner {
  readonly windows: number[] = [];

  constructor(
    private readonly advertisements: Array<[string, Map<number, Uint8Array>]>,
    private readonly holdUntilAborted: boolean
  ) {}

  async scan(windowMs: number, onAdvertisement: AdvertisementListener, signal: AbortSignal): Promise<void> {
    this.windows.push(windowMs);
    for (const [address, data] of this.advertisements) {
      onAdvertisement(address, data);
    }
    if (!this.holdUntilAborted || signal.aborted) {
      return;
    }
    await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
  }
}

describe("PillSession: scan loop", () => {
  it("keeps only its own Pill's data advertisements", async () => {
    const payload = buildPillPayload();
    const scanner = new FakeScanner([
      [OTHER_MAC, new Map([[16722, payload]])],
      [PILL_MAC.toLowerCase(), new Map([[16722, payload]])],
      [PILL_MAC, new Map([[16722, new TextEncoder().encode("PTdPillG1")]])],
      [PILL_MAC, new Map([[76, payload]])],
    ], true);
    const session = createSession({}, { scanner });

    await session.start();
    await session.whenIdle();

    expect(scanner.windows).toEqual([60_000]);
    expect(session.getStatus().advertisementsProcessed).toBe(1);

    await session.stop();
    expect(session.getState()).toBe("stopped");
  });

  it("pauses between windows and ends when stopped", async () => {
    const scanner = new FakeScanner([], false);
    const session = createSession({}, { scanner, scanPauseMs: 1 });

    await session.start();
    await vi.waitFor(() => expect(scanner.windows.length).toBeGreaterThanOrEqual(2));
    await session.stop();

    const windowsAtStop = scanner.windows.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(scanner.windows.length).toBe(windowsAtStop);
  });
});

/**
 * PillTrack Edge - Brew Tracker REST Client
 *
 * HTTP client for the brew tracker API. Owns the account credentials and the
 * bearer-token lifecycle; every token change is reported through
 * `onIdentityChange` so it can be written back to the config file.
 *
 * Features:
 * - HTTP client using fetch (Node built-in)
 * - Per-request timeout and caller abort signal
 * - Retry with exponential backoff for network errors, 429 and 5xx
 * - Login / refresh / OAuth token fallback, shared between concurrent callers
 * - Connection state tracking
 *
 * Non-2xx responses are never swallowed: each operation either returns the
 * parsed body or throws a typed error carrying the HTTP status.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { z } from "zod";
import { config } from "../config.ts";
import {
  AuthError,
  NotConfiguredError,
  RegistrationConflictError,
  RemoteUnavailableError,
  errorMessage,
} from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import type { DataPoint, RemoteIdentity, TrackerCredentials } from "../types/index.ts";
import {
  BrewListResponseSchema,
  DeviceTokenResponseSchema,
  HydrometerListResponseSchema,
  LoginResponseSchema,
  RefreshResponseSchema,
  RegisterBrewResponseSchema,
  RegisterHydrometerResponseSchema,
  type BrewRecord,
  type HydrometerRecord,
} from "./schemas.ts";

const log = createLogger("BrewTracker");

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Connection status derived from recent request outcomes */
export type ConnectionStatus = "unknown" | "connected" | "disconnected";

/** Connection state tracking */
export interface ConnectionStateInfo {
  status: ConnectionStatus;
  lastConnected: Date | null;
  lastDisconnected: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
}

/** Options for the brew tracker client */
export interface BrewTrackerClientOptions {
  /** API base URL (defaults to config.cloud.apiUrl) */
  apiUrl?: string;

  credentials?: TrackerCredentials;

  /** Tokens restored from the config file */
  identity?: Partial<RemoteIdentity>;

  /**
   * OAuth capability: returns a bearer token obtained outside this client
   * (browser login). Used when no email/password login is possible.
   */
  tokenProvider?: () => Promise<string>;

  /** Called with a copy of the identity after every token change */
  onIdentityChange?: (identity: RemoteIdentity) => void;

  /** Request timeout (defaults to config.cloud.requestTimeoutMs) */
  requestTimeoutMs?: number;

  /** Retries for network errors, 429 and 5xx (defaults to config.cloud.maxRetries) */
  maxRetries?: number;

  /** First retry delay (defaults to config.cloud.retryDelayMs) */
  retryDelayMs?: number;
}

/** Per-call options */
export interface RequestOptions {
  /** Overrides the client timeout for this call */
  timeoutMs?: number;

  /** Do not retry on network errors or 5xx */
  skipRetry?: boolean;

  /** Aborts the call (and any pending retry) */
  signal?: AbortSignal;
}

interface InternalRequestOptions extends RequestOptions {
  /** Attach the bearer token (default true) */
  authenticated?: boolean;
}

type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

/** Login shared by concurrent ensureLoggedIn() callers */
interface LoginAttempt {
  promise: Promise<void>;
  controller: AbortController;

  /** Callers still waiting; the attempt is aborted when the last one gives up */
  waiters: number;
}

export type { BrewRecord, HydrometerRecord };

// ═══════════════════════════════════════════════════════════════════════════════
// BREW TRACKER CLIENT CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class BrewTrackerClient {
  private apiUrl: string;
  private credentials: TrackerCredentials;
  private identity: RemoteIdentity;
  private tokenProvider?: BrewTrackerClientOptions["tokenProvider"];
  private onIdentityChange?: BrewTrackerClientOptions["onIdentityChange"];
  private requestTimeoutMs: number;
  private maxRetries: number;
  private retryDelayMs: number;

  private loginInFlight: LoginAttempt | null = null;

  // Connection state
  private state: ConnectionStateInfo = {
    status: "unknown",
    lastConnected: null,
    lastDisconnected: null,
    lastError: null,
    consecutiveFailures: 0,
  };

  constructor(options: BrewTrackerClientOptions = {}) {
    this.apiUrl = (options.apiUrl || config.cloud.apiUrl).replace(/\/+$/, "");
    this.credentials = options.credentials ?? { email: null, password: null };
    this.identity = {
      deviceToken: options.identity?.deviceToken ?? null,
      accessToken: options.identity?.accessToken ?? null,
      refreshToken: options.identity?.refreshToken ?? null,
    };
    this.tokenProvider = options.tokenProvider;
    this.onIdentityChange = options.onIdentityChange;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.cloud.requestTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.cloud.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? config.cloud.retryDelayMs;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────────────────────────

  getIdentity(): RemoteIdentity {
    return { ...this.identity };
  }

  getConnectionState(): ConnectionStateInfo {
    return { ...this.state };
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  isLoggedIn(): boolean {
    return this.identity.accessToken !== null;
  }

  /** Replace credentials (e.g. after the user edits them) */
  setCredentials(credentials: TrackerCredentials): void {
    this.credentials = { ...credentials };
  }

  private updateIdentity(changes: Partial<RemoteIdentity>): void {
    this.identity = { ...this.identity, ...changes };
    if (!this.onIdentityChange) {
      return;
    }
    try {
      this.onIdentityChange(this.getIdentity());
    } catch (error) {
      log.error("Failed to persist identity change:", error);
    }
  }

  private markOnline(): void {
    if (this.state.status !== "connected") {
      this.state.lastConnected = new Date();
      this.state.status = "connected";
    }
    this.state.consecutiveFailures = 0;
    this.state.lastError = null;
  }

  private markOffline(reason: string): void {
    if (this.state.status !== "disconnected") {
      this.state.lastDisconnected = new Date();
      this.state.status = "disconnected";
    }
    this.state.consecutiveFailures++;
    this.state.lastError = reason;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HTTP REQUEST
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Make an HTTP request with timeout and retry.
   *
   * Resolves with the response for any HTTP status once retries are used up;
   * rejects with RemoteUnavailableError when no response arrived at all.
   */
  private async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: InternalRequestOptions = {}
  ): Promise<Response> {
    const url = `${this.apiUrl}${path}`;
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "X-Client-Type": "pilltrack-edge",
      "X-Client-Version": "0.1.0",
    };
    if ((options.authenticated ?? true) && this.identity.accessToken) {
      headers["Authorization"] = `Bearer ${this.identity.accessToken}`;
    }

    const timeout = options.timeoutMs ?? this.requestTimeoutMs;
    const maxRetries = options.skipRetry ? 0 : this.maxRetries;
    let lastError: RemoteUnavailableError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (options.signal?.aborted) {
        throw new RemoteUnavailableError(`Request aborted: ${method} ${path}`);
      }

      // Fresh controller per attempt so a timeout does not poison the retry
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const forwardAbort = () => controller.abort();
      options.signal?.addEventListener("abort", forwardAbort, { once: true });

      try {
        const response = await fetch(url, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });

        if (response.ok) {
          this.markOnline();
          return response;
        }

        // 4xx errors are answers, not outages (except 429)
        if (response.status < 500 && response.status !== 429) {
          this.markOnline();
          return response;
        }

        this.markOffline(`HTTP ${response.status}`);
        if (attempt === maxRetries) {
          return response;
        }
        lastError = new RemoteUnavailableError(`HTTP ${response.status}: ${response.statusText}`, response.status);
      } catch (error) {
        if (options.signal?.aborted) {
          throw new RemoteUnavailableError(`Request aborted: ${method} ${path}`);
        }
        lastError = controller.signal.aborted
          ? new RemoteUnavailableError(`Request timeout after ${timeout}ms: ${method} ${path}`)
          : new RemoteUnavailableError(`Network error on ${method} ${path}: ${errorMessage(error)}`);
        this.markOffline(lastError.message);
      } finally {
        clearTimeout(timeoutId);
        options.signal?.removeEventListener("abort", forwardAbort);
      }

      if (attempt < maxRetries) {
        const delay = Math.min(
          this.retryDelayMs * Math.pow(config.cloud.retryBackoffMultiplier, attempt),
          config.cloud.maxRetryDelayMs
        );
        log.warn(`${lastError?.message ?? "Request failed"} - retrying in ${delay}ms (${attempt + 1}/${maxRetries})`);
        try {
          await sleep(delay, undefined, { signal: options.signal });
        } catch {
          throw new RemoteUnavailableError(`Request aborted: ${method} ${path}`);
        }
      }
    }

    throw lastError ?? new RemoteUnavailableError(`Request failed: ${method} ${path}`);
  }

  /** Parse a JSON body, mapping both bad JSON and schema mismatch to `onInvalid` */
  private async parseBody<S extends z.ZodTypeAny>(
    response: Response,
    schema: S,
    onInvalid: (message: string) => Error
  ): Promise<z.output<S>> {
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw onInvalid(`Response is not JSON: ${errorMessage(error)}`);
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      throw onInvalid(`Unexpected response shape: ${result.error.issues.map((i) => i.message).join("; ")}`);
    }
    return result.data;
  }

  private async failure(response: Response, what: string): Promise<RemoteUnavailableError> {
    const bodyText = await readText(response);
    return new RemoteUnavailableError(
      `${what} failed: ${response.status} ${response.statusText}`,
      response.status,
      bodyText
    );
  }

  private requireDeviceToken(): string {
    if (!this.identity.deviceToken) {
      throw new NotConfiguredError("No hydrometer device token configured");
    }
    return this.identity.deviceToken;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // AUTHENTICATION
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Log in with email and password; stores both tokens.
   * @throws AuthError on a non-2xx answer (tokens are left untouched)
   */
  async login(email: string, password: string, options: RequestOptions = {}): Promise<string> {
    log.info(`Logging in as ${email}...`);
    const response = await this.request("POST", "/auth/login", { email, password }, {
      ...options,
      authenticated: false,
    });
    if (!response.ok) {
      throw new AuthError(
        `Login failed: ${response.status} ${response.statusText}`,
        response.status,
        await readText(response)
      );
    }
    const body = await this.parseBody(
      response,
      LoginResponseSchema,
      (message) => new AuthError(`Login failed: ${message}`, response.status)
    );
    this.updateIdentity({ accessToken: body.accessToken, refreshToken: body.refreshToken });
    log.info("Logged in");
    return body.accessToken;
  }

  /**
   * Exchange the refresh token for a new access token.
   * @returns false when the tracker rejects the refresh
   */
  async refresh(email: string, refreshToken: string, options: RequestOptions = {}): Promise<boolean> {
    log.info("Refreshing access token...");
    const response = await this.request("POST", "/auth/refresh", { email, refreshToken }, {
      ...options,
      authenticated: false,
    });
    if (!response.ok) {
      log.warn(`Token refresh rejected: ${response.status} ${response.statusText}`);
      return false;
    }
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      log.warn("Token refresh answered with an unreadable body:", errorMessage(error));
      return false;
    }
    const result = RefreshResponseSchema.safeParse(json);
    if (!result.success) {
      log.warn("Token refresh answered without an access token");
      return false;
    }
    this.updateIdentity({ accessToken: result.data.accessToken });
    return true;
  }

  /**
   * Make sure an access token is held.
   *
   * Order: refresh (when both tokens are stored), password login, OAuth token
   * provider. Concurrent callers share one attempt.
   *
   * @throws AuthError when the tracker rejects the login
   * @throws NotConfiguredError when there is nothing to log in with
   * @throws RemoteUnavailableError when the tracker cannot be reached
   */
  ensureLoggedIn(options: RequestOptions = {}): Promise<void> {
    if (options.signal?.aborted) {
      return Promise.reject(new RemoteUnavailableError("Login aborted"));
    }
    let attempt = this.loginInFlight;
    if (!attempt) {
      const controller = new AbortController();
      const started: LoginAttempt = {
        controller,
        waiters: 0,
        promise: this.performLogin({ ...options, signal: controller.signal }).finally(() => {
          if (this.loginInFlight === started) {
            this.loginInFlight = null;
          }
        }),
      };
      this.loginInFlight = started;
      attempt = started;
    }
    return this.waitForLogin(attempt, options.signal);
  }

  /**
   * Wait for a shared login. An aborted caller stops waiting right away; the
   * login itself is aborted once no caller is left.
   */
  private async waitForLogin(attempt: LoginAttempt, signal?: AbortSignal): Promise<void> {
    attempt.waiters++;
    if (!signal) {
      try {
        await attempt.promise;
      } finally {
        attempt.waiters--;
      }
      return;
    }

    let detach: () => void = () => undefined;
    try {
      await new Promise<void>((resolve, reject) => {
        const onAbort = () => reject(new RemoteUnavailableError("Login aborted"));
        signal.addEventListener("abort", onAbort, { once: true });
        detach = () => signal.removeEventListener("abort", onAbort);
        attempt.promise.then(resolve, reject);
      });
    } finally {
      detach();
      attempt.waiters--;
      if (attempt.waiters === 0 && signal.aborted) {
        attempt.controller.abort();
      }
    }
  }

  private async performLogin(options: RequestOptions): Promise<void> {
    const { email, password } = this.credentials;
    const { accessToken, refreshToken } = this.identity;

    if (accessToken && refreshToken) {
      if (email && (await this.refresh(email, refreshToken, options))) {
        return;
      }
      log.warn("Refresh login failed, logging in again...");
      if (email && password) {
        await this.login(email, password, options);
        return;
      }
      if (this.tokenProvider) {
        await this.loginWithTokenProvider(this.tokenProvider);
        return;
      }
      throw new NotConfiguredError("Token refresh failed and no email/password is configured");
    }

    if (email && password) {
      await this.login(email, password, options);
      return;
    }

    if (this.tokenProvider) {
      await this.loginWithTokenProvider(this.tokenProvider);
      return;
    }

    throw new NotConfiguredError("Not able to log in: set an email and password or an OAuth token");
  }

  private async loginWithTokenProvider(provider: () => Promise<string>): Promise<void> {
    log.info("Requesting OAuth token...");
    const token = await provider();
    if (!token) {
      throw new NotConfiguredError("OAuth login returned no token");
    }
    this.updateIdentity({ accessToken: token });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HYDROMETERS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws RegistrationConflictError when the list cannot be read
   */
  async listHydrometers(options: RequestOptions = {}): Promise<HydrometerRecord[]> {
    const response = await this.request("GET", "/hydrometer", undefined, options);
    if (!response.ok) {
      throw await this.failure(response, "Get hydrometers");
    }
    const body = await this.parseBody(
      response,
      HydrometerListResponseSchema,
      (message) => new RegistrationConflictError(`Hydrometer list: ${message}`)
    );
    return body.devices;
  }

  /**
   * Register a Pill under the device token.
   * @returns hydrometer id
   */
  async registerHydrometer(name: string, options: RequestOptions = {}): Promise<string> {
    const token = this.requireDeviceToken();
    log.info(`Registering hydrometer "${name}"...`);
    const response = await this.request("POST", "/hydrometer/rapt-pill/register", { token, name }, options);
    if (!response.ok) {
      throw await this.failure(response, `Register hydrometer "${name}"`);
    }
    const body = await this.parseBody(
      response,
      RegisterHydrometerResponseSchema,
      (message) => new RemoteUnavailableError(`Register hydrometer: ${message}`, response.status)
    );
    return body.id;
  }

  /**
   * Ask the tracker for a new hydrometer device token and keep it.
   * @returns null when the tracker answers without a token
   */
  async generateDeviceToken(options: RequestOptions = {}): Promise<string | null> {
    log.info("Generating device token...");
    const response = await this.request("POST", "/hydrometer/token", undefined, options);
    if (!response.ok) {
      throw await this.failure(response, "Generate device token");
    }
    const body = await this.parseBody(
      response,
      DeviceTokenResponseSchema,
      (message) => new RemoteUnavailableError(`Generate device token: ${message}`, response.status)
    );
    if (!body.token) {
      log.warn("Device token response carried no token");
      return null;
    }
    this.updateIdentity({ deviceToken: body.token });
    return body.token;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // BREWS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws RegistrationConflictError when the list cannot be read
   */
  async listBrews(options: RequestOptions = {}): Promise<BrewRecord[]> {
    const response = await this.request("GET", "/hydrometer/brew", undefined, options);
    if (!response.ok) {
      throw await this.failure(response, "Get brews");
    }
    return this.parseBody(
      response,
      BrewListResponseSchema,
      (message) => new RegistrationConflictError(`Brew list: ${message}`)
    );
  }

  /**
   * Start a brew for a hydrometer.
   * @returns the new brew (picked by name when the tracker answers with a list)
   */
  async registerBrew(name: string, hydrometerId: string, options: RequestOptions = {}): Promise<BrewRecord> {
    log.info(`Registering brew "${name}"...`);
    const response = await this.request("POST", "/hydrometer/brew", {
      device_id: hydrometerId,
      brew_name: name,
    }, options);
    if (!response.ok) {
      throw await this.failure(response, `Register brew "${name}"`);
    }
    const body = await this.parseBody(
      response,
      RegisterBrewResponseSchema,
      (message) => new RegistrationConflictError(`Register brew: ${message}`)
    );
    if (!Array.isArray(body)) {
      return body;
    }
    const created = body.find((brew) => brew.name === name && brew.endDate === null) ?? body[0];
    if (!created) {
      throw new RegistrationConflictError(`Register brew "${name}": empty response`);
    }
    return created;
  }

  async linkRecipe(brewId: string, recipeId: number, options: RequestOptions = {}): Promise<void> {
    log.info(`Linking brew ${brewId} to recipe ${recipeId}...`);
    const response = await this.request("PATCH", `/hydrometer/brew/${encodeURIComponent(brewId)}`, {
      recipe_id: recipeId,
    }, options);
    if (!response.ok) {
      throw await this.failure(response, `Link brew ${brewId} to recipe ${recipeId}`);
    }
  }

  /**
   * Mark a brew as ended. Not retried; bounded by config.cloud.endBrewTimeoutMs
   * unless the caller passes its own timeout.
   */
  async endBrew(hydrometerId: string, brewId: string, options: RequestOptions = {}): Promise<void> {
    log.info(`Ending brew ${brewId}...`);
    const response = await this.request("PATCH", "/hydrometer/brew", {
      device_id: hydrometerId,
      brew_id: brewId,
    }, { timeoutMs: config.cloud.endBrewTimeoutMs, ...options, skipRetry: true });
    if (!response.ok) {
      throw await this.failure(response, `End brew ${brewId}`);
    }
  }

  /**
   * Delete an ended brew. Ongoing brews are refused locally.
   * @returns false when the brew has not ended
   */
  async deleteBrew(brew: BrewRecord, options: RequestOptions = {}): Promise<boolean> {
    if (!brew.endDate) {
      log.warn(`Brew "${brew.name ?? brew.id}" is not ended, not deleting`);
      return false;
    }
    const response = await this.request("DELETE", `/hydrometer/brew/${encodeURIComponent(brew.id)}`, undefined, options);
    if (!response.ok) {
      throw await this.failure(response, `Delete brew ${brew.id}`);
    }
    log.info(`Deleted brew ${brew.id}`);
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // DATA POINTS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Send one reading. Never retried: the next advertisement supersedes it.
   * @returns false when the tracker rejects the data point
   */
  async publishDataPoint(point: DataPoint, options: RequestOptions = {}): Promise<boolean> {
    const token = this.requireDeviceToken();
    const response = await this.request("POST", "/hydrometer/rapt-pill", {
      token,
      name: point.name,
      gravity: point.gravity,
      temperature: point.temperature,
      temp_units: point.temperatureUnit,
      battery: point.battery,
    }, { ...options, skipRetry: true });
    if (!response.ok) {
      log.warn(`Data point for "${point.name}" rejected: ${response.status} ${response.statusText}`);
      return false;
    }
    return true;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug("Could not read response body:", error);
    return "";
  }
}

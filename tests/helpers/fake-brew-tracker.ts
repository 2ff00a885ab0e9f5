/**
 * In-process fake of the brew tracker API.
 *
 * Install with `tracker.install()` (replaces global fetch through vi.stubGlobal)
 * and remove with `vi.unstubAllGlobals()`.
 *
 * Endpoints:
 * - POST   /auth/login
 * - POST   /auth/refresh
 * - GET    /hydrometer
 * - POST   /hydrometer/token
 * - POST   /hydrometer/rapt-pill/register
 * - POST   /hydrometer/rapt-pill
 * - GET    /hydrometer/brew
 * - POST   /hydrometer/brew
 * - PATCH  /hydrometer/brew
 * - PATCH  /hydrometer/brew/:id
 * - DELETE /hydrometer/brew/:id
 */

import { vi } from "vitest";

export const TEST_API_URL = "http://brew-tracker.test/api";
export const TEST_EMAIL = "brewer@example.com";
export const TEST_PASSWORD = "test-secret";

export interface RecordedRequest {
  method: string;
  route: string;
  path: string;
  body: unknown;
  authorization: string | null;
}

export interface FakeHydrometer {
  id: number;
  device_name: string;
}

export interface FakeBrew {
  id: number;
  name: string;
  device_id: unknown;
  end_date: string | null;
  recipe_id: number | null;
}

export interface FakeDataPoint {
  token: unknown;
  name: unknown;
  gravity: unknown;
  temperature: unknown;
  temp_units: unknown;
  battery: unknown;
}

type RouteHandler = (request: RecordedRequest) => Response;

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function field(body: unknown, key: string): unknown {
  if (body === null || typeof body !== "object") {
    return undefined;
  }
  return Reflect.get(body, key);
}

export class FakeBrewTracker {
  readonly requests: RecordedRequest[] = [];

  email = TEST_EMAIL;
  password = TEST_PASSWORD;

  accessToken: string | null = null;
  refreshToken: string | null = null;
  deviceToken: string | null = null;

  hydrometers: FakeHydrometer[] = [];
  brews: FakeBrew[] = [];
  dataPoints: FakeDataPoint[] = [];

  /** When true, POST /hydrometer/brew answers with the created brew only */
  registerBrewReturnsObject = false;

  /** Every request fails with a network error */
  offline = false;

  private tokenCounter = 0;
  private nextId = 100;
  private overrides: Map<string, RouteHandler[]> = new Map();
  private hanging: Set<string> = new Set();

  /** Replace global fetch with this fake */
  install(): this {
    vi.stubGlobal("fetch", this.fetch);
    return this;
  }

  /** Answer the next request to `route` (e.g. "POST /auth/login") with `handler` */
  once(route: string, handler: RouteHandler): this {
    const queue = this.overrides.get(route) ?? [];
    queue.push(handler);
    this.overrides.set(route, queue);
    return this;
  }

  /** Answer the next request to `route` with `status` */
  failOnce(route: string, status: number, body: unknown = { error: "forced failure" }): this {
    return this.once(route, () => jsonResponse(status, body));
  }

  /** Requests to `route` never answer; they only end when aborted */
  hang(route: string): this {
    this.hanging.add(route);
    return this;
  }

  /** Issue a login session, as if the user had logged in before */
  issueTokens(): { accessToken: string; refreshToken: string } {
    this.tokenCounter++;
    this.accessToken = `access-${this.tokenCounter}`;
    this.refreshToken = `refresh-${this.tokenCounter}`;
    return { accessToken: this.accessToken, refreshToken: this.refreshToken };
  }

  requestsTo(route: string): RecordedRequest[] {
    return this.requests.filter((request) => request.route === route);
  }

  routes(): string[] {
    return this.requests.map((request) => request.route);
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const method = (init?.method ?? "GET").toUpperCase();
    const path = url.pathname.replace(new URL(TEST_API_URL).pathname, "");
    const route = `${method} ${path.replace(/^\/hydrometer\/brew\/[^/]+$/, "/hydrometer/brew/:id")}`;
    const request: RecordedRequest = {
      method,
      route,
      path,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
      authorization: new Headers(init?.headers).get("Authorization"),
    };
    this.requests.push(request);

    const signal = init?.signal;
    if (signal?.aborted) {
      throw new Error("This operation was aborted");
    }
    if (this.offline) {
      throw new TypeError("fetch failed");
    }
    if (this.hanging.has(route)) {
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
      });
    }

    const override = this.overrides.get(route)?.shift();
    if (override) {
      return override(request);
    }
    return this.handle(request);
  };

  private handle(request: RecordedRequest): Response {
    const { body } = request;

    switch (request.route) {
      case "POST /auth/login": {
        if (field(body, "email") !== this.email || field(body, "password") !== this.password) {
          return jsonResponse(401, { error: "Invalid credentials" });
        }
        return jsonResponse(200, this.issueTokens());
      }

      case "POST /auth/refresh": {
        if (this.refreshToken === null || field(body, "refreshToken") !== this.refreshToken) {
          return jsonResponse(401, { error: "Invalid refresh token" });
        }
        this.tokenCounter++;
        this.accessToken = `access-${this.tokenCounter}`;
        return jsonResponse(200, { accessToken: this.accessToken });
      }
    }

    if (this.accessToken === null || request.authorization !== `Bearer ${this.accessToken}`) {
      return jsonResponse(401, { error: "Unauthorized" });
    }

    switch (request.route) {
      case "GET /hydrometer":
        return jsonResponse(200, { devices: this.hydrometers });

      case "POST /hydrometer/token": {
        this.tokenCounter++;
        this.deviceToken = `device-token-${this.tokenCounter}`;
        return jsonResponse(200, { token: this.deviceToken });
      }

      case "POST /hydrometer/rapt-pill/register": {
        if (field(body, "token") !== this.deviceToken) {
          return jsonResponse(400, { error: "Unknown device token" });
        }
        const hydrometer = { id: this.nextId++, device_name: String(field(body, "name")) };
        this.hydrometers.push(hydrometer);
        return jsonResponse(200, { id: hydrometer.id });
      }

      case "POST /hydrometer/rapt-pill": {
        if (field(body, "token") !== this.deviceToken) {
          return jsonResponse(400, { error: "Unknown device token" });
        }
        this.dataPoints.push({
          token: field(body, "token"),
          name: field(body, "name"),
          gravity: field(body, "gravity"),
          temperature: field(body, "temperature"),
          temp_units: field(body, "temp_units"),
          battery: field(body, "battery"),
        });
        return jsonResponse(200, { ok: true });
      }

      case "GET /hydrometer/brew":
        return jsonResponse(200, this.brews);

      case "POST /hydrometer/brew": {
        const brew: FakeBrew = {
          id: this.nextId++,
          name: String(field(body, "brew_name")),
          device_id: field(body, "device_id"),
          end_date: null,
          recipe_id: null,
        };
        this.brews.push(brew);
        return jsonResponse(200, this.registerBrewReturnsObject ? brew : [brew]);
      }

      case "PATCH /hydrometer/brew": {
        const brew = this.brews.find((b) => String(b.id) === String(field(body, "brew_id")));
        if (!brew) {
          return jsonResponse(404, { error: "Brew not found" });
        }
        brew.end_date = "2026-01-30T12:00:00Z";
        return jsonResponse(200, brew);
      }

      case "PATCH /hydrometer/brew/:id": {
        const brew = this.findBrew(request.path);
        if (!brew) {
          return jsonResponse(404, { error: "Brew not found" });
        }
        const recipeId = field(body, "recipe_id");
        brew.recipe_id = typeof recipeId === "number" ? recipeId : null;
        return jsonResponse(200, brew);
      }

      case "DELETE /hydrometer/brew/:id": {
        const brew = this.findBrew(request.path);
        if (!brew) {
          return jsonResponse(404, { error: "Brew not found" });
        }
        this.brews = this.brews.filter((b) => b !== brew);
        return jsonResponse(200, { deleted: true });
      }
    }

    return jsonResponse(404, { error: `No route for ${request.route}` });
  }

  private findBrew(path: string): FakeBrew | undefined {
    const id = path.split("/").pop();
    return this.brews.find((brew) => String(brew.id) === id);
  }
}

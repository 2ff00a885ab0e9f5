/**
 * PillTrack Edge - Config Store
 *
 * Reads and writes the JSON config file (`data.json`):
 *
 * {
 *   "MTDetails": { "MTEmail", "MTPassword", "MTUrl", "MTDeviceToken",
 *                  "AccessToken", "RefreshToken", "GToken" },
 *   "Sessions": [{ "BrewName", "Pill Name", "Mac Address", "Poll Interval",
 *                  "Temp in C", "MTRecipeId" }]
 * }
 *
 * Keys this service does not know about are kept when the file is saved.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { config } from "../config.ts";
import { ConfigFileError, errorMessage } from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import type { RemoteIdentity, SessionConfig, TrackerCredentials } from "../types/index.ts";

const log = createLogger("ConfigStore");

// ═══════════════════════════════════════════════════════════════════════════════
// FILE SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const OptionalText = z.string().nullish();

const AccountDetailsSchema = z
  .object({
    MTEmail: OptionalText,
    MTPassword: OptionalText,
    MTUrl: OptionalText,
    MTDeviceToken: OptionalText,
    AccessToken: OptionalText,
    RefreshToken: OptionalText,
    GToken: OptionalText,
  })
  .passthrough();

/** "Poll Interval" is written as text by some editors */
const PollIntervalSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value === "") {
      return config.scanning.defaultPollIntervalSeconds;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid poll interval: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const StoredSessionSchema = z
  .object({
    BrewName: z.string().min(1),
    "Pill Name": OptionalText,
    "Mac Address": z.string().min(1),
    "Poll Interval": PollIntervalSchema,
    "Temp in C": z.boolean().nullish().transform((value) => value ?? true),
    MTRecipeId: z.union([z.number(), z.string()]).nullish(),
    RemoteSync: z.boolean().optional(),
  })
  .passthrough();

const ConfigFileSchema = z
  .object({
    MTDetails: AccountDetailsSchema.default({}),
    Sessions: z.array(StoredSessionSchema).default([]),
  })
  .passthrough();

export type AccountDetails = z.infer<typeof AccountDetailsSchema>;
export type StoredSession = z.infer<typeof StoredSessionSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

export function toSessionConfig(stored: StoredSession): SessionConfig {
  return {
    brewName: stored.BrewName,
    macAddress: stored["Mac Address"],
    pollIntervalSeconds: stored["Poll Interval"],
    temperatureUnitIsCelsius: stored["Temp in C"],
    recipeId: stored.MTRecipeId ?? null,
    pillName: stored["Pill Name"] ?? null,
    remoteSync: stored.RemoteSync,
  };
}

export function fromSessionConfig(session: SessionConfig): StoredSession {
  const stored: StoredSession = {
    BrewName: session.brewName,
    "Pill Name": session.pillName ?? null,
    "Mac Address": session.macAddress,
    "Poll Interval": session.pollIntervalSeconds,
    "Temp in C": session.temperatureUnitIsCelsius,
    MTRecipeId: session.recipeId ?? null,
  };
  if (session.remoteSync !== undefined) {
    stored.RemoteSync = session.remoteSync;
  }
  return stored;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG STORE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigStore {
  private data: ConfigFile;

  private constructor(
    readonly path: string,
    data: ConfigFile
  ) {
    this.data = data;
  }

  /**
   * Load the config file.
   * @throws ConfigFileError when it is missing, not JSON or not in the expected layout
   */
  static load(path: string = config.storage.configPath): ConfigStore {
    if (!existsSync(path)) {
      throw new ConfigFileError(`Config file not found: ${path}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigFileError(`Could not read ${path}: ${errorMessage(error)}`);
    }

    return new ConfigStore(path, ConfigStore.parse(json, path));
  }

  /** Create an empty store at `path` (written on the first save) */
  static empty(path: string = config.storage.configPath): ConfigStore {
    return new ConfigStore(path, ConfigStore.parse({}, path));
  }

  private static parse(json: unknown, path: string): ConfigFile {
    const result = ConfigFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigFileError(`Invalid config file ${path}: ${issues}`);
    }
    return result.data;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ACCOUNT
  // ─────────────────────────────────────────────────────────────────────────────

  getCredentials(): TrackerCredentials {
    return {
      email: this.data.MTDetails.MTEmail || null,
      password: this.data.MTDetails.MTPassword || null,
    };
  }

  getIdentity(): RemoteIdentity {
    return {
      deviceToken: this.data.MTDetails.MTDeviceToken || null,
      accessToken: this.data.MTDetails.AccessToken || null,
      refreshToken: this.data.MTDetails.RefreshToken || null,
    };
  }

  /** Brew tracker base URL, when set in the file */
  getApiUrl(): string | null {
    return this.data.MTDetails.MTUrl || null;
  }

  /** Token from the browser login, when one has been stored */
  getOAuthToken(): string | null {
    return this.data.MTDetails.GToken || null;
  }

  setCredentials(credentials: TrackerCredentials): void {
    this.data.MTDetails.MTEmail = credentials.email;
    this.data.MTDetails.MTPassword = credentials.password;
    this.save();
  }

  /**
   * Write tokens back to the file. Used as the client's onIdentityChange hook.
   */
  saveIdentity(identity: RemoteIdentity): void {
    this.data.MTDetails.MTDeviceToken = identity.deviceToken;
    this.data.MTDetails.AccessToken = identity.accessToken;
    this.data.MTDetails.RefreshToken = identity.refreshToken;
    this.save();
  }

  saveOAuthToken(token: string): void {
    this.data.MTDetails.GToken = token;
    this.save();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SESSIONS
  // ─────────────────────────────────────────────────────────────────────────────

  getSessions(): SessionConfig[] {
    return this.data.Sessions.map(toSessionConfig);
  }

  /** Add a session definition, replacing one with the same brew name */
  upsertSession(session: SessionConfig): void {
    const stored = fromSessionConfig(session);
    const index = this.data.Sessions.findIndex((s) => s.BrewName === session.brewName);
    if (index === -1) {
      this.data.Sessions.push(stored);
    } else {
      this.data.Sessions[index] = { ...this.data.Sessions[index], ...stored };
    }
    this.save();
  }

  /**
   * @returns false when no session has that brew name
   */
  removeSession(brewName: string): boolean {
    const before = this.data.Sessions.length;
    this.data.Sessions = this.data.Sessions.filter((s) => s.BrewName !== brewName);
    if (this.data.Sessions.length === before) {
      return false;
    }
    this.save();
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FILE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws ConfigFileError when the file cannot be written
   */
  save(): void {
    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(this.path, `${JSON.stringify(this.data, null, 4)}\n`, "utf-8");
    } catch (error) {
      throw new ConfigFileError(`Could not write ${this.path}: ${errorMessage(error)}`);
    }
    log.debug(`Saved ${this.path}`);
  }
}

/**
 * PillTrack Edge - Remote Setup
 *
 * Reconciles a session with the brew tracker before data points are sent:
 * device token, hydrometer, brew and optional recipe link.
 *
 * Registration is idempotent: an existing hydrometer with the same name or an
 * ongoing brew with the same name is adopted instead of registering another.
 */

import { NotConfiguredError, RegistrationConflictError } from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import type { RemoteBinding } from "../types/index.ts";
import type { BrewRecord, BrewTrackerClient, RequestOptions } from "./rest-client.ts";

const log = createLogger("RemoteSetup");

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Parameters for resolving the session's brew */
export interface BrewTarget {
  brewName: string;
  hydrometerId: string;
  recipeId?: number | string | null;
}

/** Everything needed to bind one session to the tracker */
export interface SessionTarget {
  brewName: string;
  hydrometerName: string;
  recipeId?: number | string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEVICE TOKEN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Generate a device token when the account has none yet.
 * @throws NotConfiguredError when the tracker does not provide one
 */
export async function ensureDeviceToken(client: BrewTrackerClient, options: RequestOptions = {}): Promise<string> {
  const existing = client.getIdentity().deviceToken;
  if (existing) {
    return existing;
  }

  log.info("No device token configured, generating one");
  await client.generateDeviceToken(options);

  const token = client.getIdentity().deviceToken;
  if (!token) {
    throw new NotConfiguredError("Brew tracker did not provide a device token");
  }
  return token;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HYDROMETER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Find the hydrometer named `name`, registering it when absent.
 * @returns hydrometer id
 */
export async function resolveHydrometer(
  client: BrewTrackerClient,
  name: string,
  options: RequestOptions = {}
): Promise<string> {
  try {
    const hydrometers = await client.listHydrometers(options);
    const match = hydrometers.find((hydrometer) => hydrometer.deviceName === name);
    if (match) {
      log.info(`Using existing hydrometer "${name}" (${match.id})`);
      return match.id;
    }
  } catch (error) {
    if (!(error instanceof RegistrationConflictError)) {
      throw error;
    }
    log.warn(`Could not read hydrometer list, registering "${name}":`, error.message);
  }

  const id = await client.registerHydrometer(name, options);
  log.info(`Registered hydrometer "${name}" (${id})`);
  return id;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BREW
// ═══════════════════════════════════════════════════════════════════════════════

/** Recipe id to link, or null when none is configured */
export function configuredRecipeId(recipeId: number | string | null | undefined): number | null {
  if (recipeId === null || recipeId === undefined) {
    return null;
  }
  if (typeof recipeId === "string" && recipeId.trim() === "") {
    return null;
  }
  const parsed = typeof recipeId === "number" ? recipeId : Number(recipeId.trim());
  if (!Number.isFinite(parsed) || parsed === -1) {
    return null;
  }
  return parsed;
}

/**
 * Adopt the ongoing brew named `brewName` or register a new one, then link
 * the recipe when one is configured.
 * @returns brew id
 */
export async function resolveBrew(
  client: BrewTrackerClient,
  target: BrewTarget,
  options: RequestOptions = {}
): Promise<string> {
  let brews: BrewRecord[] = [];
  try {
    brews = await client.listBrews(options);
  } catch (error) {
    if (!(error instanceof RegistrationConflictError)) {
      throw error;
    }
    log.warn(`Could not read brew list, registering "${target.brewName}":`, error.message);
  }

  const ongoing = brews.find((brew) => brew.name === target.brewName && brew.endDate === null);
  let brewId: string;
  if (ongoing) {
    brewId = ongoing.id;
    log.info(`Using ongoing brew "${target.brewName}" (${brewId})`);
  } else {
    const created = await client.registerBrew(target.brewName, target.hydrometerId, options);
    brewId = created.id;
    log.info(`Registered brew "${target.brewName}" (${brewId})`);
  }

  const recipeId = configuredRecipeId(target.recipeId);
  if (recipeId !== null) {
    await client.linkRecipe(brewId, recipeId, options);
  }

  return brewId;
}

/**
 * Run the whole setup for one session: device token, hydrometer, brew.
 */
export async function bindSession(
  client: BrewTrackerClient,
  target: SessionTarget,
  options: RequestOptions = {}
): Promise<RemoteBinding> {
  await ensureDeviceToken(client, options);
  const hydrometerId = await resolveHydrometer(client, target.hydrometerName, options);
  const brewId = await resolveBrew(client, {
    brewName: target.brewName,
    hydrometerId,
    recipeId: target.recipeId,
  }, options);
  return { hydrometerId, brewId };
}

#!/usr/bin/env tsx
/**
 * PillTrack Edge Service
 *
 * Main entry point.
 *
 * This service:
 * - Loads account details and session definitions from the JSON config file
 * - Logs in to the brew tracker and binds each session to a hydrometer and brew
 * - Reads Pill advertisements as JSON lines from stdin (an external BLE
 *   scanner pipes them in)
 * - Decodes them, derives gravity/ABV/temperature and publishes data points
 * - Ends every brew on SIGINT/SIGTERM
 */

import { config } from "./config.ts";
import { BrewTrackerClient } from "./cloud/rest-client.ts";
import { readAdvertisementFeed } from "./devices/advertisement-feed.ts";
import { SessionRegistry } from "./sessions/session-registry.ts";
import { ConfigStore } from "./storage/config-store.ts";
import { errorMessage } from "./errors.ts";
import { createLogger } from "./utils/logger.ts";

const log = createLogger("MAIN");

const VERSION = "0.1.0";

let registry: SessionRegistry | null = null;
let shuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// BANNER
// ═══════════════════════════════════════════════════════════════════════════════

const BANNER = `
╔═══════════════════════════════════════════════════════════════════╗
║   PillTrack Edge                                                  ║
║   RAPT Pill → brew tracker                                        ║
╚═══════════════════════════════════════════════════════════════════╝
`;

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  console.log(BANNER);
  log.info(`Starting PillTrack Edge ${VERSION} (Node ${process.versions.node})`);

  // ─────────────────────────────────────────────────────────────────────────────
  // Load config file
  // ─────────────────────────────────────────────────────────────────────────────
  const configPath = process.argv[2] ?? config.storage.configPath;
  log.info(`Loading ${configPath}...`);
  const store = ConfigStore.load(configPath);
  const sessions = store.getSessions();

  // ─────────────────────────────────────────────────────────────────────────────
  // Brew tracker client
  // ─────────────────────────────────────────────────────────────────────────────
  const oauthToken = store.getOAuthToken();
  const client = new BrewTrackerClient({
    apiUrl: store.getApiUrl() ?? config.cloud.apiUrl,
    credentials: store.getCredentials(),
    identity: store.getIdentity(),
    tokenProvider: oauthToken ? async () => oauthToken : undefined,
    onIdentityChange: (identity) => store.saveIdentity(identity),
  });

  console.log("");
  console.log("┌─────────────────────────────────────────────────────────────────┐");
  console.log("│                      CONFIGURATION                              │");
  console.log("├─────────────────────────────────────────────────────────────────┤");
  console.log(`│  Brew tracker:   ${client.getApiUrl().substring(0, 45).padEnd(47)}│`);
  console.log(`│  Config file:    ${configPath.substring(0, 45).padEnd(47)}│`);
  console.log(`│  Sessions:       ${String(sessions.length).padEnd(47)}│`);
  console.log(`│  Log level:      ${config.logging.level.padEnd(47)}│`);
  console.log("└─────────────────────────────────────────────────────────────────┘");
  console.log("");

  // ─────────────────────────────────────────────────────────────────────────────
  // Sessions
  // ─────────────────────────────────────────────────────────────────────────────
  const activeRegistry = new SessionRegistry({ client });
  registry = activeRegistry;

  activeRegistry.on("status", (message) => {
    if (message.level === "info") {
      log.debug(`[${message.brewName}] ${message.message}`);
    }
  });

  for (const session of sessions) {
    activeRegistry.add(session);
  }

  if (activeRegistry.size === 0) {
    log.warn("No sessions configured; add entries under \"Sessions\" in the config file");
  }

  process.on("SIGINT", () => {
    console.log("\n[MAIN] Received SIGINT, shutting down gracefully...");
    shutdown(0).catch(fatal);
  });

  process.on("SIGTERM", () => {
    console.log("\n[MAIN] Received SIGTERM, shutting down gracefully...");
    shutdown(0).catch(fatal);
  });

  const results = await activeRegistry.startAll();
  const failed = results.filter((result) => !result.ok);
  log.info(`${results.length - failed.length}/${results.length} session(s) running`);

  // ─────────────────────────────────────────────────────────────────────────────
  // Advertisement feed
  // ─────────────────────────────────────────────────────────────────────────────
  log.info("Waiting for advertisements on stdin...");
  const stats = await readAdvertisementFeed(process.stdin, (address, manufacturerData) => {
    activeRegistry.handleAdvertisement(address, manufacturerData).catch((error: unknown) => {
      log.error(`Failed to handle advertisement from ${address}:`, errorMessage(error));
    });
  });
  log.info(`Feed closed after ${stats.lines} line(s), ${stats.invalid} invalid`);

  await shutdown(0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

async function shutdown(code: number): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  if (registry) {
    // Aborts sessions still starting; queued advertisements run before each stop
    log.info("Stopping sessions...");
    const results = await registry.stopAll();
    for (const result of results.filter((r) => !r.ok)) {
      log.error(`Session ${result.handle} did not stop cleanly: ${result.error}`);
    }

    log.info("Waiting for pending publishes...");
    await registry.whenIdle();
  }

  log.info("Goodbye!");
  process.exit(code);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

function fatal(err: unknown): never {
  console.error("[FATAL]", err);
  process.exit(1);
}

main().catch(fatal);

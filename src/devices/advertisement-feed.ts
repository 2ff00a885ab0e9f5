/**
 * PillTrack Edge - Advertisement Feed
 *
 * Line-oriented bridge from an external BLE scanner process. Each line is one
 * advertisement:
 *
 *   {"address": "AA:BB:CC:DD:EE:FF", "manufacturerData": {"16722": "5054..."}}
 *
 * Keys of `manufacturerData` are decimal vendor ids, values hex strings.
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";
import { errorMessage } from "../errors.ts";
import { createLogger } from "../utils/logger.ts";
import type { AdvertisementListener, ManufacturerData } from "../types/index.ts";

const log = createLogger("AdvertisementFeed");

const HexSchema = z
  .string()
  .transform((hex) => hex.replace(/[\s:]/g, ""))
  .refine((hex) => hex.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(hex), "must be an even-length hex string");

const FeedLineSchema = z.object({
  address: z.string().min(1),
  manufacturerData: z.record(z.string().regex(/^\d+$/, "vendor id must be a decimal integer"), HexSchema),
});

export interface FeedAdvertisement {
  address: string;
  manufacturerData: ManufacturerData;
}

export interface FeedStats {
  lines: number;
  advertisements: number;
  invalid: number;
}

export function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Parse one feed line.
 * @returns null for blank lines
 * @throws Error describing the first problem when the line is invalid
 */
export function parseFeedLine(line: string): FeedAdvertisement | null {
  const trimmed = line.trim();
  if (trimmed === "") {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch (error) {
    throw new Error(`Feed line is not JSON: ${errorMessage(error)}`);
  }

  const result = FeedLineSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new Error(`Invalid feed line: ${where}${issue?.message ?? "unknown problem"}`);
  }

  const manufacturerData = new Map<number, Uint8Array>();
  for (const [vendorId, hex] of Object.entries(result.data.manufacturerData)) {
    manufacturerData.set(Number(vendorId), hexToBytes(hex));
  }
  return { address: result.data.address, manufacturerData };
}

/**
 * Read advertisements from a stream until it ends. Invalid lines are logged
 * and skipped.
 */
export async function readAdvertisementFeed(input: Readable, onAdvertisement: AdvertisementListener): Promise<FeedStats> {
  const stats: FeedStats = { lines: 0, advertisements: 0, invalid: 0 };
  const lines = createInterface({ input, crlfDelay: Infinity });

  for await (const line of lines) {
    stats.lines++;
    let advertisement: FeedAdvertisement | null;
    try {
      advertisement = parseFeedLine(line);
    } catch (error) {
      stats.invalid++;
      log.warn(`Skipping line ${stats.lines}:`, errorMessage(error));
      continue;
    }
    if (!advertisement) {
      continue;
    }
    stats.advertisements++;
    onAdvertisement(advertisement.address, advertisement.manufacturerData);
  }

  return stats;
}

/**
 * PillTrack Edge - Pill Advertisement Decoder
 *
 * Decodes the 23-byte manufacturer payload a RAPT Pill broadcasts.
 *
 * Layout (big-endian, manufacturer id already stripped):
 *
 * Version 1:
 * - [0-1]   "PT"
 * - [2]     version (1)
 * - [3-8]   MAC address (ignored)
 * - [9-10]  temperature, u16, 1/128 K
 * - [11-14] gravity × 1000, f32
 * - [15-20] x, y, z, i16, 1/16 g
 * - [21-22] battery, i16, 1/256 %
 *
 * Version 2 (any version byte other than 1):
 * - [0-1]   "PT"
 * - [2]     version
 * - [3]     unused
 * - [4]     gravity velocity present flag
 * - [5-8]   gravity velocity, f32
 * - [9-22]  as version 1, battery as u16
 */

import { config } from "../config.ts";
import { MalformedPayloadError } from "../errors.ts";
import type { DecodedMetrics, ManufacturerData } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Exact payload length */
export const PILL_PAYLOAD_LENGTH = 23;

/** "PT" */
const PREFIX = [0x50, 0x54] as const;

const OFFSET_VERSION = 2;
const OFFSET_GRAVITY_VELOCITY_FLAG = 4;
const OFFSET_GRAVITY_VELOCITY = 5;
const OFFSET_TEMPERATURE = 9;
const OFFSET_GRAVITY = 11;
const OFFSET_X = 15;
const OFFSET_Y = 17;
const OFFSET_Z = 19;
const OFFSET_BATTERY = 21;

const SENTINEL_BYTES = new TextEncoder().encode(config.ble.sentinelPayload);

// ═══════════════════════════════════════════════════════════════════════════════
// DECODER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Decode a Pill payload.
 *
 * @param data - Manufacturer data for vendor id 16722
 * @throws {MalformedPayloadError} If the length is not 23 or the prefix is not "PT"
 */
export function decodePillAdvertisement(data: Uint8Array): DecodedMetrics {
  if (data.length !== PILL_PAYLOAD_LENGTH) {
    throw new MalformedPayloadError(
      `Advertisement payload must be ${PILL_PAYLOAD_LENGTH} bytes, got ${data.length}`
    );
  }
  if (data[0] !== PREFIX[0] || data[1] !== PREFIX[1]) {
    throw new MalformedPayloadError(
      `Unexpected payload prefix 0x${toHex(data.subarray(0, 2))}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const version = view.getUint8(OFFSET_VERSION);

  const shared = {
    temperatureRaw: view.getUint16(OFFSET_TEMPERATURE, false),
    gravityRaw: view.getFloat32(OFFSET_GRAVITY, false),
    x: view.getInt16(OFFSET_X, false),
    y: view.getInt16(OFFSET_Y, false),
    z: view.getInt16(OFFSET_Z, false),
  };

  if (version === 1) {
    return {
      version: 1,
      hasGravityVelocity: false,
      gravityVelocity: 0,
      ...shared,
      batteryRaw: view.getInt16(OFFSET_BATTERY, false),
    };
  }

  return {
    version: 2,
    hasGravityVelocity: view.getUint8(OFFSET_GRAVITY_VELOCITY_FLAG) !== 0,
    gravityVelocity: view.getFloat32(OFFSET_GRAVITY_VELOCITY, false),
    ...shared,
    batteryRaw: view.getUint16(OFFSET_BATTERY, false),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// BLE BOUNDARY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pick the Pill payload out of an advertisement's manufacturer data.
 * Returns null when there is no entry for the Pill vendor id or when the entry
 * is the "PTdPillG1" broadcast, which carries no metrics.
 */
export function extractPillPayload(manufacturerData: ManufacturerData): Uint8Array | null {
  const payload = manufacturerData.get(config.ble.manufacturerId);
  if (!payload || isSentinel(payload)) {
    return null;
  }
  return payload;
}

function isSentinel(payload: Uint8Array): boolean {
  return payload.length === SENTINEL_BYTES.length && payload.every((byte, i) => byte === SENTINEL_BYTES[i]);
}

/** Case-insensitive device address comparison */
export function macAddressesMatch(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join("");
}

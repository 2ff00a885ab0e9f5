/**
 * PillTrack Edge - Derived Metrics
 *
 * Unit conversion and ABV estimate for decoded Pill metrics.
 *
 * Celsius is rounded to 2 decimals, Fahrenheit is left unrounded.
 */

import type {
  DecodedMetrics,
  LiveTelemetry,
  SessionCalibration,
} from "../types/index.ts";

/** Simplified ABV factor: (OG - FG) × 131.25 */
const ABV_FACTOR = 131.25;

const KELVIN_OFFSET = 273.15;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Convert a 1/128 K reading to Celsius (rounded to 2 decimals) or Fahrenheit.
 */
export function temperatureFromKelvinFixedPoint(raw: number, isCelsius: boolean): number {
  const celsius = raw / 128 - KELVIN_OFFSET;
  if (isCelsius) {
    return roundTo(celsius, 2);
  }
  return celsius * (9 / 5) + 32;
}

/** Specific gravity from the transmitted ×1000 value */
export function gravityFromRaw(raw: number): number {
  return roundTo(raw / 1000, 4);
}

export function abv(startingGravity: number, currentGravity: number): number {
  return roundTo((startingGravity - currentGravity) * ABV_FACTOR, 4);
}

/** Accelerometer axis in g */
export function accel(raw: number): number {
  return raw / 16;
}

/** Round to the nearest integer, ties to the even neighbour */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Battery in whole percent; 100.5 % reads as 100 */
export function batteryPercent(raw: number): number {
  return roundHalfEven(raw / 256);
}

/**
 * Anchor the calibration at `gravity` unless it is already anchored.
 */
export function calibrate(
  calibration: SessionCalibration,
  gravity: number
): Extract<SessionCalibration, { kind: "calibrated" }> {
  if (calibration.kind === "calibrated") {
    return calibration;
  }
  return { kind: "calibrated", startingGravity: gravity };
}

/**
 * Turn decoded metrics into telemetry, anchoring the calibration on the first
 * sample.
 */
export function deriveTelemetry(
  metrics: DecodedMetrics,
  calibration: SessionCalibration,
  isCelsius: boolean,
  now: Date = new Date()
): { telemetry: LiveTelemetry; calibration: SessionCalibration } {
  const currentGravity = gravityFromRaw(metrics.gravityRaw);
  const anchored = calibrate(calibration, currentGravity);

  return {
    calibration: anchored,
    telemetry: {
      apiVersion: metrics.version,
      gravityVelocity: metrics.gravityVelocity,
      currentGravity,
      abv: abv(anchored.startingGravity, currentGravity),
      temperature: temperatureFromKelvinFixedPoint(metrics.temperatureRaw, isCelsius),
      temperatureUnit: isCelsius ? "C" : "F",
      batteryPercent: batteryPercent(metrics.batteryRaw),
      x: accel(metrics.x),
      y: accel(metrics.y),
      z: accel(metrics.z),
      lastEventTimestamp: toSecondPrecisionIso(now),
    },
  };
}

/** `2026-01-30T10:30:00Z` */
function toSecondPrecisionIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

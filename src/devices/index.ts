/**
 * PillTrack Edge Devices Module
 *
 * Exports for Pill payload decoding, derived metrics and the advertisement feed.
 */

// Decoder
export {
  PILL_PAYLOAD_LENGTH,
  decodePillAdvertisement,
  extractPillPayload,
  macAddressesMatch,
} from "./pill-decoder.ts";

// Derived metrics
export {
  roundTo,
  roundHalfEven,
  temperatureFromKelvinFixedPoint,
  gravityFromRaw,
  abv,
  accel,
  batteryPercent,
  calibrate,
  deriveTelemetry,
} from "./derived-metrics.ts";

// Feed
export {
  parseFeedLine,
  readAdvertisementFeed,
  hexToBytes,
} from "./advertisement-feed.ts";
export type { FeedAdvertisement, FeedStats } from "./advertisement-feed.ts";

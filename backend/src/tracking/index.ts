import type { Config } from "../config/env.js";
import { createDhlTrackingClient } from "./dhl-client.js";
import { ShipmentTracker } from "./shipment-tracker.js";

export function createShipmentTracker(config: Config): ShipmentTracker {
  return new ShipmentTracker({ provider: createDhlTrackingClient(config) });
}

export {
  DhlTrackingClient,
  DhlPayloadSchema,
  createDhlHttpClient,
  createDhlTrackingClient,
  normalizeDhlPayload,
  type DhlPayload,
} from "./dhl-client.js";
export { formatEventTime, formatTrackingResult } from "./format.js";
export { isNamedMockScenario, mockShipment } from "./mock-scenarios.js";
export {
  ShipmentTracker,
  trackingFailure,
  MAX_TRACKING_NUMBER_LENGTH,
  MIN_TRACKING_NUMBER_LENGTH,
  type ShipmentTrackerOptions,
} from "./shipment-tracker.js";
export type {
  Place,
  ShipmentProvider,
  TrackingEvent,
  TrackingFailure,
  TrackingResult,
  TrackingSuccess,
} from "./types.js";

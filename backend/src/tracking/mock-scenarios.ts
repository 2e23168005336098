import type { TrackingSuccess } from "./types.js";

type ScenarioFactory = (trackingNumber: string, now: Date) => TrackingSuccess;

const NAMED_SCENARIOS: Record<string, ScenarioFactory> = {
  TEST123: (trackingNumber, now) => ({
    success: true,
    trackingNumber,
    status: "transit",
    statusDescription: "Shipment in transit",
    currentLocation: "Leipzig Hub",
    estimatedDelivery: "2026-03-05",
    origin: { city: "Kericho", country: "KE" },
    destination: { city: "Boston", country: "US" },
    events: [
      {
        timestamp: "2026-02-28T20:15:00Z",
        description: "Departed sorting facility",
        location: "Leipzig",
      },
      {
        timestamp: "2026-02-28T18:45:00Z",
        description: "Arrived at sorting facility",
        location: "Leipzig",
      },
      {
        timestamp: "2026-02-27T14:30:00Z",
        description: "Shipment picked up",
        location: "Kericho",
      },
    ],
    lastUpdated: now.toISOString(),
  }),
  DELIVERED456: (trackingNumber, now) => ({
    success: true,
    trackingNumber,
    status: "delivered",
    statusDescription: "Shipment delivered",
    currentLocation: "Boston, MA",
    estimatedDelivery: "2026-02-25",
    origin: { city: "Kericho", country: "KE" },
    destination: { city: "Boston", country: "US" },
    events: [
      {
        timestamp: "2026-02-25T10:30:00Z",
        description: "Delivered",
        location: "Boston, MA",
      },
      {
        timestamp: "2026-02-25T08:15:00Z",
        description: "Out for delivery",
        location: "Boston, MA",
      },
    ],
    lastUpdated: now.toISOString(),
  }),
};

export function isNamedMockScenario(trackingNumber: string): boolean {
  return Object.hasOwn(NAMED_SCENARIOS, trackingNumber.toUpperCase());
}

/** Deterministic stand-in used when no carrier credential is configured. */
export function mockShipment(trackingNumber: string, now: Date): TrackingSuccess {
  const key = trackingNumber.toUpperCase();
  if (Object.hasOwn(NAMED_SCENARIOS, key)) {
    return NAMED_SCENARIOS[key](trackingNumber, now);
  }

  return {
    success: true,
    trackingNumber,
    status: "transit",
    statusDescription: "Shipment in transit to destination",
    currentLocation: "Frankfurt Sorting Facility",
    estimatedDelivery: "2026-03-10",
    origin: { city: "Mombasa", country: "KE" },
    destination: { city: "London", country: "GB" },
    events: [
      {
        timestamp: now.toISOString(),
        description: "Package in transit",
        location: "Frankfurt",
      },
    ],
    lastUpdated: now.toISOString(),
  };
}

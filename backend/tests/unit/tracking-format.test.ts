import { describe, test, expect } from "vitest";
import { formatEventTime, formatTrackingResult } from "../../src/tracking/format.js";
import type { TrackingSuccess } from "../../src/tracking/types.js";

// Timestamps without an offset are read and printed in the same local zone.
const inTransit: TrackingSuccess = {
  success: true,
  trackingNumber: "TEST123",
  status: "transit",
  statusDescription: "Shipment in transit",
  currentLocation: "Leipzig Hub",
  estimatedDelivery: "2026-03-05",
  origin: { city: "Kericho", country: "KE" },
  destination: { city: "Boston", country: "US" },
  events: [
    { timestamp: "2026-02-28T20:15:00", description: "Departed sorting facility", location: "Leipzig" },
    { timestamp: "2026-02-28T18:45:00", description: "Arrived at sorting facility", location: "Leipzig" },
    { timestamp: "2026-02-27T14:30:00", description: "Shipment picked up", location: "Kericho" },
    { timestamp: "2026-02-27T09:00:00", description: "Label created", location: "Kericho" },
  ],
  lastUpdated: "2026-03-01T12:00:00.000Z",
};

describe("formatEventTime", () => {
  test("should render month, day and 12-hour time", () => {
    expect(formatEventTime("2026-02-28T20:15:00")).toBe("Feb 28, 08:15 PM");
    expect(formatEventTime("2026-03-01T09:05:00")).toBe("Mar 01, 09:05 AM");
  });

  test("should return unparsable timestamps verbatim", () => {
    expect(formatEventTime("yesterday evening")).toBe("yesterday evening");
    expect(formatEventTime("")).toBe("");
  });
});

describe("formatTrackingResult", () => {
  test("should render status, route and the three latest events", () => {
    expect(formatTrackingResult(inTransit)).toBe(
      [
        "**Tracking Number:** TEST123",
        "",
        "**Status:** Shipment in transit",
        "**Current Location:** Leipzig Hub",
        "**Estimated Delivery:** 2026-03-05",
        "",
        "**From:** Kericho, KE",
        "**To:** Boston, US",
        "",
        "**Recent Activity:**",
        "- Feb 28, 08:15 PM - Departed sorting facility (Leipzig)",
        "- Feb 28, 06:45 PM - Arrived at sorting facility (Leipzig)",
        "- Feb 27, 02:30 PM - Shipment picked up (Kericho)",
      ].join("\n"),
    );
  });

  test("should omit empty sections", () => {
    const sparse: TrackingSuccess = {
      ...inTransit,
      estimatedDelivery: null,
      origin: { city: "", country: "" },
      destination: { city: "Boston", country: "" },
      events: [{ timestamp: "not a date", description: "Label created", location: "" }],
    };

    expect(formatTrackingResult(sparse)).toBe(
      [
        "**Tracking Number:** TEST123",
        "",
        "**Status:** Shipment in transit",
        "**Current Location:** Leipzig Hub",
        "**Estimated Delivery:** Not available",
        "",
        "**To:** Boston",
        "",
        "**Recent Activity:**",
        "- not a date - Label created",
      ].join("\n"),
    );
  });

  test("should render a failure as a single line", () => {
    expect(
      formatTrackingResult({
        success: false,
        trackingNumber: "ab",
        error: "Shipment tracking failed: no tracking number provided",
        reason: "InvalidTrackingNumber",
      }),
    ).toBe("Tracking Error: Shipment tracking failed: no tracking number provided");
  });
});

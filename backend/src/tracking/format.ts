import { format, isValid, parseISO } from "date-fns";
import type { Place, TrackingEvent, TrackingResult } from "./types.js";

export const RENDERED_EVENT_LIMIT = 3;
const EVENT_TIME_FORMAT = "MMM dd, hh:mm a";

/** Formats in the process time zone; anything unparsable is returned as-is. */
export function formatEventTime(timestamp: string): string {
  const date = parseISO(timestamp);
  return isValid(date) ? format(date, EVENT_TIME_FORMAT) : timestamp;
}

function formatPlace(label: string, place: Place): string | null {
  if (!place.city) {
    return null;
  }
  return place.country ? `**${label}:** ${place.city}, ${place.country}` : `**${label}:** ${place.city}`;
}

function formatEvent(event: TrackingEvent): string {
  const line = `- ${formatEventTime(event.timestamp)} - ${event.description}`;
  return event.location ? `${line} (${event.location})` : line;
}

export function formatTrackingResult(result: TrackingResult): string {
  if (!result.success) {
    return `Tracking Error: ${result.error}`;
  }

  const lines = [
    `**Tracking Number:** ${result.trackingNumber}`,
    "",
    `**Status:** ${result.statusDescription}`,
    `**Current Location:** ${result.currentLocation}`,
    `**Estimated Delivery:** ${result.estimatedDelivery ?? "Not available"}`,
  ];

  const route = [formatPlace("From", result.origin), formatPlace("To", result.destination)].filter(
    (line): line is string => line !== null,
  );
  if (route.length > 0) {
    lines.push("", ...route);
  }

  if (result.events.length > 0) {
    lines.push("", "**Recent Activity:**", ...result.events.slice(0, RENDERED_EVENT_LIMIT).map(formatEvent));
  }

  return lines.join("\n");
}

import type { TrackingFailureReason } from "../errors.js";

export interface Place {
  city: string;
  country: string;
}

export interface TrackingEvent {
  timestamp: string;
  description: string;
  location: string;
}

export interface TrackingSuccess {
  success: true;
  trackingNumber: string;
  status: string;
  statusDescription: string;
  currentLocation: string;
  estimatedDelivery: string | null;
  origin: Place;
  destination: Place;
  /** Most recent first, at most five. */
  events: TrackingEvent[];
  lastUpdated: string;
}

export interface TrackingFailure {
  success: false;
  trackingNumber: string;
  error: string;
  reason: TrackingFailureReason;
}

export type TrackingResult = TrackingSuccess | TrackingFailure;

/** A carrier backend. Rejects with `TrackingProviderError`. */
export interface ShipmentProvider {
  fetchShipment(trackingNumber: string): Promise<TrackingSuccess>;
}

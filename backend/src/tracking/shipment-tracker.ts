import {
  TrackingProviderError,
  TrackingValidationError,
  errorMessage,
  type TrackingFailureReason,
} from "../errors.js";
import { componentLogger } from "../logger.js";
import { isNamedMockScenario, mockShipment } from "./mock-scenarios.js";
import type { ShipmentProvider, TrackingResult, TrackingSuccess } from "./types.js";

const logger = componentLogger("shipment-tracker");

export const MIN_TRACKING_NUMBER_LENGTH = 8;
export const MAX_TRACKING_NUMBER_LENGTH = 39;

export interface ShipmentTrackerOptions {
  /** Live carrier backend; without one the tracker runs in mock mode. */
  provider?: ShipmentProvider;
  clock?: () => Date;
}

export class ShipmentTracker {
  private readonly provider?: ShipmentProvider;
  private readonly clock: () => Date;

  constructor(options: ShipmentTrackerOptions = {}) {
    this.provider = options.provider;
    this.clock = options.clock ?? (() => new Date());
    if (this.mockMode) {
      logger.warn("No carrier credential configured, tracking runs in mock mode");
    }
  }

  get mockMode(): boolean {
    return this.provider === undefined;
  }

  /**
   * Returns the trimmed identifier or throws `TrackingValidationError`.
   * Named mock scenario ids bypass the length bound in mock mode only.
   */
  validate(trackingNumber: string | undefined): string {
    const candidate = (trackingNumber ?? "").trim();
    if (!candidate) {
      throw new TrackingValidationError(candidate, "no tracking number provided");
    }
    if (this.mockMode && isNamedMockScenario(candidate)) {
      return candidate;
    }
    if (
      candidate.length < MIN_TRACKING_NUMBER_LENGTH ||
      candidate.length > MAX_TRACKING_NUMBER_LENGTH
    ) {
      throw new TrackingValidationError(
        candidate,
        `invalid tracking number format (expected ${MIN_TRACKING_NUMBER_LENGTH}-${MAX_TRACKING_NUMBER_LENGTH} characters, got ${candidate.length})`,
      );
    }
    return candidate;
  }

  async track(trackingNumber: string | undefined): Promise<TrackingSuccess> {
    const candidate = this.validate(trackingNumber);

    if (!this.provider) {
      logger.info({ trackingNumber: candidate }, "Using mock tracking data");
      return mockShipment(candidate, this.clock());
    }

    try {
      return await this.provider.fetchShipment(candidate);
    } catch (error) {
      if (error instanceof TrackingProviderError) {
        throw error;
      }
      throw new TrackingProviderError(candidate, "UpstreamError", errorMessage(error), {
        cause: error,
      });
    }
  }

  /** Like `track`, but reports failures as a `TrackingResult` instead of throwing. */
  async lookup(trackingNumber: string | undefined): Promise<TrackingResult> {
    try {
      return await this.track(trackingNumber);
    } catch (error) {
      logger.warn({ trackingNumber, error }, "Tracking lookup failed");
      return trackingFailure(trackingNumber ?? "", error);
    }
  }
}

export function trackingFailure(trackingNumber: string, error: unknown): TrackingResult {
  let reason: TrackingFailureReason = "UpstreamError";
  if (error instanceof TrackingValidationError || error instanceof TrackingProviderError) {
    reason = error.reason;
  }
  return {
    success: false,
    trackingNumber,
    error: errorMessage(error),
    reason,
  };
}

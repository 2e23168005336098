import axios, { AxiosError, type AxiosInstance } from "axios";
import { z } from "zod";
import type { Config } from "../config/env.js";
import { TrackingProviderError, errorMessage } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { ShipmentProvider, TrackingEvent, TrackingSuccess } from "./types.js";

const logger = componentLogger("dhl-client");

export const MAX_TRACKING_EVENTS = 5;

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);
const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_NETWORK",
]);

const AddressSchema = z
  .object({
    addressLocality: z.string().optional(),
    countryCode: z.string().optional(),
  })
  .passthrough();

const LocationSchema = z.object({ address: AddressSchema.optional() }).passthrough();

const DhlEventSchema = z
  .object({
    timestamp: z.string().optional(),
    description: z.string().optional(),
    location: LocationSchema.optional(),
  })
  .passthrough();

const DhlShipmentSchema = z
  .object({
    id: z.string().optional(),
    status: z
      .object({
        statusCode: z.string().optional(),
        description: z.string().optional(),
      })
      .passthrough()
      .optional(),
    events: z.array(DhlEventSchema).optional(),
    estimatedTimeOfDelivery: z.string().optional(),
    estimatedDeliveryTimeFrame: z
      .object({ estimatedFrom: z.string().optional() })
      .passthrough()
      .optional(),
    origin: LocationSchema.optional(),
    destination: LocationSchema.optional(),
  })
  .passthrough();

export const DhlPayloadSchema = z
  .object({ shipments: z.array(DhlShipmentSchema).default([]) })
  .passthrough();

export type DhlPayload = z.infer<typeof DhlPayloadSchema>;

/**
 * Flattens a DHL shipment-tracking payload. DHL lists events newest first;
 * only the first `MAX_TRACKING_EVENTS` are kept.
 */
export function normalizeDhlPayload(
  payload: DhlPayload,
  trackingNumber: string,
  now: Date,
): TrackingSuccess | null {
  const shipment = payload.shipments[0];
  if (!shipment) {
    return null;
  }

  const events = shipment.events ?? [];
  const origin = shipment.origin?.address;
  const destination = shipment.destination?.address;

  return {
    success: true,
    trackingNumber,
    status: shipment.status?.statusCode ?? "unknown",
    statusDescription: shipment.status?.description ?? "Status unknown",
    currentLocation: events[0]?.location?.address?.addressLocality ?? "Unknown",
    estimatedDelivery:
      shipment.estimatedTimeOfDelivery ?? shipment.estimatedDeliveryTimeFrame?.estimatedFrom ?? null,
    origin: { city: origin?.addressLocality ?? "", country: origin?.countryCode ?? "" },
    destination: {
      city: destination?.addressLocality ?? "",
      country: destination?.countryCode ?? "",
    },
    events: events.slice(0, MAX_TRACKING_EVENTS).map(
      (event): TrackingEvent => ({
        timestamp: event.timestamp ?? "",
        description: event.description ?? "",
        location: event.location?.address?.addressLocality ?? "",
      }),
    ),
    lastUpdated: now.toISOString(),
  };
}

function isTransientNetworkError(error: unknown): boolean {
  return (
    error instanceof AxiosError &&
    !error.response &&
    error.code !== undefined &&
    TRANSIENT_NETWORK_CODES.has(error.code)
  );
}

function toProviderError(trackingNumber: string, error: unknown): TrackingProviderError {
  if (error instanceof AxiosError) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new TrackingProviderError(trackingNumber, "Timeout", "DHL API request timeout", {
        cause: error,
      });
    }

    const status = error.response?.status;
    if (status === 404) {
      return new TrackingProviderError(trackingNumber, "NotFound", "tracking number not found", {
        cause: error,
        status,
      });
    }
    if (status !== undefined) {
      return new TrackingProviderError(trackingNumber, "UpstreamError", `DHL API error: ${status}`, {
        cause: error,
        status,
      });
    }
  }

  return new TrackingProviderError(
    trackingNumber,
    "UpstreamError",
    `failed to fetch tracking information: ${errorMessage(error)}`,
    { cause: error },
  );
}

export class DhlTrackingClient implements ShipmentProvider {
  constructor(
    private readonly http: AxiosInstance,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private async request(trackingNumber: string): Promise<unknown> {
    const response = await this.http.get<unknown>("", { params: { trackingNumber } });
    return response.data;
  }

  async fetchShipment(trackingNumber: string): Promise<TrackingSuccess> {
    logger.info({ trackingNumber }, "Fetching DHL shipment");

    let data: unknown;
    try {
      data = await this.request(trackingNumber);
    } catch (error) {
      if (!isTransientNetworkError(error)) {
        throw toProviderError(trackingNumber, error);
      }
      logger.warn({ trackingNumber, error }, "Transient network failure, retrying once");
      try {
        data = await this.request(trackingNumber);
      } catch (retryError) {
        throw toProviderError(trackingNumber, retryError);
      }
    }

    const parsed = DhlPayloadSchema.safeParse(data);
    if (!parsed.success) {
      logger.error({ trackingNumber, issues: parsed.error.issues }, "Malformed DHL payload");
      throw new TrackingProviderError(trackingNumber, "UpstreamError", "failed to parse tracking data");
    }

    const result = normalizeDhlPayload(parsed.data, trackingNumber, this.now());
    if (!result) {
      throw new TrackingProviderError(trackingNumber, "NotFound", "no shipment data found");
    }

    logger.info({ trackingNumber, status: result.status }, "DHL shipment fetched");
    return result;
  }
}

export function createDhlHttpClient(apiKey: string, baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      "DHL-API-Key": apiKey,
      Accept: "application/json",
    },
  });
}

export function createDhlTrackingClient(config: Config): DhlTrackingClient | undefined {
  if (!config.dhlApiKey) {
    return undefined;
  }
  return new DhlTrackingClient(
    createDhlHttpClient(config.dhlApiKey, config.dhlBaseUrl, config.trackingTimeoutMs),
  );
}

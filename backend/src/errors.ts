/**
 * Error taxonomy for a conversational turn.
 *
 * Every error raised inside the pipeline carries a `category`. The error
 * handler picks the user-facing template from the category, so the wording of
 * a message can change without changing which template a user sees.
 */

export type ErrorCategory =
  | "validation"
  | "classification"
  | "retrieval"
  | "tracking"
  | "synthesis"
  | "ingestion"
  | "internal";

export type TrackingFailureReason =
  | "InvalidTrackingNumber"
  | "Timeout"
  | "NotFound"
  | "UpstreamError";

export class AssistantError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AssistantError";
    this.category = category;
  }
}

/** Malformed turn input (blank or oversized message, missing session id). */
export class ValidationError extends AssistantError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, "validation");
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ClassificationError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Intent analysis failed: ${message}`, "classification", options);
    this.name = "ClassificationError";
  }
}

export class RetrievalError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Knowledge retrieval failed: ${message}`, "retrieval", options);
    this.name = "RetrievalError";
  }
}

export class TrackingValidationError extends AssistantError {
  readonly reason: TrackingFailureReason = "InvalidTrackingNumber";
  readonly trackingNumber: string;

  constructor(trackingNumber: string, message: string) {
    super(`Shipment tracking failed: ${message}`, "tracking");
    this.name = "TrackingValidationError";
    this.trackingNumber = trackingNumber;
  }
}

export class TrackingProviderError extends AssistantError {
  readonly reason: Exclude<TrackingFailureReason, "InvalidTrackingNumber">;
  readonly trackingNumber: string;
  readonly status?: number;

  constructor(
    trackingNumber: string,
    reason: Exclude<TrackingFailureReason, "InvalidTrackingNumber">,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(`Shipment tracking failed: ${message}`, "tracking", options);
    this.name = "TrackingProviderError";
    this.trackingNumber = trackingNumber;
    this.reason = reason;
    this.status = options?.status;
  }
}

export class SynthesisError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Response generation failed: ${message}`, "synthesis", options);
    this.name = "SynthesisError";
  }
}

export class IngestionError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Knowledge ingestion failed: ${message}`, "ingestion", options);
    this.name = "IngestionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCategory(error: unknown): ErrorCategory {
  return error instanceof AssistantError ? error.category : "internal";
}

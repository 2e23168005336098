import { Command } from "commander";
import { getConfig } from "../src/config/env.js";
import { logger } from "../src/logger.js";
import { createShipmentTracker, formatTrackingResult } from "../src/tracking/index.js";

const SAMPLE_TRACKING_NUMBERS = ["TEST123", "DELIVERED456", "GENERIC7890"];

const program = new Command()
  .name("track-shipment")
  .description("Look up shipments through the configured tracking backend")
  .option("-t, --tracking-number <number>", "tracking number to look up");

async function main(): Promise<void> {
  const options = program.parse().opts<{ trackingNumber?: string }>();
  const tracker = createShipmentTracker(getConfig());

  if (tracker.mockMode) {
    logger.warn("DHL_API_KEY is not set, using mock tracking data");
  }

  const numbers = options.trackingNumber ? [options.trackingNumber] : SAMPLE_TRACKING_NUMBERS;
  for (const trackingNumber of numbers) {
    const result = await tracker.lookup(trackingNumber);
    process.stdout.write(`\n${formatTrackingResult(result)}\n`);
    if (result.success) {
      logger.info({ trackingNumber, status: result.status }, "Tracking successful");
    } else {
      logger.error({ trackingNumber, reason: result.reason }, "Tracking failed");
      process.exitCode = 1;
    }
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, "Tracking check failed");
  process.exit(1);
});

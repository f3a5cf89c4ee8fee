import { z } from "zod";
import logger from "../config/logger";
import type { MetricStore } from "./metricStore";
import { parseCounterDelta, parseGaugeValue } from "./metricValue";

export const METRIC_KINDS = ["gauge", "counter"] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

const metricKindSchema = z.enum(METRIC_KINDS);

export type IngestFailureReason = "empty_name" | "unsupported_kind" | "invalid_value" | "storage_failure";

export type IngestResult =
  | { ok: true }
  | { ok: false; reason: IngestFailureReason; message: string };

function fail(reason: IngestFailureReason, message: string): IngestResult {
  return { ok: false, reason, message };
}

export class IngestService {
  constructor(private readonly store: MetricStore) {}

  /**
   * Validates one decoded update and applies it to the store. Checks run in a
   * fixed order and the first failing one decides the result; a rejected
   * update leaves the store untouched.
   */
  async apply(kind: string, name: string, rawValue: string): Promise<IngestResult> {
    if (name === "") return fail("empty_name", "Metric name must not be empty.");

    const parsedKind = metricKindSchema.safeParse(kind);
    if (!parsedKind.success) {
      return fail("unsupported_kind", `Unsupported metric kind. Allowed kinds: ${METRIC_KINDS.join(", ")}.`);
    }

    switch (parsedKind.data) {
      case "gauge": {
        const value = parseGaugeValue(rawValue);
        if (value === null) return fail("invalid_value", "Invalid gauge value. Expected a 64-bit float.");
        return this.write(parsedKind.data, name, () => this.store.updateGauge(name, value));
      }
      case "counter": {
        const delta = parseCounterDelta(rawValue);
        if (delta === null) return fail("invalid_value", "Invalid counter value. Expected a 64-bit integer.");
        return this.write(parsedKind.data, name, () => this.store.updateCounter(name, delta));
      }
    }
  }

  private async write(kind: MetricKind, name: string, update: () => Promise<void>): Promise<IngestResult> {
    try {
      await update();
    } catch (err) {
      logger.error({ err, kind, name }, "metric_update_failed");
      return fail("storage_failure", `Failed to update ${kind} metric.`);
    }
    logger.debug({ kind, name }, "metric_updated");
    return { ok: true };
  }
}

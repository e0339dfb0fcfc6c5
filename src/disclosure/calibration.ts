import { readFileSync } from "node:fs";
import { z } from "zod";
import type { DisclosureConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

const unit = () => z.number().min(0).max(1);

const thresholdsSchema = z.object({
  greenThreshold: unit(),
  redThreshold: unit(),
});

// zone file from the offline calibration run; below yellow_zone is rejected
const zonesSchema = z
  .object({
    green_zone: unit(),
    yellow_zone: unit().optional(),
    red_zone: unit().optional(),
  })
  .transform((zones, ctx) => {
    const red = zones.yellow_zone ?? zones.red_zone;
    if (red === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "yellow_zone or red_zone is required" });
      return z.NEVER;
    }
    return { greenThreshold: zones.green_zone, redThreshold: red };
  });

const calibrationSchema = z
  .union([thresholdsSchema, zonesSchema])
  .refine((t) => t.redThreshold <= t.greenThreshold, {
    message: "redThreshold must not exceed greenThreshold",
  });

export type CalibratedThresholds = z.infer<typeof calibrationSchema>;

/**
 * Zone thresholds fitted offline, read from a JSON file.
 * Returns null when the file is missing or invalid so callers keep the configured values.
 */
export function loadCalibratedThresholds(path: string, logger: Logger): CalibratedThresholds | null {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      logger.debug({ path }, "No calibration file");
      return null;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    logger.warn({ path, err }, "Calibration file is not valid JSON");
    return null;
  }
  const parsed = calibrationSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, "Calibration file rejected");
    return null;
  }
  return parsed.data;
}

export function withCalibration(config: DisclosureConfig, thresholds: CalibratedThresholds | null): DisclosureConfig {
  return thresholds ? { ...config, ...thresholds } : config;
}

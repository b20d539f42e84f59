// Display bands for a zone's moisture, matching the dashboard's colour scale:
// SATURATED above field capacity, CRITICAL at or past the refill point (MAD),
// WARNING when approaching it, OPTIMAL otherwise.

import type { DecisionThresholdsV1 } from "@irrigate/contracts";

export type MoistureStatus = "SATURATED" | "CRITICAL" | "WARNING" | "OPTIMAL";

export const DEFAULT_WARNING_FRACTION = 0.8;

export function classifyMoistureStatus(args: {
  smd_mm: number;
  whc_effective_mm: number;
  thresholds: DecisionThresholdsV1;
  weighted_vwc?: number | null;
  weighted_field_capacity?: number | null;
}): MoistureStatus {
  const { weighted_vwc, weighted_field_capacity } = args;
  if (typeof weighted_vwc === "number" && typeof weighted_field_capacity === "number" && weighted_vwc > weighted_field_capacity) {
    return "SATURATED";
  }

  const refillMm = args.thresholds.smd_depletion_fraction * args.whc_effective_mm;
  if (args.smd_mm >= refillMm) return "CRITICAL";

  const warning = args.thresholds.warning_fraction ?? DEFAULT_WARNING_FRACTION;
  if (args.smd_mm >= warning * refillMm) return "WARNING";
  return "OPTIMAL";
}

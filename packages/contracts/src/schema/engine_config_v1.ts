import { z } from "zod";
import { CwsiBaselineV1Schema } from "./cwsi_baseline_v1";
import { DecisionThresholdsV1Schema } from "./decision_record_v1";
import { SoilProfileConfigV1Schema } from "./soil_profile_v1";

const RangeSchema = z
  .object({ min: z.number().finite(), max: z.number().finite() })
  .strict()
  .refine((r) => r.min < r.max, { message: "min must be below max" });

export const IngestLimitsV1Schema = z
  .object({
    temperature_c: RangeSchema,
    max_vpd_kpa: z.number().finite().positive(),
    max_rainfall_mm: z.number().finite().positive(),
    rounding_tolerance: z.number().finite().nonnegative().max(0.01),
  })
  .strict();

export const CropConfigV1Schema = z
  .object({
    crop_coefficient: z.number().finite().positive(),
    cwsi_baseline: CwsiBaselineV1Schema.optional(),
  })
  .strict();

export const ZoneConfigV1Schema = z
  .object({
    crop_type: z.string().min(1),
    soil_profile: SoilProfileConfigV1Schema,
    thresholds: DecisionThresholdsV1Schema,
    sensor_trust: z.number().finite().optional(),
  })
  .strict();

export const EngineConfigV1Schema = z
  .object({
    schema_version: z.literal("1.0.0"),
    ingest: IngestLimitsV1Schema,
    crops: z.record(z.string().min(1), CropConfigV1Schema),
    zones: z.record(z.string().min(1), ZoneConfigV1Schema),
    et: z
      .object({
        // Reference ET0 by calendar month (UTC), January first.
        reference_et_mm_per_day: z.array(z.number().finite().nonnegative()).length(12),
      })
      .strict(),
  })
  .strict();

export type IngestLimitsV1 = z.infer<typeof IngestLimitsV1Schema>;
export type CropConfigV1 = z.infer<typeof CropConfigV1Schema>;
export type ZoneConfigV1 = z.infer<typeof ZoneConfigV1Schema>;
export type EngineConfigV1 = z.infer<typeof EngineConfigV1Schema>;

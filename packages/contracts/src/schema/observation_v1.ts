import { z } from "zod";

/**
 * Monitored soil depths. The probe layout is fixed at 6/12/18 inches; any
 * subset may be present in a single observation.
 */
export const MONITORED_DEPTHS = ["6in", "12in", "18in"] as const;

export const DepthKeySchema = z.enum(MONITORED_DEPTHS);
export type DepthKey = z.infer<typeof DepthKeySchema>;

/**
 * RawObservationV1Schema
 *
 * Structural gate for records handed to the engine by the ingest collaborator.
 * Ranges that depend on configuration (temperature bounds, rounding tolerance)
 * are checked by the kernel's ingest step, not here.
 */
export const RawObservationV1Schema = z
  .object({
    type: z.literal("observation_v1").optional(),
    zone_id: z.string().trim().min(1),
    ts_ms: z.number().int().nonnegative(), // unix ms, UTC
    vwc: z
      .object({
        "6in": z.number().finite().optional(),
        "12in": z.number().finite().optional(),
        "18in": z.number().finite().optional(),
      })
      .strict()
      .default({}),
    canopy_temp_c: z.number().finite(),
    air_temp_c: z.number().finite(),
    rh_pct: z.number().finite().optional(),
    vpd_kpa: z.number().finite().optional(),
    rainfall_mm: z.number().finite().optional(), // since the previous observation
  })
  .strict();

export type RawObservationV1 = z.input<typeof RawObservationV1Schema>;
export type ParsedObservationV1 = z.output<typeof RawObservationV1Schema>;

export type VwcReadings = Partial<Record<DepthKey, number>>;

/**
 * Validated, normalized observation. Produced only by the kernel's ingest step.
 */
export type ObservationV1 = {
  type: "observation_v1";
  zone_id: string;
  ts_ms: number;
  vwc: Readonly<VwcReadings>;
  canopy_temp_c: number;
  air_temp_c: number;
  rh_pct: number | null;
  vpd_kpa: number | null;
  rainfall_mm: number;
};

/**
 * Depth keys present in a reading map, in monitored-depth order.
 */
export function presentDepths(vwc: VwcReadings): DepthKey[] {
  return MONITORED_DEPTHS.filter((d) => typeof vwc[d] === "number");
}

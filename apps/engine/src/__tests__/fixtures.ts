// Zone A: FC 0.5 / PWP 0.25 over an 800 mm root zone => WHC 200 mm. A reading
// of 0.375 at both depths puts the measured deficit at 100 mm, which is the
// refill point at smd_depletion_fraction 0.5.

import type { EngineConfigV1 } from "@irrigate/contracts";

export const T0 = Date.UTC(2024, 5, 1);
export const DAY = 86_400_000;

export function testConfig(): EngineConfigV1 {
  return {
    schema_version: "1.0.0",
    ingest: {
      temperature_c: { min: -10, max: 60 },
      max_vpd_kpa: 10,
      max_rainfall_mm: 300,
      rounding_tolerance: 1e-6,
    },
    crops: {
      corn: {
        crop_coefficient: 1,
        cwsi_baseline: { lower: { intercept: 2, slope: -2 }, upper: { intercept: 4, slope: 0 } },
      },
    },
    zones: {
      A: {
        crop_type: "corn",
        soil_profile: {
          texture: "loam",
          root_depth_mm: 800,
          depths: {
            "6in": { field_capacity: 0.5, wilting_point: 0.25, weight: 0.5 },
            "12in": { field_capacity: 0.5, wilting_point: 0.25, weight: 0.5 },
          },
        },
        thresholds: { smd_depletion_fraction: 0.5, cwsi_trigger: 0.6 },
      },
    },
    et: { reference_et_mm_per_day: [4, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4] },
  };
}

export function rawObs(ts: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: "observation_v1",
    zone_id: "A",
    ts_ms: ts,
    vwc: { "6in": 0.375, "12in": 0.375 },
    canopy_temp_c: 28,
    air_temp_c: 30,
    vpd_kpa: 2,
    ...extra,
  };
}

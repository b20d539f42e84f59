// Shared fixture inputs. Numbers are chosen to be exact in binary floating
// point so expected values can be asserted with strictEqual.
//
// Zone A: FC 0.5 / PWP 0.25 at 6in and 12in, equal weights, 800 mm root zone
// => WHC 200 mm; a reading of 0.375 at both depths => measured deficit 100 mm.

import type { EngineConfigV1, ObservationV1, VwcReadings, ZoneConfigV1 } from "@irrigate/contracts";

export const T0 = Date.UTC(2024, 5, 1); // June
export const DAY = 86_400_000;

export function zoneA(overrides: Partial<ZoneConfigV1> = {}): ZoneConfigV1 {
  return {
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
    sensor_trust: 1,
    ...overrides,
  };
}

export function testConfig(zones: Record<string, ZoneConfigV1> = { A: zoneA() }): EngineConfigV1 {
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
        cwsi_baseline: {
          lower: { intercept: 2, slope: -2 },
          upper: { intercept: 4, slope: 0 },
        },
      },
      wheat: { crop_coefficient: 1 }, // no baseline
    },
    zones,
    et: { reference_et_mm_per_day: [4, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4] },
  };
}

/**
 * Raw record for zone A. With VPD 2 kPa the CWSI lines sit at -2 C (lower)
 * and 4 C (upper), so canopy 28 / air 30 gives CWSI 0 and canopy 34 gives 1.
 */
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

export function obs(ts: number, vwc: VwcReadings, rainfall_mm = 0, zone_id = "A"): ObservationV1 {
  return {
    type: "observation_v1",
    zone_id,
    ts_ms: ts,
    vwc,
    canopy_temp_c: 28,
    air_temp_c: 30,
    rh_pct: null,
    vpd_kpa: 2,
    rainfall_mm,
  };
}

/**
 * assert.throws validator: `err` is an instance of `ctor` carrying `code`.
 */
export function expectCode(err: unknown, ctor: new (...args: never[]) => Error, code: string): true {
  if (!(err instanceof ctor)) throw new Error(`expected ${ctor.name}, got ${String(err)}`);
  if (!(err instanceof Error) || !("code" in err) || err.code !== code) {
    throw new Error(`expected code ${code}, got ${err instanceof Error ? err.message : String(err)}`);
  }
  return true;
}

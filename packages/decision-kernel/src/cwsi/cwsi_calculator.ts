// Decision Kernel - CWSICalculator
//
// Two-line empirical crop water stress index:
//
//   CWSI = (dT_obs - dT_lower(VPD)) / (dT_upper(VPD) - dT_lower(VPD)), clamped to [0, 1]
//
// dT is canopy minus air temperature. The lower line is the non-water-stressed
// baseline, the upper line the non-transpiring limit.

import type { BaselineLineV1, CwsiBaselineV1, CwsiStateV1, ObservationV1 } from "@irrigate/contracts";
import { ComputationError, ConfigError } from "../errors";
import { vpdFromRelativeHumidity } from "./vpd";

export const MIN_BASELINE_SPREAD_C = 1e-9;

export type CwsiInput = {
  canopy_temp_c: number;
  air_temp_c: number;
  vpd_kpa: number;
};

function lineAt(line: BaselineLineV1, vpd: number): number {
  return line.intercept + line.slope * vpd;
}

function sameLine(a: BaselineLineV1, b: BaselineLineV1): boolean {
  return a.intercept === b.intercept && a.slope === b.slope;
}

export function clamp01(x: number): number {
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

export class CwsiCalculator {
  private baseline: Readonly<CwsiStateV1["baseline"]>;

  constructor(
    public readonly zone_id: string,
    public readonly crop_type: string,
    baseline: CwsiBaselineV1 | undefined
  ) {
    if (!baseline) {
      throw new ConfigError("MISSING_CWSI_BASELINE", `no CWSI baseline configured for crop ${crop_type}`, zone_id);
    }
    this.baseline = CwsiCalculator.checked(zone_id, { ...baseline, source: "configured" });
  }

  currentBaseline(): Readonly<CwsiStateV1["baseline"]> {
    return this.baseline;
  }

  /**
   * Replaces the non-water-stressed line (e.g. after a calibration fit). The
   * upper line stays as configured.
   */
  adoptLowerBaseline(lower: BaselineLineV1): Readonly<CwsiStateV1["baseline"]> {
    this.baseline = CwsiCalculator.checked(this.zone_id, { lower: { ...lower }, upper: this.baseline.upper, source: "fitted" });
    return this.baseline;
  }

  compute(input: CwsiInput): CwsiStateV1 {
    const { canopy_temp_c, air_temp_c, vpd_kpa } = input;
    if (![canopy_temp_c, air_temp_c, vpd_kpa].every(Number.isFinite)) {
      throw new ComputationError("NON_FINITE_CWSI_INPUT", "canopy/air temperature and VPD must be finite", this.zone_id);
    }

    const lower = lineAt(this.baseline.lower, vpd_kpa);
    const upper = lineAt(this.baseline.upper, vpd_kpa);
    const spread = upper - lower;
    if (!(spread > MIN_BASELINE_SPREAD_C)) {
      throw new ComputationError(
        "DEGENERATE_BASELINE_SPREAD",
        `upper (${upper}) - lower (${lower}) baseline spread is ${spread} at VPD ${vpd_kpa}`,
        this.zone_id
      );
    }

    const deltaT = canopy_temp_c - air_temp_c;
    return {
      baseline: this.baseline,
      cwsi: clamp01((deltaT - lower) / spread),
      delta_t_c: deltaT,
      vpd_kpa,
      lower_delta_t_c: lower,
      upper_delta_t_c: upper,
    };
  }

  /**
   * Computes the index for an observation, deriving VPD from RH when the
   * record carries no VPD of its own.
   */
  computeForObservation(obs: ObservationV1): CwsiStateV1 {
    let vpd = obs.vpd_kpa;
    if (vpd === null && obs.rh_pct !== null) vpd = vpdFromRelativeHumidity(obs.air_temp_c, obs.rh_pct);
    if (vpd === null) {
      throw new ComputationError("VPD_UNAVAILABLE", `observation at ${obs.ts_ms} has neither vpd_kpa nor rh_pct`, this.zone_id);
    }
    return this.compute({ canopy_temp_c: obs.canopy_temp_c, air_temp_c: obs.air_temp_c, vpd_kpa: vpd });
  }

  private static checked(zoneId: string, b: CwsiStateV1["baseline"]): Readonly<CwsiStateV1["baseline"]> {
    if (sameLine(b.lower, b.upper)) {
      throw new ConfigError("DEGENERATE_CWSI_BASELINE", "upper and lower CWSI baselines coincide", zoneId);
    }
    return Object.freeze({ lower: Object.freeze({ ...b.lower }), upper: Object.freeze({ ...b.upper }), source: b.source });
  }
}

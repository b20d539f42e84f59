// Decision Kernel - WaterBalanceTracker
//
// Lumped-bucket soil moisture deficit for a single zone:
//
//   SMD_new = clamp(SMD_old + ET - rain - measured_delta, 0, WHC_effective)
//
// measured_delta pulls the projected bucket toward the deficit the probes
// report, scaled by sensor_trust (1 = take the probes as ground truth, 0 =
// ignore them). Without usable readings the bucket is projected from ET and
// rain alone.
//
// The tracker owns its state exclusively. Each call computes the full next
// state and swaps it in only on success.

import { presentDepths } from "@irrigate/contracts";
import type { ObservationV1, WaterBalanceStateV1 } from "@irrigate/contracts";
import { ComputationError, ConfigError, TemporalOrderError, ValidationError } from "../errors";
import type { SoilProfile } from "../soil/soil_profile";
import { MS_PER_DAY, type EtEstimator } from "./et_estimator";

export type WaterBalanceTrackerOptions = {
  sensor_trust?: number;
};

export const DEFAULT_SENSOR_TRUST = 1;

export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x));
}

export class WaterBalanceTracker {
  private state: Readonly<WaterBalanceStateV1> | null = null;
  public readonly sensor_trust: number;

  constructor(
    public readonly zone_id: string,
    private readonly profile: SoilProfile,
    private readonly et: EtEstimator,
    opts: WaterBalanceTrackerOptions = {}
  ) {
    const trust = opts.sensor_trust ?? DEFAULT_SENSOR_TRUST;
    if (!Number.isFinite(trust) || trust < 0 || trust > 1) {
      throw new ConfigError("INVALID_SENSOR_TRUST", `sensor_trust must be in [0, 1] (got ${trust})`, zone_id);
    }
    this.sensor_trust = trust;
  }

  current(): Readonly<WaterBalanceStateV1> | null {
    return this.state;
  }

  /**
   * Applies one observation and returns the new state.
   */
  update(obs: ObservationV1): Readonly<WaterBalanceStateV1> {
    if (obs.zone_id !== this.zone_id) {
      throw new ValidationError("ZONE_MISMATCH", `observation for ${obs.zone_id} sent to tracker ${this.zone_id}`, this.zone_id);
    }

    const prev = this.state;
    if (!prev) {
      // First observation: the bucket starts full (SMD = 0).
      this.state = Object.freeze({
        zone_id: this.zone_id,
        smd_mm: 0,
        whc_effective_mm: this.profile.effectiveWhcMm(presentDepths(obs.vwc)),
        cumulative_et_mm: 0,
        cumulative_rain_mm: 0,
        last_update_ts: obs.ts_ms,
        last_observation_ts: obs.ts_ms,
        last_irrigation_ts: null,
        source: "INIT",
      });
      return this.state;
    }

    const dtMs = obs.ts_ms - prev.last_update_ts;
    if (dtMs <= 0) {
      throw new TemporalOrderError("NON_MONOTONIC_TIMESTAMP", `ts_ms ${obs.ts_ms} <= last update ${prev.last_update_ts}`, this.zone_id);
    }

    const rate = this.et.estimateET(this.zone_id, { startTs: prev.last_update_ts, endTs: obs.ts_ms });
    if (!Number.isFinite(rate) || rate < 0) {
      throw new ComputationError("INVALID_ET_RATE", `ET estimator returned ${rate} mm/day`, this.zone_id);
    }
    const etMm = (rate * dtMs) / MS_PER_DAY;
    const rainMm = obs.rainfall_mm;

    const projected = prev.smd_mm + etMm - rainMm;
    const depths = this.profile.usableDepths(presentDepths(obs.vwc));
    const whc = this.profile.effectiveWhcMm(depths);

    let measuredDelta = 0;
    let source: WaterBalanceStateV1["source"] = "PROJECTED";
    const measured = depths.length ? this.profile.measuredDeficitMm(obs.vwc) : null;
    if (measured !== null) {
      measuredDelta = this.sensor_trust * (projected - measured);
      source = "RECONCILED";
    }

    const next: WaterBalanceStateV1 = {
      zone_id: this.zone_id,
      smd_mm: clamp(projected - measuredDelta, 0, whc),
      whc_effective_mm: whc,
      cumulative_et_mm: prev.cumulative_et_mm + etMm,
      cumulative_rain_mm: prev.cumulative_rain_mm + rainMm,
      last_update_ts: obs.ts_ms,
      last_observation_ts: obs.ts_ms,
      last_irrigation_ts: prev.last_irrigation_ts,
      source,
    };
    if (!Number.isFinite(next.smd_mm)) {
      throw new ComputationError("NON_FINITE_SMD", `computed SMD ${next.smd_mm}`, this.zone_id);
    }

    this.state = Object.freeze(next);
    return this.state;
  }

  /**
   * Irrigation refills the profile: SMD back to 0 and the since-irrigation
   * accumulators cleared. `ts` may equal the last update (logged alongside a
   * reading) but not precede it.
   */
  recordIrrigation(ts: number): Readonly<WaterBalanceStateV1> {
    if (!Number.isInteger(ts) || ts < 0) {
      throw new ValidationError("INVALID_TIMESTAMP", `irrigation ts ${ts}`, this.zone_id);
    }
    const prev = this.state;
    if (prev && ts < prev.last_update_ts) {
      throw new TemporalOrderError("IRRIGATION_BEFORE_LAST_UPDATE", `ts ${ts} < last update ${prev.last_update_ts}`, this.zone_id);
    }

    this.state = Object.freeze({
      zone_id: this.zone_id,
      smd_mm: 0,
      whc_effective_mm: prev?.whc_effective_mm ?? this.profile.effectiveWhcMm(this.profile.weightedDepths()),
      cumulative_et_mm: 0,
      cumulative_rain_mm: 0,
      last_update_ts: ts,
      last_observation_ts: prev?.last_observation_ts ?? null,
      last_irrigation_ts: ts,
      source: "IRRIGATION",
    });
    return this.state;
  }
}

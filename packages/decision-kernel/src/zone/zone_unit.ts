// Decision Kernel - ZoneUnit
//
// Everything mutable about one zone lives here and nowhere else: the water
// balance tracker, the CWSI baseline, the latest accepted observation and the
// append-only decision history. Zones never share state, so independent zones
// can be driven from independent callers.

import { presentDepths } from "@irrigate/contracts";
import type {
  CalibrationPointV1,
  CropConfigV1,
  CwsiStateV1,
  DecisionRecordV1,
  DecisionThresholdsV1,
  ObservationV1,
  WaterBalanceStateV1,
  ZoneConfigV1,
} from "@irrigate/contracts";
import { ComputationError, ConfigError } from "../errors";
import { buildSoilProfile, type SoilProfile } from "../soil/soil_profile";
import { WaterBalanceTracker } from "../water_balance/water_balance_tracker";
import type { EtEstimator } from "../water_balance/et_estimator";
import { CwsiCalculator } from "../cwsi/cwsi_calculator";
import { fitLowerBaseline } from "../cwsi/baseline_fit";
import { assertValidThresholds, evaluateIrrigationDecision } from "../decision/decision_engine";
import { classifyMoistureStatus, type MoistureStatus } from "../decision/moisture_status";

export type ZoneSnapshot = {
  zone_id: string;
  crop_type: string;
  latest_observation: ObservationV1 | null;
  water_balance: Readonly<WaterBalanceStateV1> | null;
  latest_cwsi: CwsiStateV1 | null;
  moisture_status: MoistureStatus | null;
  decisions: number;
};

export class ZoneUnit {
  private latestObservation: ObservationV1 | null = null;
  private latestCwsi: CwsiStateV1 | null = null;
  private readonly decisions: DecisionRecordV1[] = [];
  // Bumped on every state change; a decision is cached per revision.
  private revision = 0;
  private decidedRevision = -1;

  constructor(
    public readonly zone_id: string,
    public readonly crop_type: string,
    public readonly profile: SoilProfile,
    private readonly tracker: WaterBalanceTracker,
    private readonly cwsi: CwsiCalculator,
    public readonly thresholds: Readonly<DecisionThresholdsV1>
  ) {}

  /**
   * Builds a zone from configuration.
   *
   * @throws ConfigError for an unknown crop type, a missing CWSI baseline, an
   * invalid soil profile, invalid thresholds or an out-of-range sensor_trust.
   */
  static fromConfig(
    zoneId: string,
    cfg: ZoneConfigV1,
    crops: Readonly<Record<string, CropConfigV1>>,
    etEstimator: EtEstimator
  ): ZoneUnit {
    const crop = crops[cfg.crop_type];
    if (!crop) throw new ConfigError("UNKNOWN_CROP_TYPE", `crop type ${cfg.crop_type} is not configured`, zoneId);

    assertValidThresholds(cfg.thresholds, zoneId);
    const profile = buildSoilProfile(zoneId, cfg.soil_profile);
    const tracker = new WaterBalanceTracker(zoneId, profile, etEstimator, { sensor_trust: cfg.sensor_trust });
    const cwsi = new CwsiCalculator(zoneId, cfg.crop_type, crop.cwsi_baseline);

    return new ZoneUnit(zoneId, cfg.crop_type, profile, tracker, cwsi, Object.freeze({ ...cfg.thresholds }));
  }

  lastAcceptedTs(): number | null {
    return this.tracker.current()?.last_update_ts ?? null;
  }

  apply(obs: ObservationV1): Readonly<WaterBalanceStateV1> {
    const state = this.tracker.update(obs);
    this.latestObservation = obs;
    this.revision++;
    return state;
  }

  recordIrrigation(ts: number): Readonly<WaterBalanceStateV1> {
    const state = this.tracker.recordIrrigation(ts);
    this.revision++;
    return state;
  }

  calibrateCwsiBaseline(points: ReadonlyArray<CalibrationPointV1>): CwsiStateV1["baseline"] {
    const lower = fitLowerBaseline(points, this.zone_id);
    const baseline = this.cwsi.adoptLowerBaseline(lower);
    this.revision++;
    return baseline;
  }

  /**
   * Runs CWSI and the decision policy on the latest accepted observation and
   * the current water balance. An unchanged zone yields its previous record.
   */
  evaluate(): DecisionRecordV1 {
    const last = this.decisions[this.decisions.length - 1];
    if (last && this.decidedRevision === this.revision) return last;

    const obs = this.latestObservation;
    const state = this.tracker.current();
    if (!obs || !state) {
      throw new ComputationError("NO_OBSERVATION", "zone has no accepted observation to evaluate", this.zone_id);
    }

    const cwsi = this.cwsi.computeForObservation(obs);
    const record = evaluateIrrigationDecision({
      zone_id: this.zone_id,
      ts_ms: state.last_update_ts,
      water_balance: state,
      cwsi,
      thresholds: this.thresholds,
    });

    this.latestCwsi = cwsi;
    this.decidedRevision = this.revision;
    // A revision that leaves the inputs unchanged decides the same tick again.
    if (last && last.decision_id === record.decision_id) return last;
    this.decisions.push(record);
    return record;
  }

  history(): ReadonlyArray<DecisionRecordV1> {
    return Object.freeze([...this.decisions]);
  }

  snapshot(): ZoneSnapshot {
    const obs = this.latestObservation;
    const state = this.tracker.current();
    return {
      zone_id: this.zone_id,
      crop_type: this.crop_type,
      latest_observation: obs,
      water_balance: state,
      latest_cwsi: this.latestCwsi,
      moisture_status: state
        ? classifyMoistureStatus({
            smd_mm: state.smd_mm,
            whc_effective_mm: state.whc_effective_mm,
            thresholds: this.thresholds,
            weighted_vwc: obs ? this.profile.weightedVwc(obs.vwc) : null,
            weighted_field_capacity: obs ? this.profile.weightedFieldCapacity(presentDepths(obs.vwc)) : null,
          })
        : null,
      decisions: this.decisions.length,
    };
  }
}

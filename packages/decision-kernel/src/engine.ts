// Decision Kernel - IrrigationEngine facade
//
// Maps zone id -> ZoneUnit and exposes the operations surrounding code uses:
// ingest, recordIrrigationEvent, evaluate, history. No IO, no logging, no
// clocks: every timestamp comes from the records themselves.
//
// A zone whose configuration fails to build is disabled, not dropped: every
// call addressed to it throws the ConfigError it failed with, while the other
// zones keep running.

import type {
  CalibrationPointV1,
  CwsiStateV1,
  DecisionRecordV1,
  EngineConfigV1,
  ObservationV1,
  WaterBalanceStateV1,
} from "@irrigate/contracts";
import { ConfigError, isIrrigationError, type IrrigationError } from "./errors";
import { normalizeObservation, type IngestContext } from "./ingest/observation_ingest";
import type { EtEstimator } from "./water_balance/et_estimator";
import { ZoneUnit, type ZoneSnapshot } from "./zone/zone_unit";

export type IrrigationEngineDeps = {
  etEstimator: EtEstimator;
};

export type ZoneStatus =
  | { zone_id: string; enabled: true; crop_type: string }
  | { zone_id: string; enabled: false; error: { code: string; message: string } };

export type BatchIngestItem =
  | { index: number; ok: true; observation: ObservationV1 }
  | { index: number; ok: false; error: IrrigationError };

export type BatchIngestResult = {
  accepted: number;
  rejected: number;
  aborted: boolean;
  results: BatchIngestItem[];
};

/**
 * Crop coefficient of each zone's crop, for Kc-scaled ET estimation.
 */
export function cropCoefficientsByZone(config: EngineConfigV1): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [zoneId, zone] of Object.entries(config.zones)) {
    const crop = config.crops[zone.crop_type];
    if (crop) out[zoneId] = crop.crop_coefficient;
  }
  return out;
}

export class IrrigationEngine {
  private readonly units = new Map<string, ZoneUnit>();
  private readonly disabled = new Map<string, ConfigError>();
  private readonly ingestContext: IngestContext;

  constructor(config: EngineConfigV1, deps: IrrigationEngineDeps) {
    for (const zoneId of Object.keys(config.zones).sort()) {
      const zoneCfg = config.zones[zoneId];
      if (!zoneCfg) continue;
      try {
        this.units.set(zoneId, ZoneUnit.fromConfig(zoneId, zoneCfg, config.crops, deps.etEstimator));
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        this.disabled.set(zoneId, err);
      }
    }

    this.ingestContext = {
      limits: config.ingest,
      lastAcceptedTs: (zoneId) => this.units.get(zoneId)?.lastAcceptedTs() ?? null,
      isKnownZone: (zoneId) => this.units.has(zoneId) || this.disabled.has(zoneId),
    };
  }

  zoneIds(): string[] {
    return [...this.units.keys()];
  }

  zoneStatus(): ZoneStatus[] {
    const out: ZoneStatus[] = [];
    for (const u of this.units.values()) out.push({ zone_id: u.zone_id, enabled: true, crop_type: u.crop_type });
    for (const [zone_id, err] of this.disabled) {
      out.push({ zone_id, enabled: false, error: { code: err.code, message: err.message } });
    }
    return out.sort((a, b) => a.zone_id.localeCompare(b.zone_id));
  }

  /**
   * Validates a raw record and applies it to its zone's water balance.
   * A rejected record leaves the zone untouched.
   */
  ingest(raw: unknown): ObservationV1 {
    const obs = normalizeObservation(raw, this.ingestContext);
    this.unit(obs.zone_id).apply(obs);
    return obs;
  }

  /**
   * Ingests records in order, collecting per-record outcomes. Stops before the
   * next record once `signal` is aborted; records already applied stay applied.
   */
  ingestBatch(raws: ReadonlyArray<unknown>, opts: { signal?: AbortSignal } = {}): BatchIngestResult {
    const results: BatchIngestItem[] = [];
    let accepted = 0;
    let aborted = false;

    for (let index = 0; index < raws.length; index++) {
      if (opts.signal?.aborted) {
        aborted = true;
        break;
      }
      try {
        results.push({ index, ok: true, observation: this.ingest(raws[index]) });
        accepted++;
      } catch (err) {
        if (!isIrrigationError(err)) throw err;
        results.push({ index, ok: false, error: err });
      }
    }

    return { accepted, rejected: results.length - accepted, aborted, results };
  }

  recordIrrigationEvent(zoneId: string, ts: number): Readonly<WaterBalanceStateV1> {
    return this.unit(zoneId).recordIrrigation(ts);
  }

  evaluate(zoneId: string): DecisionRecordV1 {
    return this.unit(zoneId).evaluate();
  }

  history(zoneId: string): ReadonlyArray<DecisionRecordV1> {
    return this.unit(zoneId).history();
  }

  snapshot(zoneId: string): ZoneSnapshot {
    return this.unit(zoneId).snapshot();
  }

  waterBalance(zoneId: string): Readonly<WaterBalanceStateV1> | null {
    return this.unit(zoneId).snapshot().water_balance;
  }

  calibrateCwsiBaseline(zoneId: string, points: ReadonlyArray<CalibrationPointV1>): CwsiStateV1["baseline"] {
    return this.unit(zoneId).calibrateCwsiBaseline(points);
  }

  private unit(zoneId: string): ZoneUnit {
    const u = this.units.get(zoneId);
    if (u) return u;
    const broken = this.disabled.get(zoneId);
    if (broken) throw broken;
    throw new ConfigError("UNKNOWN_ZONE", `zone ${zoneId} is not configured`, zoneId);
  }
}

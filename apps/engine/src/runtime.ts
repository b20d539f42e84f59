import type {
  CalibrationPointV1,
  DecisionRecordV1,
  EngineConfigV1,
  IrrigationEventV1,
  ObservationV1,
  WaterBalanceStateV1,
} from "@irrigate/contracts";
import {
  IrrigationEngine,
  KcScaledEtEstimator,
  cropCoefficientsByZone,
  dispatchDecision,
  type AlertDispatch,
  type BatchIngestResult,
  type EtEstimator,
  type ZoneSnapshot,
  type ZoneStatus,
} from "@irrigate/decision-kernel";
import type { DecisionSqliteStore } from "./store/decision_sqlite_store";
import { SqliteDecisionDispatch } from "./dispatch/sqlite_decision_dispatch";
import { LogAlertDispatch, type DecisionLogger } from "./dispatch/log_alert_dispatch";

export function createEtEstimator(config: EngineConfigV1): EtEstimator {
  return new KcScaledEtEstimator(config.et.reference_et_mm_per_day, cropCoefficientsByZone(config));
}

export type EngineRuntimeArgs = {
  config: EngineConfigV1;
  store: DecisionSqliteStore;
  logger: DecisionLogger;
  etEstimator?: EtEstimator;
  extraDispatch?: AlertDispatch[];
};

/**
 * Wires the kernel engine to its collaborators: the sqlite ledger, the alert
 * dispatchers and the ET estimator built from configuration.
 */
export class EngineRuntime {
  readonly engine: IrrigationEngine;
  private readonly store: DecisionSqliteStore;
  private readonly targets: AlertDispatch[];
  // Per zone, decisions not yet delivered to every target, oldest first.
  private readonly undelivered = new Map<string, DecisionRecordV1[]>();

  constructor(args: EngineRuntimeArgs) {
    this.engine = new IrrigationEngine(args.config, { etEstimator: args.etEstimator ?? createEtEstimator(args.config) });
    this.store = args.store;
    this.targets = [new SqliteDecisionDispatch(args.store), new LogAlertDispatch(args.logger), ...(args.extraDispatch ?? [])];
  }

  ingest(raw: unknown): ObservationV1 {
    return this.engine.ingest(raw);
  }

  ingestBatch(raws: ReadonlyArray<unknown>, signal?: AbortSignal): BatchIngestResult {
    return this.engine.ingestBatch(raws, { signal });
  }

  recordIrrigationEvent(zoneId: string, event: IrrigationEventV1): Readonly<WaterBalanceStateV1> {
    return this.store.withIrrigationEvent({ zone_id: zoneId, ...event }, () =>
      this.engine.recordIrrigationEvent(zoneId, event.ts_ms)
    );
  }

  /**
   * Evaluates the zone and dispatches the record when it is new for this tick.
   * A record whose dispatch failed is dispatched again, before any newer one,
   * on the zone's next evaluation; targets must accept redelivery.
   */
  async evaluate(zoneId: string): Promise<DecisionRecordV1> {
    const before = this.engine.history(zoneId).length;
    const record = this.engine.evaluate(zoneId);

    const queue = this.undelivered.get(zoneId) ?? [];
    if (this.engine.history(zoneId).length > before) queue.push(record);
    this.undelivered.set(zoneId, queue);
    for (let next = queue[0]; next; next = queue[0]) {
      await dispatchDecision(this.targets, next);
      queue.shift();
    }
    return record;
  }

  history(zoneId: string): ReadonlyArray<DecisionRecordV1> {
    return this.engine.history(zoneId);
  }

  snapshot(zoneId: string): ZoneSnapshot {
    return this.engine.snapshot(zoneId);
  }

  zoneStatus(): ZoneStatus[] {
    return this.engine.zoneStatus();
  }

  calibrateCwsiBaseline(zoneId: string, points: ReadonlyArray<CalibrationPointV1>) {
    return this.engine.calibrateCwsiBaseline(zoneId, points);
  }

  listDecisions(limit: number, zoneId?: string): DecisionRecordV1[] {
    return this.store.listDecisions(limit, zoneId);
  }
}

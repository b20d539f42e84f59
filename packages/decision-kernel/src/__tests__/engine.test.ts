import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { IrrigationEngine, cropCoefficientsByZone } from "../engine";
import { ComputationError, ConfigError, TemporalOrderError, ValidationError } from "../errors";
import { ConstantEtEstimator, KcScaledEtEstimator, type EtEstimator } from "../water_balance/et_estimator";
import { DAY, T0, expectCode, rawObs, testConfig, zoneA } from "./fixtures";

function engine(et: EtEstimator = new ConstantEtEstimator({ A: 4, B: 4 })): IrrigationEngine {
  return new IrrigationEngine(testConfig({ A: zoneA(), B: zoneA() }), { etEstimator: et });
}

describe("IrrigationEngine", () => {
  it("triggers on soil moisture deficit at the threshold", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    e.ingest(rawObs(T0 + DAY));
    const rec = e.evaluate("A");
    assert.equal(rec.zone_id, "A");
    assert.equal(rec.ts_ms, T0 + DAY);
    assert.equal(rec.smd_mm, 100);
    assert.equal(rec.whc_effective_mm, 200);
    assert.equal(rec.cwsi, 0);
    assert.equal(rec.rationale, "SMD_EXCEEDED");
    assert.equal(rec.triggered, true);
  });

  it("irrigates zone A at 55% depletion and stands down after irrigation", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    // deficit 0.1375 x 800 mm = 110 mm of a 200 mm WHC; canopy 0.8 C below air
    e.ingest(rawObs(T0 + DAY, { vwc: { "6in": 0.3625, "12in": 0.3625 }, canopy_temp_c: 29.2 }));
    const rec = e.evaluate("A");
    assert.ok(Math.abs(rec.smd_fraction - 0.55) < 1e-9);
    assert.ok(Math.abs(rec.cwsi - 0.2) < 1e-9);
    assert.equal(rec.rationale, "SMD_EXCEEDED");

    e.recordIrrigationEvent("A", T0 + DAY);
    const after = e.evaluate("A");
    assert.equal(after.rationale, "NONE");
    assert.equal(after.triggered, false);
  });

  it("keeps SMD within [0, WHC] across a long sequence", () => {
    const e = new IrrigationEngine(testConfig({ A: zoneA({ sensor_trust: 0.3 }) }), {
      etEstimator: new ConstantEtEstimator({ A: 9 }),
    });
    for (let i = 0; i < 240; i++) {
      const reading = 0.25 + ((i * 37) % 30) / 100;
      const extra: Record<string, unknown> = { rainfall_mm: i % 11 === 0 ? 40 : 0 };
      extra.vwc = i % 5 === 0 ? {} : { "6in": reading, "12in": Math.min(1, reading + 0.05) };
      e.ingest(rawObs(T0 + i * (DAY / 4), extra));
      const s = e.waterBalance("A");
      assert.ok(s && s.smd_mm >= 0 && s.smd_mm <= s.whc_effective_mm, `step ${i}: ${s?.smd_mm}`);
    }
  });

  it("triggers on canopy stress alone", () => {
    const e = engine();
    e.ingest(rawObs(T0, { canopy_temp_c: 34 }));
    const rec = e.evaluate("A");
    assert.equal(rec.smd_mm, 0);
    assert.equal(rec.cwsi, 1);
    assert.equal(rec.rationale, "CWSI_EXCEEDED");
  });

  it("returns the previous record for an unchanged zone", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    const first = e.evaluate("A");
    assert.equal(e.evaluate("A"), first);
    assert.equal(e.history("A").length, 1);
  });

  it("does not repeat a decision when a second irrigation leaves the state unchanged", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    e.ingest(rawObs(T0 + DAY));
    e.recordIrrigationEvent("A", T0 + DAY);
    const first = e.evaluate("A");

    e.recordIrrigationEvent("A", T0 + DAY);
    assert.equal(e.evaluate("A"), first);
    assert.deepEqual(
      e.history("A").map((r) => r.decision_id),
      [first.decision_id]
    );
  });

  it("keeps history in evaluation order", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    const r1 = e.evaluate("A");
    e.ingest(rawObs(T0 + DAY));
    const r2 = e.evaluate("A");
    assert.deepEqual(
      e.history("A").map((r) => r.decision_id),
      [r1.decision_id, r2.decision_id]
    );
    assert.ok(Object.isFrozen(e.history("A")));
  });

  it("resets the deficit on irrigation", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    e.ingest(rawObs(T0 + DAY));
    assert.equal(e.evaluate("A").triggered, true);

    const state = e.recordIrrigationEvent("A", T0 + DAY);
    assert.equal(state.smd_mm, 0);
    assert.equal(state.source, "IRRIGATION");

    const after = e.evaluate("A");
    assert.equal(after.ts_ms, T0 + DAY);
    assert.equal(after.smd_mm, 0);
    assert.equal(after.rationale, "NONE");
    assert.equal(e.history("A").length, 2);

    assert.throws(() => e.ingest(rawObs(T0 + DAY)), (err) => expectCode(err, TemporalOrderError, "NON_MONOTONIC_TIMESTAMP"));
    assert.throws(() => e.recordIrrigationEvent("A", T0), (err) => expectCode(err, TemporalOrderError, "IRRIGATION_BEFORE_LAST_UPDATE"));
  });

  it("leaves the zone untouched when a record is rejected", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    const before = e.waterBalance("A");
    assert.throws(() => e.ingest(rawObs(T0 + DAY, { air_temp_c: 80 })), ValidationError);
    assert.throws(() => e.ingest(rawObs(T0 - DAY)), TemporalOrderError);
    assert.equal(e.waterBalance("A"), before);
    assert.equal(e.snapshot("A").latest_observation?.ts_ms, T0);
  });

  it("keeps zones independent", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    e.ingest(rawObs(T0 + DAY));
    e.ingest(rawObs(T0, { zone_id: "B", vwc: { "6in": 0.5, "12in": 0.5 } }));
    assert.throws(() => e.ingest(rawObs(T0, { zone_id: "B" })), TemporalOrderError);
    assert.equal(e.waterBalance("A")?.smd_mm, 100);
    assert.equal(e.waterBalance("B")?.smd_mm, 0);
    assert.deepEqual(e.zoneIds(), ["A", "B"]);
  });

  it("fails evaluation without an observation or VPD", () => {
    const e = engine();
    assert.throws(() => e.evaluate("A"), (err) => expectCode(err, ComputationError, "NO_OBSERVATION"));

    e.ingest(rawObs(T0, { vpd_kpa: undefined }));
    assert.throws(() => e.evaluate("A"), (err) => expectCode(err, ComputationError, "VPD_UNAVAILABLE"));
    assert.equal(e.history("A").length, 0);

    e.ingest(rawObs(T0 + 1, { vpd_kpa: undefined, rh_pct: 40 }));
    assert.equal(e.evaluate("A").zone_id, "A");
  });

  it("distinguishes unknown zones in records from unknown zones in calls", () => {
    const e = engine();
    assert.throws(() => e.ingest(rawObs(T0, { zone_id: "Z" })), (err) => expectCode(err, ValidationError, "UNKNOWN_ZONE"));
    assert.throws(() => e.evaluate("Z"), (err) => expectCode(err, ConfigError, "UNKNOWN_ZONE"));
  });

  it("disables a misconfigured zone and keeps the others running", () => {
    const bad = zoneA({ crop_type: "wheat" }); // no CWSI baseline
    const e = new IrrigationEngine(testConfig({ A: zoneA(), W: bad }), { etEstimator: new ConstantEtEstimator({}, 4) });

    const status = e.zoneStatus();
    assert.equal(status.length, 2);
    const w = status[1];
    assert.ok(w && !w.enabled);
    assert.equal(w.zone_id, "W");
    assert.equal(w.error.code, "MISSING_CWSI_BASELINE");

    assert.throws(() => e.ingest(rawObs(T0, { zone_id: "W" })), (err) => expectCode(err, ConfigError, "MISSING_CWSI_BASELINE"));
    assert.throws(() => e.evaluate("W"), (err) => expectCode(err, ConfigError, "MISSING_CWSI_BASELINE"));

    e.ingest(rawObs(T0));
    assert.equal(e.evaluate("A").rationale, "NONE");
    assert.deepEqual(e.zoneIds(), ["A"]);
  });

  it("disables zones with an unknown crop type or bad thresholds", () => {
    const e = new IrrigationEngine(
      testConfig({
        U: zoneA({ crop_type: "rice" }),
        T: zoneA({ thresholds: { smd_depletion_fraction: 1.2, cwsi_trigger: 0.5 } }),
      }),
      { etEstimator: new ConstantEtEstimator({}) }
    );
    const codes = e.zoneStatus().map((s) => (s.enabled ? "ok" : s.error.code));
    assert.deepEqual(codes, ["INVALID_SMD_THRESHOLD", "UNKNOWN_CROP_TYPE"]);
  });

  it("applies a fitted CWSI baseline to later evaluations", () => {
    const e = engine();
    e.ingest(rawObs(T0, { canopy_temp_c: 31 }));
    assert.equal(e.evaluate("A").cwsi, 0.5);

    // lower line intercept 3, slope -2: at VPD 2 the lower dT is -1, spread 5
    const b = e.calibrateCwsiBaseline("A", [
      { vpd_kpa: 1, delta_t_c: 1 },
      { vpd_kpa: 2, delta_t_c: -1 },
    ]);
    assert.equal(b.source, "fitted");
    assert.deepEqual(b.lower, { intercept: 3, slope: -2 });
    assert.equal(e.evaluate("A").cwsi, 0.4);
    assert.equal(e.snapshot("A").latest_cwsi?.baseline.source, "fitted");
  });

  it("reports a moisture status in the snapshot", () => {
    const e = engine();
    e.ingest(rawObs(T0));
    assert.equal(e.snapshot("A").moisture_status, "OPTIMAL");
    e.ingest(rawObs(T0 + DAY));
    assert.equal(e.snapshot("A").moisture_status, "CRITICAL");
    assert.equal(e.snapshot("A").decisions, 0);
  });

  describe("ingestBatch", () => {
    it("collects per-record outcomes", () => {
      const e = engine();
      const out = e.ingestBatch([rawObs(T0), rawObs(T0, { zone_id: "Z" }), rawObs(T0 + DAY)]);
      assert.equal(out.accepted, 2);
      assert.equal(out.rejected, 1);
      assert.equal(out.aborted, false);
      const rejected = out.results[1];
      assert.ok(rejected && !rejected.ok);
      assert.equal(rejected.error.code, "UNKNOWN_ZONE");
    });

    it("stops at the next record once aborted", () => {
      const ctrl = new AbortController();
      const e = engine({
        estimateET: () => {
          ctrl.abort();
          return 4;
        },
      });
      const out = e.ingestBatch([rawObs(T0), rawObs(T0 + DAY), rawObs(T0 + 2 * DAY)], { signal: ctrl.signal });
      assert.equal(out.aborted, true);
      assert.equal(out.accepted, 2);
      assert.equal(out.results.length, 2);
      assert.equal(e.waterBalance("A")?.last_update_ts, T0 + DAY);
    });

    it("rethrows failures that are not irrigation errors", () => {
      const e = engine({
        estimateET: () => {
          throw new RangeError("estimator offline");
        },
      });
      assert.throws(() => e.ingestBatch([rawObs(T0), rawObs(T0 + DAY)]), RangeError);
    });
  });

  it("feeds Kc-scaled ET from the crop table", () => {
    const cfg = testConfig();
    assert.deepEqual(cropCoefficientsByZone(cfg), { A: 1 });
    const e = new IrrigationEngine(cfg, { etEstimator: new KcScaledEtEstimator(cfg.et.reference_et_mm_per_day, cropCoefficientsByZone(cfg)) });
    e.ingest(rawObs(T0, { vwc: {} }));
    e.ingest(rawObs(T0 + DAY, { vwc: {} }));
    assert.equal(e.waterBalance("A")?.smd_mm, 4);
    assert.equal(e.waterBalance("A")?.source, "PROJECTED");
  });
});

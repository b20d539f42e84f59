// Decision Kernel - IrrigationDecisionEngine
//
// Pure policy over two scalars and the zone's thresholds. The trigger is the
// logical OR of the two conditions; the rationale labels which of them held.
// Same inputs always give the same record, decision_id included.

import type {
  CwsiStateV1,
  DecisionRationale,
  DecisionRecordV1,
  DecisionThresholdsV1,
  WaterBalanceStateV1,
} from "@irrigate/contracts";
import { ComputationError, ConfigError } from "../errors";
import { sha256Hex, stableStringify } from "../util/canonical";

export type DecisionInput = {
  zone_id: string;
  ts_ms: number;
  water_balance: Pick<WaterBalanceStateV1, "smd_mm" | "whc_effective_mm">;
  cwsi: Pick<CwsiStateV1, "cwsi">;
  thresholds: DecisionThresholdsV1;
};

/**
 * Rejects thresholds that would make the policy meaningless. There are no
 * defaults: a zone without valid thresholds cannot be evaluated.
 */
export function assertValidThresholds(t: DecisionThresholdsV1, zoneId: string): void {
  const inUnit = (x: number) => Number.isFinite(x) && x > 0 && x <= 1;
  if (!inUnit(t.smd_depletion_fraction)) {
    throw new ConfigError("INVALID_SMD_THRESHOLD", `smd_depletion_fraction must be in (0, 1] (got ${t.smd_depletion_fraction})`, zoneId);
  }
  if (!inUnit(t.cwsi_trigger)) {
    throw new ConfigError("INVALID_CWSI_THRESHOLD", `cwsi_trigger must be in (0, 1] (got ${t.cwsi_trigger})`, zoneId);
  }
  if (t.warning_fraction !== undefined && !inUnit(t.warning_fraction)) {
    throw new ConfigError("INVALID_WARNING_FRACTION", `warning_fraction must be in (0, 1] (got ${t.warning_fraction})`, zoneId);
  }
}

export function rationaleFor(smdExceeded: boolean, cwsiExceeded: boolean): DecisionRationale {
  if (smdExceeded && cwsiExceeded) return "BOTH";
  if (smdExceeded) return "SMD_EXCEEDED";
  if (cwsiExceeded) return "CWSI_EXCEEDED";
  return "NONE";
}

export function evaluateIrrigationDecision(input: DecisionInput): DecisionRecordV1 {
  const { zone_id, ts_ms, thresholds } = input;
  const { smd_mm, whc_effective_mm } = input.water_balance;
  const cwsi = input.cwsi.cwsi;

  if (!(whc_effective_mm > 0) || !Number.isFinite(smd_mm) || !Number.isFinite(cwsi)) {
    throw new ComputationError("INVALID_DECISION_INPUT", `smd=${smd_mm} whc=${whc_effective_mm} cwsi=${cwsi}`, zone_id);
  }

  const smdThresholdMm = thresholds.smd_depletion_fraction * whc_effective_mm;
  const rationale = rationaleFor(smd_mm >= smdThresholdMm, cwsi >= thresholds.cwsi_trigger);

  const body = {
    type: "irrigation_decision_v1" as const,
    schema_version: "1.0.0" as const,
    zone_id,
    ts_ms,
    smd_mm,
    smd_fraction: smd_mm / whc_effective_mm,
    whc_effective_mm,
    cwsi,
    triggered: rationale !== "NONE",
    rationale,
    thresholds_used: Object.freeze({
      smd_depletion_fraction: thresholds.smd_depletion_fraction,
      smd_threshold_mm: smdThresholdMm,
      cwsi_trigger: thresholds.cwsi_trigger,
    }),
  };

  return Object.freeze({
    ...body,
    decision_id: `dec_${sha256Hex(stableStringify(body)).slice(0, 24)}`,
  });
}

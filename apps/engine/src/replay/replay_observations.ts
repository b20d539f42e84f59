// Backtest replay: feeds a recorded stream through a fresh engine, evaluating
// the zone after every accepted observation. Records tagged
// irrigation_event_v1 are applied as irrigation events.

import { z } from "zod";
import { IrrigationEventV1Schema, type DecisionRationale, type DecisionRecordV1 } from "@irrigate/contracts";
import { isIrrigationError, type IrrigationEngine } from "@irrigate/decision-kernel";

const ReplayIrrigationEventSchema = IrrigationEventV1Schema.extend({
  type: z.literal("irrigation_event_v1"),
  zone_id: z.string().min(1),
});

export type ReplayFailure = { index: number; stage: "ingest" | "irrigation" | "evaluate"; code: string; message: string };

export type ReplaySummary = {
  accepted: number;
  irrigations: number;
  evaluated: number;
  triggered: number;
  by_rationale: Record<DecisionRationale, number>;
  failures: ReplayFailure[];
};

function isIrrigationRecord(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "type" in raw && raw.type === "irrigation_event_v1";
}

export function replayObservations(
  engine: IrrigationEngine,
  records: Iterable<unknown>,
  onDecision?: (rec: DecisionRecordV1) => void
): ReplaySummary {
  const summary: ReplaySummary = {
    accepted: 0,
    irrigations: 0,
    evaluated: 0,
    triggered: 0,
    by_rationale: { SMD_EXCEEDED: 0, CWSI_EXCEEDED: 0, BOTH: 0, NONE: 0 },
    failures: [],
  };

  let index = -1;
  for (const raw of records) {
    index++;

    if (isIrrigationRecord(raw)) {
      const parsed = ReplayIrrigationEventSchema.safeParse(raw);
      if (!parsed.success) {
        summary.failures.push({ index, stage: "irrigation", code: "MALFORMED_IRRIGATION_EVENT", message: parsed.error.message });
        continue;
      }
      try {
        engine.recordIrrigationEvent(parsed.data.zone_id, parsed.data.ts_ms);
        summary.irrigations++;
      } catch (err) {
        if (!isIrrigationError(err)) throw err;
        summary.failures.push({ index, stage: "irrigation", code: err.code, message: err.message });
      }
      continue;
    }

    let zoneId: string;
    try {
      zoneId = engine.ingest(raw).zone_id;
      summary.accepted++;
    } catch (err) {
      if (!isIrrigationError(err)) throw err;
      summary.failures.push({ index, stage: "ingest", code: err.code, message: err.message });
      continue;
    }

    try {
      const rec = engine.evaluate(zoneId);
      summary.evaluated++;
      if (rec.triggered) summary.triggered++;
      summary.by_rationale[rec.rationale]++;
      onDecision?.(rec);
    } catch (err) {
      if (!isIrrigationError(err)) throw err;
      summary.failures.push({ index, stage: "evaluate", code: err.code, message: err.message });
    }
  }

  return summary;
}

/**
 * Parses JSON Lines text; blank lines are skipped, unparsable lines become
 * null so they surface as ingest failures at their own index.
 */
export function parseJsonLines(text: string): unknown[] {
  const out: unknown[] = [];
  for (const line of text.split(/\r?\n/)) {
    const s = line.trim();
    if (!s) continue;
    try {
      out.push(JSON.parse(s));
    } catch {
      out.push(null);
    }
  }
  return out;
}

import type { FastifyBaseLogger } from "fastify";
import type { DecisionRecordV1 } from "@irrigate/contracts";
import type { AlertDispatch } from "@irrigate/decision-kernel";

export type DecisionLogger = Pick<FastifyBaseLogger, "info" | "warn">;

/**
 * Stand-in for alert delivery: triggered decisions are logged at warn so they
 * surface in whatever collects the service logs.
 */
export class LogAlertDispatch implements AlertDispatch {
  readonly name = "log";

  constructor(private readonly log: DecisionLogger) {}

  async dispatch(record: DecisionRecordV1): Promise<void> {
    const fields = {
      zone_id: record.zone_id,
      decision_id: record.decision_id,
      ts_ms: record.ts_ms,
      rationale: record.rationale,
      smd_fraction: record.smd_fraction,
      cwsi: record.cwsi,
    };
    if (record.triggered) {
      this.log.warn(fields, "irrigation triggered");
    } else {
      this.log.info(fields, "irrigation not needed");
    }
  }
}

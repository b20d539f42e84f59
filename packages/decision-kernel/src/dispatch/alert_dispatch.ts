// Boundary to whatever delivers decisions onward (ledger, alerting, dashboard
// push). The kernel only defines the contract and the fan-out.

import type { DecisionRecordV1 } from "@irrigate/contracts";

export interface AlertDispatch {
  readonly name: string;
  dispatch(record: DecisionRecordV1): Promise<void>;
}

/**
 * Hands the record to every target. All targets are attempted; failures are
 * reported together as an AggregateError naming the failed targets.
 */
export async function dispatchDecision(targets: ReadonlyArray<AlertDispatch>, record: DecisionRecordV1): Promise<void> {
  const settled = await Promise.allSettled(targets.map((t) => t.dispatch(record)));

  const failedNames: string[] = [];
  const reasons: unknown[] = [];
  settled.forEach((r, i) => {
    if (r.status === "rejected") {
      failedNames.push(targets[i]?.name ?? `#${i}`);
      reasons.push(r.reason);
    }
  });

  if (reasons.length) {
    throw new AggregateError(reasons, `DISPATCH_FAILED: ${failedNames.join(",")} @ ${record.decision_id}`);
  }
}

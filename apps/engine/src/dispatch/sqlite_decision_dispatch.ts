import type { DecisionRecordV1 } from "@irrigate/contracts";
import type { AlertDispatch } from "@irrigate/decision-kernel";
import type { DecisionSqliteStore } from "../store/decision_sqlite_store";

/**
 * Appends every evaluated decision to the sqlite ledger.
 */
export class SqliteDecisionDispatch implements AlertDispatch {
  readonly name = "sqlite_ledger";

  constructor(private readonly store: DecisionSqliteStore) {}

  async dispatch(record: DecisionRecordV1): Promise<void> {
    this.store.insertDecision(record);
  }
}

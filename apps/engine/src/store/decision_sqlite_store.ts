import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { DecisionRecordV1Schema, type DecisionRecordV1, type IrrigationEventV1 } from "@irrigate/contracts";

export type DecisionStoreConfig = {
  filePath: string; // ":memory:" for an in-process database
};

export type StoredIrrigationEvent = IrrigationEventV1 & { zone_id: string };

type RecordRow = { record_json: string };

export class DecisionSqliteStore {
  private db: Database.Database;

  constructor(cfg: DecisionStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only tables
    this.db.exec(`
      create table if not exists irrigation_decisions (
        decision_id text primary key,
        zone_id text not null,
        ts_ms integer not null,
        triggered integer not null,
        rationale text not null,
        record_json text not null
      );

      create table if not exists irrigation_events (
        zone_id text not null,
        ts_ms integer not null,
        source text not null,
        applied_mm real,
        primary key (zone_id, ts_ms)
      );

      create index if not exists idx_decisions_zone_ts on irrigation_decisions(zone_id, ts_ms);
    `);
  }

  /**
   * Returns false when the decision was already stored.
   */
  insertDecision(rec: DecisionRecordV1): boolean {
    const stmt = this.db.prepare(
      `insert or ignore into irrigation_decisions (decision_id, zone_id, ts_ms, triggered, rationale, record_json)
       values (?, ?, ?, ?, ?, ?)`
    );
    const info = stmt.run(rec.decision_id, rec.zone_id, rec.ts_ms, rec.triggered ? 1 : 0, rec.rationale, JSON.stringify(rec));
    return info.changes > 0;
  }

  insertIrrigationEvent(ev: StoredIrrigationEvent): void {
    const stmt = this.db.prepare(
      `insert or ignore into irrigation_events (zone_id, ts_ms, source, applied_mm) values (?, ?, ?, ?)`
    );
    stmt.run(ev.zone_id, ev.ts_ms, ev.source, ev.applied_mm ?? null);
  }

  /**
   * Inserts the event and runs `apply` in one transaction; the insert is rolled
   * back when `apply` throws, and `apply` never runs when the insert fails.
   */
  withIrrigationEvent<T>(ev: StoredIrrigationEvent, apply: () => T): T {
    const tx = this.db.transaction(() => {
      this.insertIrrigationEvent(ev);
      return apply();
    });
    return tx();
  }

  listDecisions(limit: number, zoneId?: string): DecisionRecordV1[] {
    const rows = zoneId
      ? this.db
          .prepare<[string, number], RecordRow>(
            `select record_json from irrigation_decisions where zone_id = ? order by ts_ms desc, decision_id limit ?`
          )
          .all(zoneId, limit)
      : this.db
          .prepare<[number], RecordRow>(`select record_json from irrigation_decisions order by ts_ms desc, decision_id limit ?`)
          .all(limit);
    return rows.map((r) => DecisionRecordV1Schema.parse(JSON.parse(r.record_json)));
  }

  listIrrigationEvents(zoneId: string): StoredIrrigationEvent[] {
    const rows = this.db
      .prepare<[string], { zone_id: string; ts_ms: number; source: string; applied_mm: number | null }>(
        `select zone_id, ts_ms, source, applied_mm from irrigation_events where zone_id = ? order by ts_ms`
      )
      .all(zoneId);
    return rows.map((r) => ({
      zone_id: r.zone_id,
      ts_ms: r.ts_ms,
      source: r.source === "dispatch_feedback" ? "dispatch_feedback" : "manual_log",
      ...(r.applied_mm === null ? {} : { applied_mm: r.applied_mm }),
    }));
  }

  close(): void {
    this.db.close();
  }
}

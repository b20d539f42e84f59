import { Pool } from "pg";

type FactRow = { record_json: unknown };

/**
 * Extracts the raw observation payload from a facts.record_json value
 * (stored as TEXT or jsonb). Returns null for anything that is not an
 * observation_v1 fact.
 */
export function rowToRawObservation(row: FactRow): unknown {
  let rec: unknown = row.record_json;
  if (typeof rec === "string") {
    if (rec.trim() === "") return null;
    try {
      rec = JSON.parse(rec);
    } catch {
      return null; // not JSON: not an observation fact
    }
  }
  if (typeof rec !== "object" || rec === null) return null;
  if (!("type" in rec) || rec.type !== "observation_v1") return null;
  if (!("payload" in rec) || typeof rec.payload !== "object" || rec.payload === null) return null;
  return rec.payload;
}

/**
 * Read-only access to observation facts in the ledger, for backtesting.
 */
export class ObservationPgReader {
  private pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r?.rows?.length) throw new Error("pg ping failed");
  }

  /**
   * Observations for one zone within [startTsMs, endTsMs], oldest first.
   */
  async queryZoneWindow(params: { zoneId: string; startTsMs: number; endTsMs: number }): Promise<unknown[]> {
    const sql = `
      SELECT record_json
      FROM facts
      WHERE (record_json::jsonb->>'type') = 'observation_v1'
        AND (record_json::jsonb->'payload'->>'zone_id') = $1
        AND (record_json::jsonb->'payload'->>'ts_ms')::bigint >= $2
        AND (record_json::jsonb->'payload'->>'ts_ms')::bigint <= $3
      ORDER BY (record_json::jsonb->'payload'->>'ts_ms')::bigint ASC
    `;
    const res = await this.pool.query<FactRow>(sql, [params.zoneId, params.startTsMs, params.endTsMs]);
    return res.rows.map(rowToRawObservation).filter((x) => x !== null);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

#!/usr/bin/env node
/**
 * Backtest replay.
 *
 * Feeds recorded observations through a fresh in-memory engine and prints each
 * decision as a JSON line, then a summary. Nothing is persisted and no dispatcher
 * runs.
 *
 * Sources (exactly one):
 *   --file <path.jsonl>                 observation_v1 / irrigation_event_v1 records, one per line
 *   --pg --zone <id> --from <ms> --to <ms>   facts ledger at DATABASE_URL
 *   --synthetic --zone <id> [--days 14] [--seed 42] [--end <ms>] [--no-rain]
 *
 * Usage:
 *   npm run replay -- --synthetic --zone north-pivot --days 7
 */

import fs from "node:fs";
import path from "node:path";
import type { DecisionRecordV1, SoilTexture } from "@irrigate/contracts";
import { IrrigationEngine, isIrrigationError } from "@irrigate/decision-kernel";
import { CONFIG_DIR, loadEngineConfig } from "./config";
import { loadEnv } from "./env";
import { ObservationPgReader } from "./reader/observation_pg_reader";
import { parseJsonLines, replayObservations } from "./replay/replay_observations";
import { createEtEstimator } from "./runtime";
import { generateSyntheticObservations } from "./sim/synthetic_observations";
import { IntOption, NonEmptyOption, findRepoRoot, parseOption } from "./util";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

/* -------------------- sources -------------------- */

async function loadRecords(textureOf: (zoneId: string) => SoilTexture | undefined): Promise<unknown[]> {
  const file = arg("--file");
  if (file) {
    const fp = path.resolve(file);
    if (!fs.existsSync(fp)) die(`file not found: ${fp}`);
    return parseJsonLines(fs.readFileSync(fp, "utf8"));
  }

  if (flag("--pg")) {
    const url = process.env.DATABASE_URL;
    if (!url) die("DATABASE_URL is required for --pg");
    const zoneId = parseOption(NonEmptyOption, arg("--zone"), "--zone");
    const startTsMs = parseOption(IntOption, arg("--from"), "--from");
    const endTsMs = parseOption(IntOption, arg("--to"), "--to");

    const reader = new ObservationPgReader(url);
    try {
      await reader.ping();
      return await reader.queryZoneWindow({ zoneId, startTsMs, endTsMs });
    } finally {
      await reader.close();
    }
  }

  if (flag("--synthetic")) {
    const zoneId = parseOption(NonEmptyOption, arg("--zone"), "--zone");
    const texture = textureOf(zoneId);
    if (!texture) die(`zone ${zoneId} is not configured`);
    return generateSyntheticObservations({
      zoneId,
      texture,
      days: parseOption(IntOption, arg("--days", "14"), "--days"),
      seed: parseOption(IntOption, arg("--seed", "42"), "--seed"),
      endTs: parseOption(IntOption, arg("--end", String(Date.now())), "--end"),
      includeRainEvents: !flag("--no-rain"),
    });
  }

  return die("one of --file, --pg or --synthetic is required");
}

/* -------------------- main -------------------- */

async function main(): Promise<void> {
  const repoRoot = findRepoRoot(process.cwd(), CONFIG_DIR);
  loadEnv(repoRoot);

  const config = loadEngineConfig(arg("--profile", process.env.IRRIGATION_CONFIG_PROFILE ?? "default") ?? "default");
  const engine = new IrrigationEngine(config, { etEstimator: createEtEstimator(config) });
  for (const s of engine.zoneStatus()) {
    if (!s.enabled) console.error(`zone ${s.zone_id} disabled: ${s.error.message}`);
  }

  const records = await loadRecords((id) => config.zones[id]?.soil_profile.texture);

  const quiet = flag("--quiet");
  const summary = replayObservations(engine, records, (rec: DecisionRecordV1) => {
    if (!quiet) console.log(JSON.stringify(rec));
  });

  for (const f of summary.failures) console.error(`#${f.index} ${f.stage}: ${f.message}`);
  console.log(
    JSON.stringify(
      {
        records: records.length,
        accepted: summary.accepted,
        irrigations: summary.irrigations,
        evaluated: summary.evaluated,
        triggered: summary.triggered,
        by_rationale: summary.by_rationale,
        failures: summary.failures.length,
      },
      null,
      2
    )
  );
}

main().catch((err: unknown) => {
  if (isIrrigationError(err)) die(err.message);
  console.error(err);
  process.exit(1);
});

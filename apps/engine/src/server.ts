import path from "node:path";
import Fastify from "fastify";

import { loadEnv } from "./env";
import { CONFIG_DIR, loadEngineConfig } from "./config";
import { EngineRuntime } from "./runtime";
import { registerIrrigationRoutes } from "./routes";
import { DecisionSqliteStore } from "./store/decision_sqlite_store";
import { findRepoRoot } from "./util";

const REPO_ROOT = findRepoRoot(process.cwd(), CONFIG_DIR);
loadEnv(REPO_ROOT);

const app = Fastify({ logger: true });

app.addHook("onRequest", async (req, reply) => {
  reply.header("Access-Control-Allow-Origin", "*");
  reply.header("Access-Control-Allow-Headers", "content-type");
  reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") return reply.code(204).send();
});

async function main(): Promise<void> {
  const config = loadEngineConfig(process.env.IRRIGATION_CONFIG_PROFILE ?? "default");
  const filePath = process.env.DECISION_DB_PATH ?? path.join(REPO_ROOT, "apps", "engine", "data", "decisions.sqlite");
  const store = new DecisionSqliteStore({ filePath });

  const runtime = new EngineRuntime({ config, store, logger: app.log });
  for (const z of runtime.zoneStatus()) {
    if (!z.enabled) app.log.error({ zone_id: z.zone_id, error: z.error }, "zone disabled by configuration error");
  }
  registerIrrigationRoutes(app, runtime);
  app.addHook("onClose", async () => store.close());

  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});

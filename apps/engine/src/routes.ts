import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { CalibrationPointV1Schema, IrrigationEventV1Schema } from "@irrigate/contracts";
import { ValidationError, isIrrigationError, type IrrigationError } from "@irrigate/decision-kernel";
import type { EngineRuntime } from "./runtime";
import { IntOption, parseOption } from "./util";

type ZoneParams = { Params: { zoneId: string } };

const BatchBodySchema = z.object({ records: z.array(z.unknown()) }).strict();
const CalibrationBodySchema = z.object({ points: z.array(CalibrationPointV1Schema).min(2) }).strict();

export function statusFor(err: IrrigationError): number {
  if (err.code === "UNKNOWN_ZONE" && err.kind === "CONFIG") return 404;
  switch (err.kind) {
    case "VALIDATION":
      return 400;
    case "TEMPORAL_ORDER":
      return 409;
    case "CONFIG":
    case "COMPUTATION":
      return 422;
  }
}

export function errorBody(err: IrrigationError) {
  return {
    ok: false as const,
    error: {
      kind: err.kind,
      code: err.code,
      message: err.message,
      zone_id: err.zone_id,
      ...(err instanceof ValidationError && err.issues.length ? { issues: err.issues } : {}),
    },
  };
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string, zoneId: string | null): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "invalid body";
    throw new ValidationError("MALFORMED_REQUEST", `${what}: ${where}`, zoneId, parsed.error.issues);
  }
  return parsed.data;
}

function isBatchBody(body: unknown): boolean {
  return typeof body === "object" && body !== null && "records" in body;
}

export function registerIrrigationRoutes(app: FastifyInstance, runtime: EngineRuntime): void {
  app.setErrorHandler((err, req, reply) => {
    if (isIrrigationError(err)) {
      req.log.info({ code: err.code, zone_id: err.zone_id }, "request rejected");
      return reply.code(statusFor(err)).send(errorBody(err));
    }
    return reply.send(err);
  });

  app.post("/api/irrigation/observations", async (req, reply) => {
    if (isBatchBody(req.body)) {
      const { records } = parseBody(BatchBodySchema, req.body, "batch", null);
      const out = runtime.ingestBatch(records);
      return reply.send({
        ok: out.rejected === 0,
        accepted: out.accepted,
        rejected: out.rejected,
        aborted: out.aborted,
        results: out.results.map((r) =>
          r.ok ? { index: r.index, ok: true, observation: r.observation } : { index: r.index, ...errorBody(r.error) }
        ),
      });
    }
    const observation = runtime.ingest(req.body);
    return reply.send({ ok: true, observation });
  });

  app.post<ZoneParams>("/api/irrigation/zones/:zoneId/irrigation_events", async (req, reply) => {
    const { zoneId } = req.params;
    const event = parseBody(IrrigationEventV1Schema, req.body, "irrigation_event", zoneId);
    const water_balance = runtime.recordIrrigationEvent(zoneId, event);
    return reply.send({ ok: true, water_balance });
  });

  app.post<ZoneParams>("/api/irrigation/zones/:zoneId/evaluate", async (req, reply) => {
    const decision = await runtime.evaluate(req.params.zoneId);
    return reply.send({ ok: true, decision });
  });

  app.get<ZoneParams>("/api/irrigation/zones/:zoneId/history", async (req, reply) => {
    return reply.send({ ok: true, decisions: runtime.history(req.params.zoneId) });
  });

  app.get<ZoneParams>("/api/irrigation/zones/:zoneId/snapshot", async (req, reply) => {
    return reply.send({ ok: true, snapshot: runtime.snapshot(req.params.zoneId) });
  });

  app.post<ZoneParams>("/api/irrigation/zones/:zoneId/cwsi_baseline", async (req, reply) => {
    const { zoneId } = req.params;
    const { points } = parseBody(CalibrationBodySchema, req.body, "calibration", zoneId);
    return reply.send({ ok: true, baseline: runtime.calibrateCwsiBaseline(zoneId, points) });
  });

  app.get("/api/irrigation/zones", async (_req, reply) => {
    return reply.send({ ok: true, zones: runtime.zoneStatus() });
  });

  app.get<{ Querystring: { limit?: string; zone_id?: string } }>("/api/irrigation/decisions", async (req, reply) => {
    const q = req.query;
    let limit = 100;
    try {
      if (typeof q.limit !== "undefined") limit = parseOption(IntOption, q.limit, "limit");
    } catch (err) {
      throw new ValidationError("MALFORMED_REQUEST", err instanceof Error ? err.message : "invalid limit");
    }
    const zoneId = typeof q.zone_id === "string" && q.zone_id ? q.zone_id : undefined;
    return reply.send({ ok: true, decisions: runtime.listDecisions(Math.max(1, Math.min(limit, 500)), zoneId) });
  });
}

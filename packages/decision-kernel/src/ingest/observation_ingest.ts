// Decision Kernel - ObservationIngest
//
// Turns a raw record from the ingest collaborator into a validated
// ObservationV1. Structure is checked by the strict contract schema; physical
// plausibility and ordering are checked here. Nothing in this module touches
// zone state: the caller supplies the zone's last accepted timestamp.

import { MONITORED_DEPTHS, RawObservationV1Schema } from "@irrigate/contracts";
import type { IngestLimitsV1, ObservationV1, VwcReadings } from "@irrigate/contracts";
import { TemporalOrderError, ValidationError } from "../errors";

export type IngestContext = {
  limits: IngestLimitsV1;
  // Null when the zone has accepted nothing yet.
  lastAcceptedTs: (zoneId: string) => number | null;
  // Optional zone allowlist; unknown zones are rejected as malformed input.
  isKnownZone?: (zoneId: string) => boolean;
};

/**
 * Accepts `value` when it lies in [min, max], snapping values that miss a bound
 * by no more than `tolerance` onto it. Anything further out is rejected.
 */
export function withinBounds(
  value: number,
  min: number,
  max: number,
  tolerance: number,
  field: string,
  zoneId: string
): number {
  if (value >= min && value <= max) return value;
  if (value < min && min - value <= tolerance) return min;
  if (value > max && value - max <= tolerance) return max;
  throw new ValidationError("VALUE_OUT_OF_RANGE", `${field}=${value} outside [${min}, ${max}]`, zoneId);
}

/**
 * Validates and normalizes one raw observation.
 *
 * @throws ValidationError for malformed records, unknown zones and out-of-range values.
 * @throws TemporalOrderError when ts_ms is not after the zone's last accepted timestamp.
 */
export function normalizeObservation(raw: unknown, ctx: IngestContext): ObservationV1 {
  const parsed = RawObservationV1Schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "invalid record";
    throw new ValidationError("MALFORMED_OBSERVATION", where, zoneIdOf(raw), parsed.error.issues);
  }

  const r = parsed.data;
  const zoneId = r.zone_id;
  const tol = ctx.limits.rounding_tolerance;

  if (ctx.isKnownZone && !ctx.isKnownZone(zoneId)) {
    throw new ValidationError("UNKNOWN_ZONE", `zone ${zoneId} is not configured`, zoneId);
  }

  const vwc: VwcReadings = {};
  for (const depth of MONITORED_DEPTHS) {
    const v = r.vwc[depth];
    if (v === undefined) continue;
    vwc[depth] = withinBounds(v, 0, 1, tol, `vwc.${depth}`, zoneId);
  }

  const { min: tMin, max: tMax } = ctx.limits.temperature_c;
  const canopy = withinBounds(r.canopy_temp_c, tMin, tMax, tol, "canopy_temp_c", zoneId);
  const air = withinBounds(r.air_temp_c, tMin, tMax, tol, "air_temp_c", zoneId);

  const rh = r.rh_pct === undefined ? null : withinBounds(r.rh_pct, 0, 100, tol, "rh_pct", zoneId);
  const vpd = r.vpd_kpa === undefined ? null : withinBounds(r.vpd_kpa, 0, ctx.limits.max_vpd_kpa, tol, "vpd_kpa", zoneId);
  const rain =
    r.rainfall_mm === undefined ? 0 : withinBounds(r.rainfall_mm, 0, ctx.limits.max_rainfall_mm, tol, "rainfall_mm", zoneId);

  // Ordering last: a malformed record reports the malformation, not the order.
  const last = ctx.lastAcceptedTs(zoneId);
  if (last !== null && r.ts_ms <= last) {
    throw new TemporalOrderError("NON_MONOTONIC_TIMESTAMP", `ts_ms ${r.ts_ms} <= last accepted ${last}`, zoneId);
  }

  return Object.freeze({
    type: "observation_v1",
    zone_id: zoneId,
    ts_ms: r.ts_ms,
    vwc: Object.freeze(vwc),
    canopy_temp_c: canopy,
    air_temp_c: air,
    rh_pct: rh,
    vpd_kpa: vpd,
    rainfall_mm: rain,
  });
}

function zoneIdOf(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("zone_id" in raw)) return null;
  const z = raw.zone_id;
  return typeof z === "string" && z.trim() ? z.trim() : null;
}

// Decision Kernel - error taxonomy
//
// Every failure is thrown to the caller of the operation that hit it. Messages
// follow the `CODE: detail` convention so logs and HTTP bodies stay greppable.

import type { ZodIssue } from "zod";

export type IrrigationErrorKind = "VALIDATION" | "TEMPORAL_ORDER" | "CONFIG" | "COMPUTATION";

export abstract class IrrigationError extends Error {
  abstract readonly kind: IrrigationErrorKind;
  public readonly code: string;
  public readonly zone_id: string | null;

  constructor(code: string, detail: string, zoneId: string | null = null) {
    super(`${code}: ${detail}`);
    this.code = code;
    this.zone_id = zoneId;
  }
}

/** Malformed or physically implausible observation. */
export class ValidationError extends IrrigationError {
  readonly kind = "VALIDATION";
  public readonly issues: ReadonlyArray<ZodIssue>;

  constructor(code: string, detail: string, zoneId: string | null = null, issues: ReadonlyArray<ZodIssue> = []) {
    super(code, detail, zoneId);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** Non-monotonic timestamp for a zone. */
export class TemporalOrderError extends IrrigationError {
  readonly kind = "TEMPORAL_ORDER";

  constructor(code: string, detail: string, zoneId: string | null = null) {
    super(code, detail, zoneId);
    this.name = "TemporalOrderError";
  }
}

/** Missing or invalid soil profile, baseline or threshold configuration. */
export class ConfigError extends IrrigationError {
  readonly kind = "CONFIG";

  constructor(code: string, detail: string, zoneId: string | null = null) {
    super(code, detail, zoneId);
    this.name = "ConfigError";
  }
}

/** Degenerate numeric case; the single evaluation is rejected. */
export class ComputationError extends IrrigationError {
  readonly kind = "COMPUTATION";

  constructor(code: string, detail: string, zoneId: string | null = null) {
    super(code, detail, zoneId);
    this.name = "ComputationError";
  }
}

export function isIrrigationError(err: unknown): err is IrrigationError {
  return err instanceof IrrigationError;
}

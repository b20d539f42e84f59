import { z } from "zod";

export const IrrigationEventV1Schema = z
  .object({
    ts_ms: z.number().int().nonnegative(),
    source: z.enum(["dispatch_feedback", "manual_log"]).default("manual_log"),
    applied_mm: z.number().finite().nonnegative().optional(), // audit only; the balance resets to field capacity
  })
  .strict();

export type IrrigationEventV1 = z.output<typeof IrrigationEventV1Schema>;

import { z } from "zod";

export const DecisionRationaleSchema = z.enum(["SMD_EXCEEDED", "CWSI_EXCEEDED", "BOTH", "NONE"]);
export type DecisionRationale = z.infer<typeof DecisionRationaleSchema>;

export const DecisionThresholdsV1Schema = z
  .object({
    smd_depletion_fraction: z.number().finite(), // management allowable depletion, fraction of WHC
    cwsi_trigger: z.number().finite(),
    warning_fraction: z.number().finite().optional(), // status band only, fraction of the MAD threshold
  })
  .strict();

export type DecisionThresholdsV1 = z.infer<typeof DecisionThresholdsV1Schema>;

export const DecisionRecordV1Schema = z
  .object({
    type: z.literal("irrigation_decision_v1"),
    schema_version: z.literal("1.0.0"),
    decision_id: z.string().min(1),
    zone_id: z.string().min(1),
    ts_ms: z.number().int(),
    smd_mm: z.number().finite(),
    smd_fraction: z.number().finite(),
    whc_effective_mm: z.number().finite(),
    cwsi: z.number().min(0).max(1),
    triggered: z.boolean(),
    rationale: DecisionRationaleSchema,
    thresholds_used: z
      .object({
        smd_depletion_fraction: z.number().finite(),
        smd_threshold_mm: z.number().finite(),
        cwsi_trigger: z.number().finite(),
      })
      .strict(),
  })
  .strict();

export type DecisionRecordV1 = z.infer<typeof DecisionRecordV1Schema>;

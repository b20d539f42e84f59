import { z } from "zod";

/**
 * Linear canopy-minus-air temperature baseline: delta_t_c = intercept + slope * vpd_kpa.
 */
export const BaselineLineV1Schema = z
  .object({
    intercept: z.number().finite(),
    slope: z.number().finite(),
  })
  .strict();

export const CwsiBaselineV1Schema = z
  .object({
    lower: BaselineLineV1Schema, // non-water-stressed
    upper: BaselineLineV1Schema, // non-transpiring
  })
  .strict();

export type BaselineLineV1 = z.infer<typeof BaselineLineV1Schema>;
export type CwsiBaselineV1 = z.infer<typeof CwsiBaselineV1Schema>;

export const CalibrationPointV1Schema = z
  .object({
    vpd_kpa: z.number().finite().nonnegative(),
    delta_t_c: z.number().finite(),
  })
  .strict();

export type CalibrationPointV1 = z.infer<typeof CalibrationPointV1Schema>;

export type CwsiStateV1 = {
  baseline: CwsiBaselineV1 & { source: "configured" | "fitted" };
  cwsi: number; // 0 = no stress, 1 = maximum stress
  delta_t_c: number;
  vpd_kpa: number;
  lower_delta_t_c: number;
  upper_delta_t_c: number;
};

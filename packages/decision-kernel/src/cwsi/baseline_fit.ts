// Least-squares fit of the non-water-stressed baseline from canopy-minus-air
// temperature differences measured on well-watered reference plots.

import type { BaselineLineV1, CalibrationPointV1 } from "@irrigate/contracts";
import { ComputationError } from "../errors";

const MIN_VPD_VARIANCE = 1e-9;

export function fitLowerBaseline(points: ReadonlyArray<CalibrationPointV1>, zoneId: string | null = null): BaselineLineV1 {
  const n = points.length;
  if (n < 2) {
    throw new ComputationError("INSUFFICIENT_CALIBRATION_POINTS", `need >= 2 points, got ${n}`, zoneId);
  }

  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.vpd_kpa;
    sy += p.delta_t_c;
  }
  const mx = sx / n;
  const my = sy / n;

  let sxx = 0;
  let sxy = 0;
  for (const p of points) {
    const dx = p.vpd_kpa - mx;
    sxx += dx * dx;
    sxy += dx * (p.delta_t_c - my);
  }
  if (sxx / n <= MIN_VPD_VARIANCE) {
    throw new ComputationError("DEGENERATE_CALIBRATION_VPD", "calibration points need distinct VPD values", zoneId);
  }

  const slope = sxy / sxx;
  return { intercept: my - slope * mx, slope };
}

// Decision Kernel - SoilProfile
//
// Static per-zone soil description. A profile is built once from configuration
// and never mutated; all aggregation renormalizes the configured depth weights
// over whichever depths a given observation actually carries.

import { MONITORED_DEPTHS } from "@irrigate/contracts";
import type { DepthKey, SoilProfileConfigV1, SoilTexture, VwcReadings } from "@irrigate/contracts";
import { ConfigError } from "../errors";
import { TEXTURE_PROPERTIES } from "./texture_table";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export type SoilDepthLayer = {
  depth: DepthKey;
  field_capacity: number;
  wilting_point: number;
  weight: number;
};

export class SoilProfile {
  private readonly layerByDepth: ReadonlyMap<DepthKey, SoilDepthLayer>;

  constructor(
    public readonly zone_id: string,
    public readonly texture: SoilTexture,
    public readonly root_depth_mm: number,
    public readonly layers: ReadonlyArray<SoilDepthLayer>
  ) {
    this.layerByDepth = new Map(layers.map((l) => [l.depth, l]));
  }

  /**
   * Configured depths that carry weight, in monitored-depth order.
   */
  weightedDepths(): DepthKey[] {
    return this.layers.filter((l) => l.weight > 0).map((l) => l.depth);
  }

  /**
   * Subset of `present` that can be aggregated (configured with nonzero weight).
   */
  usableDepths(present: ReadonlyArray<DepthKey>): DepthKey[] {
    return present.filter((d) => {
      const layer = this.layerByDepth.get(d);
      return layer !== undefined && layer.weight > 0;
    });
  }

  /**
   * Effective water holding capacity of the root zone in mm, weighted over the
   * given depths. Falls back to the whole profile when none of them is usable.
   */
  effectiveWhcMm(depthsPresent: ReadonlyArray<DepthKey>): number {
    const fraction = this.weightedMean(this.resolveDepths(depthsPresent), (l) => l.field_capacity - l.wilting_point);
    return this.root_depth_mm * fraction;
  }

  weightedFieldCapacity(depthsPresent: ReadonlyArray<DepthKey>): number {
    return this.weightedMean(this.resolveDepths(depthsPresent), (l) => l.field_capacity);
  }

  /**
   * Weighted volumetric water content over the usable depths of `readings`,
   * or null when no usable depth was read.
   */
  weightedVwc(readings: VwcReadings): number | null {
    const depths = this.usableDepths(MONITORED_DEPTHS.filter((d) => typeof readings[d] === "number"));
    if (!depths.length) return null;
    return this.weightedMean(depths, (l) => readings[l.depth] ?? 0);
  }

  /**
   * Deficit below field capacity implied directly by the sensors, in mm.
   * Negative when the profile reads wetter than field capacity.
   */
  measuredDeficitMm(readings: VwcReadings): number | null {
    const depths = this.usableDepths(MONITORED_DEPTHS.filter((d) => typeof readings[d] === "number"));
    if (!depths.length) return null;
    const deficit = this.weightedMean(depths, (l) => l.field_capacity - (readings[l.depth] ?? l.field_capacity));
    return this.root_depth_mm * deficit;
  }

  private resolveDepths(depthsPresent: ReadonlyArray<DepthKey>): DepthKey[] {
    const usable = this.usableDepths(depthsPresent);
    return usable.length ? usable : this.weightedDepths();
  }

  private weightedMean(depths: ReadonlyArray<DepthKey>, pick: (l: SoilDepthLayer) => number): number {
    let sumW = 0;
    let acc = 0;
    for (const d of depths) {
      const layer = this.layerByDepth.get(d);
      if (!layer || layer.weight <= 0) continue;
      sumW += layer.weight;
      acc += layer.weight * pick(layer);
    }
    // Unreachable for profiles built by buildSoilProfile (at least one weighted depth).
    if (sumW <= 0) throw new ConfigError("NO_WEIGHTED_DEPTH", "no depth with nonzero weight", this.zone_id);
    return acc / sumW;
  }
}

/**
 * Builds and validates a zone's SoilProfile.
 *
 * Throws ConfigError when field capacity does not exceed the wilting point at
 * some depth, a weight is negative, the weights do not sum to 1 within
 * WEIGHT_SUM_TOLERANCE, or no depth carries weight.
 */
export function buildSoilProfile(zoneId: string, cfg: SoilProfileConfigV1): SoilProfile {
  if (!Number.isFinite(cfg.root_depth_mm) || cfg.root_depth_mm <= 0) {
    throw new ConfigError("INVALID_ROOT_DEPTH", `root_depth_mm must be > 0 (got ${cfg.root_depth_mm})`, zoneId);
  }

  const table = TEXTURE_PROPERTIES[cfg.texture];
  const layers: SoilDepthLayer[] = [];
  let weightSum = 0;

  for (const depth of MONITORED_DEPTHS) {
    const d = cfg.depths[depth];
    if (!d) continue;

    const fc = d.field_capacity ?? table.field_capacity;
    const pwp = d.wilting_point ?? table.wilting_point;
    if (fc < 0 || fc > 1 || pwp < 0 || pwp > 1) {
      throw new ConfigError("WHC_OUT_OF_RANGE", `FC/PWP at ${depth} must be volumetric fractions`, zoneId);
    }
    if (!(fc > pwp)) {
      throw new ConfigError("FC_NOT_ABOVE_PWP", `field capacity ${fc} <= wilting point ${pwp} at ${depth}`, zoneId);
    }
    if (d.weight < 0) {
      throw new ConfigError("NEGATIVE_DEPTH_WEIGHT", `weight ${d.weight} at ${depth}`, zoneId);
    }

    weightSum += d.weight;
    layers.push({ depth, field_capacity: fc, wilting_point: pwp, weight: d.weight });
  }

  if (!layers.some((l) => l.weight > 0)) {
    throw new ConfigError("NO_WEIGHTED_DEPTH", "at least one depth must have nonzero weight", zoneId);
  }
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError("DEPTH_WEIGHTS_NOT_NORMALIZED", `depth weights sum to ${weightSum}, expected 1`, zoneId);
  }

  return new SoilProfile(zoneId, cfg.texture, cfg.root_depth_mm, Object.freeze(layers));
}

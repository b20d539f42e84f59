// Typical volumetric field capacity / permanent wilting point by USDA texture
// class (cm3/cm3), NRCS soil survey ranges.

import type { SoilTexture } from "@irrigate/contracts";

export type TextureProperties = { field_capacity: number; wilting_point: number };

export const TEXTURE_PROPERTIES: Readonly<Record<SoilTexture, TextureProperties>> = Object.freeze({
  sand: { field_capacity: 0.12, wilting_point: 0.04 },
  loamy_sand: { field_capacity: 0.14, wilting_point: 0.06 },
  sandy_loam: { field_capacity: 0.23, wilting_point: 0.1 },
  loam: { field_capacity: 0.27, wilting_point: 0.12 },
  silt_loam: { field_capacity: 0.33, wilting_point: 0.13 },
  sandy_clay_loam: { field_capacity: 0.26, wilting_point: 0.15 },
  clay_loam: { field_capacity: 0.32, wilting_point: 0.2 },
  silty_clay_loam: { field_capacity: 0.37, wilting_point: 0.22 },
  clay: { field_capacity: 0.43, wilting_point: 0.29 },
});

/**
 * Total available water fraction (FC - PWP) for a texture class.
 */
export function textureAvailableWater(texture: SoilTexture): number {
  const p = TEXTURE_PROPERTIES[texture];
  return p.field_capacity - p.wilting_point;
}

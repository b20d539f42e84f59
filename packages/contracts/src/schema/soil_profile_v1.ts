import { z } from "zod";
import { DepthKeySchema } from "./observation_v1";

export const SOIL_TEXTURES = [
  "sand",
  "loamy_sand",
  "sandy_loam",
  "loam",
  "silt_loam",
  "sandy_clay_loam",
  "clay_loam",
  "silty_clay_loam",
  "clay",
] as const;

export const SoilTextureSchema = z.enum(SOIL_TEXTURES);
export type SoilTexture = z.infer<typeof SoilTextureSchema>;

export const SoilDepthConfigV1Schema = z
  .object({
    // Volumetric fractions; omitted values fall back to the texture table.
    field_capacity: z.number().finite().optional(),
    wilting_point: z.number().finite().optional(),
    weight: z.number().finite(),
  })
  .strict();

export const SoilProfileConfigV1Schema = z
  .object({
    texture: SoilTextureSchema,
    root_depth_mm: z.number().finite(),
    depths: z.record(DepthKeySchema, SoilDepthConfigV1Schema),
  })
  .strict();

export type SoilDepthConfigV1 = z.infer<typeof SoilDepthConfigV1Schema>;
export type SoilProfileConfigV1 = z.infer<typeof SoilProfileConfigV1Schema>;

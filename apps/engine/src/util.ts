import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export const NonEmptyOption = z.string().trim().min(1);
export const IntOption = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "expected an integer")
  .transform(Number);

/**
 * Parses a CLI or query option, throwing `invalid <name>: <reason>`.
 */
export function parseOption<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, value: string | null | undefined, name: string): T {
  const parsed = schema.safeParse(value ?? "");
  if (!parsed.success) throw new Error(`invalid ${name}: ${parsed.error.issues[0]?.message ?? "unparseable"}`);
  return parsed.data;
}

/**
 * Nearest ancestor of `startDir` that holds `marker` (config/irrigation).
 */
export function findRepoRoot(startDir: string, marker: string): string {
  for (let dir = path.resolve(startDir); ; dir = path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, marker))) return dir;
    if (path.dirname(dir) === dir) throw new Error(`no ${marker} above ${startDir}`);
  }
}

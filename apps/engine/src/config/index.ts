// apps/engine/src/config/index.ts
// Loader + validator for the engine configuration.
//
// Source of truth:
//   config/irrigation/<profile>.json   (override: IRRIGATION_CONFIG_PATH)
//
// Configuration is read once at startup. Reloading means building a new
// engine, which re-initializes every zone's state.

import fs from "node:fs";
import path from "node:path";
import { EngineConfigV1Schema, type EngineConfigV1 } from "@irrigate/contracts";
import { ConfigError } from "@irrigate/decision-kernel";
import { NonEmptyOption, findRepoRoot, parseOption } from "../util";

export const CONFIG_DIR = path.join("config", "irrigation");

export function resolveConfigPath(profile = "default"): string {
  const override = process.env.IRRIGATION_CONFIG_PATH;
  if (override) return path.resolve(override);

  const name = parseOption(NonEmptyOption, profile, "config_profile");
  const repoRoot = findRepoRoot(process.cwd(), CONFIG_DIR);
  return path.join(repoRoot, CONFIG_DIR, `${name}.json`);
}

/**
 * Structural validation only. Per-zone semantics (weights, FC > PWP,
 * baselines, thresholds) are checked when the engine builds each zone, so one
 * bad zone does not take the others down.
 */
export function parseEngineConfig(raw: unknown, origin = "<inline>"): EngineConfigV1 {
  const parsed = EngineConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError("INVALID_ENGINE_CONFIG", `${origin}: ${detail}`);
  }
  return parsed.data;
}

export function loadEngineConfig(profile = "default"): EngineConfigV1 {
  const p = resolveConfigPath(profile);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("UNREADABLE_ENGINE_CONFIG", `${p}: ${reason}`);
  }
  return parseEngineConfig(raw, p);
}

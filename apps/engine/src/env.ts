import fs from "node:fs";
import path from "node:path";

const ENV_LINE = /^\s*([A-Za-z_]\w*)\s*=\s*(?:"([^"]*)"|'([^']*)'|(.*?))\s*$/;

/**
 * KEY=value lines from a .env file; a missing file reads as empty.
 */
export function readEnvFile(fp: string): Record<string, string> {
  if (!fs.existsSync(fp)) return {};
  const out: Record<string, string> = {};
  for (const line of fs.readFileSync(fp, "utf8").split(/\r?\n/)) {
    const m = ENV_LINE.exec(line);
    if (!m?.[1] || line.trimStart().startsWith("#")) continue;
    out[m[1]] = m[2] ?? m[3] ?? m[4] ?? "";
  }
  return out;
}

/**
 * Fills unset keys from the repo root .env, then from apps/engine/.env.
 */
export function loadEnv(repoRoot: string): void {
  for (const fp of [path.join(repoRoot, ".env"), path.join(repoRoot, "apps", "engine", ".env")]) {
    for (const [key, value] of Object.entries(readEnvFile(fp))) {
      process.env[key] ??= value;
    }
  }
}

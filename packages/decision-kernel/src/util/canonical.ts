import { createHash } from "node:crypto";

type Json = null | boolean | number | string | Json[] | { [k: string]: Json };

function canonicalize(x: unknown): Json {
  if (x === null || x === undefined) return null;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: { [k: string]: Json } = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  if (typeof x === "number" || typeof x === "string" || typeof x === "boolean") return x;
  return String(x);
}

/**
 * JSON with object keys sorted recursively, so equal values hash equally.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

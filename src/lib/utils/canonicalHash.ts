/**
 * Canonical JSON + SHA-256
 *
 * Sorted-key serialization so that semantically identical records always
 * hash the same, regardless of property insertion order.
 */

import { createHash } from "node:crypto";

export function canonicalize(value: unknown, strip: ReadonlySet<string> = new Set()): unknown {
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((v) => canonicalize(v, strip));

  const sorted: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (strip.has(key) || child === undefined) continue;
    sorted[key] = canonicalize(child, strip);
  }
  return sorted;
}

export function canonicalJson(value: unknown, strip?: ReadonlySet<string>): string {
  return JSON.stringify(canonicalize(value, strip));
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function hashCanonical(value: unknown, strip?: ReadonlySet<string>): string {
  return sha256Hex(canonicalJson(value, strip));
}

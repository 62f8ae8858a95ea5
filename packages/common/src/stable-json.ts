// packages/common/src/stable-json.ts
import crypto from "node:crypto";

function normalize(v: unknown, ancestors: WeakSet<object>): unknown {
  if (v === null) return null;
  if (typeof v === "bigint") return v.toString();
  if (typeof v !== "object") return v;
  if (v instanceof Uint8Array) return "0x" + Buffer.from(v).toString("hex");
  if (ancestors.has(v)) return "[Circular]";

  ancestors.add(v);
  try {
    if (Array.isArray(v)) return v.map((x) => normalize(x, ancestors));

    const out: Record<string, unknown> = {};
    const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, vv] of entries) {
      if (typeof vv === "undefined") continue;
      out[k] = normalize(vv, ancestors);
    }
    return out;
  } finally {
    ancestors.delete(v);
  }
}

/**
 * Deterministic JSON: sorted keys, undefined dropped, bigint as decimal string,
 * bytes as 0x-hex.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value, new WeakSet<object>())) ?? "null";
}

export function sha256Hex(s: string): string {
  return crypto.createHash("sha256").update(s, "utf8").digest("hex");
}

import type { CycleRef } from "./types";

export function random_id(): string {
  // Browser-first. crypto.randomUUID exists on modern Safari/Chrome and Node 20.
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID();
  }
  return `id_${Date.now()}_${Math.random().toString(16).slice(2)}`;
}

const U64_MAX = (1n << 64n) - 1n;
const BASE36_RE = /^[0-9a-z]+$/;
const DECIMAL_RE = /^[0-9]+$/;

/** Display form of a cycle id: lowercase base-36 of the numeric id. */
export function encode_cycle_id(numeric: string | number | bigint): string {
  const n = typeof numeric === "bigint" ? numeric : BigInt(typeof numeric === "number" ? Math.trunc(numeric) : String(numeric).trim());
  if (n < 0n || n > U64_MAX) throw new RangeError(`cycle id out of range: ${String(numeric)}`);
  return n.toString(36);
}

/**
 * Decodes a base-36 display id into its decimal form.
 * Returns null when the text is not a base-36 u64.
 */
export function decode_cycle_id(display: string): string | null {
  const s = String(display || "")
    .trim()
    .toLowerCase();
  if (!s || !BASE36_RE.test(s)) return null;
  let n = 0n;
  for (const ch of s) {
    n = n * 36n + BigInt(parseInt(ch, 36));
    if (n > U64_MAX) return null;
  }
  return n.toString(10);
}

// Unparsable ids pass through unchanged; callers decide whether to warn.
export function parse_cycle_id(display: string): CycleRef {
  const raw = String(display ?? "").trim();
  const numeric = decode_cycle_id(raw);
  if (numeric === null) return { display: raw, numeric: raw, parsed: false };
  return { display: raw.toLowerCase(), numeric, parsed: true };
}

/** Trigger responses carry either a JSON number (canonical) or a display string. */
export function cycle_ref_from_wire(value: string | number): CycleRef {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      const raw = String(value);
      return { display: raw, numeric: raw, parsed: false };
    }
    return { display: encode_cycle_id(value), numeric: String(value), parsed: true };
  }
  return parse_cycle_id(value);
}

export function cycle_ref_from_numeric(numeric: string): CycleRef {
  const raw = String(numeric || "").trim();
  if (!DECIMAL_RE.test(raw)) return { display: raw, numeric: raw, parsed: false };
  const n = BigInt(raw);
  if (n > U64_MAX) return { display: raw, numeric: raw, parsed: false };
  return { display: n.toString(36), numeric: n.toString(10), parsed: true };
}

/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats (integers and bigints only)
 *   3. Deterministic encoding (same object → identical bytes, always)
 *   4. CBOR (RFC 8949) with canonical map key ordering
 *
 * Bridge payloads and message ids are derived from these bytes.
 */

import { Encoder } from "cbor-x";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

/** Sort object keys lexicographically (recursive, depth-first). */
function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (obj instanceof Uint8Array) return obj;
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === "object") {
    const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      sorted[key] = sortKeys(value);
    }
    return sorted;
  }
  if (typeof obj === "number" && !Number.isInteger(obj)) {
    throw new Error(`canonicalEncode: non-integer number ${String(obj)}`);
  }
  return obj;
}

export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(sortKeys(obj));
}

/** SHA-256 of the canonical encoding, hex. */
export function canonicalHash(obj: unknown): string {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

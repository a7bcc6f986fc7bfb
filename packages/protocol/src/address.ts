/**
 * L1 account addresses.
 *
 * Addresses are 20-byte hex strings with a 0x prefix. The pool stores them
 * lower-cased so map lookups never depend on checksum casing.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

/** Lower-case 0x-prefixed 20-byte hex string. */
export type Address = string;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: string): boolean {
  return ADDRESS_RE.test(value);
}

/** Lower-case an address. Returns null when the input is not an address. */
export function normalizeAddress(value: string): Address | null {
  if (!isAddress(value)) return null;
  return value.toLowerCase();
}

/**
 * EIP-55 mixed-case checksum form, for display and logs.
 * Input must already be a valid address.
 */
export function toChecksumAddress(address: Address): string {
  const lower = address.toLowerCase().slice(2);
  const hash = bytesToHex(keccak_256(utf8ToBytes(lower)));
  let out = "0x";
  for (let i = 0; i < lower.length; i++) {
    const ch = lower.charAt(i);
    out += parseInt(hash.charAt(i), 16) >= 8 ? ch.toUpperCase() : ch;
  }
  return out;
}

/** Compact form for log lines: 0x1234…abcd */
export function shortAddress(address: Address): string {
  return `${address.slice(0, 6)}…${address.slice(-4)}`;
}

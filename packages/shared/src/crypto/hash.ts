import { canonicalize } from "json-canonicalize";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Canonicalize before hashing for stable outputs.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

export function hashCanonical(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}

import { isPrincipal } from "@asset-ledger/shared";
import type { LedgerPrincipals } from "./types.js";

export const METADATA_MIN_LENGTH = 11;
export const METADATA_MAX_LENGTH = 256;
export const MAX_UNITS = 2n ** 128n - 1n;

export function isAssetId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isPositiveUnits(value: bigint): boolean {
  return value > 0n && value <= MAX_UNITS;
}

// Length is counted in code points, so a surrogate pair is one character.
export function isValidMetadataHash(value: unknown): value is string {
  if (typeof value !== "string") return false;
  const length = Array.from(value).length;
  return length >= METADATA_MIN_LENGTH && length <= METADATA_MAX_LENGTH;
}

export function isValidTokenization(
  totalUnits: bigint,
  tradeableUnits: bigint,
  metadataHash: unknown,
): boolean {
  return (
    isPositiveUnits(totalUnits) &&
    tradeableUnits > 0n &&
    tradeableUnits <= totalUnits &&
    isValidMetadataHash(metadataHash)
  );
}

/**
 * A participant may receive units or a compliance record. The protocol owner
 * and the service's own principal never can.
 */
export function isEligibleParticipant(
  participant: unknown,
  principals: LedgerPrincipals,
): participant is string {
  return (
    isPrincipal(participant) &&
    participant !== principals.protocolOwner &&
    participant !== principals.selfPrincipal
  );
}

/** Parses a unit count from a JSON body: a safe non-negative integer or a digit string. */
export function parseUnits(value: unknown): bigint | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === "string" && /^\d{1,40}$/.test(value)) {
    return BigInt(value);
  }
  return null;
}

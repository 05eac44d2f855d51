import type { LedgerStore } from "../storage/ledger-store.js";
import { fail, succeed, type LedgerResult } from "./errors.js";
import type { CertificateMove } from "./types.js";

export function planMint(
  store: LedgerStore,
  assetId: number,
  holder: string,
): LedgerResult<CertificateMove> {
  const existing = store.getCertificateHolder(assetId);
  if (existing !== null) {
    return fail("TransferRejected", `Certificate for asset ${assetId} is already minted`);
  }
  return succeed({ assetId, from: null, to: holder });
}

/**
 * The certificate follows a full divestment, and only when the divesting
 * sender is its current bearer. Any other transfer leaves it in place
 * (`null`).
 */
export function planCertificateHandoff(
  store: LedgerStore,
  assetId: number,
  sender: string,
  recipient: string,
  senderAfter: bigint,
): LedgerResult<CertificateMove | null> {
  if (senderAfter !== 0n) {
    return succeed(null);
  }
  const holder = store.getCertificateHolder(assetId);
  if (holder === null) {
    return fail("TransferRejected", `Certificate for asset ${assetId} was never minted`);
  }
  if (holder !== sender) {
    return succeed(null);
  }
  return succeed({ assetId, from: sender, to: recipient });
}

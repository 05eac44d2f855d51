import type { OwnershipPositionView } from "@asset-ledger/shared";
import type { LedgerStore } from "../storage/ledger-store.js";
import { fail, succeed, type LedgerResult } from "./errors.js";
import type { OwnershipPosition } from "./types.js";

export interface UnitTransferPlan {
  senderBefore: bigint;
  senderAfter: bigint;
  recipientAfter: bigint;
}

/** Units held, with no record read as zero. */
export function balanceOf(store: LedgerStore, assetId: number, holder: string): bigint {
  return store.getUnits(assetId, holder) ?? 0n;
}

/**
 * Computes both post-transfer balances. Sender and recipient must differ;
 * their combined balance is unchanged.
 */
export function planUnitTransfer(
  store: LedgerStore,
  assetId: number,
  sender: string,
  recipient: string,
  units: bigint,
): LedgerResult<UnitTransferPlan> {
  const senderBefore = balanceOf(store, assetId, sender);
  if (senderBefore < units) {
    return fail(
      "InsufficientOwnership",
      `Sender holds ${senderBefore} units of asset ${assetId}, ${units} requested`,
    );
  }
  return succeed({
    senderBefore,
    senderAfter: senderBefore - units,
    recipientAfter: balanceOf(store, assetId, recipient) + units,
  });
}

export function sumUnits(positions: OwnershipPosition[]): bigint {
  return positions.reduce((total, position) => total + position.units, 0n);
}

export function toPositionView(position: OwnershipPosition): OwnershipPositionView {
  return {
    assetId: position.assetId,
    holder: position.holder,
    units: position.units.toString(),
  };
}

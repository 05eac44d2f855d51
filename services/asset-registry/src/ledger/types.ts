import type { LedgerAction, LedgerEventRecord } from "@asset-ledger/shared";

export type { LedgerAction, LedgerEventRecord };

export interface AssetRecord {
  assetId: number;
  primaryOwner: string;
  /** Fixed at creation, as is `metadataHash`. */
  totalUnits: bigint;
  tradeableUnits: bigint;
  metadataHash: string;
  transferEnabled: boolean;
  creationHeight: number;
}

export interface OwnershipPosition {
  assetId: number;
  holder: string;
  units: bigint;
}

export interface ComplianceRecord {
  assetId: number;
  participant: string;
  compliant: boolean;
  verifiedAt: number;
  approvedBy: string;
}

export interface CertificateMove {
  assetId: number;
  /** Null when minting. */
  from: string | null;
  to: string;
}

export interface LedgerCounters {
  /** Next asset id to assign. */
  assetCounter: number;
  /** Last assigned tx id. */
  transactionNonce: number;
}

/** Identity of the running transition: who calls and at which height. */
export interface CallContext {
  caller: string;
  height: number;
}

export interface LedgerPrincipals {
  protocolOwner: string;
  selfPrincipal: string;
}

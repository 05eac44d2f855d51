export type LedgerAction =
  | "ASSET_TOKENIZED"
  | "OWNERSHIP_TRANSFERRED"
  | "COMPLIANCE_UPDATED"
  | "TRANSFER_STATUS_UPDATED";

export interface LedgerEventBody {
  txId: number;
  action: LedgerAction;
  assetId: number;
  /** The caller, except on compliance updates, where it is the participant. */
  party: string;
  height: number;
}

/** `eventHash` is the sha256 of the canonical JSON of the body fields. */
export interface LedgerEventRecord extends LedgerEventBody {
  eventHash: string;
}

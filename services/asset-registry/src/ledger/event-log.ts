import { hashCanonical, type LedgerEventBody } from "@asset-ledger/shared";
import type { LedgerAction, LedgerEventRecord } from "./types.js";

export function buildEventRecord(body: LedgerEventBody): LedgerEventRecord {
  const canonical: LedgerEventBody = {
    txId: body.txId,
    action: body.action,
    assetId: body.assetId,
    party: body.party,
    height: body.height,
  };
  return { ...canonical, eventHash: hashCanonical(canonical) };
}

export function verifyEventRecord(record: LedgerEventRecord): boolean {
  return buildEventRecord(record).eventHash === record.eventHash;
}

/**
 * Appends to a staged log. Transaction ids continue from `lastTxId` with no
 * gaps; nothing is persisted until the owning batch commits.
 */
export class EventLogWriter {
  private readonly pending: LedgerEventRecord[] = [];

  constructor(
    private lastTxId: number,
    private readonly height: number,
  ) {}

  append(action: LedgerAction, assetId: number, party: string): LedgerEventRecord {
    this.lastTxId += 1;
    const record = buildEventRecord({
      txId: this.lastTxId,
      action,
      assetId,
      party,
      height: this.height,
    });
    this.pending.push(record);
    return record;
  }

  get transactionNonce(): number {
    return this.lastTxId;
  }

  get records(): LedgerEventRecord[] {
    return [...this.pending];
  }
}

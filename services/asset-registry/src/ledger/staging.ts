import type { LedgerWriteBatch } from "../storage/ledger-store.js";
import { EventLogWriter } from "./event-log.js";
import type {
  AssetRecord,
  CallContext,
  CertificateMove,
  ComplianceRecord,
  LedgerAction,
  LedgerCounters,
  LedgerEventRecord,
} from "./types.js";

/**
 * Collects the writes of one entry-point call. Entry points stage only after
 * every precondition has passed, then hand `toBatch()` to the store in a
 * single commit.
 */
export class StagedTransition {
  private nextAssetId: number;
  private readonly log: EventLogWriter;
  private readonly newAssets: AssetRecord[] = [];
  private readonly transferStatus: Array<{ assetId: number; enabled: boolean }> = [];
  private readonly positions = new Map<string, { assetId: number; holder: string; units: bigint }>();
  private readonly compliance: ComplianceRecord[] = [];
  private readonly certificates: CertificateMove[] = [];

  constructor(counters: LedgerCounters, readonly context: CallContext) {
    this.nextAssetId = counters.assetCounter;
    this.log = new EventLogWriter(counters.transactionNonce, context.height);
  }

  allocateAssetId(): number {
    const assetId = this.nextAssetId;
    this.nextAssetId += 1;
    return assetId;
  }

  createAsset(asset: AssetRecord): void {
    this.newAssets.push(asset);
  }

  setTransferEnabled(assetId: number, enabled: boolean): void {
    this.transferStatus.push({ assetId, enabled });
  }

  // Last write per (asset, holder) wins.
  setUnits(assetId: number, holder: string, units: bigint): void {
    this.positions.set(`${assetId}:${holder}`, { assetId, holder, units });
  }

  putCompliance(record: ComplianceRecord): void {
    this.compliance.push(record);
  }

  moveCertificate(move: CertificateMove): void {
    this.certificates.push(move);
  }

  recordEvent(action: LedgerAction, assetId: number, party: string): LedgerEventRecord {
    return this.log.append(action, assetId, party);
  }

  toBatch(): LedgerWriteBatch {
    return {
      newAssets: [...this.newAssets],
      transferStatus: [...this.transferStatus],
      positions: [...this.positions.values()],
      compliance: [...this.compliance],
      certificates: [...this.certificates],
      events: this.log.records,
      counters: {
        assetCounter: this.nextAssetId,
        transactionNonce: this.log.transactionNonce,
      },
    };
  }
}

import type { ComplianceRecordView } from "@asset-ledger/shared";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { CallContext, ComplianceRecord } from "./types.js";

// Default deny: no record is the same as a revoked one.
export function isCompliant(store: LedgerStore, assetId: number, participant: string): boolean {
  return store.getCompliance(assetId, participant)?.compliant === true;
}

export function buildComplianceRecord(
  assetId: number,
  participant: string,
  compliant: boolean,
  context: CallContext,
): ComplianceRecord {
  return {
    assetId,
    participant,
    compliant,
    verifiedAt: context.height,
    approvedBy: context.caller,
  };
}

export function toComplianceView(record: ComplianceRecord): ComplianceRecordView {
  return { ...record };
}

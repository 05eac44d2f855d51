import type { ProtocolStatistics } from "@asset-ledger/shared";
import type { LedgerStore } from "../storage/ledger-store.js";
import { requireAsset, stageAssetCreation, type TokenizeInput } from "./assets.js";
import { planCertificateHandoff, planMint } from "./certificates.js";
import { buildComplianceRecord, isCompliant } from "./compliance.js";
import {
  fail,
  LedgerConflictError,
  succeed,
  type LedgerResult,
} from "./errors.js";
import { balanceOf, planUnitTransfer } from "./ownership.js";
import { StagedTransition } from "./staging.js";
import type {
  AssetRecord,
  CallContext,
  ComplianceRecord,
  LedgerEventRecord,
  LedgerPrincipals,
  OwnershipPosition,
} from "./types.js";
import {
  isAssetId,
  isEligibleParticipant,
  isPositiveUnits,
  isValidTokenization,
} from "./validation.js";

export interface TransferInput {
  assetId: number;
  recipient: string;
  units: bigint;
}

export interface ComplianceInput {
  assetId: number;
  participant: string;
  approved: boolean;
}

export interface TransferStatusInput {
  assetId: number;
  enabled: boolean;
}

export interface AssetLedgerOptions {
  /** Called once per event after its transition has been committed. */
  onCommit?: (event: LedgerEventRecord, context: CallContext) => void;
}

/**
 * The ledger state machine. Each entry point checks every precondition
 * against the store, stages its writes, and commits them in one store
 * transaction. A failed call issues no write.
 */
export class AssetLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly principals: LedgerPrincipals,
    private readonly options: AssetLedgerOptions = {},
  ) {}

  get protocolOwner(): string {
    return this.principals.protocolOwner;
  }

  tokenizeAsset(context: CallContext, input: TokenizeInput): LedgerResult<number> {
    if (!isValidTokenization(input.totalUnits, input.tradeableUnits, input.metadataHash)) {
      return fail(
        "InvalidParameters",
        "Expected 0 < tradeableUnits <= totalUnits and a metadata hash of 11 to 256 characters",
      );
    }

    const stage = new StagedTransition(this.store.getCounters(), context);
    const asset = stageAssetCreation(stage, input);
    stage.setUnits(asset.assetId, context.caller, input.totalUnits);

    const mint = planMint(this.store, asset.assetId, context.caller);
    if (!mint.ok) return mint;
    stage.moveCertificate(mint.value);

    stage.recordEvent("ASSET_TOKENIZED", asset.assetId, context.caller);
    return this.commit(stage, asset.assetId);
  }

  executeOwnershipTransfer(context: CallContext, input: TransferInput): LedgerResult<true> {
    const sender = context.caller;
    const found = requireAsset(this.store, input.assetId, "InvalidAsset");
    if (!found.ok) return found;
    const asset = found.value;

    if (!isEligibleParticipant(input.recipient, this.principals) || input.recipient === sender) {
      return fail("InvalidParameters", `Recipient '${input.recipient}' cannot receive units`);
    }
    if (!isPositiveUnits(input.units)) {
      return fail("InvalidParameters", "Transfer units must be a positive integer");
    }
    if (!asset.transferEnabled) {
      return fail("Unauthorized", `Transfers of asset ${asset.assetId} are disabled`);
    }
    if (!isCompliant(this.store, asset.assetId, input.recipient)) {
      return fail(
        "ComplianceViolation",
        `Recipient '${input.recipient}' is not approved for asset ${asset.assetId}`,
      );
    }

    const plan = planUnitTransfer(this.store, asset.assetId, sender, input.recipient, input.units);
    if (!plan.ok) return plan;

    const handoff = planCertificateHandoff(
      this.store,
      asset.assetId,
      sender,
      input.recipient,
      plan.value.senderAfter,
    );
    if (!handoff.ok) return handoff;

    const stage = new StagedTransition(this.store.getCounters(), context);
    stage.setUnits(asset.assetId, sender, plan.value.senderAfter);
    stage.setUnits(asset.assetId, input.recipient, plan.value.recipientAfter);
    if (handoff.value) {
      stage.moveCertificate(handoff.value);
    }
    stage.recordEvent("OWNERSHIP_TRANSFERRED", asset.assetId, sender);
    return this.commit(stage, true);
  }

  updateComplianceStatus(context: CallContext, input: ComplianceInput): LedgerResult<boolean> {
    if (context.caller !== this.principals.protocolOwner) {
      return fail("Unauthorized", "Only the protocol owner may update compliance");
    }
    const found = requireAsset(this.store, input.assetId, "InvalidParameters");
    if (!found.ok) return found;
    if (!isEligibleParticipant(input.participant, this.principals)) {
      return fail("InvalidParameters", `Participant '${input.participant}' is not eligible`);
    }

    const stage = new StagedTransition(this.store.getCounters(), context);
    stage.putCompliance(
      buildComplianceRecord(input.assetId, input.participant, input.approved, context),
    );
    stage.recordEvent("COMPLIANCE_UPDATED", input.assetId, input.participant);
    return this.commit(stage, input.approved);
  }

  setTransferEnabled(context: CallContext, input: TransferStatusInput): LedgerResult<boolean> {
    if (context.caller !== this.principals.protocolOwner) {
      return fail("Unauthorized", "Only the protocol owner may change the transfer gate");
    }
    const found = requireAsset(this.store, input.assetId, "InvalidAsset");
    if (!found.ok) return found;

    const stage = new StagedTransition(this.store.getCounters(), context);
    stage.setTransferEnabled(input.assetId, input.enabled);
    stage.recordEvent("TRANSFER_STATUS_UPDATED", input.assetId, context.caller);
    return this.commit(stage, input.enabled);
  }

  getAssetDetails(assetId: number): AssetRecord | null {
    return isAssetId(assetId) ? this.store.getAsset(assetId) : null;
  }

  getOwnershipPosition(assetId: number, holder: string): bigint {
    return balanceOf(this.store, assetId, holder);
  }

  getComplianceStatus(assetId: number, participant: string): ComplianceRecord | null {
    return this.store.getCompliance(assetId, participant);
  }

  getTransactionRecord(txId: number): LedgerEventRecord | null {
    return Number.isSafeInteger(txId) && txId > 0 ? this.store.getEvent(txId) : null;
  }

  getCertificateHolder(assetId: number): string | null {
    return this.store.getCertificateHolder(assetId);
  }

  listAssetHolders(assetId: number): OwnershipPosition[] {
    return this.store.listPositions(assetId);
  }

  listAssetEvents(assetId: number): LedgerEventRecord[] {
    return this.store.listEvents(assetId);
  }

  getProtocolStatistics(): ProtocolStatistics {
    const counters = this.store.getCounters();
    return {
      totalAssets: counters.assetCounter - 1,
      totalTransactions: counters.transactionNonce,
    };
  }

  private commit<T>(stage: StagedTransition, value: T): LedgerResult<T> {
    const batch = stage.toBatch();
    try {
      this.store.commit(batch);
    } catch (error) {
      if (error instanceof LedgerConflictError) {
        return fail("TransferRejected", error.message);
      }
      throw error;
    }
    for (const event of batch.events) {
      this.options.onCommit?.(event, stage.context);
    }
    return succeed(value);
  }
}

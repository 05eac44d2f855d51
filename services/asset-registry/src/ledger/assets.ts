import type { AssetDetails } from "@asset-ledger/shared";
import type { LedgerStore } from "../storage/ledger-store.js";
import { fail, succeed, type LedgerErrorCode, type LedgerResult } from "./errors.js";
import type { StagedTransition } from "./staging.js";
import type { AssetRecord } from "./types.js";
import { isAssetId } from "./validation.js";

export interface TokenizeInput {
  totalUnits: bigint;
  tradeableUnits: bigint;
  metadataHash: string;
}

/** Looks up an asset, failing with `missingCode` when the id is unknown. */
export function requireAsset(
  store: LedgerStore,
  assetId: number,
  missingCode: LedgerErrorCode,
): LedgerResult<AssetRecord> {
  const asset = isAssetId(assetId) ? store.getAsset(assetId) : null;
  if (!asset) {
    return fail(missingCode, `Asset ${assetId} does not exist`);
  }
  return succeed(asset);
}

export function stageAssetCreation(stage: StagedTransition, input: TokenizeInput): AssetRecord {
  const asset: AssetRecord = {
    assetId: stage.allocateAssetId(),
    primaryOwner: stage.context.caller,
    totalUnits: input.totalUnits,
    tradeableUnits: input.tradeableUnits,
    metadataHash: input.metadataHash,
    transferEnabled: true,
    creationHeight: stage.context.height,
  };
  stage.createAsset(asset);
  return asset;
}

export function toAssetDetails(asset: AssetRecord): AssetDetails {
  return {
    assetId: asset.assetId,
    primaryOwner: asset.primaryOwner,
    totalUnits: asset.totalUnits.toString(),
    tradeableUnits: asset.tradeableUnits.toString(),
    metadataHash: asset.metadataHash,
    transferEnabled: asset.transferEnabled,
    creationHeight: asset.creationHeight,
  };
}

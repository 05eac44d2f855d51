import type {
  AssetDetails,
  ComplianceRecordView,
  OwnershipPositionView,
  ProtocolStatistics,
} from "./asset.js";
import type { LedgerEventRecord } from "./events.js";

export type LedgerErrorLabel =
  | "unauthorized"
  | "invalid_asset"
  | "invalid_parameters"
  | "compliance_violation"
  | "insufficient_ownership"
  | "transfer_rejected";

export interface ErrorResponse {
  error: string;
  message?: string;
}

export interface TokenizeAssetResponse {
  assetId: number;
}

export interface TransferOwnershipResponse {
  transferred: true;
}

export interface UpdateComplianceRequest {
  approved: boolean;
}

export interface UpdateComplianceResponse {
  approved: boolean;
}

export interface SetTransferStatusRequest {
  enabled: boolean;
}

export interface SetTransferStatusResponse {
  enabled: boolean;
}

export interface GetAssetResponse {
  asset: AssetDetails;
}

export type GetPositionResponse = OwnershipPositionView;

export interface GetComplianceResponse {
  assetId: number;
  participant: string;
  compliant: boolean;
  record: ComplianceRecordView | null;
}

export interface GetCertificateResponse {
  assetId: number;
  holder: string;
}

export interface ListHoldersResponse {
  assetId: number;
  positions: OwnershipPositionView[];
}

export interface GetAssetEventsResponse {
  assetId: number;
  events: LedgerEventRecord[];
}

export interface GetTransactionResponse {
  event: LedgerEventRecord;
}

export type GetStatisticsResponse = ProtocolStatistics;

export interface ChainStatusResponse {
  source: "chain" | "local";
  latestHeight?: number;
  rpcUrl?: string;
  error?: string;
}

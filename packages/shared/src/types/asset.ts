// Wire shapes. Unit counts travel as decimal strings ("1000") so values above
// Number.MAX_SAFE_INTEGER survive JSON.

export interface AssetDetails {
  assetId: number;
  primaryOwner: string;
  totalUnits: string;
  tradeableUnits: string;
  metadataHash: string;
  transferEnabled: boolean;
  creationHeight: number;
}

export interface OwnershipPositionView {
  assetId: number;
  holder: string;
  units: string;
}

export interface ComplianceRecordView {
  assetId: number;
  participant: string;
  compliant: boolean;
  verifiedAt: number;
  approvedBy: string;
}

export interface ProtocolStatistics {
  totalAssets: number;
  totalTransactions: number;
}

import type { LedgerErrorLabel } from "@asset-ledger/shared";

export type LedgerErrorCode =
  | "Unauthorized"
  | "InvalidAsset"
  | "InvalidParameters"
  | "ComplianceViolation"
  | "InsufficientOwnership"
  | "TransferRejected";

export interface LedgerFailure {
  ok: false;
  error: LedgerErrorCode;
  message: string;
}

export interface LedgerSuccess<T> {
  ok: true;
  value: T;
}

export type LedgerResult<T> = LedgerSuccess<T> | LedgerFailure;

export function succeed<T>(value: T): LedgerSuccess<T> {
  return { ok: true, value };
}

export function fail(error: LedgerErrorCode, message: string): LedgerFailure {
  return { ok: false, error, message };
}

export const ERROR_HTTP_STATUS: Record<LedgerErrorCode, number> = {
  Unauthorized: 403,
  InvalidAsset: 404,
  InvalidParameters: 400,
  ComplianceViolation: 422,
  InsufficientOwnership: 409,
  TransferRejected: 409,
};

export const ERROR_LABEL: Record<LedgerErrorCode, LedgerErrorLabel> = {
  Unauthorized: "unauthorized",
  InvalidAsset: "invalid_asset",
  InvalidParameters: "invalid_parameters",
  ComplianceViolation: "compliance_violation",
  InsufficientOwnership: "insufficient_ownership",
  TransferRejected: "transfer_rejected",
};

/**
 * Raised by a store when a staged write no longer matches persisted state
 * (certificate already minted, certificate holder changed). The surrounding
 * storage transaction is rolled back before it propagates.
 */
export class LedgerConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LedgerConflictError";
  }
}

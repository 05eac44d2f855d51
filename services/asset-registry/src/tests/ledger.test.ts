import assert from "node:assert/strict";
import test from "node:test";
import { AssetLedger } from "../ledger/asset-ledger.js";
import { verifyEventRecord } from "../ledger/event-log.js";
import { sumUnits } from "../ledger/ownership.js";
import type { CallContext } from "../ledger/types.js";
import { MAX_UNITS } from "../ledger/validation.js";
import { SqliteLedgerStore } from "../storage/ledger-store.js";

const OWNER = "protocol-owner";
const SELF = "asset-registry";
const ISSUER = "issuer-1";
const RECIPIENT = "recipient-1";
const RECIPIENT_2 = "recipient-2";
const METADATA = "valid metadata string";

function setup(store = new SqliteLedgerStore(":memory:")) {
  const ledger = new AssetLedger(store, { protocolOwner: OWNER, selfPrincipal: SELF });
  let height = 0;
  const as = (caller: string): CallContext => {
    height += 1;
    return { caller, height };
  };
  return { store, ledger, as };
}

function tokenizeDefault(ctx: ReturnType<typeof setup>, units = 1000n) {
  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: units,
    tradeableUnits: units,
    metadataHash: METADATA,
  });
  assert.equal(result.ok, true);
  return result;
}

function approve(ctx: ReturnType<typeof setup>, participant: string, approved = true) {
  const result = ctx.ledger.updateComplianceStatus(ctx.as(OWNER), {
    assetId: 1,
    participant,
    approved,
  });
  assert.deepEqual(result, { ok: true, value: approved });
}

function snapshot(ctx: ReturnType<typeof setup>, assetId = 1) {
  return {
    asset: ctx.ledger.getAssetDetails(assetId),
    holders: ctx.ledger.listAssetHolders(assetId),
    certificate: ctx.ledger.getCertificateHolder(assetId),
    stats: ctx.ledger.getProtocolStatistics(),
    events: ctx.ledger.listAssetEvents(assetId),
  };
}

test("tokenizes an asset to the caller with the certificate", () => {
  const ctx = setup();
  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: 1000n,
    tradeableUnits: 1000n,
    metadataHash: METADATA,
  });

  assert.deepEqual(result, { ok: true, value: 1 });
  assert.equal(ctx.ledger.getOwnershipPosition(1, ISSUER), 1000n);
  assert.equal(ctx.ledger.getCertificateHolder(1), ISSUER);
  assert.deepEqual(ctx.ledger.getAssetDetails(1), {
    assetId: 1,
    primaryOwner: ISSUER,
    totalUnits: 1000n,
    tradeableUnits: 1000n,
    metadataHash: METADATA,
    transferEnabled: true,
    creationHeight: 1,
  });

  const event = ctx.ledger.getTransactionRecord(1);
  assert.equal(event?.action, "ASSET_TOKENIZED");
  assert.equal(event?.assetId, 1);
  assert.equal(event?.party, ISSUER);
  assert.equal(event?.height, 1);
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 1, totalTransactions: 1 });
});

test("rejects a transfer to a recipient without compliance approval", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  const before = snapshot(ctx);

  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 100n,
  });

  assert.equal(result.ok, false);
  assert.equal(result.ok ? null : result.error, "ComplianceViolation");
  assert.deepEqual(snapshot(ctx), before);
});

test("full transfer moves units and the certificate to the recipient", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  approve(ctx, RECIPIENT);

  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 1000n,
  });

  assert.deepEqual(result, { ok: true, value: true });
  assert.equal(ctx.ledger.getOwnershipPosition(1, ISSUER), 0n);
  assert.equal(ctx.ledger.getOwnershipPosition(1, RECIPIENT), 1000n);
  assert.equal(ctx.ledger.getCertificateHolder(1), RECIPIENT);
  assert.deepEqual(ctx.ledger.listAssetHolders(1), [
    { assetId: 1, holder: RECIPIENT, units: 1000n },
  ]);

  const event = ctx.ledger.getTransactionRecord(3);
  assert.equal(event?.action, "OWNERSHIP_TRANSFERRED");
  assert.equal(event?.party, ISSUER);
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 1, totalTransactions: 3 });
});

test("rejects a transfer from a holder whose balance is exhausted", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  approve(ctx, RECIPIENT);
  approve(ctx, RECIPIENT_2);
  ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 1000n,
  });
  const before = snapshot(ctx);

  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT_2,
    units: 50n,
  });

  assert.equal(result.ok ? null : result.error, "InsufficientOwnership");
  assert.deepEqual(snapshot(ctx), before);
});

test("rejects zero units and short metadata on tokenize", () => {
  const ctx = setup();
  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: 0n,
    tradeableUnits: 0n,
    metadataHash: "x",
  });

  assert.equal(result.ok ? null : result.error, "InvalidParameters");
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 0, totalTransactions: 0 });
  assert.equal(ctx.ledger.getAssetDetails(1), null);
});

test("rejects compliance updates from anyone but the protocol owner", () => {
  const ctx = setup();
  tokenizeDefault(ctx);

  const result = ctx.ledger.updateComplianceStatus(ctx.as(ISSUER), {
    assetId: 1,
    participant: RECIPIENT,
    approved: true,
  });

  assert.equal(result.ok ? null : result.error, "Unauthorized");
  assert.equal(ctx.ledger.getComplianceStatus(1, RECIPIENT), null);
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 1, totalTransactions: 1 });
});

test("validates tokenization bounds", () => {
  const ctx = setup();
  const cases: Array<{ total: bigint; tradeable: bigint; metadata: string; ok: boolean }> = [
    { total: 100n, tradeable: 100n, metadata: "a".repeat(10), ok: false },
    { total: 100n, tradeable: 100n, metadata: "a".repeat(11), ok: true },
    { total: 100n, tradeable: 100n, metadata: "a".repeat(256), ok: true },
    { total: 100n, tradeable: 100n, metadata: "a".repeat(257), ok: false },
    { total: 100n, tradeable: 101n, metadata: METADATA, ok: false },
    { total: 100n, tradeable: 0n, metadata: METADATA, ok: false },
    { total: 100n, tradeable: 1n, metadata: METADATA, ok: true },
    { total: MAX_UNITS, tradeable: MAX_UNITS, metadata: METADATA, ok: true },
    { total: MAX_UNITS + 1n, tradeable: 1n, metadata: METADATA, ok: false },
  ];

  for (const item of cases) {
    const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
      totalUnits: item.total,
      tradeableUnits: item.tradeable,
      metadataHash: item.metadata,
    });
    assert.equal(result.ok, item.ok, `total=${item.total} tradeable=${item.tradeable}`);
  }
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 4, totalTransactions: 4 });
});

test("counts metadata length in code points", () => {
  const ctx = setup();
  // ten emoji are twenty UTF-16 units but ten characters
  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: 5n,
    tradeableUnits: 5n,
    metadataHash: "\u{1F4C4}".repeat(10),
  });
  assert.equal(result.ok ? null : result.error, "InvalidParameters");
});

test("assigns sequential asset and transaction ids", () => {
  const ctx = setup();
  const ids = [1, 2, 3].map(() => {
    const result = tokenizeDefault(ctx, 10n);
    return result.ok ? result.value : 0;
  });
  assert.deepEqual(ids, [1, 2, 3]);

  const txIds = [1, 2, 3].map((txId) => ctx.ledger.getTransactionRecord(txId)?.assetId);
  assert.deepEqual(txIds, [1, 2, 3]);
  assert.equal(ctx.ledger.getTransactionRecord(0), null);
  assert.equal(ctx.ledger.getTransactionRecord(4), null);
});

test("checks transfer preconditions in order", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  const transfer = (recipient: string, units: bigint, assetId = 1) => {
    const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
      assetId,
      recipient,
      units,
    });
    return result.ok ? "ok" : result.error;
  };

  const beforeRejections = snapshot(ctx);
  assert.equal(transfer(RECIPIENT, 0n, 99), "InvalidAsset");
  assert.equal(transfer(OWNER, 10n), "InvalidParameters");
  assert.equal(transfer(SELF, 10n), "InvalidParameters");
  assert.equal(transfer(ISSUER, 10n), "InvalidParameters");
  assert.equal(transfer("not a principal", 10n), "InvalidParameters");
  assert.equal(transfer(RECIPIENT, 0n), "InvalidParameters");
  assert.deepEqual(snapshot(ctx), beforeRejections);

  const gate = ctx.ledger.setTransferEnabled(ctx.as(OWNER), { assetId: 1, enabled: false });
  assert.deepEqual(gate, { ok: true, value: false });
  const beforeGated = snapshot(ctx);
  assert.equal(transfer(RECIPIENT, 10n), "Unauthorized");
  assert.deepEqual(snapshot(ctx), beforeGated);

  ctx.ledger.setTransferEnabled(ctx.as(OWNER), { assetId: 1, enabled: true });
  assert.equal(transfer(RECIPIENT, 10n), "ComplianceViolation");

  approve(ctx, RECIPIENT);
  assert.equal(transfer(RECIPIENT, 1001n), "InsufficientOwnership");
  assert.equal(transfer(RECIPIENT, 10n), "ok");
  assert.equal(ctx.ledger.getOwnershipPosition(1, ISSUER), 990n);
});

test("reports each committed event to the commit listener", () => {
  const store = new SqliteLedgerStore(":memory:");
  const committed: Array<{ action: string; assetId: number; txId: number; caller: string }> = [];
  const ledger = new AssetLedger(
    store,
    { protocolOwner: OWNER, selfPrincipal: SELF },
    {
      onCommit: (event, context) => {
        committed.push({
          action: event.action,
          assetId: event.assetId,
          txId: event.txId,
          caller: context.caller,
        });
      },
    },
  );

  ledger.tokenizeAsset({ caller: ISSUER, height: 1 }, {
    totalUnits: 50n,
    tradeableUnits: 50n,
    metadataHash: METADATA,
  });
  const rejected = ledger.executeOwnershipTransfer({ caller: ISSUER, height: 2 }, {
    assetId: 1,
    recipient: RECIPIENT,
    units: 5n,
  });
  assert.equal(rejected.ok ? null : rejected.error, "ComplianceViolation");
  ledger.updateComplianceStatus({ caller: OWNER, height: 3 }, {
    assetId: 1,
    participant: RECIPIENT,
    approved: true,
  });

  assert.deepEqual(committed, [
    { action: "ASSET_TOKENIZED", assetId: 1, txId: 1, caller: ISSUER },
    { action: "COMPLIANCE_UPDATED", assetId: 1, txId: 2, caller: OWNER },
  ]);
});

test("restricts the transfer gate to the protocol owner", () => {
  const ctx = setup();
  tokenizeDefault(ctx);

  const denied = ctx.ledger.setTransferEnabled(ctx.as(ISSUER), { assetId: 1, enabled: false });
  assert.equal(denied.ok ? null : denied.error, "Unauthorized");
  assert.equal(ctx.ledger.getAssetDetails(1)?.transferEnabled, true);

  const missing = ctx.ledger.setTransferEnabled(ctx.as(OWNER), { assetId: 7, enabled: false });
  assert.equal(missing.ok ? null : missing.error, "InvalidAsset");

  ctx.ledger.setTransferEnabled(ctx.as(OWNER), { assetId: 1, enabled: false });
  const event = ctx.ledger.getTransactionRecord(2);
  assert.equal(event?.action, "TRANSFER_STATUS_UPDATED");
  assert.equal(event?.party, OWNER);
});

test("keeps the certificate with its bearer on partial transfers", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  approve(ctx, RECIPIENT);
  approve(ctx, RECIPIENT_2);

  ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 400n,
  });
  assert.equal(ctx.ledger.getCertificateHolder(1), ISSUER);

  // RECIPIENT divests fully but never held the certificate
  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(RECIPIENT), {
    assetId: 1,
    recipient: RECIPIENT_2,
    units: 400n,
  });
  assert.deepEqual(result, { ok: true, value: true });
  assert.equal(ctx.ledger.getCertificateHolder(1), ISSUER);
  assert.equal(ctx.ledger.getOwnershipPosition(1, RECIPIENT), 0n);

  ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT_2,
    units: 600n,
  });
  assert.equal(ctx.ledger.getCertificateHolder(1), RECIPIENT_2);
  assert.equal(ctx.ledger.getOwnershipPosition(1, RECIPIENT_2), 1000n);
});

test("conserves total units across a sequence of transfers", () => {
  const ctx = setup();
  tokenizeDefault(ctx, 500n);
  approve(ctx, RECIPIENT);
  approve(ctx, RECIPIENT_2);

  const steps: Array<[string, string, bigint]> = [
    [ISSUER, RECIPIENT, 120n],
    [RECIPIENT, RECIPIENT_2, 20n],
    [RECIPIENT_2, RECIPIENT, 50n],
    [RECIPIENT, RECIPIENT_2, 100n],
    [ISSUER, RECIPIENT_2, 380n],
    [ISSUER, RECIPIENT, 1n],
    [RECIPIENT_2, OWNER, 5n],
  ];
  for (const [from, to, units] of steps) {
    ctx.ledger.executeOwnershipTransfer(ctx.as(from), { assetId: 1, recipient: to, units });
    assert.equal(sumUnits(ctx.ledger.listAssetHolders(1)), 500n);
  }

  assert.deepEqual(
    ctx.ledger.listAssetHolders(1).map((position) => [position.holder, position.units]),
    [
      [RECIPIENT_2, 500n],
    ],
  );
  assert.equal(ctx.ledger.getCertificateHolder(1), RECIPIENT_2);
});

test("revokes compliance by overwriting the record", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  approve(ctx, RECIPIENT);
  approve(ctx, RECIPIENT, false);

  assert.deepEqual(ctx.ledger.getComplianceStatus(1, RECIPIENT), {
    assetId: 1,
    participant: RECIPIENT,
    compliant: false,
    verifiedAt: 3,
    approvedBy: OWNER,
  });
  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 1n,
  });
  assert.equal(result.ok ? null : result.error, "ComplianceViolation");

  const event = ctx.ledger.getTransactionRecord(3);
  assert.equal(event?.action, "COMPLIANCE_UPDATED");
  assert.equal(event?.party, RECIPIENT);
});

test("rejects compliance updates for unknown assets and ineligible participants", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  const update = (assetId: number, participant: string) => {
    const result = ctx.ledger.updateComplianceStatus(ctx.as(OWNER), {
      assetId,
      participant,
      approved: true,
    });
    return result.ok ? "ok" : result.error;
  };

  assert.equal(update(2, RECIPIENT), "InvalidParameters");
  assert.equal(update(1, OWNER), "InvalidParameters");
  assert.equal(update(1, SELF), "InvalidParameters");
  assert.equal(update(1, ""), "InvalidParameters");
  assert.equal(update(1, ISSUER), "ok");
});

test("returns zero and absent values for unknown records", () => {
  const ctx = setup();
  assert.equal(ctx.ledger.getAssetDetails(1), null);
  assert.equal(ctx.ledger.getAssetDetails(-1), null);
  assert.equal(ctx.ledger.getOwnershipPosition(1, ISSUER), 0n);
  assert.equal(ctx.ledger.getComplianceStatus(1, RECIPIENT), null);
  assert.equal(ctx.ledger.getCertificateHolder(1), null);
  assert.equal(ctx.ledger.getTransactionRecord(1), null);
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 0, totalTransactions: 0 });
});

test("hashes each event over its canonical fields", () => {
  const ctx = setup();
  tokenizeDefault(ctx);
  const event = ctx.ledger.getTransactionRecord(1);
  assert.ok(event);
  assert.equal(verifyEventRecord(event), true);
  assert.equal(verifyEventRecord({ ...event, party: RECIPIENT }), false);
});

class CertificateBlindStore extends SqliteLedgerStore {
  override getCertificateHolder(): string | null {
    return null;
  }
}

test("aborts a full transfer when the certificate binding is missing", () => {
  const ctx = setup(new CertificateBlindStore(":memory:"));
  tokenizeDefault(ctx);
  approve(ctx, RECIPIENT);
  const before = ctx.store.listPositions(1);

  const result = ctx.ledger.executeOwnershipTransfer(ctx.as(ISSUER), {
    assetId: 1,
    recipient: RECIPIENT,
    units: 1000n,
  });

  assert.equal(result.ok ? null : result.error, "TransferRejected");
  assert.deepEqual(ctx.store.listPositions(1), before);
  assert.deepEqual(ctx.ledger.getProtocolStatistics(), { totalAssets: 1, totalTransactions: 2 });
});

function squatCertificate(store: SqliteLedgerStore) {
  store.commit({
    newAssets: [],
    transferStatus: [],
    positions: [],
    compliance: [],
    certificates: [{ assetId: 1, from: null, to: "squatter" }],
    events: [],
    counters: { assetCounter: 1, transactionNonce: 0 },
  });
}

test("rejects tokenization when the certificate id is already taken", () => {
  const ctx = setup();
  squatCertificate(ctx.store);

  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: 10n,
    tradeableUnits: 10n,
    metadataHash: METADATA,
  });

  assert.equal(result.ok ? null : result.error, "TransferRejected");
  assert.equal(ctx.ledger.getAssetDetails(1), null);
  assert.equal(ctx.ledger.getCertificateHolder(1), "squatter");
});

test("rolls back tokenization when the mint conflicts at commit", () => {
  const ctx = setup(new CertificateBlindStore(":memory:"));
  squatCertificate(ctx.store);

  const result = ctx.ledger.tokenizeAsset(ctx.as(ISSUER), {
    totalUnits: 10n,
    tradeableUnits: 10n,
    metadataHash: METADATA,
  });

  assert.equal(result.ok ? null : result.error, "TransferRejected");
  assert.equal(ctx.store.getAsset(1), null);
  assert.equal(ctx.store.getUnits(1, ISSUER), null);
  assert.equal(ctx.store.getEvent(1), null);
  assert.deepEqual(ctx.store.getCounters(), { assetCounter: 1, transactionNonce: 0 });
});

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { LedgerAction } from "@asset-ledger/shared";
import { LedgerConflictError } from "../ledger/errors.js";
import type {
  AssetRecord,
  CertificateMove,
  ComplianceRecord,
  LedgerCounters,
  LedgerEventRecord,
  OwnershipPosition,
} from "../ledger/types.js";

/** Every write of one transition. Applied all-or-nothing by `commit`. */
export interface LedgerWriteBatch {
  newAssets: AssetRecord[];
  transferStatus: Array<{ assetId: number; enabled: boolean }>;
  /** A zero balance removes the row. */
  positions: OwnershipPosition[];
  compliance: ComplianceRecord[];
  certificates: CertificateMove[];
  events: LedgerEventRecord[];
  counters: LedgerCounters;
}

export interface LedgerStore {
  getCounters(): LedgerCounters;
  getAsset(assetId: number): AssetRecord | null;
  getUnits(assetId: number, holder: string): bigint | null;
  listPositions(assetId: number): OwnershipPosition[];
  getCompliance(assetId: number, participant: string): ComplianceRecord | null;
  getCertificateHolder(assetId: number): string | null;
  getEvent(txId: number): LedgerEventRecord | null;
  listEvents(assetId: number): LedgerEventRecord[];
  latestHeight(): number;
  commit(batch: LedgerWriteBatch): void;
  close(): void;
}

interface CounterRow {
  name: string;
  value: number;
}

interface AssetRow {
  asset_id: number;
  primary_owner: string;
  total_units: string;
  tradeable_units: string;
  metadata_hash: string;
  transfer_enabled: number;
  creation_height: number;
}

interface PositionRow {
  asset_id: number;
  holder: string;
  units: string;
}

interface ComplianceRow {
  asset_id: number;
  participant: string;
  compliant: number;
  verified_at: number;
  approved_by: string;
}

interface EventRow {
  tx_id: number;
  action: LedgerAction;
  asset_id: number;
  party: string;
  height: number;
  event_hash: string;
}

function toAsset(row: AssetRow): AssetRecord {
  return {
    assetId: row.asset_id,
    primaryOwner: row.primary_owner,
    totalUnits: BigInt(row.total_units),
    tradeableUnits: BigInt(row.tradeable_units),
    metadataHash: row.metadata_hash,
    transferEnabled: row.transfer_enabled === 1,
    creationHeight: row.creation_height,
  };
}

function toEvent(row: EventRow): LedgerEventRecord {
  return {
    txId: row.tx_id,
    action: row.action,
    assetId: row.asset_id,
    party: row.party,
    height: row.height,
    eventHash: row.event_hash,
  };
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly getCountersStmt: Database.Statement<[], CounterRow>;
  private readonly setCounterStmt: Database.Statement<[number, string]>;
  private readonly getAssetStmt: Database.Statement<[number], AssetRow>;
  private readonly insertAssetStmt: Database.Statement<
    [number, string, string, string, string, number, number]
  >;
  private readonly setTransferStatusStmt: Database.Statement<[number, number]>;
  private readonly getUnitsStmt: Database.Statement<[number, string], PositionRow>;
  private readonly listPositionsStmt: Database.Statement<[number], PositionRow>;
  private readonly putUnitsStmt: Database.Statement<[number, string, string]>;
  private readonly deleteUnitsStmt: Database.Statement<[number, string]>;
  private readonly getComplianceStmt: Database.Statement<[number, string], ComplianceRow>;
  private readonly putComplianceStmt: Database.Statement<[number, string, number, number, string]>;
  private readonly getCertificateStmt: Database.Statement<[number], { holder: string }>;
  private readonly mintCertificateStmt: Database.Statement<[number, string]>;
  private readonly moveCertificateStmt: Database.Statement<[string, number, string]>;
  private readonly getEventStmt: Database.Statement<[number], EventRow>;
  private readonly listEventsStmt: Database.Statement<[number], EventRow>;
  private readonly insertEventStmt: Database.Statement<
    [number, string, number, string, number, string]
  >;
  private readonly latestHeightStmt: Database.Statement<[], { height: number | null }>;
  private readonly applyBatch: (batch: LedgerWriteBatch) => void;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_counters (
        name TEXT PRIMARY KEY,
        value INTEGER NOT NULL
      );
      INSERT OR IGNORE INTO ledger_counters (name, value)
      VALUES ('asset_counter', 1), ('transaction_nonce', 0);

      CREATE TABLE IF NOT EXISTS assets (
        asset_id INTEGER PRIMARY KEY,
        primary_owner TEXT NOT NULL,
        total_units TEXT NOT NULL,
        tradeable_units TEXT NOT NULL,
        metadata_hash TEXT NOT NULL,
        transfer_enabled INTEGER NOT NULL,
        creation_height INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS ownership (
        asset_id INTEGER NOT NULL,
        holder TEXT NOT NULL,
        units TEXT NOT NULL,
        PRIMARY KEY(asset_id, holder)
      );

      CREATE TABLE IF NOT EXISTS compliance (
        asset_id INTEGER NOT NULL,
        participant TEXT NOT NULL,
        compliant INTEGER NOT NULL,
        verified_at INTEGER NOT NULL,
        approved_by TEXT NOT NULL,
        PRIMARY KEY(asset_id, participant)
      );

      CREATE TABLE IF NOT EXISTS certificates (
        asset_id INTEGER PRIMARY KEY,
        holder TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS ledger_events (
        tx_id INTEGER PRIMARY KEY,
        action TEXT NOT NULL,
        asset_id INTEGER NOT NULL,
        party TEXT NOT NULL,
        height INTEGER NOT NULL,
        event_hash TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_events_asset
      ON ledger_events(asset_id, tx_id ASC);
    `);

    this.getCountersStmt = this.db.prepare<[], CounterRow>(`
      SELECT name, value FROM ledger_counters
    `);

    this.setCounterStmt = this.db.prepare<[number, string]>(`
      UPDATE ledger_counters SET value = ? WHERE name = ?
    `);

    this.getAssetStmt = this.db.prepare<[number], AssetRow>(`
      SELECT asset_id, primary_owner, total_units, tradeable_units,
             metadata_hash, transfer_enabled, creation_height
      FROM assets
      WHERE asset_id = ?
      LIMIT 1
    `);

    this.insertAssetStmt = this.db.prepare<
      [number, string, string, string, string, number, number]
    >(`
      INSERT INTO assets (asset_id, primary_owner, total_units, tradeable_units,
                          metadata_hash, transfer_enabled, creation_height)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    this.setTransferStatusStmt = this.db.prepare<[number, number]>(`
      UPDATE assets SET transfer_enabled = ? WHERE asset_id = ?
    `);

    this.getUnitsStmt = this.db.prepare<[number, string], PositionRow>(`
      SELECT asset_id, holder, units
      FROM ownership
      WHERE asset_id = ? AND holder = ?
      LIMIT 1
    `);

    this.listPositionsStmt = this.db.prepare<[number], PositionRow>(`
      SELECT asset_id, holder, units
      FROM ownership
      WHERE asset_id = ?
      ORDER BY holder ASC
    `);

    this.putUnitsStmt = this.db.prepare<[number, string, string]>(`
      INSERT INTO ownership (asset_id, holder, units)
      VALUES (?, ?, ?)
      ON CONFLICT(asset_id, holder) DO UPDATE SET
        units = excluded.units
    `);

    this.deleteUnitsStmt = this.db.prepare<[number, string]>(`
      DELETE FROM ownership WHERE asset_id = ? AND holder = ?
    `);

    this.getComplianceStmt = this.db.prepare<[number, string], ComplianceRow>(`
      SELECT asset_id, participant, compliant, verified_at, approved_by
      FROM compliance
      WHERE asset_id = ? AND participant = ?
      LIMIT 1
    `);

    this.putComplianceStmt = this.db.prepare<[number, string, number, number, string]>(`
      INSERT INTO compliance (asset_id, participant, compliant, verified_at, approved_by)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(asset_id, participant) DO UPDATE SET
        compliant = excluded.compliant,
        verified_at = excluded.verified_at,
        approved_by = excluded.approved_by
    `);

    this.getCertificateStmt = this.db.prepare<[number], { holder: string }>(`
      SELECT holder FROM certificates WHERE asset_id = ? LIMIT 1
    `);

    this.mintCertificateStmt = this.db.prepare<[number, string]>(`
      INSERT INTO certificates (asset_id, holder)
      VALUES (?, ?)
      ON CONFLICT(asset_id) DO NOTHING
    `);

    this.moveCertificateStmt = this.db.prepare<[string, number, string]>(`
      UPDATE certificates SET holder = ? WHERE asset_id = ? AND holder = ?
    `);

    this.getEventStmt = this.db.prepare<[number], EventRow>(`
      SELECT tx_id, action, asset_id, party, height, event_hash
      FROM ledger_events
      WHERE tx_id = ?
      LIMIT 1
    `);

    this.listEventsStmt = this.db.prepare<[number], EventRow>(`
      SELECT tx_id, action, asset_id, party, height, event_hash
      FROM ledger_events
      WHERE asset_id = ?
      ORDER BY tx_id ASC
    `);

    this.insertEventStmt = this.db.prepare<
      [number, string, number, string, number, string]
    >(`
      INSERT INTO ledger_events (tx_id, action, asset_id, party, height, event_hash)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.latestHeightStmt = this.db.prepare<[], { height: number | null }>(`
      SELECT MAX(height) AS height FROM ledger_events
    `);

    this.applyBatch = this.db.transaction((batch: LedgerWriteBatch) => {
      for (const asset of batch.newAssets) {
        this.insertAssetStmt.run(
          asset.assetId,
          asset.primaryOwner,
          asset.totalUnits.toString(),
          asset.tradeableUnits.toString(),
          asset.metadataHash,
          asset.transferEnabled ? 1 : 0,
          asset.creationHeight,
        );
      }

      for (const status of batch.transferStatus) {
        this.setTransferStatusStmt.run(status.enabled ? 1 : 0, status.assetId);
      }

      for (const position of batch.positions) {
        if (position.units === 0n) {
          this.deleteUnitsStmt.run(position.assetId, position.holder);
        } else {
          this.putUnitsStmt.run(position.assetId, position.holder, position.units.toString());
        }
      }

      for (const record of batch.compliance) {
        this.putComplianceStmt.run(
          record.assetId,
          record.participant,
          record.compliant ? 1 : 0,
          record.verifiedAt,
          record.approvedBy,
        );
      }

      for (const move of batch.certificates) {
        const info =
          move.from === null
            ? this.mintCertificateStmt.run(move.assetId, move.to)
            : this.moveCertificateStmt.run(move.to, move.assetId, move.from);
        if (info.changes !== 1) {
          throw new LedgerConflictError(
            move.from === null
              ? `certificate for asset ${move.assetId} already minted`
              : `certificate for asset ${move.assetId} is not held by ${move.from}`,
          );
        }
      }

      for (const event of batch.events) {
        this.insertEventStmt.run(
          event.txId,
          event.action,
          event.assetId,
          event.party,
          event.height,
          event.eventHash,
        );
      }

      this.setCounterStmt.run(batch.counters.assetCounter, "asset_counter");
      this.setCounterStmt.run(batch.counters.transactionNonce, "transaction_nonce");
    });
  }

  getCounters(): LedgerCounters {
    const counters: LedgerCounters = { assetCounter: 1, transactionNonce: 0 };
    for (const row of this.getCountersStmt.all()) {
      if (row.name === "asset_counter") counters.assetCounter = row.value;
      if (row.name === "transaction_nonce") counters.transactionNonce = row.value;
    }
    return counters;
  }

  getAsset(assetId: number): AssetRecord | null {
    const row = this.getAssetStmt.get(assetId);
    return row ? toAsset(row) : null;
  }

  getUnits(assetId: number, holder: string): bigint | null {
    const row = this.getUnitsStmt.get(assetId, holder);
    return row ? BigInt(row.units) : null;
  }

  listPositions(assetId: number): OwnershipPosition[] {
    return this.listPositionsStmt.all(assetId).map((row) => ({
      assetId: row.asset_id,
      holder: row.holder,
      units: BigInt(row.units),
    }));
  }

  getCompliance(assetId: number, participant: string): ComplianceRecord | null {
    const row = this.getComplianceStmt.get(assetId, participant);
    if (!row) return null;
    return {
      assetId: row.asset_id,
      participant: row.participant,
      compliant: row.compliant === 1,
      verifiedAt: row.verified_at,
      approvedBy: row.approved_by,
    };
  }

  getCertificateHolder(assetId: number): string | null {
    const row = this.getCertificateStmt.get(assetId);
    return row ? row.holder : null;
  }

  getEvent(txId: number): LedgerEventRecord | null {
    const row = this.getEventStmt.get(txId);
    return row ? toEvent(row) : null;
  }

  listEvents(assetId: number): LedgerEventRecord[] {
    return this.listEventsStmt.all(assetId).map(toEvent);
  }

  latestHeight(): number {
    return this.latestHeightStmt.get()?.height ?? 0;
  }

  commit(batch: LedgerWriteBatch): void {
    this.applyBatch(batch);
  }

  close(): void {
    this.db.close();
  }
}

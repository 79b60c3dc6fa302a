import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  hashCanonical,
  type IssuanceEvent,
  type IssuanceEventType,
  type RecordedEvent,
} from "@holderpass/shared";

export type SettingKey =
  | "owner"
  | "admin_count"
  | "eligibility_asset"
  | "required_balance"
  | "mintable_token_id"
  | "mint_quantity"
  | "total_issued";

export interface MintRecord {
  address: string;
  tokenId: bigint;
  quantity: bigint;
  mintedAt: string;
}

export interface IssuanceStore {
  /** Runs `fn` in one SQLite transaction; a throw rolls everything back. */
  transaction<T>(fn: () => T): T;
  getSetting(key: SettingKey): string | null;
  setSetting(key: SettingKey, value: string): void;
  /** Writes only keys that are not present yet. */
  seedSettings(values: Partial<Record<SettingKey, string>>): void;

  isAdmin(address: string): boolean;
  insertAdmin(address: string, addedAt: string): void;
  deleteAdmin(address: string): void;
  listAdmins(): string[];

  getMint(address: string): MintRecord | null;
  insertMint(record: MintRecord): void;

  tokenExists(tokenId: bigint): boolean;
  markTokenExists(tokenId: bigint, at: string): void;
  getUriPrefix(tokenId: bigint): string | null;
  setUriPrefix(tokenId: bigint, prefix: string, at: string): void;

  getTokenBalance(holder: string, tokenId: bigint): bigint;
  creditTokenBalance(holder: string, tokenId: bigint, quantity: bigint): void;

  appendEvent(event: IssuanceEvent): RecordedEvent;
  listEvents(type?: IssuanceEventType): RecordedEvent[];
  close(): void;
}

interface SettingRow {
  value: string;
}

interface AddressRow {
  address: string;
}

interface MintRow {
  address: string;
  token_id: string;
  quantity: string;
  minted_at: string;
}

interface PrefixRow {
  prefix: string;
}

interface BalanceRow {
  amount: string;
}

interface EventRow {
  sequence: number;
  event_json: string;
  event_hash: string;
}

function toRecordedEvent(row: EventRow): RecordedEvent {
  return {
    sequence: row.sequence,
    event: JSON.parse(row.event_json) as IssuanceEvent,
    eventHash: row.event_hash,
  };
}

export class SqliteIssuanceStore implements IssuanceStore {
  private readonly db: Database.Database;
  private readonly getSettingStmt: Database.Statement<[string], SettingRow>;
  private readonly setSettingStmt: Database.Statement<[string, string]>;
  private readonly seedSettingStmt: Database.Statement<[string, string]>;
  private readonly isAdminStmt: Database.Statement<[string], AddressRow>;
  private readonly insertAdminStmt: Database.Statement<[string, string]>;
  private readonly deleteAdminStmt: Database.Statement<[string]>;
  private readonly listAdminsStmt: Database.Statement<[], AddressRow>;
  private readonly getMintStmt: Database.Statement<[string], MintRow>;
  private readonly insertMintStmt: Database.Statement<[string, string, string, string]>;
  private readonly tokenExistsStmt: Database.Statement<[string], { token_id: string }>;
  private readonly markTokenStmt: Database.Statement<[string, string]>;
  private readonly getPrefixStmt: Database.Statement<[string], PrefixRow>;
  private readonly setPrefixStmt: Database.Statement<[string, string, string]>;
  private readonly getBalanceStmt: Database.Statement<[string, string], BalanceRow>;
  private readonly setBalanceStmt: Database.Statement<[string, string, string]>;
  private readonly insertEventStmt: Database.Statement<[string, string, string, string]>;
  private readonly listEventsStmt: Database.Statement<[], EventRow>;
  private readonly listEventsByTypeStmt: Database.Statement<[string], EventRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS admins (
        address TEXT PRIMARY KEY,
        added_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS mints (
        address TEXT PRIMARY KEY,
        token_id TEXT NOT NULL,
        quantity TEXT NOT NULL,
        minted_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS tokens (
        token_id TEXT PRIMARY KEY,
        first_issued_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS token_uris (
        token_id TEXT PRIMARY KEY,
        prefix TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS token_balances (
        holder TEXT NOT NULL,
        token_id TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (holder, token_id)
      );
      CREATE TABLE IF NOT EXISTS events (
        sequence INTEGER PRIMARY KEY AUTOINCREMENT,
        type TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL,
        event_hash TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_events_type
      ON events(type, sequence);
    `);

    this.getSettingStmt = this.db.prepare(`
      SELECT value FROM settings WHERE key = ? LIMIT 1
    `) as Database.Statement<[string], SettingRow>;

    this.setSettingStmt = this.db.prepare(`
      INSERT INTO settings (key, value)
      VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);

    this.seedSettingStmt = this.db.prepare(`
      INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)
    `);

    this.isAdminStmt = this.db.prepare(`
      SELECT address FROM admins WHERE address = ? LIMIT 1
    `) as Database.Statement<[string], AddressRow>;

    this.insertAdminStmt = this.db.prepare(`
      INSERT INTO admins (address, added_at) VALUES (?, ?)
    `);

    this.deleteAdminStmt = this.db.prepare(`
      DELETE FROM admins WHERE address = ?
    `);

    this.listAdminsStmt = this.db.prepare(`
      SELECT address FROM admins ORDER BY added_at ASC, address ASC
    `) as Database.Statement<[], AddressRow>;

    this.getMintStmt = this.db.prepare(`
      SELECT address, token_id, quantity, minted_at
      FROM mints
      WHERE address = ?
      LIMIT 1
    `) as Database.Statement<[string], MintRow>;

    this.insertMintStmt = this.db.prepare(`
      INSERT INTO mints (address, token_id, quantity, minted_at) VALUES (?, ?, ?, ?)
    `);

    this.tokenExistsStmt = this.db.prepare(`
      SELECT token_id FROM tokens WHERE token_id = ? LIMIT 1
    `) as Database.Statement<[string], { token_id: string }>;

    this.markTokenStmt = this.db.prepare(`
      INSERT OR IGNORE INTO tokens (token_id, first_issued_at) VALUES (?, ?)
    `);

    this.getPrefixStmt = this.db.prepare(`
      SELECT prefix FROM token_uris WHERE token_id = ? LIMIT 1
    `) as Database.Statement<[string], PrefixRow>;

    this.setPrefixStmt = this.db.prepare(`
      INSERT INTO token_uris (token_id, prefix, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(token_id) DO UPDATE SET
        prefix = excluded.prefix,
        updated_at = excluded.updated_at
    `);

    this.getBalanceStmt = this.db.prepare(`
      SELECT amount FROM token_balances WHERE holder = ? AND token_id = ? LIMIT 1
    `) as Database.Statement<[string, string], BalanceRow>;

    this.setBalanceStmt = this.db.prepare(`
      INSERT INTO token_balances (holder, token_id, amount)
      VALUES (?, ?, ?)
      ON CONFLICT(holder, token_id) DO UPDATE SET amount = excluded.amount
    `);

    this.insertEventStmt = this.db.prepare(`
      INSERT INTO events (type, occurred_at, event_json, event_hash) VALUES (?, ?, ?, ?)
    `);

    this.listEventsStmt = this.db.prepare(`
      SELECT sequence, event_json, event_hash FROM events ORDER BY sequence ASC
    `) as Database.Statement<[], EventRow>;

    this.listEventsByTypeStmt = this.db.prepare(`
      SELECT sequence, event_json, event_hash
      FROM events
      WHERE type = ?
      ORDER BY sequence ASC
    `) as Database.Statement<[string], EventRow>;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getSetting(key: SettingKey): string | null {
    const row = this.getSettingStmt.get(key);
    return row ? row.value : null;
  }

  setSetting(key: SettingKey, value: string): void {
    this.setSettingStmt.run(key, value);
  }

  seedSettings(values: Partial<Record<SettingKey, string>>): void {
    this.transaction(() => {
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
          this.seedSettingStmt.run(key, value);
        }
      }
    });
  }

  isAdmin(address: string): boolean {
    return this.isAdminStmt.get(address) !== undefined;
  }

  insertAdmin(address: string, addedAt: string): void {
    this.insertAdminStmt.run(address, addedAt);
  }

  deleteAdmin(address: string): void {
    this.deleteAdminStmt.run(address);
  }

  listAdmins(): string[] {
    return this.listAdminsStmt.all().map((row) => row.address);
  }

  getMint(address: string): MintRecord | null {
    const row = this.getMintStmt.get(address);
    if (!row) return null;
    return {
      address: row.address,
      tokenId: BigInt(row.token_id),
      quantity: BigInt(row.quantity),
      mintedAt: row.minted_at,
    };
  }

  insertMint(record: MintRecord): void {
    this.insertMintStmt.run(
      record.address,
      record.tokenId.toString(),
      record.quantity.toString(),
      record.mintedAt,
    );
  }

  tokenExists(tokenId: bigint): boolean {
    return this.tokenExistsStmt.get(tokenId.toString()) !== undefined;
  }

  markTokenExists(tokenId: bigint, at: string): void {
    this.markTokenStmt.run(tokenId.toString(), at);
  }

  getUriPrefix(tokenId: bigint): string | null {
    const row = this.getPrefixStmt.get(tokenId.toString());
    return row ? row.prefix : null;
  }

  setUriPrefix(tokenId: bigint, prefix: string, at: string): void {
    this.setPrefixStmt.run(tokenId.toString(), prefix, at);
  }

  getTokenBalance(holder: string, tokenId: bigint): bigint {
    const row = this.getBalanceStmt.get(holder, tokenId.toString());
    return row ? BigInt(row.amount) : 0n;
  }

  creditTokenBalance(holder: string, tokenId: bigint, quantity: bigint): void {
    this.transaction(() => {
      const next = this.getTokenBalance(holder, tokenId) + quantity;
      this.setBalanceStmt.run(holder, tokenId.toString(), next.toString());
    });
  }

  appendEvent(event: IssuanceEvent): RecordedEvent {
    const eventHash = hashCanonical(event);
    const info = this.insertEventStmt.run(
      event.type,
      event.occurredAt,
      JSON.stringify(event),
      eventHash,
    );
    return {
      sequence: Number(info.lastInsertRowid),
      event,
      eventHash,
    };
  }

  listEvents(type?: IssuanceEventType): RecordedEvent[] {
    const rows = type ? this.listEventsByTypeStmt.all(type) : this.listEventsStmt.all();
    return rows.map(toRecordedEvent);
  }

  close(): void {
    this.db.close();
  }
}

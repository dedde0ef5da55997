import type { AccessPointRecord } from '@uplink/shared';
import { canonicalIdentity } from '@uplink/shared';
import type { Db } from '../services/database.js';
import { LedgerIOError, describeError } from '../errors.js';

interface ConnectionRow {
  bssid: string;
  ssid: string;
  password: string;
  last_connected: number;
}

const epochSeconds = () => Math.floor(Date.now() / 1000);

function toRecord(r: ConnectionRow): AccessPointRecord {
  return { identity: r.bssid, name: r.ssid, secret: r.password, lastSuccess: r.last_connected };
}

/**
 * Connection ledger — remembered access points and their credentials.
 *
 * Every operation is a single synchronous statement, so writes from the
 * recovery cycle and from a manual connect never interleave and a reader
 * never sees half a record. Nothing here is ever deleted.
 */
export class ConnectionLedger {
  private upsertStmt;
  private touchStmt;
  private secretStmt;
  private getStmt;
  private listStmt;

  constructor(db: Db, private now: () => number = epochSeconds) {
    this.upsertStmt = db.prepare<[string, string, string, number]>(
      'INSERT OR REPLACE INTO connections (bssid, ssid, password, last_connected) VALUES (?, ?, ?, ?)',
    );
    this.touchStmt = db.prepare<[number, string]>('UPDATE connections SET last_connected = ? WHERE bssid = ?');
    this.secretStmt = db.prepare<[string], Pick<ConnectionRow, 'password'>>('SELECT password FROM connections WHERE bssid = ?');
    this.getStmt = db.prepare<[string], ConnectionRow>('SELECT * FROM connections WHERE bssid = ?');
    this.listStmt = db.prepare<[], ConnectionRow>('SELECT * FROM connections ORDER BY last_connected DESC, bssid ASC');
  }

  upsert(identity: string, name: string, secret: string): AccessPointRecord {
    const record: AccessPointRecord = { identity: canonicalIdentity(identity), name, secret, lastSuccess: this.now() };
    this.guard('upsert', () => this.upsertStmt.run(record.identity, record.name, record.secret, record.lastSuccess));
    console.log(`💾 Saved access point ${record.name} (${record.identity})`);
    return { ...record };
  }

  /** Refreshes last-success for a known identity. Returns false when unknown. */
  touch(identity: string): boolean {
    const info = this.guard('touch', () => this.touchStmt.run(this.now(), canonicalIdentity(identity)));
    return info.changes > 0;
  }

  getSecret(identity: string): string | undefined {
    return this.guard('read', () => this.secretStmt.get(canonicalIdentity(identity)))?.password;
  }

  get(identity: string): AccessPointRecord | undefined {
    const row = this.guard('read', () => this.getStmt.get(canonicalIdentity(identity)));
    return row ? toRecord(row) : undefined;
  }

  /** Most recently used first. */
  listAll(): AccessPointRecord[] {
    return this.guard('list', () => this.listStmt.all()).map(toRecord);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new LedgerIOError(operation, describeError(err));
    }
  }
}

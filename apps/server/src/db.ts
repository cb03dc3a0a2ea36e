import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import net from 'net';
import { dirname } from 'path';
import { logger } from './logger.js';
import { RECORD_TYPES, isRecordType, type DnsRecord, type RecordType } from './types.js';

export type RecordDatabase = Database.Database;

interface DnsRecordRow {
  id: number;
  name: string;
  type: string;
  ipv4address: string | null;
  ipv6address: string | null;
  cname: string | null;
  priority: number | null;
}

/**
 * Opens (and creates when missing) the record database. `:memory:` gives a
 * private in-process database.
 */
export function openDatabase(path: string): RecordDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 1000');

  db.exec(`
    CREATE TABLE IF NOT EXISTS dns_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('${RECORD_TYPES.join("', '")}')),
      ipv4address TEXT,
      ipv6address TEXT,
      cname TEXT,
      priority INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_dns_records_name_type ON dns_records (name COLLATE NOCASE, type);
    CREATE INDEX IF NOT EXISTS idx_dns_records_ipv4 ON dns_records (ipv4address);
    CREATE INDEX IF NOT EXISTS idx_dns_records_ipv6 ON dns_records (ipv6address COLLATE NOCASE);
  `);

  logger.debug('Record database opened', { path });
  return db;
}

function rowToRecord(row: DnsRecordRow): DnsRecord | null {
  if (!row.name || !isRecordType(row.type)) {
    logger.warn('Skipping record with unusable name or type', { id: row.id, name: row.name, type: row.type });
    return null;
  }

  const record: DnsRecord = { id: row.id, name: row.name, type: row.type };
  if (row.ipv4address) record.ipv4Address = row.ipv4address;
  if (row.ipv6address) record.ipv6Address = row.ipv6address;
  if (row.cname) record.cname = row.cname;
  if (row.priority !== null) record.priority = row.priority;
  return record;
}

function toRecords(rows: DnsRecordRow[]): DnsRecord[] {
  const records: DnsRecord[] = [];
  for (const row of rows) {
    const record = rowToRecord(row);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Prepared queries over the `dns_records` table. Statements are prepared once;
 * better-sqlite3 runs them synchronously so concurrent queries never interleave.
 */
export function createRecordTable(db: RecordDatabase) {
  const byNameAndType = db.prepare<[string, string], DnsRecordRow>(
    'SELECT * FROM dns_records WHERE name = ? COLLATE NOCASE AND type = ? ORDER BY id ASC',
  );
  const byIPv4 = db.prepare<[string], DnsRecordRow>('SELECT * FROM dns_records WHERE ipv4address = ? ORDER BY id ASC');
  const all = db.prepare<[], DnsRecordRow>('SELECT * FROM dns_records ORDER BY name ASC, type ASC, id ASC');
  const insert = db.prepare<[string, string, string | null, string | null, string | null, number | null]>(`
    INSERT INTO dns_records (name, type, ipv4address, ipv6address, cname, priority)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const remove = db.prepare<[number]>('DELETE FROM dns_records WHERE id = ?');

  return {
    findByNameAndType(name: string, type: RecordType): DnsRecord[] {
      return toRecords(byNameAndType.all(name, type));
    },

    findByIPv4(address: string): DnsRecord[] {
      return toRecords(byIPv4.all(address));
    },

    /**
     * Matches the candidates against `ipv6address`. A dotted-quad candidate (the
     * IPv4 inside a mapped address) also matches `ipv4address`, and
     * `ipv6address` written in mixed notation (`::ffff:a.b.c.d`).
     */
    findByIPv6(candidates: readonly string[]): DnsRecord[] {
      if (candidates.length === 0) return [];
      const dottedQuads = candidates.filter((candidate) => net.isIPv4(candidate));
      const ipv6Forms = [...candidates, ...dottedQuads.map((quad) => `::ffff:${quad}`)];
      const inList = (values: readonly string[]) => values.map(() => '?').join(', ');

      let sql = `SELECT * FROM dns_records WHERE ipv6address COLLATE NOCASE IN (${inList(ipv6Forms)})`;
      if (dottedQuads.length > 0) {
        sql += ` OR ipv4address IN (${inList(dottedQuads)})`;
      }
      const stmt = db.prepare<string[], DnsRecordRow>(`${sql} ORDER BY id ASC`);
      return toRecords(stmt.all(...ipv6Forms, ...dottedQuads));
    },

    getAll(): DnsRecord[] {
      return toRecords(all.all());
    },

    add(record: Omit<DnsRecord, 'id'>): number {
      const result = insert.run(
        record.name.toLowerCase(),
        record.type,
        record.ipv4Address ?? null,
        record.ipv6Address ?? null,
        record.cname ?? null,
        record.priority ?? null,
      );
      return Number(result.lastInsertRowid);
    },

    remove(id: number): boolean {
      return remove.run(id).changes > 0;
    },

    ping(): void {
      db.prepare('SELECT 1').get();
    },
  };
}

export type RecordTable = ReturnType<typeof createRecordTable>;

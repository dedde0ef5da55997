import type { Db } from './database.js';

interface SettingRow {
  key: string;
  value: string;
}

export class SettingsService {
  constructor(private db: Db) {}

  getAll(): Record<string, unknown> {
    const rows = this.db.prepare<[], SettingRow>('SELECT key, value FROM settings').all();
    const result: Record<string, unknown> = {};
    for (const r of rows) result[r.key] = parseValue(r.value);
    return result;
  }

  get(key: string): unknown {
    const row = this.db.prepare<[string], Pick<SettingRow, 'value'>>('SELECT value FROM settings WHERE key = ?').get(key);
    if (!row) return undefined;
    return parseValue(row.value);
  }

  set(key: string, value: unknown): void {
    this.db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run(key, JSON.stringify(value));
  }

  delete(key: string): void {
    this.db.prepare('DELETE FROM settings WHERE key = ?').run(key);
  }
}

function parseValue(raw: string): unknown {
  try { return JSON.parse(raw); } catch { return raw; }
}

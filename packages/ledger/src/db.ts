import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

import { SCHEMA_SQL } from "./schema";

export type LedgerDatabase = Database.Database;

const IN_MEMORY = ":memory:";

export function openLedgerDatabase(dbPath: string = IN_MEMORY): LedgerDatabase {
  if (dbPath !== IN_MEMORY) {
    const dir = path.dirname(dbPath);
    if (dir && dir !== ".") {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
  return db;
}

/** Key/value rows in `ledger_state`, used for process-wide settings and counters. */
export class LedgerStateStore {
  constructor(private readonly db: LedgerDatabase) {}

  get(key: string): string | null {
    const row = this.db.prepare("SELECT value FROM ledger_state WHERE key = ?").get(key) as { value: string } | undefined;
    return row?.value ?? null;
  }

  set(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO ledger_state(key, value)
         VALUES(?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      )
      .run(key, value);
  }
}

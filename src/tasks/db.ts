import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

let dbSingleton: Database.Database | null = null;

/**
 * Open (or create) the task ledger and make it the process-wide handle.
 * `:memory:` is accepted for tests.
 */
export function openTasksDb(dbPath: string): Database.Database {
  closeTasksDb();

  if (dbPath !== ":memory:") {
    const dir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL lets the HTTP process read while a worker process writes
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  db.pragma("foreign_keys = ON");
  // Wait on a competing writer instead of failing with SQLITE_BUSY right away
  db.pragma("busy_timeout = 5000");
  db.pragma("temp_store = FILE");

  dbSingleton = db;
  return dbSingleton;
}

export function getTasksDb(): Database.Database {
  if (!dbSingleton) throw new Error("Task ledger is not open; call openTasksDb() first");
  return dbSingleton;
}

export function closeTasksDb(): void {
  if (dbSingleton) {
    dbSingleton.close();
    dbSingleton = null;
  }
}

/**
 * Run `fn` inside BEGIN IMMEDIATE. The RESERVED lock is taken up front, so two
 * writers can never both read "nothing there" and then both insert.
 */
export function inImmediateTransaction<T>(db: Database.Database, fn: () => T): T {
  db.exec("BEGIN IMMEDIATE");
  try {
    const out = fn();
    db.exec("COMMIT");
    return out;
  } catch (e) {
    // SQLite may already have rolled back on its own (e.g. SQLITE_FULL)
    if (db.inTransaction) db.exec("ROLLBACK");
    throw e;
  }
}

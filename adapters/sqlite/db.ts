import { readFileSync } from "fs";
import Database from "better-sqlite3";

export type DB = Database.Database;
export type Statement = Database.Statement;

/** Open a DB or accept an existing connection; apply migrations. */
export function openDb(dbOrPath: DB | string): DB {
  const db = typeof dbOrPath === "string" ? new Database(dbOrPath) : dbOrPath;
  if (typeof dbOrPath === "string") db.pragma("journal_mode = WAL");
  applyMigrations(db);
  return db;
}

function applyMigrations(db: DB): void {
  const sql = readFileSync(new URL("./migrations/001_init.sql", import.meta.url), "utf8");
  db.exec(sql);
}

import Database from "better-sqlite3"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { DDL } from "./schema"

export type JudgingDatabase = BetterSQLite3Database

/** Opens (or creates) a judging database and makes sure its tables exist. */
export function openDatabase(filename: string): { db: JudgingDatabase; sqlite: Database.Database } {
  const sqlite = new Database(filename)

  // Enable WAL mode for better concurrent read performance
  sqlite.pragma("journal_mode = WAL")
  // Wait up to 5s if DB is locked by another process
  sqlite.pragma("busy_timeout = 5000")
  // Enable foreign key enforcement
  sqlite.pragma("foreign_keys = ON")

  sqlite.exec(DDL)
  return { db: drizzle(sqlite), sqlite }
}

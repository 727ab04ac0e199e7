import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

/**
 * Open (or create) the bookkeeping database: exchange-rate cache,
 * reminder log and monthly history. Pass ':memory:' for a throwaway one.
 */
export function openDatabase(file: string): Db {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }
  const db = new Database(file);

  // Enable WAL mode for better performance
  db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS exchange_rates (
      currency TEXT PRIMARY KEY,
      rate REAL NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS notification_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      subscription_name TEXT NOT NULL,
      sent_date TEXT NOT NULL,
      days_remaining INTEGER NOT NULL,
      email_sent INTEGER NOT NULL DEFAULT 1
    )
  `);
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_notification_log_sent ON notification_log(sent_date, subscription_name)
  `);

  // One row per calendar month; re-recording a month replaces its row
  db.exec(`
    CREATE TABLE IF NOT EXISTS history (
      month TEXT PRIMARY KEY,
      date TEXT NOT NULL,
      subscription_count INTEGER NOT NULL,
      monthly_total REAL NOT NULL,
      yearly_estimate REAL NOT NULL,
      category_totals TEXT NOT NULL DEFAULT '{}'
    )
  `);

  return db;
}

// Row shapes as stored

export interface RateRow {
  currency: string;
  rate: number;
  updated_at: string;
}

export interface HistoryRow {
  month: string;
  date: string;
  subscription_count: number;
  monthly_total: number;
  yearly_estimate: number;
  category_totals: string;
}

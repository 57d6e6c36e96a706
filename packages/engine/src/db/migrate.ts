import type { DB } from './index.js';

export function migrate(db: DB): void {
  db.$client.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY,
      balance_date TEXT NOT NULL,
      monthly_budget_cents INTEGER NOT NULL DEFAULT 0,
      strategy TEXT NOT NULL DEFAULT 'avalanche' CHECK(strategy IN ('avalanche', 'snowball', 'entered', 'custom')),
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS debts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      creditor TEXT NOT NULL,
      balance_cents INTEGER NOT NULL,
      apr REAL NOT NULL,
      min_payment_cents INTEGER NOT NULL,
      custom_priority INTEGER,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_debts_position ON debts(position);

    CREATE TABLE IF NOT EXISTS schedule_overrides (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      month_index INTEGER NOT NULL UNIQUE,
      additional_amount_cents INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS payment_overrides (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      month_index INTEGER NOT NULL,
      debt_id INTEGER NOT NULL REFERENCES debts(id) ON DELETE CASCADE,
      amount_cents INTEGER NOT NULL,
      note TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS uix_payment_override_month_debt ON payment_overrides(month_index, debt_id);
  `);
}

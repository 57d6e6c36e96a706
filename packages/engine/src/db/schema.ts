import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { PAYOFF_STRATEGIES } from '../debt/types.js';

export const settings = sqliteTable('settings', {
  id: integer('id').primaryKey(),
  balanceDate: text('balance_date').notNull(),
  monthlyBudgetCents: integer('monthly_budget_cents').notNull().default(0),
  strategy: text('strategy', { enum: PAYOFF_STRATEGIES }).notNull().default('avalanche'),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export const debts = sqliteTable('debts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  creditor: text('creditor').notNull(),
  balanceCents: integer('balance_cents').notNull(),
  apr: real('apr').notNull(),
  minPaymentCents: integer('min_payment_cents').notNull(),
  customPriority: integer('custom_priority'),
  position: integer('position').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_debts_position').on(table.position),
]);

export const scheduleOverrides = sqliteTable('schedule_overrides', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  monthIndex: integer('month_index').notNull().unique(),
  additionalAmountCents: integer('additional_amount_cents').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export const paymentOverrides = sqliteTable('payment_overrides', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  monthIndex: integer('month_index').notNull(),
  debtId: integer('debt_id').notNull().references(() => debts.id, { onDelete: 'cascade' }),
  amountCents: integer('amount_cents').notNull(),
  note: text('note'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  uniqueIndex('uix_payment_override_month_debt').on(table.monthIndex, table.debtId),
]);

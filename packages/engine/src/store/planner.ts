import { asc, eq } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { debts, paymentOverrides, scheduleOverrides, settings } from '../db/schema.js';
import type {
  DebtInput,
  PaymentOverride,
  PlannerSettings,
  ScheduleOverride,
  SimulationResult,
  StrategyComparison,
} from '../debt/types.js';
import { runSimulation } from '../debt/simulator.js';
import { compareStrategies } from '../debt/analyzer.js';

export const SETTINGS_ID = 1;

function today(): string {
  return new Date().toISOString().split('T')[0];
}

/** Reads the single settings row, creating it with defaults the first time. */
export function getSettings(db: DB): PlannerSettings {
  const row =
    db.select().from(settings).where(eq(settings.id, SETTINGS_ID)).get() ??
    db.insert(settings).values({ id: SETTINGS_ID, balanceDate: today() }).returning().get();

  return {
    balanceDate: row.balanceDate,
    monthlyBudgetCents: row.monthlyBudgetCents,
    strategy: row.strategy,
  };
}

export function listDebts(db: DB): DebtInput[] {
  return db
    .select()
    .from(debts)
    .orderBy(asc(debts.position), asc(debts.id))
    .all()
    .map((row) => ({
      id: row.id,
      creditor: row.creditor,
      balanceCents: row.balanceCents,
      apr: row.apr,
      minPaymentCents: row.minPaymentCents,
      customPriority: row.customPriority,
      position: row.position,
    }));
}

export function listScheduleOverrides(db: DB): ScheduleOverride[] {
  return db
    .select({
      monthIndex: scheduleOverrides.monthIndex,
      additionalAmountCents: scheduleOverrides.additionalAmountCents,
    })
    .from(scheduleOverrides)
    .orderBy(asc(scheduleOverrides.monthIndex))
    .all();
}

export function listPaymentOverrides(db: DB, monthIndex?: number): PaymentOverride[] {
  const query = db
    .select({
      monthIndex: paymentOverrides.monthIndex,
      debtId: paymentOverrides.debtId,
      amountCents: paymentOverrides.amountCents,
      note: paymentOverrides.note,
    })
    .from(paymentOverrides)
    .where(monthIndex === undefined ? undefined : eq(paymentOverrides.monthIndex, monthIndex))
    .orderBy(asc(paymentOverrides.monthIndex), asc(paymentOverrides.debtId));

  return query.all();
}

export function simulateFromStore(db: DB): SimulationResult {
  return runSimulation(getSettings(db), listDebts(db), listScheduleOverrides(db), listPaymentOverrides(db));
}

export function compareFromStore(db: DB): StrategyComparison {
  return compareStrategies(getSettings(db), listDebts(db), listScheduleOverrides(db), listPaymentOverrides(db));
}

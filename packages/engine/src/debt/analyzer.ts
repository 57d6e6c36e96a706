import type {
  DebtInput,
  PaymentOverride,
  PlannerSettings,
  ScheduleOverride,
  StrategyComparison,
  StrategyOutcome,
} from './types.js';
import { PAYOFF_STRATEGIES } from './types.js';
import { runSimulation } from './simulator.js';
import { centsToString, subtractCents, toCents } from '../math/money.js';

/**
 * Runs the same inputs under every strategy. Outcomes are sorted by total interest, then by
 * months to debt freedom; the first one is recommended.
 */
export function compareStrategies(
  settings: PlannerSettings,
  debts: readonly DebtInput[],
  scheduleOverrides: readonly ScheduleOverride[],
  paymentOverrides: readonly PaymentOverride[] = [],
): StrategyComparison {
  const strategies: StrategyOutcome[] = PAYOFF_STRATEGIES.map((strategy) => ({
    strategy,
    totals: runSimulation({ ...settings, strategy }, debts, scheduleOverrides, paymentOverrides).totals,
  }));

  strategies.sort(
    (a, b) =>
      toCents(a.totals.totalInterest) - toCents(b.totals.totalInterest) ||
      a.totals.totalMonths - b.totals.totalMonths,
  );

  const best = strategies[0];
  const worst = strategies[strategies.length - 1];

  return {
    strategies,
    recommended: best.strategy,
    savingsVsWorst: centsToString(
      subtractCents(toCents(worst.totals.totalInterest), toCents(best.totals.totalInterest)),
    ),
  };
}

export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { settings, debts, scheduleOverrides, paymentOverrides } from './db/schema.js';
export { migrate } from './db/migrate.js';

export {
  quantize,
  toCents,
  centsToString,
  formatMoney,
  subtractCents,
  sumCents,
  monthlyInterestCents,
} from './math/money.js';
export { addMonths, monthLabel, isValidIsoDate } from './math/calendar.js';

export { PAYOFF_STRATEGIES } from './debt/types.js';
export type {
  PayoffStrategy,
  DebtInput,
  PlannerSettings,
  ScheduleOverride,
  PaymentOverride,
  DebtState,
  DebtAmounts,
  MonthRecord,
  DebtSummary,
  SimulationTotals,
  SimulationResult,
  StrategyOutcome,
  StrategyComparison,
} from './debt/types.js';
export { SimulationError, unknownStrategy, insufficientBudget, exceededMaxDuration } from './debt/errors.js';
export type { SimulationErrorCode } from './debt/errors.js';
export { orderDebts, isPayoffStrategy } from './debt/ordering.js';
export type { OrderableDebt } from './debt/ordering.js';
export { runSimulation, MAX_MONTHS } from './debt/simulator.js';
export { compareStrategies } from './debt/analyzer.js';

export {
  SETTINGS_ID,
  getSettings,
  listDebts,
  listScheduleOverrides,
  listPaymentOverrides,
  simulateFromStore,
  compareFromStore,
} from './store/planner.js';

export const PAYOFF_STRATEGIES = ['avalanche', 'snowball', 'entered', 'custom'] as const;

export type PayoffStrategy = (typeof PAYOFF_STRATEGIES)[number];

export interface DebtInput {
  id: number;
  creditor: string;
  balanceCents: number;
  /** Annual percentage rate, in percent (18.5 means 18.5%). */
  apr: number;
  minPaymentCents: number;
  /** Lower runs first under the custom strategy; null sorts after every prioritised debt. */
  customPriority?: number | null;
  position: number;
}

export interface PlannerSettings {
  /** `YYYY-MM-DD`, the date of the first simulated month. */
  balanceDate: string;
  monthlyBudgetCents: number;
  strategy: PayoffStrategy;
}

export interface ScheduleOverride {
  monthIndex: number;
  additionalAmountCents: number;
}

export interface PaymentOverride {
  monthIndex: number;
  debtId: number;
  amountCents: number;
  note?: string | null;
}

export interface DebtState {
  id: number;
  creditor: string;
  apr: number;
  minPaymentCents: number;
  customPriority: number | null;
  position: number;
  initialBalanceCents: number;
  balanceCents: number;
  interestPaidCents: number;
  payoffMonthIndex: number | null;
}

/** Keyed by debt id. Money values are fixed 2-decimal strings. */
export type DebtAmounts = Record<string, string>;

export interface MonthRecord {
  monthIndex: number;
  monthLabel: string;
  dateISO: string;
  interestAccrued: string;
  snowballAmount: string;
  additionalAmount: string;
  defaultPayments: DebtAmounts;
  payments: DebtAmounts;
  remainingBalances: DebtAmounts;
  warnings: string[];
}

export interface DebtSummary {
  id: number;
  creditor: string;
  initialBalance: string;
  interestPaid: string;
  monthsToPayoff: number;
  payoffMonthLabel: string | null;
}

export interface SimulationTotals {
  totalInterest: string;
  totalMonths: number;
  minPaymentsSum: string;
  minimumMonthlyPayment: string;
  initialSnowball: string;
}

export interface SimulationResult {
  months: MonthRecord[];
  debts: DebtSummary[];
  totals: SimulationTotals;
}

export interface StrategyOutcome {
  strategy: PayoffStrategy;
  totals: SimulationTotals;
}

export interface StrategyComparison {
  strategies: StrategyOutcome[];
  recommended: PayoffStrategy;
  savingsVsWorst: string;
}

import { PAYOFF_STRATEGIES, type PayoffStrategy } from './types.js';
import { unknownStrategy } from './errors.js';

export interface OrderableDebt {
  creditor: string;
  apr: number;
  balanceCents: number;
  customPriority?: number | null;
  position: number;
}

type Comparator = (a: OrderableDebt, b: OrderableDebt) => number;

const NO_PRIORITY = 9999;

function byCreditor(a: OrderableDebt, b: OrderableDebt): number {
  const left = a.creditor.toLowerCase();
  const right = b.creditor.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

const COMPARATORS: Record<PayoffStrategy, Comparator> = {
  avalanche: (a, b) => b.apr - a.apr || a.balanceCents - b.balanceCents || byCreditor(a, b),
  snowball: (a, b) => a.balanceCents - b.balanceCents || b.apr - a.apr || byCreditor(a, b),
  entered: (a, b) => a.position - b.position,
  custom: (a, b) =>
    (a.customPriority ?? NO_PRIORITY) - (b.customPriority ?? NO_PRIORITY) ||
    a.balanceCents - b.balanceCents ||
    byCreditor(a, b),
};

export function isPayoffStrategy(value: string): value is PayoffStrategy {
  return PAYOFF_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Returns a new array in payoff order. The sort is stable, so debts that tie on every key
 * keep their input order.
 */
export function orderDebts<T extends OrderableDebt>(strategy: string, debts: readonly T[]): T[] {
  if (!isPayoffStrategy(strategy)) {
    throw unknownStrategy(strategy);
  }
  return [...debts].sort(COMPARATORS[strategy]);
}

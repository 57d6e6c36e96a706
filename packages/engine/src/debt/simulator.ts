import type {
  DebtAmounts,
  DebtInput,
  DebtState,
  DebtSummary,
  MonthRecord,
  PaymentOverride,
  PlannerSettings,
  ScheduleOverride,
  SimulationResult,
} from './types.js';
import { orderDebts } from './ordering.js';
import { exceededMaxDuration, insufficientBudget } from './errors.js';
import { centsToString, monthlyInterestCents, sumCents } from '../math/money.js';
import { addMonths, monthLabel } from '../math/calendar.js';

export const MAX_MONTHS = 600;

function emptyResult(): SimulationResult {
  return {
    months: [],
    debts: [],
    totals: {
      totalInterest: '0.00',
      totalMonths: 0,
      minPaymentsSum: '0.00',
      minimumMonthlyPayment: '0.00',
      initialSnowball: '0.00',
    },
  };
}

function toDebtState(debt: DebtInput): DebtState {
  return {
    id: debt.id,
    creditor: debt.creditor,
    apr: debt.apr,
    minPaymentCents: debt.minPaymentCents,
    customPriority: debt.customPriority ?? null,
    position: debt.position,
    initialBalanceCents: debt.balanceCents,
    balanceCents: debt.balanceCents,
    interestPaidCents: 0,
    payoffMonthIndex: null,
  };
}

function indexPaymentOverrides(overrides: readonly PaymentOverride[]): Map<number, Map<number, number>> {
  const byMonth = new Map<number, Map<number, number>>();
  for (const override of overrides) {
    if (override.amountCents < 0) continue;
    const month = byMonth.get(override.monthIndex) ?? new Map<number, number>();
    month.set(override.debtId, override.amountCents);
    byMonth.set(override.monthIndex, month);
  }
  return byMonth;
}

function toAmounts(amounts: Map<number, number>): DebtAmounts {
  const result: DebtAmounts = {};
  for (const [debtId, cents] of amounts) {
    result[String(debtId)] = centsToString(cents);
  }
  return result;
}

export function runSimulation(
  settings: PlannerSettings,
  debts: readonly DebtInput[],
  scheduleOverrides: readonly ScheduleOverride[],
  paymentOverrides: readonly PaymentOverride[] = [],
): SimulationResult {
  // Fresh mutable state per run
  const states = debts.map(toDebtState);

  if (states.length === 0) {
    return emptyResult();
  }

  const minPaymentsSum = sumCents(states.map((d) => d.minPaymentCents));
  const budget = settings.monthlyBudgetCents;
  if (budget < minPaymentsSum) {
    throw insufficientBudget();
  }

  const additionalByMonth = new Map(
    scheduleOverrides.map((o) => [o.monthIndex, o.additionalAmountCents] as const),
  );
  const overridesByMonth = indexPaymentOverrides(paymentOverrides);

  const strategy = settings.strategy;
  const initialOrder = orderDebts(strategy, states).map((d) => d.id);
  const initialSnowball = Math.max(budget - minPaymentsSum, 0);

  const months: MonthRecord[] = [];
  let freedMinimums = 0;
  let totalInterest = 0;
  let monthIndex = 1;

  while (states.some((d) => d.balanceCents > 0)) {
    if (monthIndex > MAX_MONTHS) {
      throw exceededMaxDuration(MAX_MONTHS);
    }

    const ordered = orderDebts(strategy, states);
    const date = addMonths(settings.balanceDate, monthIndex - 1);

    // a. Accrue interest
    let interestAccrued = 0;
    for (const debt of ordered) {
      if (debt.balanceCents <= 0) continue;
      const interest = monthlyInterestCents(debt.balanceCents, debt.apr);
      debt.balanceCents += interest;
      debt.interestPaidCents += interest;
      interestAccrued += interest;
    }
    totalInterest += interestAccrued;

    // Post-interest balances cap this month's payment overrides
    const ceilings = new Map(states.map((d) => [d.id, d.balanceCents] as const));

    const additionalAmount = additionalByMonth.get(monthIndex) ?? 0;
    const snowballAmount = initialSnowball + freedMinimums + additionalAmount;
    const payments = new Map<number, number>(states.map((d) => [d.id, 0]));

    // b. Minimum payments; the unused part of a minimum joins the surplus
    let surplus = 0;
    for (const debt of ordered) {
      if (debt.balanceCents <= 0) continue;
      const payment = Math.min(debt.minPaymentCents, debt.balanceCents);
      debt.balanceCents -= payment;
      payments.set(debt.id, (payments.get(debt.id) ?? 0) + payment);
      surplus += debt.minPaymentCents - payment;
    }

    // c. Walk the order with what is left
    let remaining = snowballAmount + surplus;
    for (const debt of ordered) {
      if (remaining <= 0) break;
      if (debt.balanceCents <= 0) continue;
      const payment = Math.min(remaining, debt.balanceCents);
      debt.balanceCents -= payment;
      payments.set(debt.id, (payments.get(debt.id) ?? 0) + payment);
      remaining -= payment;
    }

    // d. Payment overrides replace the computed amount, capped at the post-interest balance
    const finalPayments = new Map(payments);
    const warnings: string[] = [];
    for (const [debtId, amount] of overridesByMonth.get(monthIndex) ?? []) {
      if (!finalPayments.has(debtId)) continue;
      const ceiling = ceilings.get(debtId) ?? 0;
      if (amount > ceiling) {
        warnings.push(`Override for debt ${debtId} capped at remaining balance.`);
      }
      finalPayments.set(debtId, Math.min(amount, ceiling));
    }

    const totalDefault = sumCents([...payments.values()]);
    const totalFinal = sumCents([...finalPayments.values()]);
    if (totalFinal > totalDefault) {
      warnings.push(
        `Overrides require more funds than available; need an additional $${centsToString(totalFinal - totalDefault)}.`,
      );
    } else if (totalFinal < totalDefault) {
      warnings.push('Overrides reduced payments; remaining budget left unallocated.');
    }

    // e. Settle balances, close debts that reached zero
    let newlyFreed = 0;
    for (const debt of states) {
      const ceiling = ceilings.get(debt.id) ?? 0;
      debt.balanceCents = Math.max(0, ceiling - (finalPayments.get(debt.id) ?? 0));
      if (debt.balanceCents === 0 && debt.payoffMonthIndex === null) {
        debt.payoffMonthIndex = monthIndex;
        newlyFreed += debt.minPaymentCents;
      }
    }

    months.push({
      monthIndex,
      monthLabel: monthLabel(date),
      dateISO: date,
      interestAccrued: centsToString(interestAccrued),
      snowballAmount: centsToString(snowballAmount),
      additionalAmount: centsToString(additionalAmount),
      defaultPayments: toAmounts(payments),
      payments: toAmounts(finalPayments),
      remainingBalances: toAmounts(new Map(states.map((d) => [d.id, d.balanceCents] as const))),
      warnings,
    });

    freedMinimums += newlyFreed;
    monthIndex++;
  }

  const totalMonths = monthIndex - 1;
  const byId = new Map(states.map((d) => [d.id, d] as const));

  const debtSummaries: DebtSummary[] = [];
  for (const debtId of initialOrder) {
    const debt = byId.get(debtId);
    if (!debt) continue;
    const payoffIndex = debt.payoffMonthIndex;
    debtSummaries.push({
      id: debt.id,
      creditor: debt.creditor,
      initialBalance: centsToString(debt.initialBalanceCents),
      interestPaid: centsToString(debt.interestPaidCents),
      monthsToPayoff: payoffIndex ?? totalMonths,
      payoffMonthLabel:
        payoffIndex === null ? null : monthLabel(addMonths(settings.balanceDate, payoffIndex - 1)),
    });
  }

  return {
    months,
    debts: debtSummaries,
    totals: {
      totalInterest: centsToString(totalInterest),
      totalMonths,
      minPaymentsSum: centsToString(minPaymentsSum),
      minimumMonthlyPayment: centsToString(minPaymentsSum),
      initialSnowball: centsToString(initialSnowball),
    },
  };
}

import { describe, it, expect, beforeEach } from 'vitest';
import { api, createTestApp, type App } from './helpers.js';

const SETTINGS = { balanceDate: '2024-01-01', monthlyBudget: '200.00', strategy: 'avalanche' };

const DEBTS = [
  { id: 1, creditor: 'Loan A', balance: '100.00', apr: 12, minimumPayment: '50.00' },
  { id: 2, creditor: 'Loan B', balance: '200.00', apr: 6, minimumPayment: '25.00' },
];

const TOTALS = {
  totalInterest: '2.51',
  totalMonths: 2,
  minPaymentsSum: '75.00',
  minimumMonthlyPayment: '75.00',
  initialSnowball: '125.00',
};

describe('Simulation API', () => {
  let app: App;

  beforeEach(async () => {
    app = createTestApp();
    await api(app, 'PUT', '/api/v1/settings', SETTINGS);
    for (const { id: _id, ...debt } of DEBTS) {
      await api(app, 'POST', '/api/v1/debts', debt);
    }
  });

  it('GET /api/v1/simulation runs the stored plan', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/simulation');
    expect(status).toBe(200);
    expect(data).toEqual({
      months: [
        {
          monthIndex: 1,
          monthLabel: 'Jan 2024',
          dateISO: '2024-01-01',
          interestAccrued: '2.00',
          snowballAmount: '125.00',
          additionalAmount: '0.00',
          defaultPayments: { '1': '101.00', '2': '99.00' },
          payments: { '1': '101.00', '2': '99.00' },
          remainingBalances: { '1': '0.00', '2': '102.00' },
          warnings: [],
        },
        {
          monthIndex: 2,
          monthLabel: 'Feb 2024',
          dateISO: '2024-02-01',
          interestAccrued: '0.51',
          snowballAmount: '175.00',
          additionalAmount: '0.00',
          defaultPayments: { '1': '0.00', '2': '102.51' },
          payments: { '1': '0.00', '2': '102.51' },
          remainingBalances: { '1': '0.00', '2': '0.00' },
          warnings: [],
        },
      ],
      debts: [
        {
          id: 1,
          creditor: 'Loan A',
          initialBalance: '100.00',
          interestPaid: '1.00',
          monthsToPayoff: 1,
          payoffMonthLabel: 'Jan 2024',
        },
        {
          id: 2,
          creditor: 'Loan B',
          initialBalance: '200.00',
          interestPaid: '1.51',
          monthsToPayoff: 2,
          payoffMonthLabel: 'Feb 2024',
        },
      ],
      totals: TOTALS,
    });
  });

  it('GET /api/v1/simulation returns an empty result without debts', async () => {
    await api(app, 'DELETE', '/api/v1/debts/1');
    await api(app, 'DELETE', '/api/v1/debts/2');

    const { status, data } = await api(app, 'GET', '/api/v1/simulation');
    expect(status).toBe(200);
    expect(data).toEqual({
      months: [],
      debts: [],
      totals: {
        totalInterest: '0.00',
        totalMonths: 0,
        minPaymentsSum: '0.00',
        minimumMonthlyPayment: '0.00',
        initialSnowball: '0.00',
      },
    });
  });

  it('GET /api/v1/simulation applies stored payment overrides', async () => {
    await api(app, 'PUT', '/api/v1/payment-overrides/bulk', {
      monthIndex: 1,
      overrides: [{ debtId: 2, amount: 0, note: 'skip' }],
    });

    const { data } = await api(app, 'GET', '/api/v1/simulation');
    expect(data).toMatchObject({
      months: [
        {
          defaultPayments: { '1': '101.00', '2': '99.00' },
          payments: { '1': '101.00', '2': '0.00' },
          remainingBalances: { '1': '0.00', '2': '201.00' },
          warnings: ['Overrides reduced payments; remaining budget left unallocated.'],
        },
        { monthIndex: 2 },
        { monthIndex: 3 },
      ],
      totals: { totalInterest: '3.02', totalMonths: 3 },
    });
  });

  it('GET /api/v1/simulation reports an insufficient budget', async () => {
    await api(app, 'PUT', '/api/v1/settings', { monthlyBudget: 50 });

    const { status, data } = await api(app, 'GET', '/api/v1/simulation');
    expect(status).toBe(400);
    expect(data).toEqual({
      error: {
        code: 'INSUFFICIENT_BUDGET',
        message: 'Monthly budget is less than sum of minimum payments. Increase the budget.',
        suggestion: 'Raise monthlyBudget to at least the sum of minimum payments',
      },
    });
  });

  it('GET /api/v1/simulation reports a plan that never finishes', async () => {
    await api(app, 'PUT', '/api/v1/debts/2', { balance: 100000, apr: 24, minimumPayment: 25 });
    await api(app, 'PUT', '/api/v1/settings', { monthlyBudget: 75 });

    const { status, data } = await api(app, 'GET', '/api/v1/simulation');
    expect(status).toBe(400);
    expect(data).toMatchObject({
      error: { code: 'EXCEEDED_MAX_DURATION', message: 'Simulation exceeded 600 months. Check inputs.' },
    });
  });

  it('GET /api/v1/simulation/compare ranks every strategy', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/simulation/compare');
    expect(status).toBe(200);
    expect(data).toEqual({
      strategies: [
        { strategy: 'avalanche', totals: TOTALS },
        { strategy: 'snowball', totals: TOTALS },
        { strategy: 'entered', totals: TOTALS },
        { strategy: 'custom', totals: TOTALS },
      ],
      recommended: 'avalanche',
      savingsVsWorst: '0.00',
    });
  });

  it('POST /api/v1/simulation runs a plan given in the body', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulation', {
      settings: SETTINGS,
      debts: DEBTS,
      scheduleOverrides: [{ monthIndex: 1, additionalAmount: 50 }],
    });
    expect(status).toBe(200);
    expect(data).toMatchObject({
      months: [
        {
          snowballAmount: '175.00',
          additionalAmount: '50.00',
          payments: { '1': '101.00', '2': '149.00' },
          remainingBalances: { '1': '0.00', '2': '52.00' },
        },
        {
          interestAccrued: '0.26',
          additionalAmount: '0.00',
          payments: { '1': '0.00', '2': '52.26' },
        },
      ],
      totals: { totalInterest: '2.26', totalMonths: 2 },
    });
  });

  it('POST /api/v1/simulation follows custom priorities', async () => {
    const { data } = await api(app, 'POST', '/api/v1/simulation', {
      settings: { ...SETTINGS, strategy: 'custom' },
      debts: [DEBTS[0], { ...DEBTS[1], customPriority: 1 }],
    });
    expect(data).toMatchObject({
      debts: [{ id: 2 }, { id: 1 }],
    });
  });

  it('POST /api/v1/simulation ignores payment overrides for unknown debts', async () => {
    const { data } = await api(app, 'POST', '/api/v1/simulation', {
      settings: SETTINGS,
      debts: DEBTS,
      paymentOverrides: [{ monthIndex: 1, debtId: 99, amount: 10 }],
    });
    expect(data).toMatchObject({ months: [{ warnings: [] }, { warnings: [] }], totals: TOTALS });
  });

  it('POST /api/v1/simulation rejects an unknown strategy', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulation', {
      settings: { ...SETTINGS, strategy: 'fastest' },
      debts: DEBTS,
    });
    expect(status).toBe(400);
    expect(data).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('POST /api/v1/simulation rejects repeated debt ids', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulation', {
      settings: { ...SETTINGS, monthlyBudget: '100.00' },
      debts: [
        { id: 1, creditor: 'Small', balance: '10.00', apr: 0, minimumPayment: '10.00' },
        { id: 1, creditor: 'Big', balance: '1000.00', apr: 0, minimumPayment: '10.00' },
      ],
    });
    expect(status).toBe(400);
    expect(data).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'debts: Duplicate debt id provided',
        suggestion: 'Check request body',
      },
    });
  });

  it('POST /api/v1/simulation rejects a missing debts list', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulation', { settings: SETTINGS });
    expect(status).toBe(400);
    expect(data).toMatchObject({ error: { message: 'debts: Required' } });
  });
});

import { Hono } from 'hono';
import { z } from 'zod';
import {
  type DB,
  type DebtInput,
  runSimulation,
  simulateFromStore,
  compareFromStore,
} from '@payoff-planner/engine';
import { validationError } from '../errors.js';
import { isoDateSchema, issuesMessage, nonNegativeMoneySchema, strategySchema } from '../schemas.js';

const debtSchema = z.object({
  id: z.number().int().positive(),
  creditor: z.string().min(1),
  balance: nonNegativeMoneySchema,
  apr: z.number().finite().min(0),
  minimumPayment: nonNegativeMoneySchema,
  customPriority: z.number().int().nullable().optional(),
  position: z.number().int().optional(),
});

const simulationRequestSchema = z.object({
  settings: z.object({
    balanceDate: isoDateSchema,
    monthlyBudget: nonNegativeMoneySchema,
    strategy: strategySchema,
  }),
  debts: z
    .array(debtSchema)
    .max(100)
    .refine((debts) => new Set(debts.map((d) => d.id)).size === debts.length, 'Duplicate debt id provided'),
  scheduleOverrides: z
    .array(
      z.object({
        monthIndex: z.number().int().min(1),
        additionalAmount: nonNegativeMoneySchema,
      }),
    )
    .default([]),
  paymentOverrides: z
    .array(
      z.object({
        monthIndex: z.number().int().min(1),
        debtId: z.number().int().positive(),
        amount: nonNegativeMoneySchema,
        note: z.string().nullable().optional(),
      }),
    )
    .default([]),
});

function toDebtInputs(debts: z.infer<typeof debtSchema>[]): DebtInput[] {
  return debts.map((d, index) => ({
    id: d.id,
    creditor: d.creditor,
    balanceCents: d.balance,
    apr: d.apr,
    minPaymentCents: d.minimumPayment,
    customPriority: d.customPriority ?? null,
    position: d.position ?? index,
  }));
}

export function simulationRoutes(db: DB) {
  const router = new Hono();

  // GET /: schedule for the stored plan
  router.get('/', (c) => c.json(simulateFromStore(db)));

  // GET /compare: stored plan under every strategy
  router.get('/compare', (c) => c.json(compareFromStore(db)));

  // POST /: schedule for a plan given in the body
  router.post('/', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = simulationRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    const { settings, debts, scheduleOverrides, paymentOverrides } = parsed.data;
    const result = runSimulation(
      {
        balanceDate: settings.balanceDate,
        monthlyBudgetCents: settings.monthlyBudget,
        strategy: settings.strategy,
      },
      toDebtInputs(debts),
      scheduleOverrides.map((o) => ({ monthIndex: o.monthIndex, additionalAmountCents: o.additionalAmount })),
      paymentOverrides.map((o) => ({
        monthIndex: o.monthIndex,
        debtId: o.debtId,
        amountCents: o.amount,
        note: o.note,
      })),
    );

    return c.json(result);
  });

  return router;
}

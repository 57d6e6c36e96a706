import { Hono } from 'hono';
import { z } from 'zod';
import { and, eq, inArray } from 'drizzle-orm';
import {
  type DB,
  debts,
  paymentOverrides,
  listPaymentOverrides,
  centsToString,
  formatMoney,
} from '@payoff-planner/engine';
import { AppError, validationError } from '../errors.js';
import { idParamSchema, issuesMessage, monthIndexSchema, nonNegativeMoneySchema } from '../schemas.js';

const overrideEntrySchema = z.object({
  debtId: z.number().int().positive('debtId must be > 0'),
  amount: nonNegativeMoneySchema,
  note: z
    .string()
    .nullable()
    .optional()
    .transform((note) => note?.slice(0, 255) ?? null),
});

const bulkUpsertSchema = z.object({
  monthIndex: z.number().int().min(1, 'monthIndex must be >= 1'),
  overrides: z.array(overrideEntrySchema).default([]),
});

export function paymentOverrideRoutes(db: DB) {
  const router = new Hono();

  // GET /?monthIndex=n
  router.get('/', (c) => {
    const raw = c.req.query('monthIndex');
    let monthIndex: number | undefined;
    if (raw !== undefined) {
      const parsed = monthIndexSchema.safeParse(raw);
      if (!parsed.success) {
        throw validationError('monthIndex must be a positive integer');
      }
      monthIndex = parsed.data;
    }

    const overrides = listPaymentOverrides(db, monthIndex).map((o) => ({
      monthIndex: o.monthIndex,
      debtId: o.debtId,
      amount: centsToString(o.amountCents),
      amountFormatted: formatMoney(o.amountCents),
      note: o.note ?? null,
    }));
    return c.json(overrides);
  });

  // PUT /bulk: replaces every override of one month
  router.put('/bulk', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = bulkUpsertSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    const { monthIndex, overrides } = parsed.data;
    const debtIds = overrides.map((o) => o.debtId);
    if (new Set(debtIds).size !== debtIds.length) {
      throw validationError('Duplicate debtId provided for month');
    }

    if (debtIds.length > 0) {
      const known = new Set(
        db.select({ id: debts.id }).from(debts).where(inArray(debts.id, debtIds)).all().map((row) => row.id),
      );
      const missing = debtIds.filter((id) => !known.has(id));
      if (missing.length > 0) {
        throw validationError(`Unknown debt ids: ${missing.join(', ')}`);
      }
    }

    db.transaction((tx) => {
      tx.delete(paymentOverrides).where(eq(paymentOverrides.monthIndex, monthIndex)).run();
      for (const override of overrides) {
        tx.insert(paymentOverrides)
          .values({
            monthIndex,
            debtId: override.debtId,
            amountCents: override.amount,
            note: override.note,
          })
          .run();
      }
    });

    return c.body(null, 204);
  });

  // DELETE /:monthIndex/:debtId
  router.delete('/:monthIndex/:debtId', (c) => {
    const month = monthIndexSchema.safeParse(c.req.param('monthIndex'));
    const debt = idParamSchema.safeParse(c.req.param('debtId'));
    if (!month.success || !debt.success) {
      throw validationError('monthIndex must be >= 1 and debtId must be > 0');
    }

    const where = and(eq(paymentOverrides.monthIndex, month.data), eq(paymentOverrides.debtId, debt.data));
    const existing = db.select().from(paymentOverrides).where(where).get();
    if (!existing) {
      throw new AppError(
        'NOT_FOUND',
        `Payment override for month ${month.data} and debt ${debt.data} not found`,
        404,
        'Use GET /api/v1/payment-overrides to list overrides',
      );
    }

    db.delete(paymentOverrides).where(where).run();
    return c.body(null, 204);
  });

  return router;
}

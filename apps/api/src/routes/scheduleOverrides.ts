import { Hono } from 'hono';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import {
  type DB,
  scheduleOverrides,
  listScheduleOverrides,
  centsToString,
  formatMoney,
} from '@payoff-planner/engine';
import { validationError } from '../errors.js';
import { issuesMessage, monthIndexSchema, nonNegativeMoneySchema } from '../schemas.js';

const upsertOverrideSchema = z.object({
  additionalAmount: nonNegativeMoneySchema.default(0),
});

export function scheduleOverrideRoutes(db: DB) {
  const router = new Hono();

  // GET /: list by month
  router.get('/', (c) => {
    const overrides = listScheduleOverrides(db).map((o) => ({
      monthIndex: o.monthIndex,
      additionalAmount: centsToString(o.additionalAmountCents),
      additionalAmountFormatted: formatMoney(o.additionalAmountCents),
    }));
    return c.json(overrides);
  });

  // PUT /:monthIndex: a zero amount removes the override
  router.put('/:monthIndex', async (c) => {
    const month = monthIndexSchema.safeParse(c.req.param('monthIndex'));
    if (!month.success) {
      throw validationError(issuesMessage(month.error));
    }

    const body = await c.req.json().catch(() => null);
    const parsed = upsertOverrideSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    const monthIndex = month.data;
    const amountCents = parsed.data.additionalAmount;

    if (amountCents === 0) {
      db.delete(scheduleOverrides).where(eq(scheduleOverrides.monthIndex, monthIndex)).run();
    } else {
      db.insert(scheduleOverrides)
        .values({ monthIndex, additionalAmountCents: amountCents })
        .onConflictDoUpdate({
          target: scheduleOverrides.monthIndex,
          set: { additionalAmountCents: amountCents, updatedAt: new Date().toISOString() },
        })
        .run();
    }

    return c.body(null, 204);
  });

  return router;
}

import { Hono } from 'hono';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import {
  type DB,
  type PlannerSettings,
  settings,
  getSettings,
  centsToString,
  formatMoney,
  SETTINGS_ID,
} from '@payoff-planner/engine';
import { validationError } from '../errors.js';
import { isoDateSchema, issuesMessage, nonNegativeMoneySchema, strategySchema } from '../schemas.js';

const updateSettingsSchema = z.object({
  balanceDate: isoDateSchema.optional(),
  monthlyBudget: nonNegativeMoneySchema.optional(),
  strategy: strategySchema.optional(),
});

function formatSettings(current: PlannerSettings) {
  return {
    balanceDate: current.balanceDate,
    monthlyBudget: centsToString(current.monthlyBudgetCents),
    monthlyBudgetFormatted: formatMoney(current.monthlyBudgetCents),
    strategy: current.strategy,
  };
}

export function settingsRoutes(db: DB) {
  const router = new Hono();

  // GET /: current settings
  router.get('/', (c) => c.json(formatSettings(getSettings(db))));

  // PUT /: partial update
  router.put('/', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = updateSettingsSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    // ensure the row exists
    getSettings(db);

    const { balanceDate, monthlyBudget, strategy } = parsed.data;
    db.update(settings)
      .set({
        balanceDate,
        monthlyBudgetCents: monthlyBudget,
        strategy,
        updatedAt: new Date().toISOString(),
      })
      .where(eq(settings.id, SETTINGS_ID))
      .run();

    return c.json(formatSettings(getSettings(db)));
  });

  return router;
}

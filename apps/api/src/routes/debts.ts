import { Hono } from 'hono';
import { z } from 'zod';
import { desc, eq } from 'drizzle-orm';
import { type DB, debts, centsToString, formatMoney } from '@payoff-planner/engine';
import { notFound, validationError } from '../errors.js';
import { idParamSchema, issuesMessage, nonNegativeMoneySchema } from '../schemas.js';

const createDebtSchema = z.object({
  creditor: z.string().trim().min(1).max(100),
  balance: nonNegativeMoneySchema,
  apr: z.number().finite().min(0),
  minimumPayment: nonNegativeMoneySchema,
  customPriority: z.number().int().nullable().optional(),
});

const updateDebtSchema = createDebtSchema.partial();

const reorderSchema = z.object({
  idsInOrder: z.array(z.number().int()),
});

function formatDebt(debt: typeof debts.$inferSelect) {
  return {
    id: debt.id,
    creditor: debt.creditor,
    balance: centsToString(debt.balanceCents),
    balanceFormatted: formatMoney(debt.balanceCents),
    apr: debt.apr,
    minimumPayment: centsToString(debt.minPaymentCents),
    minimumPaymentFormatted: formatMoney(debt.minPaymentCents),
    customPriority: debt.customPriority,
    position: debt.position,
  };
}

function parseId(raw: string): number {
  const parsed = idParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw validationError('Debt id must be a positive integer');
  }
  return parsed.data;
}

export function debtRoutes(db: DB) {
  const router = new Hono();

  // GET /: list in entry order
  router.get('/', (c) => {
    const rows = db.select().from(debts).orderBy(debts.position, debts.id).all();
    return c.json(rows.map(formatDebt));
  });

  // POST /: create debt at the end of the list
  router.post('/', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = createDebtSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    const last = db.select({ position: debts.position }).from(debts).orderBy(desc(debts.position)).limit(1).get();
    const data = parsed.data;
    const created = db
      .insert(debts)
      .values({
        creditor: data.creditor,
        balanceCents: data.balance,
        apr: data.apr,
        minPaymentCents: data.minimumPayment,
        customPriority: data.customPriority ?? null,
        position: (last?.position ?? 0) + 1,
      })
      .returning()
      .get();

    return c.json(formatDebt(created), 201);
  });

  // POST /reorder: positions follow idsInOrder; unknown ids are skipped
  router.post('/reorder', async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = reorderSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError('idsInOrder must be a list of debt ids');
    }

    db.transaction((tx) => {
      parsed.data.idsInOrder.forEach((id, position) => {
        tx.update(debts).set({ position, updatedAt: new Date().toISOString() }).where(eq(debts.id, id)).run();
      });
    });

    return c.body(null, 204);
  });

  // GET /:id: single debt
  router.get('/:id', (c) => {
    const id = parseId(c.req.param('id'));
    const debt = db.select().from(debts).where(eq(debts.id, id)).get();
    if (!debt) throw notFound('Debt', id);
    return c.json(formatDebt(debt));
  });

  // PUT /:id: partial update
  router.put('/:id', async (c) => {
    const id = parseId(c.req.param('id'));
    const debt = db.select().from(debts).where(eq(debts.id, id)).get();
    if (!debt) throw notFound('Debt', id);

    const body = await c.req.json().catch(() => null);
    const parsed = updateDebtSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(issuesMessage(parsed.error));
    }

    const data = parsed.data;
    db.update(debts)
      .set({
        creditor: data.creditor,
        balanceCents: data.balance,
        apr: data.apr,
        minPaymentCents: data.minimumPayment,
        customPriority: data.customPriority,
        updatedAt: new Date().toISOString(),
      })
      .where(eq(debts.id, id))
      .run();

    const updated = db.select().from(debts).where(eq(debts.id, id)).get();
    if (!updated) throw notFound('Debt', id);
    return c.json(formatDebt(updated));
  });

  // DELETE /:id: payment overrides for the debt cascade
  router.delete('/:id', (c) => {
    const id = parseId(c.req.param('id'));
    const debt = db.select().from(debts).where(eq(debts.id, id)).get();
    if (!debt) throw notFound('Debt', id);

    db.delete(debts).where(eq(debts.id, id)).run();
    return c.body(null, 204);
  });

  return router;
}

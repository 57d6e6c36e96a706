import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { SimulationError, type DB } from '@payoff-planner/engine';
import { settingsRoutes } from './routes/settings.js';
import { debtRoutes } from './routes/debts.js';
import { scheduleOverrideRoutes } from './routes/scheduleOverrides.js';
import { paymentOverrideRoutes } from './routes/paymentOverrides.js';
import { simulationRoutes } from './routes/simulation.js';
import { AppError, simulationFailed } from './errors.js';

export const API_VERSION = '0.1.0';

function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof SimulationError) return simulationFailed(err);
  console.error(err);
  return new AppError('INTERNAL_ERROR', err.message, 500, 'Check server logs');
}

export function createApp(db: DB) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    const appError = toAppError(err);
    return c.json(
      {
        error: {
          code: appError.code,
          message: appError.message,
          suggestion: appError.suggestion,
        },
      },
      appError.status,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: API_VERSION }));

  app.route('/api/v1/settings', settingsRoutes(db));
  app.route('/api/v1/debts', debtRoutes(db));
  app.route('/api/v1/schedule-overrides', scheduleOverrideRoutes(db));
  app.route('/api/v1/payment-overrides', paymentOverrideRoutes(db));
  app.route('/api/v1/simulation', simulationRoutes(db));

  return app;
}

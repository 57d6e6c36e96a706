import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { SimulationError, SimulationErrorCode } from '@payoff-planner/engine';

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ContentfulStatusCode = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (entity: string, id: string | number) =>
  new AppError(
    'NOT_FOUND',
    `${entity} '${id}' not found`,
    404,
    `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
  );

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

const SIMULATION_SUGGESTIONS: Record<SimulationErrorCode, string> = {
  UNKNOWN_STRATEGY: 'Use one of: avalanche, snowball, entered, custom',
  INSUFFICIENT_BUDGET: 'Raise monthlyBudget to at least the sum of minimum payments',
  EXCEEDED_MAX_DURATION: 'Raise monthlyBudget or minimum payments above the monthly interest',
};

export const simulationFailed = (err: SimulationError) =>
  new AppError(err.code, err.message, 400, SIMULATION_SUGGESTIONS[err.code]);

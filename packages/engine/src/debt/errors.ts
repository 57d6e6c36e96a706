export type SimulationErrorCode = 'UNKNOWN_STRATEGY' | 'INSUFFICIENT_BUDGET' | 'EXCEEDED_MAX_DURATION';

export class SimulationError extends Error {
  constructor(
    public readonly code: SimulationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

export const unknownStrategy = (strategy: string) =>
  new SimulationError('UNKNOWN_STRATEGY', `Unknown strategy '${strategy}'`);

export const insufficientBudget = () =>
  new SimulationError(
    'INSUFFICIENT_BUDGET',
    'Monthly budget is less than sum of minimum payments. Increase the budget.',
  );

export const exceededMaxDuration = (maxMonths: number) =>
  new SimulationError('EXCEEDED_MAX_DURATION', `Simulation exceeded ${maxMonths} months. Check inputs.`);

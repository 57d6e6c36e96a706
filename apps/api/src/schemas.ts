import { z } from 'zod';
import { PAYOFF_STRATEGIES, isValidIsoDate, toCents } from '@payoff-planner/engine';

/** A number or decimal string, quantized to cents. */
export const moneySchema = z
  .union([z.number().finite(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Amount must be a decimal number')])
  .transform((value) => toCents(value))
  .refine(Number.isSafeInteger, 'Amount is too large');

export const nonNegativeMoneySchema = moneySchema.refine((cents) => cents >= 0, 'Amount must be >= 0');

export const isoDateSchema = z.string().refine(isValidIsoDate, 'Date must be a valid YYYY-MM-DD date');

export const strategySchema = z.enum(PAYOFF_STRATEGIES);

export const idParamSchema = z.coerce.number().int().positive();

export const monthIndexSchema = z.coerce.number().int().min(1, 'monthIndex must be >= 1');

export function issuesMessage(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}

import Decimal from 'decimal.js';
import { z } from 'zod';
import { InvalidOperationError } from './errors';
import { ORDER_SIDES } from '../types';

const displayName = z.string().trim().min(1).max(100);
const currency = z.string().trim().toUpperCase().pipe(z.string().regex(/^[A-Z0-9]{2,10}$/));

export const idSchema = z.string().min(1).max(64);

export const amountSchema = z.union([
  z.string().trim().min(1),
  z.number().finite(),
  z.instanceof(Decimal),
]);

export const limitSchema = z.coerce.number().int().min(1).max(10_000);

export const identitySchema = z.object({
  externalId: z.string().trim().min(1).max(255),
  displayName,
});

export const pairSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9]{2,10}\/[A-Z0-9]{2,10}$/, 'pair must look like BASE/QUOTE');

export const marketOrderSchema = z.object({
  accountId: idSchema,
  pair: pairSchema,
  side: z.enum(ORDER_SIDES),
  amount: amountSchema,
  price: amountSchema.nullable(),
});

export const createOfferSchema = z.object({
  accountId: idSchema,
  offeringCurrency: currency,
  offeringAmount: amountSchema,
  requestingCurrency: currency,
  requestingAmount: amountSchema,
});

export const transactionQuerySchema = z.object({
  pair: pairSchema.optional(),
  limit: limitSchema.default(100),
});

/**
 * Parse with a schema; schema failures become InvalidOperationError.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new InvalidOperationError(issues[0] ? `${issues[0].path || 'input'}: ${issues[0].message}` : 'Invalid input', {
      issues,
    });
  }
  return result.data;
}

export { currency as currencySchema };

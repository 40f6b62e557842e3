import { z } from 'zod';
import { HoldingType } from '../common/enums';

// Shared schemas
const symbolSchema = z
  .string({
    required_error: 'Symbol is required',
    invalid_type_error: 'Symbol must be a string',
  })
  .trim()
  .min(1, 'Symbol is required')
  .max(20, 'Symbol must be at most 20 characters')
  .transform(value => value.toUpperCase());

const amountSchema = (field: string) =>
  z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite(`${field} must be a finite number`)
    .nonnegative(`${field} must not be negative`);

export const holdingTypeSchema = z.nativeEnum(HoldingType, {
  errorMap: () => ({ message: `Type must be one of: ${Object.values(HoldingType).join(', ')}` }),
});

// Fund and crypto lookup schemas
export const fundParamsSchema = z.object({
  code: symbolSchema,
});

export const cryptoParamsSchema = z.object({
  symbol: symbolSchema,
});

// Holdings schemas
export const holdingIdParamsSchema = z.object({
  id: z.coerce
    .number({ invalid_type_error: 'Holding ID must be a number' })
    .int('Holding ID must be an integer')
    .positive('Holding ID must be positive'),
});

export const listHoldingsQuerySchema = z.object({
  type: holdingTypeSchema.optional(),
});

export const createHoldingBodySchema = z.object({
  type: holdingTypeSchema,
  symbol: symbolSchema,
  quantity: amountSchema('Quantity'),
  cost_basis: amountSchema('Cost basis'),
});

export const updateHoldingBodySchema = z
  .object({
    quantity: amountSchema('Quantity').optional(),
    cost_basis: amountSchema('Cost basis').optional(),
  })
  .refine(body => body.quantity !== undefined || body.cost_basis !== undefined, {
    message: 'At least one of quantity or cost_basis is required',
  });

// Seed file schema
export const holdingsSeedSchema = z.object({
  funds: z
    .array(z.object({ code: symbolSchema, quantity: amountSchema('Quantity'), cost_basis: amountSchema('Cost basis') }))
    .default([]),
  crypto: z
    .array(z.object({ symbol: symbolSchema, quantity: amountSchema('Quantity'), cost_basis: amountSchema('Cost basis') }))
    .default([]),
});

export type CreateHoldingBody = z.infer<typeof createHoldingBodySchema>;
export type UpdateHoldingBody = z.infer<typeof updateHoldingBodySchema>;
export type HoldingsSeed = z.infer<typeof holdingsSeedSchema>;

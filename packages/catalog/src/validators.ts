import { z } from 'zod';
import { isCalendarDate } from '@stockroom/shared';

const nonBlank = z.string().refine((value) => value.trim() !== '', 'must not be blank');

const optionalAmount = z.number().finite().nullish();

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Not a calendar date');

export const itemAttributesSchema = z.object({
  serialLabel: z.string().nullish(),
  sku: nonBlank,
  category: nonBlank,
  subcategory: z.string().nullish(),
  stone: z.string().nullish(),
  color: z.string().nullish(),
  finish: z.string().nullish(),
  weight: optionalAmount,
  length: optionalAmount,
  width: optionalAmount,
  yearOfPurchase: z.number().int().nullish(),
});

export const pricingInputsSchema = z.object({
  unitPrice: optionalAmount,
  threadWork: optionalAmount,
  gstOnCost: optionalAmount,
  packagingCost: optionalAmount,
  spMargin: z.string().nullish(),
  taxesPercent: optionalAmount,
});

export const newItemSchema = itemAttributesSchema.extend({
  pricing: pricingInputsSchema,
});

export const historicalItemSchema = itemAttributesSchema.extend({
  pricing: pricingInputsSchema.extend({
    costPrice: optionalAmount,
    finalCostPrice: optionalAmount,
    sellingPrice: optionalAmount,
    finalSellingPrice: optionalAmount,
  }),
  status: nonBlank.optional(),
  customerName: z.string().nullish(),
  saleAmount: optionalAmount,
  dateOfSale: isoDate.nullish(),
});

export const saleDetailsSchema = z.object({
  customerName: nonBlank,
  saleAmount: z.number().finite().nonnegative(),
  dateOfSale: isoDate,
});

export type ValidatedItemAttributes = z.infer<typeof itemAttributesSchema>;

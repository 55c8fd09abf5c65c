import { z } from 'zod';
import { isIsoDate } from '../lib/dates';

const isoDate = z
  .string()
  .transform((val) => val.trim())
  .pipe(z.string().refine(isIsoDate, 'Use ISO date format YYYY-MM-DD'));

const days = z.number().int().nonnegative();

export const simulationSchema = z
  .object({
    productTitle: z.string().max(255).default(''),
    variantTitle: z.string().max(255).default(''),
    sku: z.string().min(1).max(128),
    dailyDemand: z.number().nonnegative(),
    leadTimeDays: days,
    shippingTimeDays: days,
    safetyStockDays: days,
    startingInventory: z.number(),
    startDate: isoDate,
    inTransitQuantity: z.number().nonnegative().optional(),
    inTransitArrivalDate: isoDate.nullable().optional()
  })
  .refine((data) => !(data.inTransitQuantity && data.inTransitQuantity > 0) || Boolean(data.inTransitArrivalDate), {
    message: 'inTransitArrivalDate is required when inTransitQuantity is positive.',
    path: ['inTransitArrivalDate']
  });

export const productSettingsSchema = z.object({
  leadTimeDays: days.optional(),
  shippingTimeDays: days.optional(),
  safetyStockDays: days.optional(),
  inTransitQuantity: z.number().nonnegative().optional(),
  inTransitArrivalDate: isoDate.nullable().optional(),
  startDate: isoDate.optional()
});

export const productCreateSchema = productSettingsSchema.extend({
  sku: z.string().min(1).max(128)
});

export const eventCompletionSchema = z.object({
  completed: z.boolean()
});

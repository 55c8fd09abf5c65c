import { roundQuantity } from '../../lib/numbers';
import { InvalidParameterError } from './errors';
import type { ReplenishmentParameters } from './types';

export function assertNonNegativeNumber(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(field, `${field} must be a finite number.`, value);
  }
  if (value < 0) {
    throw new InvalidParameterError(field, `${field} cannot be negative.`, value);
  }
}

export function assertNonNegativeDays(field: string, value: number): void {
  assertNonNegativeNumber(field, value);
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(field, `${field} must be a whole number of days.`, value);
  }
}

/**
 * Derives the run constants of the continuous-review policy.
 *
 * Reorder point and order quantity share one formula (demand over the total
 * lead time plus safety stock), so a single order lifts stock to roughly
 * twice the reorder point. Zero demand yields all-zero quantities.
 */
export function computeParameters(
  dailyDemand: number,
  leadTimeDays: number,
  shippingTimeDays: number,
  safetyStockDays: number
): ReplenishmentParameters {
  assertNonNegativeNumber('dailyDemand', dailyDemand);
  assertNonNegativeDays('leadTimeDays', leadTimeDays);
  assertNonNegativeDays('shippingTimeDays', shippingTimeDays);
  assertNonNegativeDays('safetyStockDays', safetyStockDays);

  const totalLeadTime = leadTimeDays + shippingTimeDays;
  const safetyStock = roundQuantity(dailyDemand * safetyStockDays);
  const reorderPoint = roundQuantity(dailyDemand * totalLeadTime + safetyStock);
  const orderQuantity = roundQuantity(dailyDemand * totalLeadTime + safetyStock);

  return { totalLeadTime, safetyStock, reorderPoint, orderQuantity };
}

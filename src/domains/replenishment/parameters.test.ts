import { describe, expect, it } from 'vitest';
import { InvalidParameterError } from './errors';
import { computeParameters } from './parameters';

describe('computeParameters', () => {
  it('derives lead time, safety stock, reorder point and order quantity', () => {
    expect(computeParameters(10, 20, 10, 5)).toEqual({
      totalLeadTime: 30,
      safetyStock: 50,
      reorderPoint: 350,
      orderQuantity: 350
    });
  });

  it('keeps reorder point and order quantity equal', () => {
    const params = computeParameters(7.5, 12, 3, 4);
    expect(params.reorderPoint).toBe(142.5);
    expect(params.orderQuantity).toBe(params.reorderPoint);
  });

  it('rounds fractional demand to quantity precision', () => {
    const params = computeParameters(0.1, 3, 0, 1);
    expect(params.safetyStock).toBe(0.1);
    expect(params.reorderPoint).toBe(0.4);
  });

  it('returns zero quantities for zero demand', () => {
    expect(computeParameters(0, 45, 45, 10)).toEqual({
      totalLeadTime: 90,
      safetyStock: 0,
      reorderPoint: 0,
      orderQuantity: 0
    });
  });

  it('rejects negative inputs', () => {
    expect(() => computeParameters(10, -1, 10, 5)).toThrow(InvalidParameterError);
    let caught: unknown;
    try {
      computeParameters(-2, 1, 1, 1);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    expect(caught).toMatchObject({ message: 'INVALID_PARAMETER', status: 400, details: { field: 'dailyDemand' } });
  });

  it('rejects fractional day counts and non-finite demand', () => {
    expect(() => computeParameters(1, 2.5, 0, 0)).toThrow(InvalidParameterError);
    expect(() => computeParameters(Number.NaN, 1, 1, 1)).toThrow(InvalidParameterError);
  });
});

import { describe, expect, it } from 'vitest';
import { DemandImportError, parseDemandCsv } from './demandImport.service';

const LIMITS = { maxRows: 100, maxBytes: 64 * 1024 };

const DEMAND_CSV = [
  'product_title,variant_title,variant_sku,ending_quantity,quantity_sold_per_day',
  'Cold Brew,1L,CB-1L,1000,10',
  'Cold Brew,"2L, family",CB-2L,400,4.5',
  'Tea,Loose,,5,1',
  'Tea,Bagged,TEA-B,abc,1',
  'Tea,Bagged,TEA-B2,10,-1',
  'Cold Brew,1L,CB-1L,3,3'
].join('\n');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseDemandCsv', () => {
  it('maps the sales export columns onto demand rows', () => {
    const result = parseDemandCsv(DEMAND_CSV, LIMITS);

    expect(result.delimiter).toBe(',');
    expect(result.rows).toEqual([
      {
        rowNumber: 1,
        productTitle: 'Cold Brew',
        variantTitle: '1L',
        sku: 'CB-1L',
        startingInventory: 1000,
        dailyDemand: 10,
        label: 'Cold Brew - 1L (SKU: CB-1L)'
      },
      {
        rowNumber: 2,
        productTitle: 'Cold Brew',
        variantTitle: '2L, family',
        sku: 'CB-2L',
        startingInventory: 400,
        dailyDemand: 4.5,
        label: 'Cold Brew - 2L, family (SKU: CB-2L)'
      }
    ]);
  });

  it('reports row problems without dropping valid rows', () => {
    const { errors } = parseDemandCsv(DEMAND_CSV, LIMITS);

    expect(errors.map((error) => [error.rowNumber, error.sku, error.errorCode])).toEqual([
      [3, null, 'DEMAND_SKU_REQUIRED'],
      [4, 'TEA-B', 'DEMAND_INVENTORY_INVALID'],
      [5, 'TEA-B2', 'DEMAND_RATE_INVALID'],
      [6, 'CB-1L', 'DEMAND_DUPLICATE_SKU']
    ]);
  });

  it('matches headers loosely', () => {
    const csv = 'Product Title\tVariant Title\tVariant SKU\tEnding Quantity\tQuantity Sold Per Day\nMug\tRed\tMUG-R\t12\t0.5\n';
    const { rows } = parseDemandCsv(csv, LIMITS);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ sku: 'MUG-R', startingInventory: 12, dailyDemand: 0.5 });
  });

  it('lists missing required columns', () => {
    const error = captureError(() => parseDemandCsv('product_title,variant_sku,ending_quantity\nA,B,1\n', LIMITS));
    expect(error).toBeInstanceOf(DemandImportError);
    expect(error).toMatchObject({
      code: 'DEMAND_MISSING_COLUMNS',
      status: 400,
      details: { missing: ['variant_title', 'quantity_sold_per_day'] }
    });
  });

  it('enforces size and row limits', () => {
    expect(captureError(() => parseDemandCsv(DEMAND_CSV, { maxRows: 100, maxBytes: 10 }))).toMatchObject({
      code: 'DEMAND_FILE_TOO_LARGE',
      status: 413
    });
    expect(captureError(() => parseDemandCsv(DEMAND_CSV, { maxRows: 2, maxBytes: 64 * 1024 }))).toMatchObject({
      code: 'DEMAND_ROW_LIMIT',
      status: 413
    });
  });

  it('requires a header row', () => {
    expect(captureError(() => parseDemandCsv('\n\n', LIMITS))).toMatchObject({ code: 'DEMAND_NO_HEADERS' });
  });
});

import { getDemandImportLimits, type DemandImportLimits } from '../config/replenishmentDefaults';
import type { ItemIdentity } from '../domains/replenishment';
import { normalizeHeader, parseCsv } from '../lib/csv';
import { parseNumberOrNull } from '../lib/numbers';

export type DemandField = 'productTitle' | 'variantTitle' | 'sku' | 'startingInventory' | 'dailyDemand';

export type DemandRow = ItemIdentity & {
  rowNumber: number;
  startingInventory: number;
  dailyDemand: number;
  label: string;
};

export type DemandRowErrorCode =
  | 'DEMAND_SKU_REQUIRED'
  | 'DEMAND_INVENTORY_INVALID'
  | 'DEMAND_RATE_INVALID'
  | 'DEMAND_DUPLICATE_SKU';

export type DemandRowError = {
  rowNumber: number;
  sku: string | null;
  errorCode: DemandRowErrorCode;
  errorDetail: string;
};

export type DemandImportResult = {
  rows: DemandRow[];
  errors: DemandRowError[];
  delimiter: string;
};

export type DemandImportErrorCode =
  | 'DEMAND_FILE_TOO_LARGE'
  | 'DEMAND_ROW_LIMIT'
  | 'DEMAND_NO_HEADERS'
  | 'DEMAND_MISSING_COLUMNS';

export class DemandImportError extends Error {
  code: DemandImportErrorCode;
  status: number;
  details?: Record<string, unknown>;

  constructor(code: DemandImportErrorCode, status: number, details?: Record<string, unknown>) {
    super(code);
    this.name = 'DemandImportError';
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

// Column names of the sales export the demand file comes from.
export const DEMAND_COLUMNS: Record<DemandField, string> = {
  productTitle: 'product_title',
  variantTitle: 'variant_title',
  sku: 'variant_sku',
  startingInventory: 'ending_quantity',
  dailyDemand: 'quantity_sold_per_day'
};

const HEADER_SYNONYMS: Record<DemandField, string[]> = {
  productTitle: ['producttitle', 'product'],
  variantTitle: ['varianttitle', 'variant'],
  sku: ['variantsku', 'sku'],
  startingInventory: ['endingquantity', 'onhand', 'currentinventory'],
  dailyDemand: ['quantitysoldperday', 'dailydemand']
};

const DEMAND_FIELDS = Object.keys(DEMAND_COLUMNS) as DemandField[];

export function demandRowLabel(identity: ItemIdentity): string {
  return `${identity.productTitle} - ${identity.variantTitle} (SKU: ${identity.sku})`;
}

function resolveColumns(headers: string[]) {
  const positions = new Map<string, number>();
  headers.forEach((header, index) => {
    const key = normalizeHeader(header);
    if (!positions.has(key)) positions.set(key, index);
  });

  const columns: Partial<Record<DemandField, number>> = {};
  const missing: string[] = [];
  for (const field of DEMAND_FIELDS) {
    const index = HEADER_SYNONYMS[field]
      .map((candidate) => positions.get(candidate))
      .find((position) => position !== undefined);
    if (index === undefined) {
      missing.push(DEMAND_COLUMNS[field]);
    } else {
      columns[field] = index;
    }
  }
  return { columns, missing };
}

function pickValue(row: string[], index: number | undefined): string {
  if (index === undefined) return '';
  return row[index]?.trim() ?? '';
}

/**
 * Reads a demand export into selectable rows. File-level problems throw a
 * {@link DemandImportError}; row-level problems are collected so the valid
 * rows stay usable.
 */
export function parseDemandCsv(
  csvText: string,
  limits: DemandImportLimits = getDemandImportLimits()
): DemandImportResult {
  const byteLength = Buffer.byteLength(csvText, 'utf8');
  if (byteLength > limits.maxBytes) {
    throw new DemandImportError('DEMAND_FILE_TOO_LARGE', 413, { maxBytes: limits.maxBytes, byteLength });
  }

  const { headers, rows, delimiter, truncated } = parseCsv(csvText, { maxRows: limits.maxRows });
  if (headers.length === 0) {
    throw new DemandImportError('DEMAND_NO_HEADERS', 400);
  }
  if (truncated) {
    throw new DemandImportError('DEMAND_ROW_LIMIT', 413, { maxRows: limits.maxRows });
  }

  const { columns, missing } = resolveColumns(headers);
  if (missing.length > 0) {
    throw new DemandImportError('DEMAND_MISSING_COLUMNS', 400, { missing });
  }

  const parsedRows: DemandRow[] = [];
  const errors: DemandRowError[] = [];
  const seenSkus = new Set<string>();

  rows.forEach((raw, index) => {
    const rowNumber = index + 1;
    const sku = pickValue(raw, columns.sku);
    if (!sku) {
      errors.push({ rowNumber, sku: null, errorCode: 'DEMAND_SKU_REQUIRED', errorDetail: 'variant_sku is blank.' });
      return;
    }
    if (seenSkus.has(sku)) {
      errors.push({
        rowNumber,
        sku,
        errorCode: 'DEMAND_DUPLICATE_SKU',
        errorDetail: `SKU ${sku} already appears earlier in the file.`
      });
      return;
    }

    const startingInventory = parseNumberOrNull(pickValue(raw, columns.startingInventory));
    if (startingInventory === null) {
      errors.push({
        rowNumber,
        sku,
        errorCode: 'DEMAND_INVENTORY_INVALID',
        errorDetail: 'ending_quantity must be a number.'
      });
      return;
    }

    const dailyDemand = parseNumberOrNull(pickValue(raw, columns.dailyDemand));
    if (dailyDemand === null || dailyDemand < 0) {
      errors.push({
        rowNumber,
        sku,
        errorCode: 'DEMAND_RATE_INVALID',
        errorDetail: 'quantity_sold_per_day must be a non-negative number.'
      });
      return;
    }

    seenSkus.add(sku);
    const identity: ItemIdentity = {
      productTitle: pickValue(raw, columns.productTitle),
      variantTitle: pickValue(raw, columns.variantTitle),
      sku
    };
    parsedRows.push({ ...identity, rowNumber, startingInventory, dailyDemand, label: demandRowLabel(identity) });
  });

  return { rows: parsedRows, errors, delimiter };
}

export type ReplenishmentDefaults = {
  leadTimeDays: number;
  shippingTimeDays: number;
  safetyStockDays: number;
};

export type DemandImportLimits = {
  maxRows: number;
  maxBytes: number;
};

type ConfigOptions = {
  env?: NodeJS.ProcessEnv;
};

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 0) return fallback;
  return parsed;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseNonNegativeInt(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

export function getReplenishmentDefaults(options: ConfigOptions = {}): ReplenishmentDefaults {
  const env = options.env ?? process.env;
  return {
    leadTimeDays: parseNonNegativeInt(env.DEFAULT_LEAD_TIME_DAYS, 45),
    shippingTimeDays: parseNonNegativeInt(env.DEFAULT_SHIPPING_TIME_DAYS, 45),
    safetyStockDays: parseNonNegativeInt(env.DEFAULT_SAFETY_STOCK_DAYS, 10)
  };
}

export function getDemandImportLimits(options: ConfigOptions = {}): DemandImportLimits {
  const env = options.env ?? process.env;
  return {
    maxRows: parsePositiveInt(env.DEMAND_IMPORT_MAX_ROWS, 50000),
    maxBytes: parsePositiveInt(env.DEMAND_IMPORT_MAX_BYTES, 10 * 1024 * 1024)
  };
}

export function getServerPort(options: ConfigOptions = {}): number {
  const env = options.env ?? process.env;
  return parsePositiveInt(env.PORT, 3000);
}

import { getRequestContext } from '../lib/requestContext';

export const REPLENISHMENT_EVENT = {
  SCHEDULE_GENERATED: 'REPLENISHMENT_SCHEDULE_GENERATED',
  DEMAND_IMPORTED: 'REPLENISHMENT_DEMAND_IMPORTED',
  PRODUCT_REMOVED: 'REPLENISHMENT_PRODUCT_REMOVED'
} as const;

export type ReplenishmentEventName = (typeof REPLENISHMENT_EVENT)[keyof typeof REPLENISHMENT_EVENT];

export type ScheduleGeneratedPayload = {
  sku: string;
  reason: 'added' | 'updated';
  startDate: string;
  orderCount: number;
  arrivalCount: number;
  prunedCompletionFlags: number;
};

export type DemandImportedPayload = {
  validRows: number;
  errorRows: number;
  delimiter: string;
};

export type ProductRemovedPayload = {
  sku: string;
  eventCount: number;
};

export type ReplenishmentEventPayloadMap = {
  [REPLENISHMENT_EVENT.SCHEDULE_GENERATED]: ScheduleGeneratedPayload;
  [REPLENISHMENT_EVENT.DEMAND_IMPORTED]: DemandImportedPayload;
  [REPLENISHMENT_EVENT.PRODUCT_REMOVED]: ProductRemovedPayload;
};

export type ReplenishmentEventLogger = (line: string) => void;

/** One JSON line per event, tagged with the current request id when there is one. */
export function emitReplenishmentEvent<T extends ReplenishmentEventName>(
  event: T,
  payload: ReplenishmentEventPayloadMap[T],
  logger: ReplenishmentEventLogger = console.log
): void {
  logger(
    JSON.stringify({
      event,
      requestId: getRequestContext()?.requestId,
      ...payload,
      timestamp: new Date().toISOString()
    })
  );
}

import type { IsoDate } from '../../lib/dates';

export const SCHEDULE_EVENT_KIND = {
  IN_TRANSIT_ARRIVAL: 'InTransitArrival',
  ORDER_PLACED: 'OrderPlaced'
} as const;

export type ScheduleEventKind = (typeof SCHEDULE_EVENT_KIND)[keyof typeof SCHEDULE_EVENT_KIND];

export type ItemIdentity = {
  productTitle: string;
  variantTitle: string;
  sku: string;
};

export type ReplenishmentInputs = ItemIdentity & {
  dailyDemand: number;
  leadTimeDays: number;
  shippingTimeDays: number;
  safetyStockDays: number;
  startingInventory: number;
  startDate: IsoDate;
  inTransitQuantity?: number;
  inTransitArrivalDate?: IsoDate | null;
};

export type ReplenishmentParameters = {
  totalLeadTime: number;
  safetyStock: number;
  reorderPoint: number;
  orderQuantity: number;
};

export type PendingArrivalSource = 'in_transit' | 'order';

export type PendingArrival = {
  arrivalDate: IsoDate;
  quantity: number;
  source: PendingArrivalSource;
};

/** What the stepper emits, before identity and completion are attached. */
export type EmittedEvent = {
  eventKind: ScheduleEventKind;
  orderDate: IsoDate | null;
  arrivalDate: IsoDate;
  quantity: number;
};

export type ScheduleEvent = ItemIdentity &
  EmittedEvent & {
    id: string;
    completed: boolean;
  };

export type ReplenishmentRun = {
  parameters: ReplenishmentParameters;
  horizon: { startDate: IsoDate; endDate: IsoDate };
  events: ScheduleEvent[];
};

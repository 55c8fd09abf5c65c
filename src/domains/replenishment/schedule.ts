import { compareIsoDates, type IsoDate } from '../../lib/dates';
import type { EmittedEvent, ItemIdentity, ScheduleEvent, ScheduleEventKind } from './types';

/**
 * Stable event key. It survives regeneration and reordering of a schedule,
 * unlike a row index.
 */
export function scheduleEventId(sku: string, arrivalDate: IsoDate, eventKind: ScheduleEventKind): string {
  return `${sku}:${arrivalDate}:${eventKind}`;
}

export function assembleSchedule(identity: ItemIdentity, emitted: readonly EmittedEvent[]): ScheduleEvent[] {
  const events: ScheduleEvent[] = emitted.map((event) => ({
    id: scheduleEventId(identity.sku, event.arrivalDate, event.eventKind),
    productTitle: identity.productTitle,
    variantTitle: identity.variantTitle,
    sku: identity.sku,
    eventKind: event.eventKind,
    orderDate: event.orderDate,
    arrivalDate: event.arrivalDate,
    quantity: event.quantity,
    completed: false
  }));

  // Array.prototype.sort is stable: same-day events keep emission order.
  return events.sort((a, b) => compareIsoDates(a.arrivalDate, b.arrivalDate));
}

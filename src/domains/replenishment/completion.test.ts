import { describe, expect, it } from 'vitest';
import { CompletionOverlay } from './completion';
import { SCHEDULE_EVENT_KIND, type ScheduleEvent } from './types';

function makeEvent(arrivalDate: string, orderDate: string | null = null): ScheduleEvent {
  const eventKind = orderDate ? SCHEDULE_EVENT_KIND.ORDER_PLACED : SCHEDULE_EVENT_KIND.IN_TRANSIT_ARRIVAL;
  return {
    id: `SKU-1:${arrivalDate}:${eventKind}`,
    productTitle: 'Widget',
    variantTitle: 'Blue',
    sku: 'SKU-1',
    eventKind,
    orderDate,
    arrivalDate,
    quantity: 10,
    completed: false
  };
}

describe('CompletionOverlay', () => {
  it('applies flags by event id without touching the source events', () => {
    const events = [makeEvent('2024-01-05'), makeEvent('2024-02-01', '2024-01-02')];
    const overlay = new CompletionOverlay();
    overlay.setCompleted('SKU-1:2024-02-01:OrderPlaced', true);

    const applied = overlay.apply(events);
    expect(applied.map((event) => event.completed)).toEqual([false, true]);
    expect(events[1].completed).toBe(false);
  });

  it('clears a flag when set back to false', () => {
    const overlay = new CompletionOverlay();
    overlay.setCompleted('a', true);
    overlay.setCompleted('a', false);
    expect(overlay.isCompleted('a')).toBe(false);
    expect(overlay.completedCount).toBe(0);
  });

  it('prunes flags of events that disappeared', () => {
    const overlay = new CompletionOverlay();
    overlay.setCompleted('SKU-1:2024-01-05:InTransitArrival', true);
    overlay.setCompleted('SKU-1:2024-03-01:OrderPlaced', true);

    const removed = overlay.prune([makeEvent('2024-01-05')]);

    expect(removed).toBe(1);
    expect(overlay.isCompleted('SKU-1:2024-01-05:InTransitArrival')).toBe(true);
    expect(overlay.isCompleted('SKU-1:2024-03-01:OrderPlaced')).toBe(false);
  });
});

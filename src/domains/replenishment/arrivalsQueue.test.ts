import { describe, expect, it } from 'vitest';
import { FutureArrivalsQueue } from './arrivalsQueue';

describe('FutureArrivalsQueue', () => {
  it('ignores a seed without quantity or date', () => {
    const queue = new FutureArrivalsQueue();
    queue.seed(0, '2024-01-05');
    queue.seed(10, null);
    queue.seed(undefined, '2024-01-05');
    expect(queue.size).toBe(0);
  });

  it('keeps entries ordered by arrival date', () => {
    const queue = new FutureArrivalsQueue();
    queue.schedule(5, '2024-01-10');
    queue.schedule(7, '2024-01-05');
    queue.seed(3, '2024-01-10');

    expect(queue.snapshot()).toEqual([
      { arrivalDate: '2024-01-05', quantity: 7, source: 'order' },
      { arrivalDate: '2024-01-10', quantity: 5, source: 'order' },
      { arrivalDate: '2024-01-10', quantity: 3, source: 'in_transit' }
    ]);
  });

  it('releases due entries exactly once', () => {
    const queue = new FutureArrivalsQueue();
    queue.schedule(5, '2024-01-10');
    queue.seed(3, '2024-01-10');

    expect(queue.matureOn('2024-01-09')).toEqual([]);
    expect(queue.matureOn('2024-01-10')).toEqual([
      { arrivalDate: '2024-01-10', quantity: 5, source: 'order' },
      { arrivalDate: '2024-01-10', quantity: 3, source: 'in_transit' }
    ]);
    expect(queue.matureOn('2024-01-10')).toEqual([]);
    expect(queue.size).toBe(0);
  });

  it('releases entries dated before the given day', () => {
    const queue = new FutureArrivalsQueue();
    queue.seed(4, '2023-12-30');
    expect(queue.matureOn('2024-01-01')).toEqual([{ arrivalDate: '2023-12-30', quantity: 4, source: 'in_transit' }]);
  });

  it('reports pending arrivals strictly after a date', () => {
    const queue = new FutureArrivalsQueue();
    queue.schedule(1, '2024-02-01');
    expect(queue.hasPendingAfter('2024-01-31')).toBe(true);
    expect(queue.hasPendingAfter('2024-02-01')).toBe(false);
  });
});

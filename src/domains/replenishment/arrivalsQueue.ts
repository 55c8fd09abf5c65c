import { compareIsoDates, type IsoDate } from '../../lib/dates';
import type { PendingArrival } from './types';

/**
 * Quantities ordered but not yet on hand, keyed by arrival date. Owned by a
 * single simulation run.
 */
export class FutureArrivalsQueue {
  private entries: PendingArrival[] = [];

  get size(): number {
    return this.entries.length;
  }

  /** Initial in-transit shipment; ignored without a positive quantity and a date. */
  seed(quantity: number | undefined, arrivalDate: IsoDate | null | undefined): void {
    if (!quantity || quantity <= 0 || !arrivalDate) return;
    this.insert({ arrivalDate, quantity, source: 'in_transit' });
  }

  schedule(quantity: number, arrivalDate: IsoDate): void {
    this.insert({ arrivalDate, quantity, source: 'order' });
  }

  /**
   * Removes and returns every entry due on or before `date`, earliest first.
   * A released entry is never returned again.
   */
  matureOn(date: IsoDate): PendingArrival[] {
    const due: PendingArrival[] = [];
    const remaining: PendingArrival[] = [];
    for (const entry of this.entries) {
      if (compareIsoDates(entry.arrivalDate, date) <= 0) {
        due.push(entry);
      } else {
        remaining.push(entry);
      }
    }
    this.entries = remaining;
    return due;
  }

  hasPendingAfter(date: IsoDate): boolean {
    return this.entries.some((entry) => compareIsoDates(entry.arrivalDate, date) > 0);
  }

  snapshot(): PendingArrival[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  // Kept sorted by date; equal dates keep insertion order.
  private insert(entry: PendingArrival): void {
    const index = this.entries.findIndex((existing) => compareIsoDates(existing.arrivalDate, entry.arrivalDate) > 0);
    if (index === -1) {
      this.entries.push(entry);
    } else {
      this.entries.splice(index, 0, entry);
    }
  }
}

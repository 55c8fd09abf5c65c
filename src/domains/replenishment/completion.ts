import type { ScheduleEvent } from './types';

/**
 * Completion flags kept beside a schedule, keyed by event id. Regenerating
 * the schedule leaves flags of surviving events untouched.
 */
export class CompletionOverlay {
  private readonly flags = new Map<string, boolean>();

  isCompleted(eventId: string): boolean {
    return this.flags.get(eventId) ?? false;
  }

  setCompleted(eventId: string, completed: boolean): void {
    if (completed) {
      this.flags.set(eventId, true);
    } else {
      this.flags.delete(eventId);
    }
  }

  apply(events: readonly ScheduleEvent[]): ScheduleEvent[] {
    return events.map((event) => ({ ...event, completed: this.isCompleted(event.id) }));
  }

  /** Drops flags for events that are no longer scheduled; returns how many. */
  prune(events: readonly ScheduleEvent[]): number {
    const live = new Set(events.map((event) => event.id));
    let removed = 0;
    for (const eventId of [...this.flags.keys()]) {
      if (!live.has(eventId)) {
        this.flags.delete(eventId);
        removed += 1;
      }
    }
    return removed;
  }

  get completedCount(): number {
    return this.flags.size;
  }
}

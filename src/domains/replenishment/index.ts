export {
  SCHEDULE_EVENT_KIND,
  type EmittedEvent,
  type ItemIdentity,
  type PendingArrival,
  type ReplenishmentInputs,
  type ReplenishmentParameters,
  type ReplenishmentRun,
  type ScheduleEvent,
  type ScheduleEventKind
} from './types';

export { InvalidParameterError } from './errors';
export { computeParameters } from './parameters';
export { FutureArrivalsQueue } from './arrivalsQueue';
export { HORIZON_DAYS, runReplenishment, simulateReplenishment } from './simulation';
export { assembleSchedule, scheduleEventId } from './schedule';
export { CompletionOverlay } from './completion';

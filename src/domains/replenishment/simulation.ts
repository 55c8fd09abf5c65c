import { addDays, canAddDays, compareIsoDates, isIsoDate } from '../../lib/dates';
import { roundQuantity } from '../../lib/numbers';
import { FutureArrivalsQueue } from './arrivalsQueue';
import { InvalidParameterError } from './errors';
import { assertNonNegativeNumber, computeParameters } from './parameters';
import { assembleSchedule } from './schedule';
import {
  SCHEDULE_EVENT_KIND,
  type EmittedEvent,
  type ReplenishmentInputs,
  type ReplenishmentParameters,
  type ReplenishmentRun,
  type ScheduleEvent
} from './types';

export const HORIZON_DAYS = 365;

function validateInputs(inputs: ReplenishmentInputs): ReplenishmentParameters {
  const parameters = computeParameters(
    inputs.dailyDemand,
    inputs.leadTimeDays,
    inputs.shippingTimeDays,
    inputs.safetyStockDays
  );

  if (typeof inputs.startingInventory !== 'number' || !Number.isFinite(inputs.startingInventory)) {
    throw new InvalidParameterError(
      'startingInventory',
      'startingInventory must be a finite number.',
      inputs.startingInventory
    );
  }
  if (!isIsoDate(inputs.startDate)) {
    throw new InvalidParameterError('startDate', 'startDate must be a YYYY-MM-DD date.', inputs.startDate);
  }
  // The last order of the horizon may arrive totalLeadTime days past its end.
  if (!canAddDays(inputs.startDate, HORIZON_DAYS + parameters.totalLeadTime)) {
    throw new InvalidParameterError(
      'startDate',
      'startDate leaves no room for the planning horizon before 9999-12-31.',
      inputs.startDate
    );
  }

  const inTransitQuantity = inputs.inTransitQuantity ?? 0;
  assertNonNegativeNumber('inTransitQuantity', inTransitQuantity);
  if (inputs.inTransitArrivalDate != null && !isIsoDate(inputs.inTransitArrivalDate)) {
    throw new InvalidParameterError(
      'inTransitArrivalDate',
      'inTransitArrivalDate must be a YYYY-MM-DD date.',
      inputs.inTransitArrivalDate
    );
  }
  if (inTransitQuantity > 0 && !inputs.inTransitArrivalDate) {
    throw new InvalidParameterError(
      'inTransitArrivalDate',
      'inTransitArrivalDate is required when inTransitQuantity is positive.'
    );
  }

  return parameters;
}

/**
 * Day-stepped continuous-review loop over the horizon. Each day: release due
 * arrivals, consume demand, then place an order when stock is at or below the
 * reorder point and nothing is still in flight. Orders credit stock only when
 * they arrive.
 */
function stepInventory(inputs: ReplenishmentInputs, parameters: ReplenishmentParameters): EmittedEvent[] {
  const { reorderPoint, orderQuantity, totalLeadTime } = parameters;
  const endDate = addDays(inputs.startDate, HORIZON_DAYS);
  const queue = new FutureArrivalsQueue();
  queue.seed(inputs.inTransitQuantity, inputs.inTransitArrivalDate);

  const emitted: EmittedEvent[] = [];
  let availableInventory = inputs.startingInventory;
  let ordersPlaced = 0;

  for (let day = 0; day < HORIZON_DAYS; day += 1) {
    const date = addDays(inputs.startDate, day);

    for (const arrival of queue.matureOn(date)) {
      availableInventory = roundQuantity(availableInventory + arrival.quantity);
      // Order arrivals are already announced by their OrderPlaced event.
      if (arrival.source === 'in_transit') {
        emitted.push({
          eventKind: SCHEDULE_EVENT_KIND.IN_TRANSIT_ARRIVAL,
          orderDate: null,
          arrivalDate: date,
          quantity: arrival.quantity
        });
      }
    }

    availableInventory = roundQuantity(availableInventory - inputs.dailyDemand);

    if (availableInventory > reorderPoint || queue.hasPendingAfter(date)) continue;

    const arrivalDate = addDays(date, totalLeadTime);
    if (compareIsoDates(arrivalDate, endDate) >= 0) continue;
    // Zero-quantity orders are placed at most once per run.
    if (orderQuantity === 0 && ordersPlaced > 0) continue;

    emitted.push({
      eventKind: SCHEDULE_EVENT_KIND.ORDER_PLACED,
      orderDate: date,
      arrivalDate,
      quantity: orderQuantity
    });
    queue.schedule(orderQuantity, arrivalDate);
    ordersPlaced += 1;
  }

  return emitted;
}

export function runReplenishment(inputs: ReplenishmentInputs): ReplenishmentRun {
  const parameters = validateInputs(inputs);
  const emitted = stepInventory(inputs, parameters);
  return {
    parameters,
    horizon: { startDate: inputs.startDate, endDate: addDays(inputs.startDate, HORIZON_DAYS) },
    events: assembleSchedule(
      { productTitle: inputs.productTitle, variantTitle: inputs.variantTitle, sku: inputs.sku },
      emitted
    )
  };
}

/**
 * Purchase-order schedule for one item over the next {@link HORIZON_DAYS}
 * days, sorted by arrival date. An empty result means no action is needed.
 */
export function simulateReplenishment(inputs: ReplenishmentInputs): ScheduleEvent[] {
  return runReplenishment(inputs).events;
}

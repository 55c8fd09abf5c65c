import { SCHEDULE_EVENT_KIND, type ScheduleEvent, type ScheduleEventKind } from '../domains/replenishment';
import { isIsoDate } from '../lib/dates';
import { formatCsv, parseCsv } from '../lib/csv';
import { parseNumberOrNull } from '../lib/numbers';

export const SCHEDULE_EXPORT_HEADERS = [
  'Product',
  'Variant',
  'SKU',
  'Order Date',
  'Arrival Date',
  'Order Quantity',
  'Event',
  'Completed'
] as const;

export type ScheduleExportRecord = {
  Product: string;
  Variant: string;
  SKU: string;
  'Order Date': string;
  'Arrival Date': string;
  'Order Quantity': number;
  Event: ScheduleEventKind;
  Completed: boolean;
};

export class ScheduleExportError extends Error {
  code = 'SCHEDULE_CSV_INVALID' as const;
  status = 400;
  details: { rowNumber: number | null; reason: string };

  constructor(reason: string, rowNumber: number | null = null) {
    super('SCHEDULE_CSV_INVALID');
    this.name = 'ScheduleExportError';
    this.details = { rowNumber, reason };
  }
}

const EVENT_KINDS = new Set<string>(Object.values(SCHEDULE_EVENT_KIND));

function isScheduleEventKind(value: string): value is ScheduleEventKind {
  return EVENT_KINDS.has(value);
}

export function toScheduleRecord(event: ScheduleEvent): ScheduleExportRecord {
  return {
    Product: event.productTitle,
    Variant: event.variantTitle,
    SKU: event.sku,
    'Order Date': event.orderDate ?? '',
    'Arrival Date': event.arrivalDate,
    'Order Quantity': event.quantity,
    Event: event.eventKind,
    Completed: event.completed
  };
}

export function scheduleExportFileName(sku: string): string {
  return `${sku.replace(/[^A-Za-z0-9._-]/g, '_')}_order_schedule.csv`;
}

export function formatScheduleCsv(events: readonly ScheduleEvent[]): string {
  const rows = events.map((event) => {
    const record = toScheduleRecord(event);
    return SCHEDULE_EXPORT_HEADERS.map((header) => record[header]);
  });
  return formatCsv(SCHEDULE_EXPORT_HEADERS, rows);
}

/** Reads back what {@link formatScheduleCsv} wrote. */
export function parseScheduleCsv(text: string): ScheduleExportRecord[] {
  const { headers, rows } = parseCsv(text, { delimiter: ',' });
  if (headers.join(',') !== SCHEDULE_EXPORT_HEADERS.join(',')) {
    throw new ScheduleExportError(`Expected header ${SCHEDULE_EXPORT_HEADERS.join(',')}.`);
  }

  return rows.map((row, index) => {
    const rowNumber = index + 1;
    const [product, variant, sku, orderDate, arrivalDate, quantityText, event, completed] = SCHEDULE_EXPORT_HEADERS.map(
      (_header, column) => row[column] ?? ''
    );

    if (!isScheduleEventKind(event)) {
      throw new ScheduleExportError(`Unknown event ${event}.`, rowNumber);
    }
    if (!isIsoDate(arrivalDate) || (orderDate !== '' && !isIsoDate(orderDate))) {
      throw new ScheduleExportError('Dates must be YYYY-MM-DD.', rowNumber);
    }
    const quantity = parseNumberOrNull(quantityText);
    if (quantity === null) {
      throw new ScheduleExportError('Order Quantity must be a number.', rowNumber);
    }
    if (completed !== 'true' && completed !== 'false') {
      throw new ScheduleExportError('Completed must be true or false.', rowNumber);
    }

    return {
      Product: product,
      Variant: variant,
      SKU: sku,
      'Order Date': orderDate,
      'Arrival Date': arrivalDate,
      'Order Quantity': quantity,
      Event: event,
      Completed: completed === 'true'
    };
  });
}

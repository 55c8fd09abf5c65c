import { v4 as uuidv4 } from 'uuid';
import {
  getDemandImportLimits,
  getReplenishmentDefaults,
  type DemandImportLimits,
  type ReplenishmentDefaults
} from '../config/replenishmentDefaults';
import {
  CompletionOverlay,
  SCHEDULE_EVENT_KIND,
  runReplenishment,
  type ItemIdentity,
  type ReplenishmentInputs,
  type ReplenishmentRun,
  type ScheduleEvent
} from '../domains/replenishment';
import { todayIsoDate, type IsoDate } from '../lib/dates';
import {
  REPLENISHMENT_EVENT,
  emitReplenishmentEvent,
  type ReplenishmentEventLogger
} from '../observability/replenishment.events';
import { demandRowLabel, parseDemandCsv, type DemandImportResult, type DemandRow } from './demandImport.service';
import { formatScheduleCsv, scheduleExportFileName } from './scheduleExport.service';

export type PlanningBoardErrorCode =
  | 'DEMAND_NOT_LOADED'
  | 'PRODUCT_NOT_IN_CATALOG'
  | 'PRODUCT_ALREADY_ADDED'
  | 'PRODUCT_NOT_FOUND'
  | 'SCHEDULE_EVENT_NOT_FOUND';

const ERROR_STATUS: Record<PlanningBoardErrorCode, number> = {
  DEMAND_NOT_LOADED: 409,
  PRODUCT_NOT_IN_CATALOG: 404,
  PRODUCT_ALREADY_ADDED: 409,
  PRODUCT_NOT_FOUND: 404,
  SCHEDULE_EVENT_NOT_FOUND: 404
};

export class PlanningBoardError extends Error {
  code: PlanningBoardErrorCode;
  status: number;
  details?: Record<string, unknown>;

  constructor(code: PlanningBoardErrorCode, details?: Record<string, unknown>) {
    super(code);
    this.name = 'PlanningBoardError';
    this.code = code;
    this.status = ERROR_STATUS[code];
    this.details = details;
  }
}

export type ProductSettings = {
  leadTimeDays?: number;
  shippingTimeDays?: number;
  safetyStockDays?: number;
  inTransitQuantity?: number;
  inTransitArrivalDate?: IsoDate | null;
  startDate?: IsoDate;
};

export type AddProductInput = ProductSettings & { sku: string };

export type ProductSummary = ItemIdentity & {
  label: string;
  currentInventory: number;
  dailyDemand: number;
  leadTimeDays: number;
  shippingTimeDays: number;
  safetyStockDays: number;
  inTransitQuantity: number;
  inTransitArrivalDate: IsoDate | null;
  startDate: IsoDate;
  orderQuantity: number;
  totalLeadTime: number;
  safetyStock: number;
  reorderPoint: number;
  eventCount: number;
  scheduleId: string;
  generatedAt: string;
};

export type ScheduleExport = {
  fileName: string;
  csv: string;
};

export type PlanningBoardOptions = {
  defaults?: ReplenishmentDefaults;
  limits?: DemandImportLimits;
  clock?: () => Date;
  logger?: ReplenishmentEventLogger;
};

type BoardEntry = {
  inputs: ReplenishmentInputs;
  run: ReplenishmentRun;
  overlay: CompletionOverlay;
  scheduleId: string;
  generatedAt: string;
};

/**
 * Products added for planning, each with its latest schedule and completion
 * flags. Lives as long as the process; the simulation itself stays stateless.
 */
export class PlanningBoard {
  private catalog: Map<string, DemandRow> | null = null;
  private readonly entries = new Map<string, BoardEntry>();
  private readonly defaults: ReplenishmentDefaults;
  private readonly limits: DemandImportLimits;
  private readonly clock: () => Date;
  private readonly logger?: ReplenishmentEventLogger;

  constructor(options: PlanningBoardOptions = {}) {
    this.defaults = options.defaults ?? getReplenishmentDefaults();
    this.limits = options.limits ?? getDemandImportLimits();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
  }

  loadDemand(csvText: string): DemandImportResult {
    const result = parseDemandCsv(csvText, this.limits);
    this.catalog = new Map(result.rows.map((row) => [row.sku, row]));
    emitReplenishmentEvent(
      REPLENISHMENT_EVENT.DEMAND_IMPORTED,
      { validRows: result.rows.length, errorRows: result.errors.length, delimiter: result.delimiter },
      this.logger
    );
    return result;
  }

  listDemandOptions(): Array<{ sku: string; label: string }> {
    if (!this.catalog) return [];
    return [...this.catalog.values()].map((row) => ({ sku: row.sku, label: row.label }));
  }

  addProduct(input: AddProductInput): ProductSummary {
    if (!this.catalog) {
      throw new PlanningBoardError('DEMAND_NOT_LOADED');
    }
    const row = this.catalog.get(input.sku);
    if (!row) {
      throw new PlanningBoardError('PRODUCT_NOT_IN_CATALOG', { sku: input.sku });
    }
    if (this.entries.has(input.sku)) {
      throw new PlanningBoardError('PRODUCT_ALREADY_ADDED', { sku: input.sku });
    }

    const inputs: ReplenishmentInputs = {
      productTitle: row.productTitle,
      variantTitle: row.variantTitle,
      sku: row.sku,
      startingInventory: row.startingInventory,
      dailyDemand: row.dailyDemand,
      leadTimeDays: input.leadTimeDays ?? this.defaults.leadTimeDays,
      shippingTimeDays: input.shippingTimeDays ?? this.defaults.shippingTimeDays,
      safetyStockDays: input.safetyStockDays ?? this.defaults.safetyStockDays,
      inTransitQuantity: input.inTransitQuantity ?? 0,
      inTransitArrivalDate: input.inTransitArrivalDate ?? null,
      startDate: input.startDate ?? todayIsoDate(this.clock())
    };

    const entry = this.generate(inputs, new CompletionOverlay(), 'added');
    this.entries.set(inputs.sku, entry);
    return this.summarize(entry);
  }

  /** Re-simulates with changed settings; completion flags follow event ids. */
  updateProduct(sku: string, patch: ProductSettings): ProductSummary {
    const current = this.requireEntry(sku);
    const inputs: ReplenishmentInputs = {
      ...current.inputs,
      leadTimeDays: patch.leadTimeDays ?? current.inputs.leadTimeDays,
      shippingTimeDays: patch.shippingTimeDays ?? current.inputs.shippingTimeDays,
      safetyStockDays: patch.safetyStockDays ?? current.inputs.safetyStockDays,
      inTransitQuantity: patch.inTransitQuantity ?? current.inputs.inTransitQuantity,
      inTransitArrivalDate:
        patch.inTransitArrivalDate !== undefined ? patch.inTransitArrivalDate : current.inputs.inTransitArrivalDate,
      startDate: patch.startDate ?? current.inputs.startDate
    };

    const entry = this.generate(inputs, current.overlay, 'updated');
    this.entries.set(sku, entry);
    return this.summarize(entry);
  }

  removeProduct(sku: string): void {
    const entry = this.requireEntry(sku);
    this.entries.delete(sku);
    emitReplenishmentEvent(
      REPLENISHMENT_EVENT.PRODUCT_REMOVED,
      { sku, eventCount: entry.run.events.length },
      this.logger
    );
  }

  listProducts(): ProductSummary[] {
    return [...this.entries.values()].map((entry) => this.summarize(entry));
  }

  getProduct(sku: string): ProductSummary {
    return this.summarize(this.requireEntry(sku));
  }

  getSchedule(sku: string): ScheduleEvent[] {
    const entry = this.requireEntry(sku);
    return entry.overlay.apply(entry.run.events);
  }

  setEventCompleted(sku: string, eventId: string, completed: boolean): ScheduleEvent {
    const entry = this.requireEntry(sku);
    const event = entry.run.events.find((candidate) => candidate.id === eventId);
    if (!event) {
      throw new PlanningBoardError('SCHEDULE_EVENT_NOT_FOUND', { sku, eventId });
    }
    entry.overlay.setCompleted(eventId, completed);
    return { ...event, completed: entry.overlay.isCompleted(eventId) };
  }

  exportSchedule(sku: string): ScheduleExport {
    return {
      fileName: scheduleExportFileName(sku),
      csv: formatScheduleCsv(this.getSchedule(sku))
    };
  }

  private requireEntry(sku: string): BoardEntry {
    const entry = this.entries.get(sku);
    if (!entry) {
      throw new PlanningBoardError('PRODUCT_NOT_FOUND', { sku });
    }
    return entry;
  }

  private generate(inputs: ReplenishmentInputs, overlay: CompletionOverlay, reason: 'added' | 'updated'): BoardEntry {
    const run = runReplenishment(inputs);
    const prunedCompletionFlags = overlay.prune(run.events);
    emitReplenishmentEvent(
      REPLENISHMENT_EVENT.SCHEDULE_GENERATED,
      {
        sku: inputs.sku,
        reason,
        startDate: inputs.startDate,
        orderCount: run.events.filter((event) => event.eventKind === SCHEDULE_EVENT_KIND.ORDER_PLACED).length,
        arrivalCount: run.events.filter((event) => event.eventKind === SCHEDULE_EVENT_KIND.IN_TRANSIT_ARRIVAL).length,
        prunedCompletionFlags
      },
      this.logger
    );
    return { inputs, run, overlay, scheduleId: uuidv4(), generatedAt: this.clock().toISOString() };
  }

  private summarize(entry: BoardEntry): ProductSummary {
    const { inputs, run } = entry;
    return {
      productTitle: inputs.productTitle,
      variantTitle: inputs.variantTitle,
      sku: inputs.sku,
      label: demandRowLabel(inputs),
      currentInventory: inputs.startingInventory,
      dailyDemand: inputs.dailyDemand,
      leadTimeDays: inputs.leadTimeDays,
      shippingTimeDays: inputs.shippingTimeDays,
      safetyStockDays: inputs.safetyStockDays,
      inTransitQuantity: inputs.inTransitQuantity ?? 0,
      inTransitArrivalDate: inputs.inTransitArrivalDate ?? null,
      startDate: inputs.startDate,
      orderQuantity: run.parameters.orderQuantity,
      totalLeadTime: run.parameters.totalLeadTime,
      safetyStock: run.parameters.safetyStock,
      reorderPoint: run.parameters.reorderPoint,
      eventCount: run.events.length,
      scheduleId: entry.scheduleId,
      generatedAt: entry.generatedAt
    };
  }
}

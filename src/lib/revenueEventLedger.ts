/**
 * @module revenueEventLedger
 * @description Append-only ledger of revenue events, partitioned by tenant.
 *
 * Every accepted event receives the next per-tenant sequence number inside the
 * tenant's sequencer, so appends for one tenant are totally ordered while other
 * tenants proceed in parallel. Reads capture the committed watermark of every
 * tenant when they begin and only return events at or below it: an append that
 * is still queued, or that commits after the read started, is not part of that
 * read's snapshot.
 */

import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from './logger';
import { APP_CONFIG, RevenueConfig } from './config';
import { ServiceError, ValidationError, toError } from './errors';
import { isCurrencyCode, toDecimal } from './money';
import { assertValidRange, isValidDate } from './dateRange';
import { TenantSequencer } from './tenantSequencer';
import {
  REVENUE_EVENT_TYPES,
  REVENUE_SOURCES,
  DateRange,
  RevenueEvent,
  RevenueEventType,
  RevenueSource,
  StoredRevenueEvent,
} from '../types/revenue';

const logger = getLogger('revenueEventLedger');

// ── Types ─────────────────────────────────────────────────────────────────────

/** Highest committed sequence per tenant. */
export type Watermarks = Record<string, number>;

export interface LedgerFilter {
  tenantId?: string;
  dateRange: DateRange;
  eventTypes?: RevenueEventType[];
}

export interface LedgerSnapshot {
  events: StoredRevenueEvent[];
  watermarks: Watermarks;
}

export interface RevenueEventStorage {
  hasEvent(eventId: string): boolean;
  insert(event: StoredRevenueEvent): void;
  latestSequence(tenantId: string): number;
  watermarks(): Watermarks;
  /** Events of `tenantId` (or every tenant) in range, ordered by timestamp then id. */
  range(tenantId: string | undefined, dateRange: DateRange): StoredRevenueEvent[];
  tenantIds(): string[];
}

export type AppendListener = (event: StoredRevenueEvent) => void;

export interface RevenueEventInput {
  tenantId: string;
  eventType: RevenueEventType;
  amount: Decimal.Value;
  currency?: string;
  timestamp?: Date;
  subscriptionId?: string;
  customerId?: string;
  invoiceId?: string;
  metadata?: Record<string, string>;
  source?: RevenueSource;
}

export interface LedgerOptions {
  storage?: RevenueEventStorage;
  config?: Pick<RevenueConfig, 'clockSkewToleranceMs' | 'reportingCurrency'>;
  clock?: () => Date;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function compareEvents(a: RevenueEvent, b: RevenueEvent): number {
  const dt = a.timestamp.getTime() - b.timestamp.getTime();
  if (dt !== 0) return dt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function isEventType(value: string): value is RevenueEventType {
  return REVENUE_EVENT_TYPES.some((t) => t === value);
}

function isSource(value: string): value is RevenueSource {
  return REVENUE_SOURCES.some((s) => s === value);
}

export function createRevenueEvent(input: RevenueEventInput): RevenueEvent {
  return {
    id: uuidv4(),
    tenantId: input.tenantId,
    eventType: input.eventType,
    amount: toDecimal(input.amount),
    currency: (input.currency ?? APP_CONFIG.reportingCurrency).toUpperCase(),
    timestamp: input.timestamp ?? new Date(),
    ...(input.subscriptionId ? { subscriptionId: input.subscriptionId } : {}),
    ...(input.customerId ? { customerId: input.customerId } : {}),
    ...(input.invoiceId ? { invoiceId: input.invoiceId } : {}),
    metadata: { ...input.metadata },
    source: input.source ?? 'manual',
  };
}

// ── In-memory storage ─────────────────────────────────────────────────────────

export class InMemoryRevenueEventStorage implements RevenueEventStorage {
  private partitions: Map<string, StoredRevenueEvent[]> = new Map();
  private ids: Set<string> = new Set();

  hasEvent(eventId: string): boolean {
    return this.ids.has(eventId);
  }

  insert(event: StoredRevenueEvent): void {
    const partition = this.partitions.get(event.tenantId) ?? [];
    partition.push(event);
    this.partitions.set(event.tenantId, partition);
    this.ids.add(event.id);
  }

  latestSequence(tenantId: string): number {
    const partition = this.partitions.get(tenantId);
    return partition && partition.length > 0 ? partition[partition.length - 1].sequence : 0;
  }

  watermarks(): Watermarks {
    const out: Watermarks = {};
    for (const tenantId of this.partitions.keys()) {
      out[tenantId] = this.latestSequence(tenantId);
    }
    return out;
  }

  range(tenantId: string | undefined, dateRange: DateRange): StoredRevenueEvent[] {
    const from = dateRange.startDate.getTime();
    const to = dateRange.endDate.getTime();
    const partitions = tenantId !== undefined ? [this.partitions.get(tenantId) ?? []] : [...this.partitions.values()];
    const out: StoredRevenueEvent[] = [];
    for (const partition of partitions) {
      for (const event of partition) {
        const t = event.timestamp.getTime();
        if (t >= from && t <= to) out.push(event);
      }
    }
    return out.sort(compareEvents);
  }

  tenantIds(): string[] {
    return [...this.partitions.keys()].sort();
  }
}

// ── RevenueEventLedger ────────────────────────────────────────────────────────

export class RevenueEventLedger {
  private readonly storage: RevenueEventStorage;
  private readonly sequencer = new TenantSequencer();
  private readonly listeners: Set<AppendListener> = new Set();
  private readonly clockSkewToleranceMs: number;
  private readonly clock: () => Date;

  constructor(options: LedgerOptions = {}) {
    this.storage = options.storage ?? new InMemoryRevenueEventStorage();
    this.clockSkewToleranceMs = (options.config ?? APP_CONFIG).clockSkewToleranceMs;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validates, sequences and stores an event. Rejects with `invalid_event` or
   * `duplicate_event` without changing the ledger.
   */
  async append(event: RevenueEvent): Promise<StoredRevenueEvent> {
    this.validate(event);

    return this.sequencer.run(event.tenantId, () => {
      if (this.storage.hasEvent(event.id)) {
        logger.warn('Duplicate revenue event rejected', { eventId: event.id, tenantId: event.tenantId });
        throw new ServiceError('validation', 'duplicate_event', `Revenue event already recorded: ${event.id}`, {
          eventId: event.id,
        });
      }

      const stored: StoredRevenueEvent = {
        ...event,
        metadata: { ...event.metadata },
        sequence: this.storage.latestSequence(event.tenantId) + 1,
      };
      this.storage.insert(stored);

      logger.debug('Revenue event appended', {
        eventId: stored.id,
        tenantId: stored.tenantId,
        eventType: stored.eventType,
        sequence: stored.sequence,
      });

      this.notify(stored);
      return stored;
    });
  }

  /** Current committed watermarks; pass them to `query` to read a fixed snapshot. */
  snapshot(): Watermarks {
    return this.storage.watermarks();
  }

  query(filter: LedgerFilter, watermarks?: Watermarks): LedgerSnapshot {
    assertValidRange(filter.dateRange);
    const marks = watermarks ?? this.storage.watermarks();
    const types = filter.eventTypes ? new Set(filter.eventTypes) : null;

    const events = this.storage
      .range(filter.tenantId, filter.dateRange)
      .filter((e) => e.sequence <= (marks[e.tenantId] ?? 0) && (!types || types.has(e.eventType)));

    const visible: Watermarks = {};
    for (const [tenantId, seq] of Object.entries(marks)) {
      if (filter.tenantId === undefined || filter.tenantId === tenantId) visible[tenantId] = seq;
    }
    return { events, watermarks: visible };
  }

  listEvents(tenantId: string | undefined, dateRange: DateRange): StoredRevenueEvent[] {
    return this.query({ tenantId, dateRange }).events;
  }

  tenantIds(): string[] {
    return this.storage.tenantIds();
  }

  hasTenant(tenantId: string): boolean {
    return this.storage.latestSequence(tenantId) > 0;
  }

  onAppend(listener: AppendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(event: StoredRevenueEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error('Append listener failed', toError(err), { eventId: event.id });
      }
    }
  }

  private validate(event: RevenueEvent): void {
    const reject = (field: string, message: string): never => {
      logger.warn('Invalid revenue event rejected', { eventId: event.id, field, reason: message });
      throw new ValidationError(field, message, 'invalid_event');
    };

    if (!event.id || event.id.trim() === '') reject('id', 'Event id is required');
    if (!event.tenantId || event.tenantId.trim() === '') reject('tenantId', 'Tenant id is required');
    if (!isEventType(event.eventType)) reject('eventType', `Unknown event type: ${event.eventType}`);
    if (!isSource(event.source)) reject('source', `Unknown revenue source: ${event.source}`);
    if (!(event.amount instanceof Decimal) || !event.amount.isFinite()) reject('amount', 'Amount must be a finite decimal');
    if (event.amount.isNegative()) reject('amount', 'Amount must be a non-negative magnitude');
    if (!isCurrencyCode(event.currency)) reject('currency', `Unrecognised currency code: ${event.currency}`);
    if (!isValidDate(event.timestamp)) reject('timestamp', 'Timestamp is not a valid date');

    const latest = this.clock().getTime() + this.clockSkewToleranceMs;
    if (event.timestamp.getTime() > latest) reject('timestamp', 'Timestamp is in the future beyond clock-skew tolerance');
  }
}

import type BetterSqlite3 from 'better-sqlite3';
import Decimal from 'decimal.js';
import getDb from './index';
import type { RevenueEventStorage, Watermarks } from '../lib/revenueEventLedger';
import {
  REVENUE_EVENT_TYPES,
  REVENUE_SOURCES,
  DateRange,
  RevenueEventType,
  RevenueSource,
  StoredRevenueEvent,
} from '../types/revenue';

interface RevenueEventRow {
  id: string;
  tenantId: string;
  sequence: number;
  eventType: string;
  amount: string;
  currency: string;
  timestamp: number;
  subscriptionId: string | null;
  customerId: string | null;
  invoiceId: string | null;
  metadata: string;
  source: string;
}

function parseEventType(value: string): RevenueEventType {
  const match = REVENUE_EVENT_TYPES.find((t) => t === value);
  if (!match) throw new Error(`Corrupt revenue_events row: unknown eventType ${value}`);
  return match;
}

function parseSource(value: string): RevenueSource {
  const match = REVENUE_SOURCES.find((s) => s === value);
  if (!match) throw new Error(`Corrupt revenue_events row: unknown source ${value}`);
  return match;
}

function parseMetadata(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw || '{}');
  const out: Record<string, string> = {};
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') out[key] = value;
    }
  }
  return out;
}

function rowToEvent(row: RevenueEventRow): StoredRevenueEvent {
  return {
    id: row.id,
    tenantId: row.tenantId,
    sequence: row.sequence,
    eventType: parseEventType(row.eventType),
    amount: new Decimal(row.amount),
    currency: row.currency,
    timestamp: new Date(row.timestamp),
    ...(row.subscriptionId ? { subscriptionId: row.subscriptionId } : {}),
    ...(row.customerId ? { customerId: row.customerId } : {}),
    ...(row.invoiceId ? { invoiceId: row.invoiceId } : {}),
    metadata: parseMetadata(row.metadata),
    source: parseSource(row.source),
  };
}

/** `revenue_events` table: append-only, partitioned by tenant. */
export class SqliteRevenueEventStorage implements RevenueEventStorage {
  constructor(private readonly db: BetterSqlite3.Database = getDb()) {}

  hasEvent(eventId: string): boolean {
    const row = this.db.prepare<[string], { id: string }>('SELECT id FROM revenue_events WHERE id = ?').get(eventId);
    return row !== undefined;
  }

  insert(event: StoredRevenueEvent): void {
    this.db.prepare(`
      INSERT INTO revenue_events
        (id, tenantId, sequence, eventType, amount, currency, timestamp, subscriptionId, customerId, invoiceId, metadata, source)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.id,
      event.tenantId,
      event.sequence,
      event.eventType,
      event.amount.toString(),
      event.currency,
      event.timestamp.getTime(),
      event.subscriptionId || null,
      event.customerId || null,
      event.invoiceId || null,
      JSON.stringify(event.metadata),
      event.source,
    );
  }

  latestSequence(tenantId: string): number {
    const row = this.db
      .prepare<[string], { seq: number | null }>('SELECT MAX(sequence) AS seq FROM revenue_events WHERE tenantId = ?')
      .get(tenantId);
    return row?.seq ?? 0;
  }

  watermarks(): Watermarks {
    const rows = this.db
      .prepare<[], { tenantId: string; seq: number }>('SELECT tenantId, MAX(sequence) AS seq FROM revenue_events GROUP BY tenantId')
      .all();
    const out: Watermarks = {};
    for (const row of rows) out[row.tenantId] = row.seq;
    return out;
  }

  range(tenantId: string | undefined, dateRange: DateRange): StoredRevenueEvent[] {
    const from = dateRange.startDate.getTime();
    const to = dateRange.endDate.getTime();
    const rows =
      tenantId !== undefined
        ? this.db
            .prepare<[string, number, number], RevenueEventRow>(
              'SELECT * FROM revenue_events WHERE tenantId = ? AND timestamp >= ? AND timestamp <= ? ORDER BY timestamp, id',
            )
            .all(tenantId, from, to)
        : this.db
            .prepare<[number, number], RevenueEventRow>(
              'SELECT * FROM revenue_events WHERE timestamp >= ? AND timestamp <= ? ORDER BY timestamp, id',
            )
            .all(from, to);
    return rows.map(rowToEvent);
  }

  tenantIds(): string[] {
    return this.db
      .prepare<[], { tenantId: string }>('SELECT DISTINCT tenantId FROM revenue_events ORDER BY tenantId')
      .all()
      .map((r) => r.tenantId);
  }
}

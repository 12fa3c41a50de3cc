import type BetterSqlite3 from 'better-sqlite3';
import Decimal from 'decimal.js';
import getDb from './index';
import type { CachedSnapshot, MetricsSnapshotCache } from '../lib/metricsAggregator';
import type { RevenueMetrics, RevenuePeriodGranularity } from '../types/revenue';

interface SnapshotRow {
  watermark: string;
  payload: string;
}

interface MetricsPayload {
  tenantId?: string;
  granularity: RevenuePeriodGranularity;
  startDate: number;
  endDate: number;
  currency: string;
  totalRevenue: string;
  recurringRevenue: string;
  usageRevenue: string;
  oneTimeRevenue: string;
  refunds: string;
  netRevenue: string;
  monthlyRecurringRevenue: string;
  annualRecurringRevenue: string;
  customerCount: number;
  averageRevenuePerCustomer: string;
  lifetimeValue: string | null;
  churnRate: number;
  growthRate: number | null;
  eventCount: number;
  asOfSequence: Record<string, number>;
  generatedAt: number;
}

function toPayload(m: RevenueMetrics): MetricsPayload {
  return {
    ...(m.tenantId !== undefined ? { tenantId: m.tenantId } : {}),
    granularity: m.granularity,
    startDate: m.range.startDate.getTime(),
    endDate: m.range.endDate.getTime(),
    currency: m.currency,
    totalRevenue: m.totalRevenue.toString(),
    recurringRevenue: m.recurringRevenue.toString(),
    usageRevenue: m.usageRevenue.toString(),
    oneTimeRevenue: m.oneTimeRevenue.toString(),
    refunds: m.refunds.toString(),
    netRevenue: m.netRevenue.toString(),
    monthlyRecurringRevenue: m.monthlyRecurringRevenue.toString(),
    annualRecurringRevenue: m.annualRecurringRevenue.toString(),
    customerCount: m.customerCount,
    averageRevenuePerCustomer: m.averageRevenuePerCustomer.toString(),
    lifetimeValue: m.lifetimeValue ? m.lifetimeValue.toString() : null,
    churnRate: m.churnRate,
    growthRate: m.growthRate,
    eventCount: m.eventCount,
    asOfSequence: m.asOfSequence,
    generatedAt: m.generatedAt.getTime(),
  };
}

function fromPayload(p: MetricsPayload): RevenueMetrics {
  return {
    ...(p.tenantId !== undefined ? { tenantId: p.tenantId } : {}),
    granularity: p.granularity,
    range: { startDate: new Date(p.startDate), endDate: new Date(p.endDate) },
    currency: p.currency,
    totalRevenue: new Decimal(p.totalRevenue),
    recurringRevenue: new Decimal(p.recurringRevenue),
    usageRevenue: new Decimal(p.usageRevenue),
    oneTimeRevenue: new Decimal(p.oneTimeRevenue),
    refunds: new Decimal(p.refunds),
    netRevenue: new Decimal(p.netRevenue),
    monthlyRecurringRevenue: new Decimal(p.monthlyRecurringRevenue),
    annualRecurringRevenue: new Decimal(p.annualRecurringRevenue),
    customerCount: p.customerCount,
    averageRevenuePerCustomer: new Decimal(p.averageRevenuePerCustomer),
    lifetimeValue: p.lifetimeValue !== null ? new Decimal(p.lifetimeValue) : null,
    churnRate: p.churnRate,
    growthRate: p.growthRate,
    eventCount: p.eventCount,
    asOfSequence: p.asOfSequence,
    generatedAt: new Date(p.generatedAt),
  };
}

function isPayload(value: unknown): value is MetricsPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'granularity' in value &&
    'netRevenue' in value &&
    'asOfSequence' in value
  );
}

/** `metrics_snapshots` table: most recent derived snapshot per (scope, period). */
export class SqliteMetricsSnapshotCache implements MetricsSnapshotCache {
  constructor(private readonly db: BetterSqlite3.Database = getDb()) {}

  get(scope: string, key: string): CachedSnapshot | null {
    const row = this.db
      .prepare<[string, string], SnapshotRow>('SELECT watermark, payload FROM metrics_snapshots WHERE scope = ? AND periodKey = ?')
      .get(scope, key);
    if (!row) return null;
    const parsed: unknown = JSON.parse(row.payload);
    if (!isPayload(parsed)) return null;
    return { watermarkKey: row.watermark, metrics: fromPayload(parsed) };
  }

  put(scope: string, key: string, snapshot: CachedSnapshot): void {
    this.db.prepare(`
      INSERT INTO metrics_snapshots (scope, periodKey, watermark, payload, storedAt)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(scope, periodKey) DO UPDATE SET
        watermark = excluded.watermark, payload = excluded.payload, storedAt = excluded.storedAt
    `).run(scope, key, snapshot.watermarkKey, JSON.stringify(toPayload(snapshot.metrics)), Date.now());
  }

  clear(): void {
    this.db.prepare('DELETE FROM metrics_snapshots').run();
  }
}

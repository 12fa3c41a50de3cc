/**
 * @module metricsAggregator
 * @description Derives revenue metrics and breakdowns from a fixed ledger
 * snapshot. Results depend only on the visible event set and the requested
 * period, so recomputation is deterministic and order-independent.
 *
 * Polarity: amounts are stored as magnitudes. Refunds, chargebacks, credits and
 * downgrades subtract; cancellations carry no revenue; every other type adds.
 */

import Decimal from 'decimal.js';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles } from './config';
import { ComputationError } from './errors';
import { ZERO, sum, toCents, ratio } from './money';
import {
  addMonthsUTC,
  copyRange,
  mrrFactor,
  periodKey,
  previousRange,
  rangeContains,
  resolvePeriod,
} from './dateRange';
import { RevenueEventLedger, Watermarks } from './revenueEventLedger';
import type {
  DateRange,
  RevenueBreakdown,
  RevenueEvent,
  RevenueEventType,
  RevenueMetrics,
  RevenuePeriod,
  RevenueSource,
  StoredRevenueEvent,
  TenantRevenue,
} from '../types/revenue';

const logger = getLogger('metricsAggregator');

const EPOCH = new Date(0);
const PLATFORM_SCOPE = 'platform';

// ── Polarity ──────────────────────────────────────────────────────────────────

export type Polarity = 1 | -1 | 0;

export function eventPolarity(type: RevenueEventType): Polarity {
  switch (type) {
    case 'subscriptionCreated':
    case 'subscriptionRenewed':
    case 'subscriptionUpgraded':
    case 'usageCharge':
    case 'oneTimePayment':
    case 'setupFee':
    case 'addOnPurchase':
      return 1;
    case 'subscriptionDowngraded':
    case 'refund':
    case 'chargeback':
    case 'credit':
      return -1;
    case 'subscriptionCancelled':
      return 0;
    default: {
      const unreachable: never = type;
      throw new ComputationError('calculation_error', `Unknown event type: ${String(unreachable)}`);
    }
  }
}

export function signedAmount(event: RevenueEvent): Decimal {
  const polarity = eventPolarity(event.eventType);
  return polarity === 0 ? ZERO : event.amount.times(polarity);
}

export function totalsByType(events: RevenueEvent[]): Partial<Record<RevenueEventType, Decimal>> {
  const totals: Partial<Record<RevenueEventType, Decimal>> = {};
  for (const event of events) {
    totals[event.eventType] = (totals[event.eventType] ?? ZERO).plus(event.amount);
  }
  return totals;
}

export function netRevenue(events: RevenueEvent[]): Decimal {
  return sum(events.map(signedAmount));
}

interface Components {
  recurring: Decimal;
  usage: Decimal;
  oneTime: Decimal;
  setupFees: Decimal;
  addOns: Decimal;
  oneTimePayments: Decimal;
  refunds: Decimal;
}

function components(events: RevenueEvent[]): Components {
  const t = totalsByType(events);
  const get = (type: RevenueEventType): Decimal => t[type] ?? ZERO;
  const oneTimePayments = get('oneTimePayment');
  const setupFees = get('setupFee');
  const addOns = get('addOnPurchase');
  return {
    recurring: get('subscriptionCreated')
      .plus(get('subscriptionRenewed'))
      .plus(get('subscriptionUpgraded'))
      .minus(get('subscriptionDowngraded')),
    usage: get('usageCharge'),
    oneTime: oneTimePayments.plus(setupFees).plus(addOns),
    setupFees,
    addOns,
    oneTimePayments,
    refunds: get('refund').plus(get('chargeback')).plus(get('credit')),
  };
}

/** Subscriptions whose latest lifecycle event before `at` leaves them running. */
export function activeSubscriptionsAt(events: StoredRevenueEvent[], at: Date): Set<string> {
  const active = new Set<string>();
  const cutoff = at.getTime();
  for (const event of events) {
    if (event.timestamp.getTime() >= cutoff || !event.subscriptionId) continue;
    switch (event.eventType) {
      case 'subscriptionCreated':
      case 'subscriptionRenewed':
      case 'subscriptionUpgraded':
      case 'subscriptionDowngraded':
        active.add(event.subscriptionId);
        break;
      case 'subscriptionCancelled':
        active.delete(event.subscriptionId);
        break;
      default:
        break;
    }
  }
  return active;
}

// ── Snapshot cache ────────────────────────────────────────────────────────────

export interface CachedSnapshot {
  watermarkKey: string;
  metrics: RevenueMetrics;
}

/** Latest derived snapshot per (scope, period) pair. */
export interface MetricsSnapshotCache {
  get(scope: string, key: string): CachedSnapshot | null;
  put(scope: string, key: string, snapshot: CachedSnapshot): void;
  clear(): void;
}

export class InMemoryMetricsSnapshotCache implements MetricsSnapshotCache {
  private store: Map<string, CachedSnapshot> = new Map();

  get(scope: string, key: string): CachedSnapshot | null {
    return this.store.get(`${scope}|${key}`) ?? null;
  }

  put(scope: string, key: string, snapshot: CachedSnapshot): void {
    this.store.set(`${scope}|${key}`, snapshot);
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }
}

export function scopeWatermarks(marks: Watermarks, tenantId?: string): Watermarks {
  if (tenantId === undefined) return { ...marks };
  return marks[tenantId] !== undefined ? { [tenantId]: marks[tenantId] } : {};
}

/** Callers get their own dates and sequence map; the cached snapshot stays untouched. */
function detached(metrics: RevenueMetrics): RevenueMetrics {
  return {
    ...metrics,
    range: copyRange(metrics.range),
    asOfSequence: { ...metrics.asOfSequence },
    generatedAt: new Date(metrics.generatedAt.getTime()),
  };
}

function watermarkKey(marks: Watermarks): string {
  return Object.keys(marks)
    .sort()
    .map((k) => `${k}:${marks[k]}`)
    .join(',');
}

// ── MetricsAggregator ─────────────────────────────────────────────────────────

export interface ComputeOptions {
  /** Return a zero-valued baseline instead of failing on an empty window. */
  allowEmpty?: boolean;
  currency?: string;
  /** Read from this fixed snapshot instead of the current ledger state. */
  watermarks?: Watermarks;
}

export interface MetricsAggregatorOptions {
  ledger: RevenueEventLedger;
  cache?: MetricsSnapshotCache;
  features?: Pick<FeatureToggles, 'caching'>;
  reportingCurrency?: string;
  clock?: () => Date;
}

interface Window {
  range: DateRange;
  inWindow: StoredRevenueEvent[];
  history: StoredRevenueEvent[];
  watermarks: Watermarks;
  currency: string;
}

export class MetricsAggregator {
  private readonly ledger: RevenueEventLedger;
  private readonly cache: MetricsSnapshotCache;
  private readonly caching: boolean;
  private readonly reportingCurrency: string;
  private readonly clock: () => Date;

  constructor(options: MetricsAggregatorOptions) {
    this.ledger = options.ledger;
    this.cache = options.cache ?? new InMemoryMetricsSnapshotCache();
    this.caching = (options.features ?? APP_CONFIG.features).caching;
    this.reportingCurrency = options.reportingCurrency ?? APP_CONFIG.reportingCurrency;
    this.clock = options.clock ?? (() => new Date());
  }

  get ledgerRef(): RevenueEventLedger {
    return this.ledger;
  }

  get currency(): string {
    return this.reportingCurrency;
  }

  computeMetrics(period: RevenuePeriod, tenantId?: string, options: ComputeOptions = {}): RevenueMetrics {
    const range = resolvePeriod(period, this.clock());
    const currency = (options.currency ?? this.reportingCurrency).toUpperCase();
    const marks = scopeWatermarks(options.watermarks ?? this.ledger.snapshot(), tenantId);
    const scope = `${tenantId ?? PLATFORM_SCOPE}:${currency}`;
    const key = periodKey(period, range);
    const wmKey = watermarkKey(marks);

    if (this.caching) {
      const cached = this.cache.get(scope, key);
      if (cached && cached.watermarkKey === wmKey && (cached.metrics.eventCount > 0 || options.allowEmpty)) {
        logger.debug('Metrics snapshot served from cache', { scope, key });
        return detached(cached.metrics);
      }
    }

    const window = this.window(range, tenantId, marks, currency);
    if (window.inWindow.length === 0 && !options.allowEmpty) {
      throw new ComputationError('insufficient_data', 'No revenue events in the requested period', {
        tenantId,
        startDate: range.startDate.toISOString(),
        endDate: range.endDate.toISOString(),
      });
    }

    const metrics = this.derive(period, tenantId, window);
    if (this.caching) this.cache.put(scope, key, { watermarkKey: wmKey, metrics });

    logger.debug('Metrics computed', { scope, key, eventCount: metrics.eventCount });
    return detached(metrics);
  }

  computeBreakdown(period: RevenuePeriod, tenantId?: string, options: ComputeOptions = {}): RevenueBreakdown {
    const range = resolvePeriod(period, this.clock());
    const currency = (options.currency ?? this.reportingCurrency).toUpperCase();
    const marks = scopeWatermarks(options.watermarks ?? this.ledger.snapshot(), tenantId);
    const { inWindow } = this.window(range, tenantId, marks, currency);
    if (inWindow.length === 0 && !options.allowEmpty) {
      throw new ComputationError('insufficient_data', 'No revenue events in the requested period', { tenantId });
    }

    const c = components(inWindow);
    const byTier: Record<string, Decimal> = {};
    const byRegion: Record<string, Decimal> = {};
    const byChannel: Partial<Record<RevenueSource, Decimal>> = {};
    for (const event of inWindow) {
      const amount = signedAmount(event);
      const tier = event.metadata.tier ?? 'unassigned';
      const region = event.metadata.region ?? 'unassigned';
      byTier[tier] = (byTier[tier] ?? ZERO).plus(amount);
      byRegion[region] = (byRegion[region] ?? ZERO).plus(amount);
      byChannel[event.source] = (byChannel[event.source] ?? ZERO).plus(amount);
    }

    return {
      ...(tenantId !== undefined ? { tenantId } : {}),
      range,
      currency,
      subscriptionRevenue: c.recurring,
      usageBasedRevenue: c.usage,
      oneTimeCharges: c.oneTimePayments,
      setupFees: c.setupFees,
      addOnRevenue: c.addOns,
      refundsAndCredits: c.refunds,
      revenueByTier: byTier,
      revenueByRegion: byRegion,
      revenueByChannel: byChannel,
    };
  }

  /**
   * Metrics for `count` complete calendar months ending with the month before
   * `asOf`, oldest first. Empty months yield zero baselines.
   */
  monthlySeries(tenantId: string | undefined, count: number, asOf: Date, watermarks?: Watermarks): RevenueMetrics[] {
    const marks = watermarks ?? this.ledger.snapshot();
    const firstMonth = addMonthsUTC(asOf, -count);
    const series: RevenueMetrics[] = [];
    for (let i = 0; i < count; i++) {
      series.push(
        this.computeMetrics(
          { granularity: 'monthly', reference: addMonthsUTC(firstMonth, i) },
          tenantId,
          { allowEmpty: true, watermarks: marks },
        ),
      );
    }
    return series;
  }

  revenueByTenant(period: RevenuePeriod, tenants: Array<{ id: string; name: string }>): TenantRevenue[] {
    const marks = this.ledger.snapshot();
    return tenants.map((tenant) => {
      const m = this.computeMetrics(period, tenant.id, { allowEmpty: true, watermarks: marks });
      return {
        tenantId: tenant.id,
        tenantName: tenant.name,
        totalRevenue: m.netRevenue,
        subscriptionRevenue: m.recurringRevenue,
        usageRevenue: m.usageRevenue,
        customerCount: m.customerCount,
        averageRevenuePerCustomer: m.averageRevenuePerCustomer,
        granularity: m.granularity,
        range: m.range,
      };
    });
  }

  /** Events of one bucket from a fixed snapshot, in the reporting currency. */
  eventsIn(range: DateRange, tenantId: string | undefined, watermarks: Watermarks): StoredRevenueEvent[] {
    return this.ledger
      .query({ tenantId, dateRange: range }, watermarks)
      .events.filter((e) => e.currency === this.reportingCurrency);
  }

  private window(range: DateRange, tenantId: string | undefined, marks: Watermarks, currency: string): Window {
    const snapshot = this.ledger.query({ tenantId, dateRange: { startDate: EPOCH, endDate: range.endDate } }, marks);
    const history = snapshot.events.filter((e) => e.currency === currency);
    const inWindow = history.filter((e) => rangeContains(range, e.timestamp));
    return { range, inWindow, history, watermarks: snapshot.watermarks, currency };
  }

  private derive(period: RevenuePeriod, tenantId: string | undefined, w: Window): RevenueMetrics {
    const c = components(w.inWindow);
    const gross = c.recurring.plus(c.usage).plus(c.oneTime);
    const net = gross.minus(c.refunds);

    const customers = new Set<string>();
    for (const event of w.inWindow) {
      if (event.customerId && event.eventType !== 'subscriptionCancelled') customers.add(event.customerId);
    }
    const arpc = customers.size > 0 ? toCents(net.dividedBy(customers.size)) : ZERO;

    const activeAtStart = activeSubscriptionsAt(w.history, w.range.startDate);
    const cancelled = new Set<string>();
    for (const event of w.inWindow) {
      if (event.eventType === 'subscriptionCancelled' && event.subscriptionId && activeAtStart.has(event.subscriptionId)) {
        cancelled.add(event.subscriptionId);
      }
    }
    const churnRate = ratio(new Decimal(cancelled.size), new Decimal(activeAtStart.size), 4);

    const prev = previousRange(period, w.range);
    const prevNet = netRevenue(w.history.filter((e) => rangeContains(prev, e.timestamp)));
    const growthRate = prevNet.isZero()
      ? null
      : net.minus(prevNet).dividedBy(prevNet.abs()).toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();

    const mrr = toCents(c.recurring.times(mrrFactor(period, w.range)));

    return {
      ...(tenantId !== undefined ? { tenantId } : {}),
      granularity: period.granularity,
      range: w.range,
      currency: w.currency,
      totalRevenue: gross,
      recurringRevenue: c.recurring,
      usageRevenue: c.usage,
      oneTimeRevenue: c.oneTime,
      refunds: c.refunds,
      netRevenue: net,
      monthlyRecurringRevenue: mrr,
      annualRecurringRevenue: mrr.times(12),
      customerCount: customers.size,
      averageRevenuePerCustomer: arpc,
      lifetimeValue: churnRate > 0 ? toCents(arpc.dividedBy(churnRate)) : null,
      churnRate,
      growthRate,
      eventCount: w.inWindow.length,
      asOfSequence: w.watermarks,
      generatedAt: w.range.endDate,
    };
  }
}

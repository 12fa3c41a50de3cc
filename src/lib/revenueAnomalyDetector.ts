/**
 * @module revenueAnomalyDetector
 * @description Rolling-baseline anomaly detection over revenue buckets. Each
 * bucket is scored against the mean and sample deviation of the buckets that
 * precede it (the bucket itself never feeds its own baseline) and classified as
 * a spike, drop, oscillation, gap or inconsistency.
 */

import Decimal from 'decimal.js';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles, POLICY } from './config';
import { ComputationError, ServiceError, ValidationError } from './errors';
import { ZERO, formatAmount, mean, sampleStdDev, sum, toCents } from './money';
import { bucketStart, shiftBucket, trailingBuckets } from './dateRange';
import { MetricsAggregator, eventPolarity, netRevenue, totalsByType } from './metricsAggregator';
import type { Watermarks } from './revenueEventLedger';
import {
  REVENUE_EVENT_TYPES,
  AnomalyMetric,
  AnomalySeverity,
  AnomalyType,
  DateRange,
  RevenueAnomaly,
  RevenueEventType,
  StoredRevenueEvent,
} from '../types/revenue';

const logger = getLogger('revenueAnomalyDetector');

// ── Types ─────────────────────────────────────────────────────────────────────

export type AnomalyGranularity = 'daily' | 'weekly' | 'monthly';

export interface DetectOptions {
  tenantId?: string;
  metric?: AnomalyMetric;
  granularity?: AnomalyGranularity;
  lookbackBuckets?: number;
  baselineWindow?: number;
  asOf?: Date;
  watermarks?: Watermarks;
}

interface Bucket {
  range: DateRange;
  events: StoredRevenueEvent[];
  value: Decimal;
  gross: Decimal;
  refunds: Decimal;
}

// ── Statistical Helpers ───────────────────────────────────────────────────────

export function severityFor(absDeviation: number): AnomalySeverity | null {
  const bands = POLICY.anomalyBands;
  if (absDeviation >= bands.critical) return 'critical';
  if (absDeviation >= bands.high) return 'high';
  if (absDeviation >= bands.medium) return 'medium';
  if (absDeviation >= bands.low) return 'low';
  return null;
}

function grossOf(events: StoredRevenueEvent[]): Decimal {
  return sum(events.filter((e) => eventPolarity(e.eventType) === 1).map((e) => e.amount));
}

function refundsOf(events: StoredRevenueEvent[]): Decimal {
  return sum(
    events
      .filter((e) => e.eventType === 'refund' || e.eventType === 'chargeback' || e.eventType === 'credit')
      .map((e) => e.amount),
  );
}

export function metricValue(metric: AnomalyMetric, events: StoredRevenueEvent[]): Decimal {
  switch (metric) {
    case 'netRevenue':
      return netRevenue(events);
    case 'grossRevenue':
      return grossOf(events);
    case 'refunds':
      return refundsOf(events);
    case 'eventCount':
      return new Decimal(events.length);
    default: {
      const unreachable: never = metric;
      throw new ValidationError('metric', `Unknown metric: ${String(unreachable)}`);
    }
  }
}

/** True when consecutive deltas alternate in sign and each exceeds `threshold`. */
export function isOscillating(deltas: Decimal[], threshold: Decimal): boolean {
  if (deltas.length < 2) return false;
  for (let i = 0; i < deltas.length; i++) {
    if (deltas[i].abs().lte(threshold)) return false;
    if (i > 0 && deltas[i].isPositive() === deltas[i - 1].isPositive()) return false;
  }
  return true;
}

function recommendedActions(type: AnomalyType): string[] {
  switch (type) {
    case 'suddenDrop':
      return [
        'Check payment provider status and failed charge reports',
        'Review recent cancellations and downgrades',
      ];
    case 'suddenSpike':
      return ['Confirm the spike is not caused by duplicate billing', 'Identify the promotion or event driving bookings'];
    case 'unusualPattern':
      return ['Review billing cycle alignment', 'Inspect batch imports for irregular timing'];
    case 'missingData':
      return ['Verify the billing webhook pipeline is delivering events', 'Backfill the missing period from the provider'];
    case 'dataInconsistency':
      return ['Reconcile refunds against original invoices', 'Audit credits issued in the period'];
    default: {
      const unreachable: never = type;
      throw new ValidationError('anomalyType', `Unknown anomaly type: ${String(unreachable)}`);
    }
  }
}

// ── RevenueAnomalyDetector ────────────────────────────────────────────────────

export class RevenueAnomalyDetector {
  private readonly aggregator: MetricsAggregator;
  private readonly enabled: boolean;
  private readonly clock: () => Date;

  constructor(
    aggregator: MetricsAggregator,
    options: { features?: Pick<FeatureToggles, 'anomalyDetection'>; clock?: () => Date } = {},
  ) {
    this.aggregator = aggregator;
    this.enabled = (options.features ?? APP_CONFIG.features).anomalyDetection;
    this.clock = options.clock ?? (() => new Date());
  }

  detect(options: DetectOptions = {}): RevenueAnomaly[] {
    const metric = options.metric ?? 'netRevenue';
    const granularity = options.granularity ?? 'daily';
    const lookback = options.lookbackBuckets ?? POLICY.anomalyLookbackBuckets;
    const window = options.baselineWindow ?? POLICY.anomalyBaselineWindow;

    if (!Number.isInteger(lookback) || lookback < 1) {
      throw new ValidationError('lookbackBuckets', 'lookbackBuckets must be a positive integer');
    }
    if (!Number.isInteger(window) || window < 2) {
      throw new ValidationError('baselineWindow', 'baselineWindow must be an integer of at least 2');
    }
    if (!this.enabled) {
      logger.debug('Anomaly detection disabled, skipping', { tenantId: options.tenantId });
      return [];
    }

    try {
      const anomalies = this.scan(options.tenantId, metric, granularity, lookback, window, options);
      if (anomalies.length > 0) {
        logger.warn('Revenue anomalies detected', {
          tenantId: options.tenantId,
          metric,
          count: anomalies.length,
          critical: anomalies.filter((a) => a.severity === 'critical').length,
        });
      }
      return anomalies;
    } catch (err) {
      if (err instanceof ServiceError) throw err;
      throw new ComputationError('anomaly_detection_failed', 'Anomaly detection failed', {
        tenantId: options.tenantId,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private scan(
    tenantId: string | undefined,
    metric: AnomalyMetric,
    granularity: AnomalyGranularity,
    lookback: number,
    window: number,
    options: DetectOptions,
  ): RevenueAnomaly[] {
    const asOf = options.asOf ?? this.clock();
    const marks = options.watermarks ?? this.aggregator.ledgerRef.snapshot();
    // The bucket holding asOf is still filling; scoring ends at the one before it.
    const lastComplete = shiftBucket(granularity, bucketStart(granularity, asOf), -1);
    const ranges = trailingBuckets(granularity, lastComplete, lookback + window);
    const span: DateRange = { startDate: ranges[0].startDate, endDate: ranges[ranges.length - 1].endDate };
    const events = this.aggregator.eventsIn(span, tenantId, marks);

    const buckets: Bucket[] = ranges.map((range) => {
      const inBucket = events.filter(
        (e) => e.timestamp.getTime() >= range.startDate.getTime() && e.timestamp.getTime() <= range.endDate.getTime(),
      );
      return {
        range,
        events: inBucket,
        value: metricValue(metric, inBucket),
        gross: grossOf(inBucket),
        refunds: refundsOf(inBucket),
      };
    });

    const anomalies: RevenueAnomaly[] = [];
    for (let i = window; i < buckets.length; i++) {
      const anomaly = this.evaluate(buckets, i, window, metric, tenantId);
      if (anomaly) anomalies.push(anomaly);
    }
    return anomalies;
  }

  private evaluate(
    buckets: Bucket[],
    index: number,
    window: number,
    metric: AnomalyMetric,
    tenantId: string | undefined,
  ): RevenueAnomaly | null {
    const bucket = buckets[index];
    const baseline = buckets.slice(index - window, index);
    const values = baseline.map((b) => b.value);
    const avg = mean(values);
    const sigma = sampleStdDev(values);
    const delta = bucket.value.minus(avg);
    const z = sigma.isZero() ? null : delta.dividedBy(sigma).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
    const banded = z === null ? (delta.isZero() ? null : 'critical') : severityFor(Math.abs(z));

    let type: AnomalyType | null = null;
    let severity: AnomalySeverity | null = null;

    if (bucket.events.length === 0 && avg.gt(0)) {
      type = 'missingData';
      severity = banded ?? 'medium';
    } else if (bucket.refunds.gt(bucket.gross)) {
      type = 'dataInconsistency';
      severity = banded ?? 'high';
    } else if (banded) {
      type = delta.isPositive() ? 'suddenSpike' : 'suddenDrop';
      severity = banded;
    } else if (index >= 4 && !sigma.isZero()) {
      const deltas: Decimal[] = [];
      for (let k = index - 3; k <= index; k++) deltas.push(buckets[k].value.minus(buckets[k - 1].value));
      if (isOscillating(deltas, sigma)) {
        type = 'unusualPattern';
        severity = 'low';
      }
    }

    if (!type || !severity) return null;

    const scope = tenantId ?? 'platform';
    const start = bucket.range.startDate.toISOString();
    return {
      id: `${scope}:${metric}:${start}`,
      detectedAt: bucket.range.endDate,
      bucket: bucket.range,
      metric,
      anomalyType: type,
      severity,
      description: this.describe(type, metric, bucket, avg, z),
      observedValue: toCents(bucket.value),
      expectedValue: toCents(avg),
      deviation: z,
      affectedRevenue: toCents(delta),
      possibleCauses: this.causes(bucket, baseline),
      recommendedActions: recommendedActions(type),
      ...(tenantId !== undefined ? { tenantId } : {}),
    };
  }

  /** Top three event types by absolute move against their baseline mean. */
  private causes(bucket: Bucket, baseline: Bucket[]): string[] {
    const current = totalsByType(bucket.events);
    const history = baseline.map((b) => totalsByType(b.events));
    const moves: Array<{ type: RevenueEventType; move: Decimal }> = [];
    for (const type of REVENUE_EVENT_TYPES) {
      const expected = mean(history.map((h) => h[type] ?? ZERO));
      const move = (current[type] ?? ZERO).minus(expected);
      if (!move.isZero()) moves.push({ type, move });
    }
    moves.sort((a, b) => b.move.abs().comparedTo(a.move.abs()) || (a.type < b.type ? -1 : 1));
    return moves.slice(0, 3).map((m) => `${m.type} ${m.move.isPositive() ? 'up' : 'down'} ${toCents(m.move.abs()).toFixed(2)} versus baseline`);
  }

  private describe(type: AnomalyType, metric: AnomalyMetric, bucket: Bucket, avg: Decimal, z: number | null): string {
    const observed =
      metric === 'eventCount' ? `${bucket.value.toString()} events` : formatAmount(bucket.value, this.aggregator.currency);
    const expected = toCents(avg).toFixed(2);
    const sigmas = z === null ? 'with a flat baseline' : `${Math.abs(z).toFixed(2)}σ from baseline`;
    switch (type) {
      case 'suddenDrop':
        return `${metric} dropped to ${observed} against an expected ${expected} (${sigmas})`;
      case 'suddenSpike':
        return `${metric} spiked to ${observed} against an expected ${expected} (${sigmas})`;
      case 'unusualPattern':
        return `${metric} is oscillating around ${expected}`;
      case 'missingData':
        return `No revenue events recorded where about ${expected} was expected`;
      case 'dataInconsistency':
        return `Refunds of ${toCents(bucket.refunds).toFixed(2)} exceed gross revenue of ${toCents(bucket.gross).toFixed(2)}`;
      default: {
        const unreachable: never = type;
        return String(unreachable);
      }
    }
  }
}

import Decimal from 'decimal.js';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles, POLICY } from './config';
import { ValidationError } from './errors';
import { ZERO, formatAmount } from './money';
import { isAlignedBucket, lastCompletedQuarter, shiftBucket } from './dateRange';
import { MetricsAggregator, signedAmount } from './metricsAggregator';
import type { Watermarks } from './revenueEventLedger';
import type {
  BenchmarkComparison,
  GrowthDriver,
  GrowthTrend,
  RevenueEventType,
  RevenueGrowthAnalysis,
  RevenueMetrics,
} from '../types/revenue';

const logger = getLogger('revenueGrowthAnalyzer');

export interface GrowthOptions {
  asOf?: Date;
  /** Number of trailing monthly growth rates used for trend classification. */
  samples?: number;
  watermarks?: Watermarks;
}

/**
 * Deterministic classification of the last K growth rates: fewer than two
 * samples is steady, more than one sign change is volatile, then strictly
 * increasing or decreasing runs, otherwise steady.
 */
export function classifyTrend(rates: number[]): GrowthTrend {
  if (rates.length < 2) return 'steady';

  let signChanges = 0;
  for (let i = 1; i < rates.length; i++) {
    const prev = Math.sign(rates[i - 1]);
    const cur = Math.sign(rates[i]);
    if (prev !== 0 && cur !== 0 && prev !== cur) signChanges++;
  }
  if (signChanges > 1) return 'volatile';

  let increasing = true;
  let decreasing = true;
  for (let i = 1; i < rates.length; i++) {
    if (rates[i] <= rates[i - 1]) increasing = false;
    if (rates[i] >= rates[i - 1]) decreasing = false;
  }
  if (increasing) return 'accelerating';
  if (decreasing) return 'declining';
  return 'steady';
}

function growth(current: Decimal, previous: Decimal): number | null {
  if (previous.isZero()) return null;
  return current.minus(previous).dividedBy(previous.abs()).toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
}

export class RevenueGrowthAnalyzer {
  private readonly aggregator: MetricsAggregator;
  private readonly benchmarking: boolean;
  private readonly clock: () => Date;

  constructor(
    aggregator: MetricsAggregator,
    options: { features?: Pick<FeatureToggles, 'benchmarking'>; clock?: () => Date } = {},
  ) {
    this.aggregator = aggregator;
    this.benchmarking = (options.features ?? APP_CONFIG.features).benchmarking;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Growth between two calendar-aligned, complete, non-overlapping windows of
   * the same granularity. `null` when the previous window had no net revenue.
   */
  compareWindows(current: RevenueMetrics, previous: RevenueMetrics, asOf: Date = this.clock()): number | null {
    const granularity = current.granularity;
    if (granularity === 'custom' || previous.granularity !== granularity) {
      throw new ValidationError('period', 'Growth windows must share one calendar granularity', 'partial_period');
    }
    if (!isAlignedBucket(granularity, current.range) || !isAlignedBucket(granularity, previous.range)) {
      throw new ValidationError('period', 'Growth windows must be calendar-aligned buckets', 'partial_period');
    }
    if (previous.range.endDate.getTime() >= current.range.startDate.getTime()) {
      throw new ValidationError('period', 'Growth windows must not overlap', 'partial_period');
    }
    if (current.range.endDate.getTime() >= asOf.getTime()) {
      throw new ValidationError('period', 'Cannot compare a period that has not completed', 'partial_period');
    }
    return growth(current.netRevenue, previous.netRevenue);
  }

  analyzeGrowth(tenantId?: string, options: GrowthOptions = {}): RevenueGrowthAnalysis {
    const asOf = options.asOf ?? this.clock();
    const samples = options.samples ?? POLICY.growthTrendSamples;
    if (!Number.isInteger(samples) || samples < 1) {
      throw new ValidationError('samples', 'samples must be a positive integer');
    }
    const marks = options.watermarks ?? this.aggregator.ledgerRef.snapshot();
    const quarter = (reference: Date): RevenueMetrics =>
      this.aggregator.computeMetrics({ granularity: 'quarterly', reference }, tenantId, { allowEmpty: true, watermarks: marks });

    const lastQ = lastCompletedQuarter(asOf);
    const current = quarter(lastQ.startDate);
    const previous = quarter(shiftBucket('quarterly', lastQ.startDate, -1));
    const yearAgo = quarter(shiftBucket('quarterly', lastQ.startDate, -4));

    const months = this.aggregator.monthlySeries(tenantId, samples, asOf, marks);
    const rates = months.map((m) => m.growthRate).filter((r): r is number => r !== null);
    const trend = classifyTrend(rates);
    const projected =
      rates.length > 0
        ? Math.round((rates.reduce((s, r) => s + r, 0) / rates.length) * 10_000) / 10_000
        : null;

    const analysis: RevenueGrowthAnalysis = {
      ...(tenantId !== undefined ? { tenantId } : {}),
      currentGrowthRate: rates.length > 0 ? rates[rates.length - 1] : null,
      quarterOverQuarterGrowth: this.compareWindows(current, previous, asOf),
      yearOverYearGrowth: this.compareWindows(current, yearAgo, asOf),
      growthTrend: trend,
      recentGrowthRates: rates,
      growthDrivers: this.drivers(tenantId, months[months.length - 1], marks),
      projectedGrowth: projected,
      benchmarkComparison: this.benchmark(projected),
    };

    logger.debug('Growth analysed', { tenantId, trend, rates });
    return analysis;
  }

  /** Per event type contribution to the change in net revenue between the last two months. */
  private drivers(tenantId: string | undefined, last: RevenueMetrics | undefined, marks: Watermarks): GrowthDriver[] {
    if (!last) return [];
    const previousRange = {
      startDate: shiftBucket('monthly', last.range.startDate, -1),
      endDate: new Date(last.range.startDate.getTime() - 1),
    };
    const byType = (events: ReturnType<MetricsAggregator['eventsIn']>): Map<RevenueEventType, Decimal> => {
      const totals = new Map<RevenueEventType, Decimal>();
      for (const e of events) totals.set(e.eventType, (totals.get(e.eventType) ?? ZERO).plus(signedAmount(e)));
      return totals;
    };
    const now = byType(this.aggregator.eventsIn(last.range, tenantId, marks));
    const before = byType(this.aggregator.eventsIn(previousRange, tenantId, marks));

    const types = new Set<RevenueEventType>([...now.keys(), ...before.keys()]);
    const drivers: GrowthDriver[] = [];
    for (const type of types) {
      const contribution = (now.get(type) ?? ZERO).minus(before.get(type) ?? ZERO);
      if (contribution.isZero()) continue;
      drivers.push({
        name: type,
        contribution,
        description: `${type} moved net revenue by ${formatAmount(contribution, this.aggregator.currency)}`,
      });
    }
    return drivers.sort((a, b) => b.contribution.abs().comparedTo(a.contribution.abs()) || (a.name < b.name ? -1 : 1));
  }

  private benchmark(projected: number | null): BenchmarkComparison | null {
    if (!this.benchmarking || projected === null) return null;
    const industry = POLICY.industryMonthlyGrowth;
    const comparison = projected > industry + 0.01 ? 'aboveAverage' : projected < industry - 0.01 ? 'belowAverage' : 'average';
    return {
      industryAverage: industry,
      comparison,
      benchmark: 'Golf booking SaaS monthly revenue growth',
    };
  }
}

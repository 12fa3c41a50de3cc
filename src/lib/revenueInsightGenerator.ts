/**
 * @module revenueInsightGenerator
 * @description Turns metrics, growth, anomalies and forecasts into short,
 * actionable insights. Each insight expires a week after it is created.
 */

import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles, POLICY } from './config';
import { ServiceError } from './errors';
import { formatAmount, sum, toCents } from './money';
import { addMonthsUTC } from './dateRange';
import { MetricsAggregator } from './metricsAggregator';
import { RevenueGrowthAnalyzer } from './revenueGrowthAnalyzer';
import { RevenueAnomalyDetector } from './revenueAnomalyDetector';
import { RevenueForecastEngine, totalForecast } from './revenueForecastEngine';
import type { Watermarks } from './revenueEventLedger';
import type {
  ImpactLevel,
  InsightType,
  RevenueAnomaly,
  RevenueForecast,
  RevenueGrowthAnalysis,
  RevenueInsight,
  RevenueMetrics,
} from '../types/revenue';

const logger = getLogger('revenueInsightGenerator');

const THRESHOLDS = {
  highChurn: 0.05,
  severeChurn: 0.1,
  refundRatio: 0.05,
  usageShare: 0.3,
  usagePricingUplift: 0.1,
  forecastMonths: 3,
} as const;

export interface InsightInputs {
  metrics: RevenueMetrics;
  growth: RevenueGrowthAnalysis | null;
  anomalies: RevenueAnomaly[];
  forecast: RevenueForecast[];
}

interface Draft {
  title: string;
  description: string;
  insightType: InsightType;
  impact: ImpactLevel;
  recommendation: string;
  potentialValue: Decimal | null;
  confidence: number;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** Rules applied in a fixed order; the output order follows it. */
export function deriveInsights(inputs: InsightInputs, createdAt: Date, tenantId?: string): RevenueInsight[] {
  const { metrics, growth, anomalies, forecast } = inputs;
  const currency = metrics.currency;
  const drafts: Draft[] = [];

  if (metrics.churnRate > THRESHOLDS.highChurn) {
    drafts.push({
      title: 'High subscription churn',
      description: `Churn reached ${percent(metrics.churnRate)} in the period.`,
      insightType: 'warning',
      impact: metrics.churnRate > THRESHOLDS.severeChurn ? 'high' : 'medium',
      recommendation: 'Review cancellation reasons and reach out to at-risk courses before renewal.',
      potentialValue: toCents(metrics.monthlyRecurringRevenue.times(metrics.churnRate)),
      confidence: 0.85,
    });
  }

  if (metrics.totalRevenue.gt(0)) {
    const refundRatio = metrics.refunds.dividedBy(metrics.totalRevenue).toNumber();
    if (refundRatio > THRESHOLDS.refundRatio) {
      drafts.push({
        title: 'Elevated refunds',
        description: `Refunds and credits were ${percent(refundRatio)} of gross revenue (${formatAmount(metrics.refunds, currency)}).`,
        insightType: 'warning',
        impact: 'medium',
        recommendation: 'Audit booking cancellations and payment disputes for recurring causes.',
        potentialValue: metrics.refunds,
        confidence: 0.8,
      });
    }

    const usageShare = metrics.usageRevenue.dividedBy(metrics.totalRevenue).toNumber();
    if (usageShare >= THRESHOLDS.usageShare) {
      drafts.push({
        title: 'Strong usage-based revenue',
        description: `Usage charges make up ${percent(usageShare)} of gross revenue.`,
        insightType: 'opportunity',
        impact: 'medium',
        recommendation: 'Offer higher usage tiers or bundles to heavy users.',
        potentialValue: toCents(metrics.usageRevenue.times(THRESHOLDS.usagePricingUplift)),
        confidence: 0.7,
      });
    }
  }

  if (growth && (growth.growthTrend === 'accelerating' || growth.growthTrend === 'declining')) {
    const accelerating = growth.growthTrend === 'accelerating';
    const rates = growth.recentGrowthRates.map(percent).join(', ');
    drafts.push({
      title: accelerating ? 'Revenue growth is accelerating' : 'Revenue growth is slowing',
      description: `Recent monthly growth rates: ${rates}.`,
      insightType: 'trend',
      impact: accelerating ? 'medium' : 'high',
      recommendation: accelerating
        ? 'Increase capacity and marketing spend while demand is rising.'
        : 'Investigate which courses or channels are losing bookings.',
      potentialValue:
        accelerating && growth.projectedGrowth !== null
          ? toCents(metrics.netRevenue.times(growth.projectedGrowth))
          : null,
      confidence: 0.75,
    });
  }

  if (forecast.length > 0) {
    const upside = totalForecast(forecast, 'optimistic').minus(totalForecast(forecast, 'realistic'));
    if (upside.gt(0)) {
      const first = forecast.find((f) => f.scenario === 'realistic');
      drafts.push({
        title: 'Forecast upside',
        description: `The optimistic scenario adds ${formatAmount(upside, currency)} over the forecast horizon.`,
        insightType: 'prediction',
        impact: 'low',
        recommendation: 'Target peak-season tee times with dynamic pricing to capture the upside.',
        potentialValue: toCents(upside),
        confidence: first ? first.confidence : 0.5,
      });
    }
  }

  const critical = anomalies.filter((a) => a.severity === 'critical');
  if (critical.length > 0) {
    drafts.push({
      title: 'Critical revenue anomalies',
      description: `${critical.length} critical anomalies detected, latest: ${critical[critical.length - 1].description}`,
      insightType: 'warning',
      impact: 'critical',
      recommendation: 'Verify payment processing and data feeds for the affected periods.',
      potentialValue: toCents(sum(critical.map((a) => a.affectedRevenue.abs()))),
      confidence: 0.9,
    });
  }

  const expiresAt = new Date(createdAt.getTime() + POLICY.insightTtlMs);
  return drafts.map((d) => ({
    id: uuidv4(),
    ...d,
    createdAt,
    expiresAt,
    ...(tenantId !== undefined ? { tenantId } : {}),
  }));
}

// ── RevenueInsightGenerator ───────────────────────────────────────────────────

export interface InsightGeneratorOptions {
  aggregator: MetricsAggregator;
  growth: RevenueGrowthAnalyzer;
  anomalies: RevenueAnomalyDetector;
  forecast: RevenueForecastEngine;
  features?: Pick<FeatureToggles, 'insightGeneration'>;
  clock?: () => Date;
}

export class RevenueInsightGenerator {
  private readonly enabled: boolean;
  private readonly clock: () => Date;

  constructor(private readonly options: InsightGeneratorOptions) {
    this.enabled = (options.features ?? APP_CONFIG.features).insightGeneration;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Insights for the last complete month before `asOf`. */
  generate(tenantId?: string, opts: { asOf?: Date; watermarks?: Watermarks } = {}): RevenueInsight[] {
    if (!this.enabled) return [];

    const asOf = opts.asOf ?? this.clock();
    const marks = opts.watermarks ?? this.options.aggregator.ledgerRef.snapshot();
    const metrics = this.options.aggregator.computeMetrics(
      { granularity: 'monthly', reference: addMonthsUTC(asOf, -1) },
      tenantId,
      { allowEmpty: true, watermarks: marks },
    );

    const inputs: InsightInputs = {
      metrics,
      growth: this.options.growth.analyzeGrowth(tenantId, { asOf, watermarks: marks }),
      anomalies: this.options.anomalies.detect({ tenantId, asOf, watermarks: marks }),
      forecast: this.forecastOrEmpty(tenantId, asOf, marks),
    };

    const insights = deriveInsights(inputs, asOf, tenantId);
    logger.info('Revenue insights generated', { tenantId, count: insights.length });
    return insights;
  }

  private forecastOrEmpty(tenantId: string | undefined, asOf: Date, marks: Watermarks): RevenueForecast[] {
    try {
      return this.options.forecast.forecast(tenantId, THRESHOLDS.forecastMonths, { asOf, watermarks: marks });
    } catch (err) {
      if (err instanceof ServiceError && err.code === 'forecast_failed') {
        logger.debug('Forecast unavailable for insights', { tenantId, reason: err.message });
        return [];
      }
      throw err;
    }
  }
}


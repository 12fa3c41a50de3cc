import { describe, it, expect } from '@jest/globals';
import Decimal from 'decimal.js';
import { RevenueInsightGenerator, deriveInsights } from '../../../src/lib/revenueInsightGenerator';
import { RevenueGrowthAnalyzer } from '../../../src/lib/revenueGrowthAnalyzer';
import { RevenueAnomalyDetector } from '../../../src/lib/revenueAnomalyDetector';
import { RevenueForecastEngine } from '../../../src/lib/revenueForecastEngine';
import type {
  RevenueAnomaly,
  RevenueForecast,
  RevenueGrowthAnalysis,
  RevenueMetrics,
} from '../../../src/types/revenue';
import { appendAll, ev, features, revenueStack } from '../../helpers/fixtures';

const CREATED = new Date('2024-08-01T00:00:00.000Z');
const JULY = { startDate: new Date('2024-07-01T00:00:00.000Z'), endDate: new Date('2024-07-31T23:59:59.999Z') };

function metrics(overrides: Partial<RevenueMetrics> = {}): RevenueMetrics {
  return {
    tenantId: 't1',
    granularity: 'monthly',
    range: JULY,
    currency: 'USD',
    totalRevenue: new Decimal(1000),
    recurringRevenue: new Decimal(600),
    usageRevenue: new Decimal(100),
    oneTimeRevenue: new Decimal(300),
    refunds: new Decimal(20),
    netRevenue: new Decimal(980),
    monthlyRecurringRevenue: new Decimal(600),
    annualRecurringRevenue: new Decimal(7200),
    customerCount: 10,
    averageRevenuePerCustomer: new Decimal(98),
    lifetimeValue: null,
    churnRate: 0,
    growthRate: null,
    eventCount: 12,
    asOfSequence: { t1: 12 },
    generatedAt: JULY.endDate,
    ...overrides,
  };
}

function growth(overrides: Partial<RevenueGrowthAnalysis> = {}): RevenueGrowthAnalysis {
  return {
    tenantId: 't1',
    currentGrowthRate: 0.02,
    quarterOverQuarterGrowth: null,
    yearOverYearGrowth: null,
    growthTrend: 'steady',
    recentGrowthRates: [0.02, 0.01, 0.02],
    growthDrivers: [],
    projectedGrowth: 0.0167,
    benchmarkComparison: null,
    ...overrides,
  };
}

function point(scenario: RevenueForecast['scenario'], amount: number, confidence: number): RevenueForecast {
  const predictedRevenue = new Decimal(amount);
  return {
    month: new Date('2024-08-01T00:00:00.000Z'),
    monthsAhead: 1,
    scenario,
    predictedRevenue,
    confidenceInterval: { lowerBound: predictedRevenue, upperBound: predictedRevenue, confidence },
    confidence,
    factors: [],
  };
}

function criticalAnomaly(affected: number, description: string): RevenueAnomaly {
  return {
    id: `t1:netRevenue:${description}`,
    detectedAt: JULY.endDate,
    bucket: JULY,
    metric: 'netRevenue',
    anomalyType: 'suddenDrop',
    severity: 'critical',
    description,
    observedValue: new Decimal(0),
    expectedValue: new Decimal(affected),
    deviation: null,
    affectedRevenue: new Decimal(-affected),
    possibleCauses: [],
    recommendedActions: [],
  };
}

describe('deriveInsights', () => {
  it('returns nothing for healthy metrics', () => {
    expect(deriveInsights({ metrics: metrics(), growth: growth(), anomalies: [], forecast: [] }, CREATED)).toEqual([]);
  });

  it('applies every rule in a fixed order', () => {
    const insights = deriveInsights(
      {
        metrics: metrics({ churnRate: 0.12, refunds: new Decimal(100), usageRevenue: new Decimal(400), netRevenue: new Decimal(900) }),
        growth: growth({ growthTrend: 'accelerating', projectedGrowth: 0.1, recentGrowthRates: [0.05, 0.08, 0.12] }),
        anomalies: [criticalAnomaly(40, 'first'), criticalAnomaly(60, 'second')],
        forecast: [point('realistic', 500, 0.65), point('optimistic', 560, 0.65)],
      },
      CREATED,
      't1',
    );

    expect(insights.map((i) => [i.insightType, i.impact, i.potentialValue?.toFixed(2) ?? null, i.confidence])).toEqual([
      ['warning', 'high', '72.00', 0.85],
      ['warning', 'medium', '100.00', 0.8],
      ['opportunity', 'medium', '40.00', 0.7],
      ['trend', 'medium', '90.00', 0.75],
      ['prediction', 'low', '60.00', 0.65],
      ['warning', 'critical', '100.00', 0.9],
    ]);
    expect(insights[0].description).toBe('Churn reached 12.0% in the period.');
    expect(insights[3].description).toBe('Recent monthly growth rates: 5.0%, 8.0%, 12.0%.');
    expect(insights[5].description).toBe('2 critical anomalies detected, latest: second');
    for (const insight of insights) {
      expect(insight.tenantId).toBe('t1');
      expect(insight.createdAt).toBe(CREATED);
      expect(insight.expiresAt?.toISOString()).toBe('2024-08-08T00:00:00.000Z');
    }
  });

  it('rates moderate churn as medium impact', () => {
    const [insight] = deriveInsights({ metrics: metrics({ churnRate: 0.07 }), growth: null, anomalies: [], forecast: [] }, CREATED);
    expect(insight.impact).toBe('medium');
    expect(insight.potentialValue?.toFixed(2)).toBe('42.00');
  });

  it('gives declining growth high impact and no potential value', () => {
    const [insight] = deriveInsights(
      { metrics: metrics(), growth: growth({ growthTrend: 'declining' }), anomalies: [], forecast: [] },
      CREATED,
    );
    expect(insight.title).toBe('Revenue growth is slowing');
    expect(insight.impact).toBe('high');
    expect(insight.potentialValue).toBeNull();
  });
});

describe('RevenueInsightGenerator', () => {
  async function generator(insightGeneration: boolean) {
    const stack = revenueStack('2024-08-01T12:00:00.000Z');
    await appendAll(stack.ledger, [
      ev('t1', 'usageCharge', 500, '2024-07-10T10:00:00.000Z', { customerId: 'c1' }),
      ev('t1', 'oneTimePayment', 500, '2024-07-11T10:00:00.000Z', { customerId: 'c2' }),
    ]);
    const f = features({ insightGeneration });
    const opts = { features: f, clock: stack.clock };
    return new RevenueInsightGenerator({
      aggregator: stack.aggregator,
      growth: new RevenueGrowthAnalyzer(stack.aggregator, opts),
      anomalies: new RevenueAnomalyDetector(stack.aggregator, opts),
      forecast: new RevenueForecastEngine(stack.aggregator, opts),
      features: f,
      clock: stack.clock,
    });
  }

  it('reads the previous month and tolerates a missing forecast', async () => {
    const insights = (await generator(true)).generate('t1');
    const usage = insights.find((i) => i.insightType === 'opportunity');
    expect(usage?.description).toBe('Usage charges make up 50.0% of gross revenue.');
    expect(usage?.potentialValue?.toFixed(2)).toBe('50.00');
    expect(insights.some((i) => i.insightType === 'prediction')).toBe(false);
  });

  it('returns nothing when insight generation is disabled', async () => {
    expect((await generator(false)).generate('t1')).toEqual([]);
  });
});

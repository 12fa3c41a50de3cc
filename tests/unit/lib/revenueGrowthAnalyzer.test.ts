import { describe, it, expect } from '@jest/globals';
import { RevenueGrowthAnalyzer, classifyTrend } from '../../../src/lib/revenueGrowthAnalyzer';
import { appendAll, captureError, ev, features, revenueStack } from '../../helpers/fixtures';

const NOW = '2024-07-15T12:00:00.000Z';

async function acceleratingTenant(benchmarking = false) {
  const stack = revenueStack(NOW);
  await appendAll(stack.ledger, [
    ev('t1', 'usageCharge', '100', '2024-03-10T10:00:00.000Z'),
    ev('t1', 'usageCharge', '105', '2024-04-10T10:00:00.000Z'),
    ev('t1', 'usageCharge', '113.4', '2024-05-10T10:00:00.000Z'),
    ev('t1', 'usageCharge', '127.008', '2024-06-10T10:00:00.000Z'),
  ]);
  const analyzer = new RevenueGrowthAnalyzer(stack.aggregator, { features: features({ benchmarking }), clock: stack.clock });
  return { ...stack, analyzer };
}

describe('classifyTrend', () => {
  it('classifies strictly rising rates as accelerating', () => {
    expect(classifyTrend([0.05, 0.08, 0.12])).toBe('accelerating');
  });

  it('classifies strictly falling rates as declining', () => {
    expect(classifyTrend([0.12, 0.08, 0.05])).toBe('declining');
  });

  it('classifies repeated sign changes as volatile', () => {
    expect(classifyTrend([0.1, -0.1, 0.1])).toBe('volatile');
  });

  it('falls back to steady', () => {
    expect(classifyTrend([0.05])).toBe('steady');
    expect(classifyTrend([0.05, 0.05, 0.06])).toBe('steady');
  });
});

describe('RevenueGrowthAnalyzer', () => {
  it('derives monthly rates, quarter growth and drivers', async () => {
    const { analyzer } = await acceleratingTenant();
    const g = analyzer.analyzeGrowth('t1');

    expect(g.recentGrowthRates).toEqual([0.05, 0.08, 0.12]);
    expect(g.growthTrend).toBe('accelerating');
    expect(g.currentGrowthRate).toBe(0.12);
    expect(g.projectedGrowth).toBe(0.0833);
    expect(g.quarterOverQuarterGrowth).toBe(2.4541);
    expect(g.yearOverYearGrowth).toBeNull();
    expect(g.benchmarkComparison).toBeNull();
    expect(g.growthDrivers).toHaveLength(1);
    expect(g.growthDrivers[0].name).toBe('usageCharge');
    expect(g.growthDrivers[0].contribution.toString()).toBe('13.608');
    expect(g.growthDrivers[0].description).toBe('usageCharge moved net revenue by 13.61 USD');
  });

  it('compares projected growth with the industry benchmark when enabled', async () => {
    const { analyzer } = await acceleratingTenant(true);
    expect(analyzer.analyzeGrowth('t1').benchmarkComparison).toEqual({
      industryAverage: 0.05,
      comparison: 'aboveAverage',
      benchmark: 'Golf booking SaaS monthly revenue growth',
    });
  });

  it('refuses to compare a period that has not completed', async () => {
    const { analyzer, aggregator } = await acceleratingTenant();
    const current = aggregator.computeMetrics(
      { granularity: 'quarterly', reference: new Date('2024-07-01T00:00:00.000Z') },
      't1',
      { allowEmpty: true },
    );
    const previous = aggregator.computeMetrics(
      { granularity: 'quarterly', reference: new Date('2024-04-01T00:00:00.000Z') },
      't1',
    );
    expect(captureError(() => analyzer.compareWindows(current, previous))).toMatchObject({ code: 'partial_period' });
  });

  it('refuses windows of different granularity', async () => {
    const { analyzer, aggregator } = await acceleratingTenant();
    const quarter = aggregator.computeMetrics({ granularity: 'quarterly', reference: new Date('2024-04-01T00:00:00.000Z') }, 't1');
    const month = aggregator.computeMetrics({ granularity: 'monthly', reference: new Date('2024-03-01T00:00:00.000Z') }, 't1');
    expect(captureError(() => analyzer.compareWindows(quarter, month))).toMatchObject({ code: 'partial_period' });
  });

  it('returns null growth when the previous window had no revenue', async () => {
    const { analyzer, aggregator } = await acceleratingTenant();
    const march = aggregator.computeMetrics({ granularity: 'monthly', reference: new Date('2024-03-01T00:00:00.000Z') }, 't1');
    const february = aggregator.computeMetrics(
      { granularity: 'monthly', reference: new Date('2024-02-01T00:00:00.000Z') },
      't1',
      { allowEmpty: true },
    );
    expect(analyzer.compareWindows(march, february)).toBeNull();
  });
});

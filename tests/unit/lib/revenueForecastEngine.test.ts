import { describe, it, expect } from '@jest/globals';
import Decimal from 'decimal.js';
import {
  RevenueForecastEngine,
  monthOverMonthDeltas,
  totalForecast,
  weightedLinearTrend,
} from '../../../src/lib/revenueForecastEngine';
import { appendAll, captureError, ev, features, revenueStack } from '../../helpers/fixtures';

const NOW = '2024-07-15T12:00:00.000Z';
const dec = (values: number[]): Decimal[] => values.map((v) => new Decimal(v));

async function linearHistory() {
  const stack = revenueStack(NOW);
  await appendAll(stack.ledger, [
    ev('t1', 'subscriptionRenewed', 100, '2024-04-10T10:00:00.000Z', { subscriptionId: 's1' }),
    ev('t1', 'subscriptionRenewed', 200, '2024-05-10T10:00:00.000Z', { subscriptionId: 's1' }),
    ev('t1', 'subscriptionRenewed', 300, '2024-06-10T10:00:00.000Z', { subscriptionId: 's1' }),
  ]);
  const engine = new RevenueForecastEngine(stack.aggregator, { features: features(), clock: stack.clock });
  return { ...stack, engine };
}

describe('RevenueForecastEngine', () => {
  it('fits a straight line exactly', () => {
    const fit = weightedLinearTrend(dec([100, 200, 300]));
    expect(fit.slope.toDecimalPlaces(6).toNumber()).toBe(100);
    expect(fit.intercept.toDecimalPlaces(6).toNumber()).toBe(100);
    expect(monthOverMonthDeltas(dec([100, 300, 250])).map((d) => d.toNumber())).toEqual([200, -50]);
  });

  it('extends the trend from the current month onward', async () => {
    const { engine } = await linearHistory();
    const points = engine.forecast('t1', 3, { scenarios: ['realistic'] });

    expect(points.map((p) => p.month.toISOString().slice(0, 7))).toEqual(['2024-07', '2024-08', '2024-09']);
    expect(points.map((p) => p.predictedRevenue.toFixed(2))).toEqual(['400.00', '500.00', '600.00']);
    expect(points.map((p) => p.confidence)).toEqual([0.65, 0.6045, 0.5622]);
    expect(points[0].confidenceInterval.lowerBound.toFixed(2)).toBe('400.00');
    expect(points[0].confidenceInterval.upperBound.toFixed(2)).toBe('400.00');
    expect(points[0].tenantId).toBe('t1');
  });

  it('reports seasonality, trend and volatility factors', async () => {
    const { engine } = await linearHistory();
    const [first] = engine.forecast('t1', 1, { scenarios: ['realistic'] });
    expect(first.factors.map((f) => f.name)).toEqual(['seasonality', 'trend', 'volatility']);
    expect(first.factors[0].impact).toBe(0.25);
    expect(first.factors[1].impact).toBe(0.5);
    expect(first.factors[2].impact).toBe(0);
  });

  it('orders scenarios and keeps confidence non-increasing with horizon', () => {
    const engine = new RevenueForecastEngine(revenueStack(NOW).aggregator, { features: features() });
    const points = engine.project(dec([100, 300, 200, 260]), 6, new Date(NOW), [
      'conservative',
      'realistic',
      'optimistic',
    ]);
    expect(points).toHaveLength(18);

    for (let h = 1; h <= 6; h++) {
      const at = points.filter((p) => p.monthsAhead === h);
      const [low, mid, high] = at.map((p) => p.predictedRevenue.toNumber());
      expect(low).toBeLessThanOrEqual(mid);
      expect(mid).toBeLessThanOrEqual(high);
      for (const p of at) {
        expect(p.confidenceInterval.lowerBound.lte(p.predictedRevenue)).toBe(true);
        expect(p.confidenceInterval.upperBound.gte(p.predictedRevenue)).toBe(true);
      }
    }
    const realistic = points.filter((p) => p.scenario === 'realistic').map((p) => p.confidence);
    for (let i = 1; i < realistic.length; i++) {
      expect(realistic[i]).toBeLessThanOrEqual(realistic[i - 1]);
    }
  });

  it('widens the interval further out', () => {
    const engine = new RevenueForecastEngine(revenueStack(NOW).aggregator, { features: features() });
    const points = engine.project(dec([100, 300, 200, 260]), 4, new Date(NOW), ['realistic']);
    const widths = points.map((p) => p.confidenceInterval.upperBound.minus(p.confidenceInterval.lowerBound).toNumber());
    for (let i = 1; i < widths.length; i++) {
      expect(widths[i]).toBeGreaterThan(widths[i - 1]);
    }
  });

  it('sums a scenario over the horizon', async () => {
    const { engine } = await linearHistory();
    const points = engine.forecast('t1', 3);
    expect(points).toHaveLength(9);
    expect(totalForecast(points, 'realistic').toFixed(2)).toBe('1500.00');
  });

  it.each([0, 37, 1.5])('rejects a horizon of %p months', (months) => {
    const engine = new RevenueForecastEngine(revenueStack(NOW).aggregator, { features: features() });
    expect(captureError(() => engine.forecast('t1', months))).toMatchObject({
      kind: 'validation',
      code: 'invalid_forecast_horizon',
    });
  });

  it('fails with fewer than three months of history', async () => {
    const stack = revenueStack(NOW);
    await appendAll(stack.ledger, [
      ev('t1', 'usageCharge', 100, '2024-05-10T10:00:00.000Z'),
      ev('t1', 'usageCharge', 120, '2024-06-10T10:00:00.000Z'),
    ]);
    const engine = new RevenueForecastEngine(stack.aggregator, { features: features(), clock: stack.clock });
    expect(captureError(() => engine.forecast('t1', 3))).toMatchObject({
      kind: 'computation',
      code: 'forecast_failed',
      context: { availableMonths: 2 },
    });
  });

  it('returns nothing when forecasting is disabled', async () => {
    const { aggregator, clock } = await linearHistory();
    const engine = new RevenueForecastEngine(aggregator, { features: features({ forecasting: false }), clock });
    expect(engine.forecast('t1', 3)).toEqual([]);
  });
});

/**
 * Revenue Forecast Engine
 *
 * Projects monthly net revenue from trailing metrics snapshots:
 * - Weighted least-squares trend (recent months weigh more)
 * - Conservative / realistic / optimistic scenarios offset by volatility
 * - Confidence intervals that widen with volatility and horizon
 * - Seasonality, trend and volatility reported as explanatory factors only
 */

import Decimal from 'decimal.js';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles, POLICY } from './config';
import { ComputationError, ValidationError } from './errors';
import { ZERO, mean, sampleStdDev, sum, toCents } from './money';
import { addMonthsUTC } from './dateRange';
import { MetricsAggregator } from './metricsAggregator';
import type { Watermarks } from './revenueEventLedger';
import type { ForecastFactor, ForecastScenario, RevenueForecast } from '../types/revenue';

const logger = getLogger('revenueForecastEngine');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ForecastOptions {
  scenarios?: ForecastScenario[];
  /** Trailing months used for the fit. */
  historyMonths?: number;
  asOf?: Date;
  watermarks?: Watermarks;
}

export interface TrendFit {
  slope: Decimal;
  intercept: Decimal;
}

const ALL_SCENARIOS: ForecastScenario[] = ['conservative', 'realistic', 'optimistic'];

/** Golf booking seasonality, index 0 = January. */
const SEASONAL_INDEX = [0.7, 0.75, 0.9, 1.05, 1.2, 1.25, 1.25, 1.2, 1.1, 0.95, 0.85, 0.8];

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Weighted least squares over x = 0..n-1 with weights 1..n. */
export function weightedLinearTrend(values: Decimal[]): TrendFit {
  const n = values.length;
  if (n === 0) return { slope: ZERO, intercept: ZERO };
  if (n === 1) return { slope: ZERO, intercept: values[0] };

  let wSum = ZERO;
  let wx = ZERO;
  let wy = ZERO;
  values.forEach((y, i) => {
    const w = new Decimal(i + 1);
    wSum = wSum.plus(w);
    wx = wx.plus(w.times(i));
    wy = wy.plus(w.times(y));
  });
  const xBar = wx.dividedBy(wSum);
  const yBar = wy.dividedBy(wSum);

  let num = ZERO;
  let den = ZERO;
  values.forEach((y, i) => {
    const w = new Decimal(i + 1);
    const dx = new Decimal(i).minus(xBar);
    num = num.plus(w.times(dx).times(y.minus(yBar)));
    den = den.plus(w.times(dx.pow(2)));
  });

  const slope = den.isZero() ? ZERO : num.dividedBy(den);
  return { slope, intercept: yBar.minus(slope.times(xBar)) };
}

export function monthOverMonthDeltas(values: Decimal[]): Decimal[] {
  const deltas: Decimal[] = [];
  for (let i = 1; i < values.length; i++) deltas.push(values[i].minus(values[i - 1]));
  return deltas;
}

function scenarioOffset(scenario: ForecastScenario, sigma: Decimal): Decimal {
  const step = sigma.times(POLICY.forecastScenarioSigma);
  switch (scenario) {
    case 'conservative':
      return step.negated();
    case 'realistic':
      return ZERO;
    case 'optimistic':
      return step;
    default: {
      const unreachable: never = scenario;
      throw new ValidationError('scenario', `Unknown scenario: ${String(unreachable)}`);
    }
  }
}

function round4(value: Decimal): number {
  return value.toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
}

// ── RevenueForecastEngine ─────────────────────────────────────────────────────

export class RevenueForecastEngine {
  private readonly aggregator: MetricsAggregator;
  private readonly enabled: boolean;
  private readonly clock: () => Date;

  constructor(
    aggregator: MetricsAggregator,
    options: { features?: Pick<FeatureToggles, 'forecasting'>; clock?: () => Date } = {},
  ) {
    this.aggregator = aggregator;
    this.enabled = (options.features ?? APP_CONFIG.features).forecasting;
    this.clock = options.clock ?? (() => new Date());
  }

  forecast(tenantId: string | undefined, monthCount: number, options: ForecastOptions = {}): RevenueForecast[] {
    if (!Number.isInteger(monthCount) || monthCount < 1 || monthCount > POLICY.forecastMaxMonths) {
      throw new ValidationError(
        'monthCount',
        `monthCount must be an integer between 1 and ${POLICY.forecastMaxMonths}`,
        'invalid_forecast_horizon',
      );
    }
    const historyMonths = options.historyMonths ?? POLICY.forecastHistoryMonths;
    if (!Number.isInteger(historyMonths) || historyMonths < POLICY.forecastMinHistoryMonths) {
      throw new ValidationError(
        'historyMonths',
        `historyMonths must be an integer of at least ${POLICY.forecastMinHistoryMonths}`,
        'invalid_forecast_history',
      );
    }
    if (!this.enabled) {
      logger.debug('Forecasting disabled, skipping', { tenantId });
      return [];
    }

    const asOf = options.asOf ?? this.clock();
    const series = this.aggregator.monthlySeries(tenantId, historyMonths, asOf, options.watermarks);
    const firstActive = series.findIndex((m) => m.eventCount > 0);
    const history = firstActive === -1 ? [] : series.slice(firstActive).map((m) => m.netRevenue);

    if (history.length < POLICY.forecastMinHistoryMonths) {
      logger.warn('Forecast rejected: insufficient history', { tenantId, months: history.length });
      throw new ComputationError(
        'forecast_failed',
        `At least ${POLICY.forecastMinHistoryMonths} months of revenue history are required`,
        { tenantId, availableMonths: history.length },
      );
    }

    const points = this.project(history, monthCount, asOf, options.scenarios ?? ALL_SCENARIOS, tenantId);
    logger.info('Revenue forecast generated', { tenantId, monthCount, historyMonths: history.length, points: points.length });
    return points;
  }

  /** Pure projection over an explicit net-revenue series, oldest first. */
  project(
    history: Decimal[],
    monthCount: number,
    asOf: Date,
    scenarios: ForecastScenario[],
    tenantId?: string,
  ): RevenueForecast[] {
    const n = history.length;
    const fit = weightedLinearTrend(history);
    const sigma = sampleStdDev(monthOverMonthDeltas(history));
    const avg = mean(history);
    const cv = avg.isZero() ? (sigma.isZero() ? ZERO : new Decimal(1)) : sigma.dividedBy(avg.abs());
    const base = Decimal.min(new Decimal(0.95), new Decimal(0.5).plus(new Decimal(0.05).times(n))).dividedBy(cv.plus(1));
    const startMonth = addMonthsUTC(asOf, 0);

    const out: RevenueForecast[] = [];
    for (let h = 1; h <= monthCount; h++) {
      const trend = fit.intercept.plus(fit.slope.times(n - 1 + h));
      const confidence = round4(base.times(new Decimal(POLICY.forecastHorizonDecay).pow(h - 1)));
      const halfWidth = sigma.times(POLICY.forecastZScore).times(new Decimal(1).plus(new Decimal(h).dividedBy(n)).sqrt());
      const month = addMonthsUTC(startMonth, h - 1);
      const factors = this.factors(month, fit, sigma, avg, cv, confidence);

      for (const scenario of scenarios) {
        const raw = trend.plus(scenarioOffset(scenario, sigma));
        if (!raw.isFinite()) {
          throw new ComputationError('forecast_failed', 'Forecast produced a non-finite value', { tenantId, monthsAhead: h });
        }
        const predicted = toCents(Decimal.max(ZERO, raw));
        out.push({
          month,
          monthsAhead: h,
          scenario,
          predictedRevenue: predicted,
          confidenceInterval: {
            lowerBound: toCents(Decimal.max(ZERO, predicted.minus(halfWidth))),
            upperBound: toCents(predicted.plus(halfWidth)),
            confidence,
          },
          confidence,
          factors,
          ...(tenantId !== undefined ? { tenantId } : {}),
        });
      }
    }
    return out;
  }

  private factors(
    month: Date,
    fit: TrendFit,
    sigma: Decimal,
    avg: Decimal,
    cv: Decimal,
    confidence: number,
  ): ForecastFactor[] {
    const m = month.getUTCMonth();
    const seasonal = SEASONAL_INDEX[m];
    const slopeShare = avg.isZero() ? ZERO : fit.slope.dividedBy(avg.abs());
    return [
      {
        name: 'seasonality',
        impact: Math.round((seasonal - 1) * 10_000) / 10_000,
        confidence: 0.6,
        description: `${MONTH_NAMES[m]} bookings typically run at ${Math.round(seasonal * 100)}% of an average month`,
      },
      {
        name: 'trend',
        impact: round4(slopeShare),
        confidence,
        description: `Fitted trend of ${toCents(fit.slope).toFixed(2)} per month`,
      },
      {
        name: 'volatility',
        impact: round4(cv),
        confidence,
        description: `Month-over-month deviation of ${toCents(sigma).toFixed(2)}`,
      },
    ];
  }
}

export function totalForecast(points: RevenueForecast[], scenario: ForecastScenario): Decimal {
  return sum(points.filter((p) => p.scenario === scenario).map((p) => p.predictedRevenue));
}

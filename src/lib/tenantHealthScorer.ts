/**
 * @module tenantHealthScorer
 * @description Composite 0–100 health score per tenant from SLO signals and
 * current usage against limits.
 */

import { getLogger } from './logger';
import { APP_CONFIG, POLICY } from './config';
import { ValidationError } from './errors';
import { callCollaborator } from './collaborator';
import { UNBOUNDED, TenantLimitGovernor } from './tenantLimitGovernor';
import { UsageCounterStore } from './usageCounterStore';
import { TenantManager } from './tenantManager';
import { runTenantBatch, BatchSummary } from './tenantBatchRunner';
import type {
  HealthFactor,
  HealthFactorName,
  HealthGrade,
  HealthTrend,
  SloSignals,
  TenantHealthScore,
} from '../types/tenant';

const logger = getLogger('tenantHealthScorer');

/** External SLO feed. */
export interface SloSignalProvider {
  signalsFor(tenantId: string, signal: AbortSignal): Promise<SloSignals>;
}

export interface HealthInputs {
  signals: SloSignals;
  apiCalls: number;
  apiCallLimit: number;
}

// ── Pure scoring ──────────────────────────────────────────────────────────────

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function usageRatio(apiCalls: number, limit: number): number {
  if (limit >= UNBOUNDED) return 0;
  if (limit <= 0) return apiCalls > 0 ? 1 : 0;
  return apiCalls / limit;
}

export function gradeFor(score: number): HealthGrade {
  const g = POLICY.healthGrades;
  if (score >= g.excellent) return 'excellent';
  if (score >= g.good) return 'good';
  if (score >= g.fair) return 'fair';
  if (score >= g.poor) return 'poor';
  return 'critical';
}

export function healthFactors(inputs: HealthInputs): HealthFactor[] {
  const { signals } = inputs;
  const values: Record<HealthFactorName, number> = {
    uptime: clamp01(signals.uptime),
    errorRate: clamp01(1 - signals.errorRate),
    usageEfficiency: clamp01(1 - usageRatio(inputs.apiCalls, inputs.apiCallLimit)),
    satisfaction: clamp01(signals.satisfaction / 5),
  };
  const names: HealthFactorName[] = ['uptime', 'errorRate', 'usageEfficiency', 'satisfaction'];
  return names.map((name) => {
    const weight = POLICY.healthWeights[name];
    return { name, weight, value: values[name], contribution: round2(100 * weight * values[name]) };
  });
}

export function compositeScore(factors: HealthFactor[]): number {
  return round2(100 * factors.reduce((s, f) => s + f.weight * f.value, 0));
}

export function healthTrends(current: HealthFactor[], previous: HealthFactor[] | null): HealthTrend[] {
  const eps = POLICY.healthTrendEpsilon;
  return current.map((factor) => {
    const before = previous?.find((p) => p.name === factor.name);
    const change = before ? Math.round((factor.value - before.value) * 10000) / 10000 : 0;
    const direction = change > eps ? 'improving' : change < -eps ? 'declining' : 'stable';
    return { factor: factor.name, direction, change };
  });
}

export function healthRecommendations(inputs: HealthInputs): string[] {
  const out: string[] = [];
  if (inputs.signals.uptime < 0.99) out.push('Improve system reliability to achieve 99%+ uptime');
  if (inputs.signals.errorRate > 0.01) out.push('Reduce error rate to below 1%');
  if (usageRatio(inputs.apiCalls, inputs.apiCallLimit) > 0.8) out.push('Consider upgrading plan to avoid usage limits');
  return out;
}

function validateSignals(tenantId: string, signals: SloSignals): void {
  const bad = (field: string): never => {
    throw new ValidationError(field, `SLO signal ${field} out of range for tenant ${tenantId}`, 'invalid_slo_signal');
  };
  if (!Number.isFinite(signals.uptime) || signals.uptime < 0 || signals.uptime > 1) bad('uptime');
  if (!Number.isFinite(signals.errorRate) || signals.errorRate < 0 || signals.errorRate > 1) bad('errorRate');
  if (!Number.isFinite(signals.satisfaction) || signals.satisfaction < 0 || signals.satisfaction > 5) bad('satisfaction');
}

// ── TenantHealthScorer ────────────────────────────────────────────────────────

export interface TenantHealthScorerOptions {
  tenants: TenantManager;
  governor: TenantLimitGovernor;
  usage: UsageCounterStore;
  slo: SloSignalProvider;
  timeoutMs?: number;
  clock?: () => Date;
}

export class TenantHealthScorer {
  private readonly previous: Map<string, TenantHealthScore> = new Map();
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(private readonly options: TenantHealthScorerOptions) {
    this.timeoutMs = options.timeoutMs ?? APP_CONFIG.collaboratorTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async score(tenantId: string, signal?: AbortSignal): Promise<TenantHealthScore> {
    const tenant = this.options.tenants.getTenant(tenantId);
    const limits = this.options.governor.resolveLimits(tenant);
    const apiCalls = this.options.usage.get(tenantId).usage.apiCalls;

    const signals = await callCollaborator('sloSignalProvider', this.timeoutMs, (callSignal) =>
      this.options.slo.signalsFor(tenantId, signal ? AbortSignal.any([signal, callSignal]) : callSignal),
    );
    validateSignals(tenantId, signals);

    const inputs: HealthInputs = { signals, apiCalls, apiCallLimit: limits.apiCallsPerMonth };
    const factors = healthFactors(inputs);
    const score = compositeScore(factors);
    const calculatedAt = this.clock();

    const result: TenantHealthScore = {
      tenantId,
      score,
      grade: gradeFor(score),
      factors,
      trends: healthTrends(factors, this.previous.get(tenantId)?.factors ?? null),
      recommendations: healthRecommendations(inputs),
      calculatedAt,
      nextCalculation: new Date(calculatedAt.getTime() + POLICY.healthRecalculationMs),
    };
    this.previous.set(tenantId, result);

    logger.info('Tenant health scored', { tenantId, score, grade: result.grade });
    return result;
  }

  lastScore(tenantId: string): TenantHealthScore | null {
    return this.previous.get(tenantId) ?? null;
  }

  scoreAll(tenantIds: readonly string[], signal?: AbortSignal): Promise<BatchSummary<TenantHealthScore>> {
    return runTenantBatch(tenantIds, (id, s) => this.score(id, s), { signal });
  }
}

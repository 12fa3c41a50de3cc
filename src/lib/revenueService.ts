/**
 * @module revenueService
 * @description Query and command surface over the revenue and tenant modules.
 * Every operation resolves to an `OperationResult`; failures carry the error
 * kind and code instead of throwing.
 */

import { getLogger } from './logger';
import { APP_CONFIG, RevenueConfig } from './config';
import { NotFoundError, OperationResult, ok, fail } from './errors';
import { openDatabase } from '../db';
import { SqliteRevenueEventStorage } from '../db/revenueEvents';
import { SqliteTenantStateStorage } from '../db/tenantState';
import { SqliteMetricsSnapshotCache } from '../db/metricsSnapshots';
import { RevenueEventLedger, RevenueEventInput, createRevenueEvent } from './revenueEventLedger';
import { MetricsAggregator } from './metricsAggregator';
import { RevenueForecastEngine } from './revenueForecastEngine';
import { DetectOptions, RevenueAnomalyDetector } from './revenueAnomalyDetector';
import { RevenueGrowthAnalyzer } from './revenueGrowthAnalyzer';
import { RevenueInsightGenerator } from './revenueInsightGenerator';
import { ExportEncoder, RevenueReportAssembler } from './revenueReportAssembler';
import { RevenueSignals, SignalListener, SignalName } from './revenueSignals';
import { InMemoryTenantRepository, TenantRepository } from './tenantRepository';
import { UsageCounterStore } from './usageCounterStore';
import { TenantLimitGovernor } from './tenantLimitGovernor';
import { TenantAuthorizer, TenantManager } from './tenantManager';
import { SloSignalProvider, TenantHealthScorer } from './tenantHealthScorer';
import { TenantDataMigrator, TenantMigrationService } from './tenantMigration';
import type { BatchSummary } from './tenantBatchRunner';
import type {
  DateRange,
  ExportArtifact,
  ExportFormat,
  ForecastScenario,
  ReportFormat,
  RevenueAnomaly,
  RevenueBreakdown,
  RevenueEventType,
  RevenueForecast,
  RevenueGrowthAnalysis,
  RevenueInsight,
  RevenueMetrics,
  RevenuePeriod,
  RevenueReport,
  StoredRevenueEvent,
  TenantRevenue,
} from '../types/revenue';
import type {
  MigrationOptions,
  MigrationResult,
  TenantHealthScore,
  TenantLimits,
  TenantUsageReport,
} from '../types/tenant';

const logger = getLogger('revenueService');

export interface RevenueServiceComponents {
  ledger: RevenueEventLedger;
  aggregator: MetricsAggregator;
  forecast: RevenueForecastEngine;
  anomalies: RevenueAnomalyDetector;
  growth: RevenueGrowthAnalyzer;
  insights: RevenueInsightGenerator;
  reports: RevenueReportAssembler;
  signals: RevenueSignals;
  usage: UsageCounterStore;
  governor: TenantLimitGovernor;
  tenants: TenantManager;
  health: TenantHealthScorer;
  migration: TenantMigrationService;
}

export class RevenueService {
  constructor(private readonly c: RevenueServiceComponents) {}

  get components(): RevenueServiceComponents {
    return this.c;
  }

  // ── Revenue ─────────────────────────────────────────────────────────────────

  async getRevenueMetrics(period: RevenuePeriod, tenantId?: string): Promise<OperationResult<RevenueMetrics>> {
    return this.run('getRevenueMetrics', tenantId, () => this.c.aggregator.computeMetrics(period, tenantId));
  }

  async getRevenueByTenant(period: RevenuePeriod): Promise<OperationResult<TenantRevenue[]>> {
    return this.run('getRevenueByTenant', undefined, () =>
      this.c.aggregator.revenueByTenant(
        period,
        this.c.tenants.listTenants().map((t) => ({ id: t.id, name: t.name })),
      ),
    );
  }

  async getRevenueForecast(
    monthCount: number,
    tenantId?: string,
    scenarios?: ForecastScenario[],
  ): Promise<OperationResult<RevenueForecast[]>> {
    return this.run('getRevenueForecast', tenantId, () =>
      this.c.forecast.forecast(tenantId, monthCount, scenarios ? { scenarios } : {}),
    );
  }

  async getRevenueBreakdown(period: RevenuePeriod, tenantId?: string): Promise<OperationResult<RevenueBreakdown>> {
    return this.run('getRevenueBreakdown', tenantId, () => this.c.aggregator.computeBreakdown(period, tenantId));
  }

  async recordRevenueEvent(input: RevenueEventInput): Promise<OperationResult<StoredRevenueEvent>> {
    return this.run('recordRevenueEvent', input.tenantId, () => this.c.ledger.append(createRevenueEvent(input)));
  }

  async getRevenueEvents(
    dateRange: DateRange,
    tenantId?: string,
    eventTypes?: RevenueEventType[],
  ): Promise<OperationResult<StoredRevenueEvent[]>> {
    return this.run('getRevenueEvents', tenantId, () => this.c.ledger.query({ tenantId, dateRange, eventTypes }).events);
  }

  async generateRevenueReport(
    period: RevenuePeriod,
    format: ReportFormat,
    tenantId?: string,
  ): Promise<OperationResult<RevenueReport>> {
    return this.run('generateRevenueReport', tenantId, () =>
      this.c.reports.generateRevenueReport(period, format, tenantId),
    );
  }

  async exportRevenueData(
    dateRange: DateRange,
    format: ExportFormat,
    tenantId?: string,
  ): Promise<OperationResult<ExportArtifact>> {
    return this.run('exportRevenueData', tenantId, () => this.c.reports.exportRevenueData(dateRange, format, tenantId));
  }

  async analyzeRevenueGrowth(tenantId?: string): Promise<OperationResult<RevenueGrowthAnalysis>> {
    return this.run('analyzeRevenueGrowth', tenantId, () => this.c.growth.analyzeGrowth(tenantId));
  }

  async detectRevenueAnomalies(options: DetectOptions = {}): Promise<OperationResult<RevenueAnomaly[]>> {
    return this.run('detectRevenueAnomalies', options.tenantId, () => this.c.anomalies.detect(options));
  }

  async getRevenueInsights(tenantId?: string): Promise<OperationResult<RevenueInsight[]>> {
    return this.run('getRevenueInsights', tenantId, () => this.c.insights.generate(tenantId));
  }

  subscribe<K extends SignalName>(name: K, listener: SignalListener<K>): () => void {
    return this.c.signals.subscribe(name, listener);
  }

  // ── Tenants ─────────────────────────────────────────────────────────────────

  async getTenantLimits(tenantId: string): Promise<OperationResult<TenantLimits>> {
    return this.run('getTenantLimits', tenantId, () =>
      this.c.governor.resolveLimits(this.c.tenants.getTenant(tenantId)),
    );
  }

  async getTenantUsage(tenantId: string): Promise<OperationResult<TenantUsageReport>> {
    return this.run('getTenantUsage', tenantId, () => this.c.governor.getTenantUsage(tenantId));
  }

  async getTenantHealthScore(tenantId: string): Promise<OperationResult<TenantHealthScore>> {
    return this.run('getTenantHealthScore', tenantId, () => this.c.health.score(tenantId));
  }

  async getAllTenantsHealth(signal?: AbortSignal): Promise<OperationResult<BatchSummary<TenantHealthScore>>> {
    return this.run('getAllTenantsHealth', undefined, () =>
      this.c.health.scoreAll(
        this.c.tenants.listTenants().map((t) => t.id),
        signal,
      ),
    );
  }

  async migrateTenantData(
    fromTenantId: string,
    toTenantId: string,
    options: MigrationOptions,
    signal?: AbortSignal,
  ): Promise<OperationResult<MigrationResult>> {
    return this.run('migrateTenantData', undefined, () =>
      this.c.migration.migrateTenantData(fromTenantId, toTenantId, options, signal),
    );
  }

  private async run<T>(
    operation: string,
    tenantId: string | undefined,
    fn: () => T | Promise<T>,
  ): Promise<OperationResult<T>> {
    try {
      if (tenantId !== undefined && !this.c.tenants.hasTenant(tenantId)) {
        throw new NotFoundError('tenant', tenantId);
      }
      return ok(await fn());
    } catch (err) {
      const result = fail<T>(err);
      if (!result.success) {
        logger.warn('Operation failed', { operation, tenantId, kind: result.error.kind, code: result.error.code });
      }
      return result;
    }
  }
}

// ── Wiring ────────────────────────────────────────────────────────────────────

export interface CreateRevenueServiceOptions {
  config?: RevenueConfig;
  /** `sqlite` keeps events, usage, limits and snapshots in `config.databasePath`. */
  persistence?: 'memory' | 'sqlite';
  slo: SloSignalProvider;
  migrator: TenantDataMigrator;
  encoder: ExportEncoder;
  authorizer?: TenantAuthorizer;
  tenantRepository?: TenantRepository;
  clock?: () => Date;
}

export function createRevenueService(options: CreateRevenueServiceOptions): RevenueService {
  const config = options.config ?? APP_CONFIG;
  const { features } = config;
  const clock = options.clock;
  const db = options.persistence === 'sqlite' ? openDatabase(config.databasePath) : null;

  const ledger = new RevenueEventLedger({
    ...(db ? { storage: new SqliteRevenueEventStorage(db) } : {}),
    config,
    clock,
  });
  const aggregator = new MetricsAggregator({
    ledger,
    ...(db ? { cache: new SqliteMetricsSnapshotCache(db) } : {}),
    features,
    reportingCurrency: config.reportingCurrency,
    clock,
  });
  const forecast = new RevenueForecastEngine(aggregator, { features, clock });
  const anomalies = new RevenueAnomalyDetector(aggregator, { features, clock });
  const growth = new RevenueGrowthAnalyzer(aggregator, { features, clock });
  const insights = new RevenueInsightGenerator({ aggregator, growth, anomalies, forecast, features, clock });
  const reports = new RevenueReportAssembler({
    aggregator,
    insights,
    encoder: options.encoder,
    features,
    config,
    clock,
  });
  const signals = new RevenueSignals({ ledger, features, reportingCurrency: config.reportingCurrency });

  const repository = options.tenantRepository ?? new InMemoryTenantRepository();
  const usage = new UsageCounterStore({ ...(db ? { storage: new SqliteTenantStateStorage(db) } : {}), clock });
  const governor = new TenantLimitGovernor({ tenants: repository, usage, features, clock });
  const tenants = new TenantManager({
    tenants: repository,
    governor,
    usage,
    ...(options.authorizer ? { authorizer: options.authorizer } : {}),
    features,
    clock,
  });
  const health = new TenantHealthScorer({
    tenants,
    governor,
    usage,
    slo: options.slo,
    timeoutMs: config.collaboratorTimeoutMs,
    clock,
  });
  const migration = new TenantMigrationService(tenants, options.migrator, {
    features,
    timeoutMs: config.collaboratorTimeoutMs,
    clock,
  });

  logger.info('Revenue service created', { persistence: db ? 'sqlite' : 'memory', currency: config.reportingCurrency });
  return new RevenueService({
    ledger,
    aggregator,
    forecast,
    anomalies,
    growth,
    insights,
    reports,
    signals,
    usage,
    governor,
    tenants,
    health,
    migration,
  });
}

export * from './types/revenue';
export * from './types/tenant';

export { APP_CONFIG, DEFAULT_FEATURES, POLICY, loadRevenueConfig } from './lib/config';
export type { FeatureName, FeatureToggles, LogLevel, RevenueConfig } from './lib/config';
export { getLogger } from './lib/logger';
export type { StructuredLogger } from './lib/logger';
export {
  AuthorizationError,
  ComputationError,
  NotFoundError,
  ServiceError,
  UpstreamError,
  ValidationError,
} from './lib/errors';
export type { ErrorKind, OperationResult, ServiceFailure } from './lib/errors';

export { RevenueEventLedger, InMemoryRevenueEventStorage, createRevenueEvent } from './lib/revenueEventLedger';
export type { RevenueEventInput, RevenueEventStorage, Watermarks } from './lib/revenueEventLedger';
export { MetricsAggregator, eventPolarity } from './lib/metricsAggregator';
export { RevenueForecastEngine } from './lib/revenueForecastEngine';
export { RevenueAnomalyDetector } from './lib/revenueAnomalyDetector';
export type { DetectOptions } from './lib/revenueAnomalyDetector';
export { RevenueGrowthAnalyzer, classifyTrend } from './lib/revenueGrowthAnalyzer';
export { RevenueInsightGenerator } from './lib/revenueInsightGenerator';
export { RevenueReportAssembler } from './lib/revenueReportAssembler';
export type { ExportEncoder, ExportTable } from './lib/revenueReportAssembler';
export { openBytes } from './lib/exportEncryption';
export { RevenueSignals } from './lib/revenueSignals';
export type { SignalName, SignalValues } from './lib/revenueSignals';

export { UsageCounterStore } from './lib/usageCounterStore';
export { TenantLimitGovernor, UNBOUNDED, deriveChildLimits, limitsForTier } from './lib/tenantLimitGovernor';
export { TenantManager, allowListAuthorizer } from './lib/tenantManager';
export type { TenantAuthorizer } from './lib/tenantManager';
export { InMemoryTenantRepository } from './lib/tenantRepository';
export type { TenantRepository } from './lib/tenantRepository';
export { TenantHealthScorer } from './lib/tenantHealthScorer';
export type { SloSignalProvider } from './lib/tenantHealthScorer';
export { TenantMigrationService } from './lib/tenantMigration';
export type { TenantDataMigrator } from './lib/tenantMigration';
export { runTenantBatch } from './lib/tenantBatchRunner';
export type { BatchSummary } from './lib/tenantBatchRunner';

export { RevenueService, createRevenueService } from './lib/revenueService';
export type { CreateRevenueServiceOptions } from './lib/revenueService';
export { openDatabase, closeDb } from './db';

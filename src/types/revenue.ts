import type Decimal from 'decimal.js';

// ── Events ────────────────────────────────────────────────────────────────────

export const REVENUE_EVENT_TYPES = [
  'subscriptionCreated',
  'subscriptionRenewed',
  'subscriptionUpgraded',
  'subscriptionDowngraded',
  'subscriptionCancelled',
  'usageCharge',
  'oneTimePayment',
  'refund',
  'chargeback',
  'credit',
  'setupFee',
  'addOnPurchase',
] as const;

export type RevenueEventType = (typeof REVENUE_EVENT_TYPES)[number];

export const REVENUE_SOURCES = [
  'stripe',
  'applePay',
  'googlePay',
  'bankTransfer',
  'invoice',
  'manual',
  'migration',
] as const;

export type RevenueSource = (typeof REVENUE_SOURCES)[number];

/**
 * A monetary event as produced by the billing collaborator. `amount` is always a
 * non-negative magnitude; the event type decides whether it adds to or subtracts
 * from net revenue.
 */
export interface RevenueEvent {
  id: string;
  tenantId: string;
  eventType: RevenueEventType;
  amount: Decimal;
  currency: string;
  timestamp: Date;
  subscriptionId?: string;
  customerId?: string;
  invoiceId?: string;
  metadata: Record<string, string>;
  source: RevenueSource;
}

/** An event once accepted by the ledger. */
export interface StoredRevenueEvent extends RevenueEvent {
  sequence: number;
}

// ── Periods & ranges ──────────────────────────────────────────────────────────

export interface DateRange {
  startDate: Date;
  endDate: Date;
}

export type CalendarGranularity = 'daily' | 'weekly' | 'monthly' | 'quarterly' | 'yearly';

export type RevenuePeriod =
  | { granularity: CalendarGranularity; reference?: Date }
  | { granularity: 'custom'; range: DateRange };

export type RevenuePeriodGranularity = RevenuePeriod['granularity'];

// ── Derived snapshots ─────────────────────────────────────────────────────────

export interface RevenueMetrics {
  tenantId?: string;
  granularity: RevenuePeriodGranularity;
  range: DateRange;
  currency: string;
  totalRevenue: Decimal;
  recurringRevenue: Decimal;
  usageRevenue: Decimal;
  oneTimeRevenue: Decimal;
  refunds: Decimal;
  netRevenue: Decimal;
  monthlyRecurringRevenue: Decimal;
  annualRecurringRevenue: Decimal;
  customerCount: number;
  averageRevenuePerCustomer: Decimal;
  lifetimeValue: Decimal | null;
  churnRate: number;
  /** `null` when the previous period had zero net revenue. */
  growthRate: number | null;
  eventCount: number;
  asOfSequence: Record<string, number>;
  generatedAt: Date;
}

export interface RevenueBreakdown {
  tenantId?: string;
  range: DateRange;
  currency: string;
  subscriptionRevenue: Decimal;
  usageBasedRevenue: Decimal;
  oneTimeCharges: Decimal;
  setupFees: Decimal;
  addOnRevenue: Decimal;
  refundsAndCredits: Decimal;
  revenueByTier: Record<string, Decimal>;
  revenueByRegion: Record<string, Decimal>;
  revenueByChannel: Partial<Record<RevenueSource, Decimal>>;
}

export interface TenantRevenue {
  tenantId: string;
  tenantName: string;
  totalRevenue: Decimal;
  subscriptionRevenue: Decimal;
  usageRevenue: Decimal;
  customerCount: number;
  averageRevenuePerCustomer: Decimal;
  granularity: RevenuePeriodGranularity;
  range: DateRange;
}

// ── Forecasts ─────────────────────────────────────────────────────────────────

export type ForecastScenario = 'conservative' | 'realistic' | 'optimistic';

export interface ConfidenceInterval {
  lowerBound: Decimal;
  upperBound: Decimal;
  confidence: number;
}

export interface ForecastFactor {
  name: string;
  impact: number;
  confidence: number;
  description: string;
}

export interface RevenueForecast {
  month: Date;
  monthsAhead: number;
  scenario: ForecastScenario;
  predictedRevenue: Decimal;
  confidenceInterval: ConfidenceInterval;
  confidence: number;
  factors: ForecastFactor[];
  tenantId?: string;
}

// ── Anomalies ─────────────────────────────────────────────────────────────────

export type AnomalyType = 'suddenDrop' | 'suddenSpike' | 'unusualPattern' | 'missingData' | 'dataInconsistency';

export type AnomalySeverity = 'low' | 'medium' | 'high' | 'critical';

export type AnomalyMetric = 'netRevenue' | 'grossRevenue' | 'refunds' | 'eventCount';

export interface RevenueAnomaly {
  id: string;
  detectedAt: Date;
  bucket: DateRange;
  metric: AnomalyMetric;
  anomalyType: AnomalyType;
  severity: AnomalySeverity;
  description: string;
  observedValue: Decimal;
  expectedValue: Decimal;
  /** σ units; `null` when the baseline has no spread. */
  deviation: number | null;
  affectedRevenue: Decimal;
  possibleCauses: string[];
  recommendedActions: string[];
  tenantId?: string;
}

// ── Growth ────────────────────────────────────────────────────────────────────

export type GrowthTrend = 'accelerating' | 'steady' | 'declining' | 'volatile';

export type ComparisonResult = 'aboveAverage' | 'belowAverage' | 'average';

export interface GrowthDriver {
  name: string;
  contribution: Decimal;
  description: string;
}

export interface BenchmarkComparison {
  industryAverage: number;
  comparison: ComparisonResult;
  benchmark: string;
}

export interface RevenueGrowthAnalysis {
  tenantId?: string;
  currentGrowthRate: number | null;
  quarterOverQuarterGrowth: number | null;
  yearOverYearGrowth: number | null;
  growthTrend: GrowthTrend;
  recentGrowthRates: number[];
  growthDrivers: GrowthDriver[];
  projectedGrowth: number | null;
  benchmarkComparison: BenchmarkComparison | null;
}

// ── Insights & reports ────────────────────────────────────────────────────────

export type InsightType = 'optimization' | 'warning' | 'opportunity' | 'trend' | 'prediction';

export type ImpactLevel = 'low' | 'medium' | 'high' | 'critical';

export interface RevenueInsight {
  id: string;
  title: string;
  description: string;
  insightType: InsightType;
  impact: ImpactLevel;
  recommendation: string;
  potentialValue: Decimal | null;
  confidence: number;
  createdAt: Date;
  expiresAt: Date | null;
  tenantId?: string;
}

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface RevenueTrend {
  metric: string;
  direction: TrendDirection;
  magnitude: number;
  granularity: RevenuePeriodGranularity;
}

export const REPORT_FORMATS = ['pdf', 'excel', 'csv', 'json', 'html'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const EXPORT_FORMATS = ['csv', 'json', 'excel', 'xml'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface RevenueReport {
  id: string;
  title: string;
  tenantId?: string;
  granularity: RevenuePeriodGranularity;
  range: DateRange;
  generatedAt: Date;
  metrics: RevenueMetrics;
  breakdown: RevenueBreakdown;
  trends: RevenueTrend[];
  insights: RevenueInsight[];
  format: ReportFormat;
  data: Uint8Array;
}

export interface ExportArtifact {
  format: ExportFormat;
  range: DateRange;
  rowCount: number;
  bytes: Uint8Array;
  encrypted: boolean;
  iv?: string;
  authTag?: string;
}

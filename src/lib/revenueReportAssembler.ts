/**
 * @module revenueReportAssembler
 * @description Revenue reports and raw event exports. Encoding into the
 * requested file format is delegated to an `ExportEncoder`; sealed exports use
 * AES-256-GCM with the configured export key.
 */

import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { getLogger, audit } from './logger';
import { APP_CONFIG, FeatureToggles, RevenueConfig } from './config';
import { ValidationError } from './errors';
import { callCollaborator } from './collaborator';
import { assertValidRange, previousRange, resolvePeriod } from './dateRange';
import { MetricsAggregator } from './metricsAggregator';
import { RevenueInsightGenerator } from './revenueInsightGenerator';
import { parseExportKey, sealBytes } from './exportEncryption';
import { runTenantBatch, BatchSummary } from './tenantBatchRunner';
import type { Watermarks } from './revenueEventLedger';
import {
  EXPORT_FORMATS,
  REPORT_FORMATS,
  DateRange,
  ExportArtifact,
  ExportFormat,
  ReportFormat,
  RevenueMetrics,
  RevenuePeriod,
  RevenueReport,
  RevenueTrend,
  TrendDirection,
} from '../types/revenue';

const logger = getLogger('revenueReportAssembler');

// ── Encoding ──────────────────────────────────────────────────────────────────

export interface ExportTable {
  title: string;
  columns: string[];
  rows: string[][];
}

/**
 * External document encoder. Every format, text or binary, is rendered by the
 * collaborator; an unsupported format should be rejected as `unsupported_format`.
 */
export interface ExportEncoder {
  encode(format: ReportFormat | ExportFormat, table: ExportTable, signal: AbortSignal): Promise<Uint8Array>;
}

// ── Trends ────────────────────────────────────────────────────────────────────

const TREND_METRICS = ['totalRevenue', 'netRevenue', 'monthlyRecurringRevenue', 'customerCount', 'churnRate'] as const;

type TrendMetric = (typeof TREND_METRICS)[number];

function metricNumber(metrics: RevenueMetrics, name: TrendMetric): Decimal {
  const value = metrics[name];
  return value instanceof Decimal ? value : new Decimal(value);
}

/** Relative change per metric; magnitude 1 when the previous value was zero and the current is not. */
export function metricTrends(current: RevenueMetrics, previous: RevenueMetrics): RevenueTrend[] {
  return TREND_METRICS.map((metric) => {
    const cur = metricNumber(current, metric);
    const prev = metricNumber(previous, metric);
    const diff = cur.minus(prev);
    const direction: TrendDirection = diff.gt(0) ? 'increasing' : diff.lt(0) ? 'decreasing' : 'stable';
    const magnitude = prev.isZero()
      ? diff.isZero()
        ? 0
        : 1
      : diff.abs().dividedBy(prev.abs()).toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
    return { metric, direction, magnitude, granularity: current.granularity };
  });
}

function previousPeriod(period: RevenuePeriod, range: DateRange): RevenuePeriod {
  const prev = previousRange(period, range);
  return period.granularity === 'custom'
    ? { granularity: 'custom', range: prev }
    : { granularity: period.granularity, reference: prev.startDate };
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

function day(d: Date): string {
  return d.toISOString().slice(0, 10);
}

// ── RevenueReportAssembler ────────────────────────────────────────────────────

export interface ReportAssemblerOptions {
  aggregator: MetricsAggregator;
  insights: RevenueInsightGenerator;
  encoder: ExportEncoder;
  features?: Pick<FeatureToggles, 'encryption' | 'auditLogging'>;
  config?: Pick<RevenueConfig, 'collaboratorTimeoutMs' | 'exportEncryptionKey'>;
  clock?: () => Date;
}

export class RevenueReportAssembler {
  private readonly aggregator: MetricsAggregator;
  private readonly insights: RevenueInsightGenerator;
  private readonly encoder: ExportEncoder;
  private readonly encryption: boolean;
  private readonly auditEnabled: boolean;
  private readonly timeoutMs: number;
  private readonly exportKey: string | null;
  private readonly clock: () => Date;

  constructor(options: ReportAssemblerOptions) {
    const features = options.features ?? APP_CONFIG.features;
    const config = options.config ?? APP_CONFIG;
    this.aggregator = options.aggregator;
    this.insights = options.insights;
    this.encoder = options.encoder;
    this.encryption = features.encryption;
    this.auditEnabled = features.auditLogging;
    this.timeoutMs = config.collaboratorTimeoutMs;
    this.exportKey = config.exportEncryptionKey;
    this.clock = options.clock ?? (() => new Date());
  }

  async generateRevenueReport(
    period: RevenuePeriod,
    format: ReportFormat,
    tenantId?: string,
    watermarks?: Watermarks,
  ): Promise<RevenueReport> {
    if (!isReportFormat(format)) {
      throw new ValidationError('format', `Unsupported report format: ${format}`, 'unsupported_format');
    }
    const marks = watermarks ?? this.aggregator.ledgerRef.snapshot();
    const range = resolvePeriod(period, this.clock());
    const metrics = this.aggregator.computeMetrics(period, tenantId, { watermarks: marks });
    const breakdown = this.aggregator.computeBreakdown(period, tenantId, { watermarks: marks });
    const previous = this.aggregator.computeMetrics(previousPeriod(period, range), tenantId, {
      allowEmpty: true,
      watermarks: marks,
    });
    const insights = this.insights.generate(tenantId, {
      asOf: new Date(range.endDate.getTime() + 1),
      watermarks: marks,
    });

    const title = `Revenue report (${period.granularity}) ${day(range.startDate)} to ${day(range.endDate)}`;
    const trends = metricTrends(metrics, previous);
    const table: ExportTable = {
      title,
      columns: ['metric', 'value'],
      rows: [
        ['totalRevenue', metrics.totalRevenue.toFixed(2)],
        ['netRevenue', metrics.netRevenue.toFixed(2)],
        ['recurringRevenue', metrics.recurringRevenue.toFixed(2)],
        ['usageRevenue', metrics.usageRevenue.toFixed(2)],
        ['oneTimeRevenue', metrics.oneTimeRevenue.toFixed(2)],
        ['refunds', metrics.refunds.toFixed(2)],
        ['monthlyRecurringRevenue', metrics.monthlyRecurringRevenue.toFixed(2)],
        ['annualRecurringRevenue', metrics.annualRecurringRevenue.toFixed(2)],
        ['customerCount', String(metrics.customerCount)],
        ['averageRevenuePerCustomer', metrics.averageRevenuePerCustomer.toFixed(2)],
        ['churnRate', String(metrics.churnRate)],
        ['growthRate', metrics.growthRate === null ? '' : String(metrics.growthRate)],
      ],
    };
    const data = await this.encode(format, table);

    const report: RevenueReport = {
      id: uuidv4(),
      title,
      ...(tenantId !== undefined ? { tenantId } : {}),
      granularity: period.granularity,
      range,
      generatedAt: metrics.generatedAt,
      metrics,
      breakdown,
      trends,
      insights,
      format,
      data,
    };

    logger.info('Revenue report generated', { reportId: report.id, tenantId, format, bytes: data.byteLength });
    return report;
  }

  async exportRevenueData(dateRange: DateRange, format: ExportFormat, tenantId?: string): Promise<ExportArtifact> {
    assertValidRange(dateRange);
    if (!isExportFormat(format)) {
      throw new ValidationError('format', `Unsupported export format: ${format}`, 'unsupported_format');
    }

    const events = this.aggregator.ledgerRef.query({ tenantId, dateRange }).events;
    const table: ExportTable = {
      title: `Revenue events ${day(dateRange.startDate)} to ${day(dateRange.endDate)}`,
      columns: [
        'id',
        'tenantId',
        'eventType',
        'amount',
        'currency',
        'timestamp',
        'subscriptionId',
        'customerId',
        'invoiceId',
        'source',
      ],
      rows: events.map((e) => [
        e.id,
        e.tenantId,
        e.eventType,
        e.amount.toFixed(2),
        e.currency,
        e.timestamp.toISOString(),
        e.subscriptionId ?? '',
        e.customerId ?? '',
        e.invoiceId ?? '',
        e.source,
      ]),
    };
    const bytes = await this.encode(format, table);

    let artifact: ExportArtifact = { format, range: dateRange, rowCount: events.length, bytes, encrypted: false };
    if (this.encryption) {
      const sealed = sealBytes(bytes, parseExportKey(this.exportKey));
      artifact = { ...artifact, bytes: sealed.ciphertext, encrypted: true, iv: sealed.iv, authTag: sealed.authTag };
    }

    logger.info('Revenue data exported', { tenantId, format, rowCount: events.length, encrypted: artifact.encrypted });
    audit(this.auditEnabled, 'revenue.exported', { tenantId, format, rowCount: events.length });
    return artifact;
  }

  generateReportsForTenants(
    tenantIds: readonly string[],
    period: RevenuePeriod,
    format: ReportFormat,
    signal?: AbortSignal,
  ): Promise<BatchSummary<RevenueReport>> {
    const marks = this.aggregator.ledgerRef.snapshot();
    return runTenantBatch(tenantIds, (id) => this.generateRevenueReport(period, format, id, marks), { signal });
  }

  private encode(format: ReportFormat | ExportFormat, table: ExportTable): Promise<Uint8Array> {
    return callCollaborator('exportEncoder', this.timeoutMs, (signal) => this.encoder.encode(format, table, signal), 'export_failed');
  }
}

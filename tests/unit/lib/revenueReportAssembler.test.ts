import { describe, it, expect } from '@jest/globals';
import { ExportEncoder, RevenueReportAssembler, metricTrends } from '../../../src/lib/revenueReportAssembler';
import { RevenueInsightGenerator } from '../../../src/lib/revenueInsightGenerator';
import { RevenueGrowthAnalyzer } from '../../../src/lib/revenueGrowthAnalyzer';
import { RevenueAnomalyDetector } from '../../../src/lib/revenueAnomalyDetector';
import { RevenueForecastEngine } from '../../../src/lib/revenueForecastEngine';
import { openBytes, parseExportKey } from '../../../src/lib/exportEncryption';
import type { DateRange, RevenuePeriod } from '../../../src/types/revenue';
import { appendAll, captureError, ev, features, revenueStack } from '../../helpers/fixtures';
import { TextExportEncoder } from '../../helpers/textExportEncoder';

const NOW = '2024-08-01T12:00:00.000Z';
const JULY: RevenuePeriod = { granularity: 'monthly', reference: new Date('2024-07-01T00:00:00.000Z') };
const JULY_RANGE: DateRange = {
  startDate: new Date('2024-07-01T00:00:00.000Z'),
  endDate: new Date('2024-07-31T23:59:59.999Z'),
};
const KEY = 'a'.repeat(64);

interface SetupOptions {
  encryption?: boolean;
  exportEncryptionKey?: string | null;
  encoder?: ExportEncoder;
}

async function setup(options: SetupOptions = {}) {
  const stack = revenueStack(NOW);
  await appendAll(stack.ledger, [
    ev('t1', 'usageCharge', 400, '2024-06-10T10:00:00.000Z', { customerId: 'c1' }),
    ev('t1', 'usageCharge', 500, '2024-07-10T10:00:00.000Z', { customerId: 'c1' }),
    ev('t1', 'oneTimePayment', 500, '2024-07-11T10:00:00.000Z', { customerId: 'c2', invoiceId: 'inv-7' }),
    ev('t1', 'refund', 100, '2024-07-12T10:00:00.000Z', { customerId: 'c2' }),
    ev('t2', 'usageCharge', 75, '2024-06-15T10:00:00.000Z', { customerId: 'c9' }),
  ]);
  const f = features({ encryption: options.encryption ?? false });
  const opts = { features: f, clock: stack.clock };
  const insights = new RevenueInsightGenerator({
    aggregator: stack.aggregator,
    growth: new RevenueGrowthAnalyzer(stack.aggregator, opts),
    anomalies: new RevenueAnomalyDetector(stack.aggregator, opts),
    forecast: new RevenueForecastEngine(stack.aggregator, opts),
    features: f,
    clock: stack.clock,
  });
  const assembler = new RevenueReportAssembler({
    aggregator: stack.aggregator,
    insights,
    encoder: options.encoder ?? new TextExportEncoder(),
    features: f,
    config: {
      collaboratorTimeoutMs: 1_000,
      exportEncryptionKey: options.exportEncryptionKey === undefined ? KEY : options.exportEncryptionKey,
    },
    clock: stack.clock,
  });
  return { ...stack, assembler };
}

function text(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

describe('metricTrends', () => {
  it('measures change relative to the previous period', async () => {
    const { aggregator } = await setup();
    const july = aggregator.computeMetrics(JULY, 't1');
    const june = aggregator.computeMetrics({ granularity: 'monthly', reference: new Date('2024-06-01T00:00:00.000Z') }, 't1');

    expect(metricTrends(july, june)).toEqual([
      { metric: 'totalRevenue', direction: 'increasing', magnitude: 1.5, granularity: 'monthly' },
      { metric: 'netRevenue', direction: 'increasing', magnitude: 1.25, granularity: 'monthly' },
      { metric: 'monthlyRecurringRevenue', direction: 'stable', magnitude: 0, granularity: 'monthly' },
      { metric: 'customerCount', direction: 'increasing', magnitude: 1, granularity: 'monthly' },
      { metric: 'churnRate', direction: 'stable', magnitude: 0, granularity: 'monthly' },
    ]);
  });

  it('uses magnitude 1 for growth from zero', async () => {
    const { aggregator } = await setup();
    const july = aggregator.computeMetrics(JULY, 't1');
    const empty = aggregator.computeMetrics(
      { granularity: 'monthly', reference: new Date('2024-05-01T00:00:00.000Z') },
      't1',
      { allowEmpty: true },
    );
    expect(metricTrends(july, empty)[0]).toEqual({
      metric: 'totalRevenue',
      direction: 'increasing',
      magnitude: 1,
      granularity: 'monthly',
    });
    expect(metricTrends(empty, july)[0].direction).toBe('decreasing');
  });
});

describe('RevenueReportAssembler', () => {
  it('renders a monthly report as csv', async () => {
    const { assembler } = await setup();
    const report = await assembler.generateRevenueReport(JULY, 'csv', 't1');

    expect(report.title).toBe('Revenue report (monthly) 2024-07-01 to 2024-07-31');
    expect(report.tenantId).toBe('t1');
    expect(report.format).toBe('csv');
    expect(text(report.data).split('\n')).toEqual([
      'metric,value',
      'totalRevenue,1000.00',
      'netRevenue,900.00',
      'recurringRevenue,0.00',
      'usageRevenue,500.00',
      'oneTimeRevenue,500.00',
      'refunds,100.00',
      'monthlyRecurringRevenue,0.00',
      'annualRecurringRevenue,0.00',
      'customerCount,2',
      'averageRevenuePerCustomer,450.00',
      'churnRate,0',
      'growthRate,1.25',
      '',
    ]);
    expect(report.trends[1]).toEqual({ metric: 'netRevenue', direction: 'increasing', magnitude: 1.25, granularity: 'monthly' });
  });

  it('decodes back to the same figures as json', async () => {
    const { assembler } = await setup();
    const report = await assembler.generateRevenueReport(JULY, 'json', 't1');
    const rows: unknown = JSON.parse(text(report.data));
    expect(Array.isArray(rows) ? rows.slice(0, 2) : null).toEqual([
      { metric: 'totalRevenue', value: '1000.00' },
      { metric: 'netRevenue', value: '900.00' },
    ]);
  });

  it('hands every format to the encoder, csv included', async () => {
    const encoder = new TextExportEncoder();
    const { assembler } = await setup({ encoder });
    await assembler.generateRevenueReport(JULY, 'csv', 't1');
    await assembler.exportRevenueData(JULY_RANGE, 'json', 't1');
    expect(encoder.calls).toEqual(['csv', 'json']);
  });

  it('surfaces formats the encoder rejects and encoder failures', async () => {
    const plain = await setup();
    await expect(plain.assembler.generateRevenueReport(JULY, 'pdf', 't1')).rejects.toMatchObject({
      kind: 'validation',
      code: 'unsupported_format',
    });

    const broken = await setup({
      encoder: {
        encode: async () => {
          throw new Error('renderer crashed');
        },
      },
    });
    await expect(broken.assembler.generateRevenueReport(JULY, 'excel', 't1')).rejects.toMatchObject({
      kind: 'upstream',
      code: 'export_failed',
      message: 'exportEncoder failed: renderer crashed',
    });
  });

  it('exports raw events in time order', async () => {
    const { assembler } = await setup();
    const artifact = await assembler.exportRevenueData(JULY_RANGE, 'csv', 't1');

    expect(artifact.encrypted).toBe(false);
    expect(artifact.rowCount).toBe(3);
    const lines = text(artifact.bytes).trimEnd().split('\n');
    expect(lines[0]).toBe('id,tenantId,eventType,amount,currency,timestamp,subscriptionId,customerId,invoiceId,source');
    expect(lines.slice(1).map((l) => l.split(',').slice(1))).toEqual([
      ['t1', 'usageCharge', '500.00', 'USD', '2024-07-10T10:00:00.000Z', '', 'c1', '', 'manual'],
      ['t1', 'oneTimePayment', '500.00', 'USD', '2024-07-11T10:00:00.000Z', '', 'c2', 'inv-7', 'manual'],
      ['t1', 'refund', '100.00', 'USD', '2024-07-12T10:00:00.000Z', '', 'c2', '', 'manual'],
    ]);
  });

  it('seals exports with the configured key', async () => {
    const { assembler } = await setup({ encryption: true });
    const artifact = await assembler.exportRevenueData(JULY_RANGE, 'csv');

    expect(artifact.encrypted).toBe(true);
    expect(artifact.rowCount).toBe(3);
    const opened = openBytes(
      { ciphertext: artifact.bytes, iv: artifact.iv ?? '', authTag: artifact.authTag ?? '' },
      parseExportKey(KEY),
    );
    expect(text(opened).split('\n')).toHaveLength(5);
  });

  it('refuses to seal without a usable key', async () => {
    const { assembler } = await setup({ encryption: true, exportEncryptionKey: null });
    await expect(assembler.exportRevenueData(JULY_RANGE, 'csv', 't1')).rejects.toMatchObject({
      kind: 'computation',
      code: 'encryption_unavailable',
    });
    expect(captureError(() => parseExportKey('test-secret'))).toMatchObject({ code: 'encryption_unavailable' });
  });

  it('rejects an inverted export range', async () => {
    const { assembler } = await setup();
    const inverted = { startDate: JULY_RANGE.endDate, endDate: JULY_RANGE.startDate };
    await expect(assembler.exportRevenueData(inverted, 'csv')).rejects.toMatchObject({ code: 'invalid_date_range' });
  });

  it('reports per tenant and records failures', async () => {
    const { assembler } = await setup();
    const summary = await assembler.generateReportsForTenants(['t1', 't2'], JULY, 'json');

    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);
    const [first, second] = summary.outcomes;
    expect(first.status === 'succeeded' ? first.result.tenantId : null).toBe('t1');
    expect(second.status === 'failed' ? second.error.code : null).toBe('insufficient_data');
  });
});

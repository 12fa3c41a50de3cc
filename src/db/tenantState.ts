import type BetterSqlite3 from 'better-sqlite3';
import getDb from './index';
import { emptyUsage, TenantStateStorage } from '../lib/usageCounterStore';
import { GOVERNED_RESOURCES, SupportLevel, TenantLimits, TenantUsageCounter } from '../types/tenant';

interface TenantStateRow {
  tenantId: string;
  limits: string | null;
  usage: string | null;
  periodStart: number | null;
  updatedAt: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (typeof value !== 'number') throw new Error(`Corrupt tenant_state row: ${key} is not a number`);
  return value;
}

function supportLevel(value: unknown): SupportLevel {
  if (value === 'email' || value === 'priority' || value === 'dedicated') return value;
  throw new Error('Corrupt tenant_state row: unknown supportLevel');
}

function parseLimits(raw: string): TenantLimits {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) throw new Error('Corrupt tenant_state row: limits is not an object');
  const sla = parsed.slaUptime;
  return {
    apiCallsPerMonth: numberField(parsed, 'apiCallsPerMonth'),
    storageGb: numberField(parsed, 'storageGb'),
    bandwidthGb: numberField(parsed, 'bandwidthGb'),
    maxUsers: numberField(parsed, 'maxUsers'),
    maxCourses: numberField(parsed, 'maxCourses'),
    maxBookings: numberField(parsed, 'maxBookings'),
    maxChildTenants: numberField(parsed, 'maxChildTenants'),
    maxCustomDomains: numberField(parsed, 'maxCustomDomains'),
    maxWebhooks: numberField(parsed, 'maxWebhooks'),
    supportLevel: supportLevel(parsed.supportLevel),
    slaUptime: typeof sla === 'number' ? sla : null,
    backupRetentionDays: numberField(parsed, 'backupRetentionDays'),
    version: numberField(parsed, 'version'),
  };
}

function parseUsage(tenantId: string, raw: string, periodStart: number, updatedAt: number): TenantUsageCounter {
  const parsed: unknown = JSON.parse(raw);
  const usage = emptyUsage();
  if (isRecord(parsed)) {
    for (const resource of GOVERNED_RESOURCES) {
      const value = parsed[resource];
      if (typeof value === 'number') usage[resource] = value;
    }
  }
  return { tenantId, periodStart: new Date(periodStart), usage, updatedAt: new Date(updatedAt) };
}

/** `tenant_state` table: latest resolved limits and usage counters per tenant. */
export class SqliteTenantStateStorage implements TenantStateStorage {
  constructor(private readonly db: BetterSqlite3.Database = getDb()) {}

  private row(tenantId: string): TenantStateRow | undefined {
    return this.db.prepare<[string], TenantStateRow>('SELECT * FROM tenant_state WHERE tenantId = ?').get(tenantId);
  }

  loadUsage(tenantId: string): TenantUsageCounter | null {
    const row = this.row(tenantId);
    if (!row || row.usage === null || row.periodStart === null) return null;
    return parseUsage(tenantId, row.usage, row.periodStart, row.updatedAt);
  }

  saveUsage(counter: TenantUsageCounter): void {
    this.db.prepare(`
      INSERT INTO tenant_state (tenantId, usage, periodStart, updatedAt)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(tenantId) DO UPDATE SET usage = excluded.usage, periodStart = excluded.periodStart, updatedAt = excluded.updatedAt
    `).run(counter.tenantId, JSON.stringify(counter.usage), counter.periodStart.getTime(), counter.updatedAt.getTime());
  }

  loadLimits(tenantId: string): TenantLimits | null {
    const row = this.row(tenantId);
    return row && row.limits !== null ? parseLimits(row.limits) : null;
  }

  saveLimits(tenantId: string, limits: TenantLimits): void {
    this.db.prepare(`
      INSERT INTO tenant_state (tenantId, limits, updatedAt)
      VALUES (?, ?, ?)
      ON CONFLICT(tenantId) DO UPDATE SET limits = excluded.limits, updatedAt = excluded.updatedAt
    `).run(tenantId, JSON.stringify(limits), Date.now());
  }
}

/**
 * @module tenantLimitGovernor
 * @description Effective limit resolution and overage accounting for tenants.
 *
 * Each numeric ceiling resolves independently: an explicit tenant override wins,
 * then the tenant's tier default, then (for child tenants) a fraction of the
 * parent's resolved limit. Parent → child is a reference walked at resolution
 * time through `deriveChildLimits`, never a copied record.
 */

import Decimal from 'decimal.js';
import { getLogger, audit } from './logger';
import { APP_CONFIG, FeatureToggles, POLICY } from './config';
import { NotFoundError, ServiceError, ValidationError, toError } from './errors';
import { shiftBucket } from './dateRange';
import { UsageCounterStore, emptyUsage, isMetered } from './usageCounterStore';
import type { TenantRepository } from './tenantRepository';
import {
  GOVERNED_RESOURCES,
  GovernedResource,
  LimitKey,
  ResourceOverage,
  ResourceUsage,
  Tenant,
  TenantLimitValues,
  TenantLimits,
  TenantTier,
  TenantUsageReport,
} from '../types/tenant';

const logger = getLogger('tenantLimitGovernor');

export const UNBOUNDED = Number.MAX_SAFE_INTEGER;

export const LIMIT_KEY_BY_RESOURCE: Record<GovernedResource, LimitKey> = {
  apiCalls: 'apiCallsPerMonth',
  storageGb: 'storageGb',
  bandwidthGb: 'bandwidthGb',
  users: 'maxUsers',
  courses: 'maxCourses',
  bookings: 'maxBookings',
  childTenants: 'maxChildTenants',
  customDomains: 'maxCustomDomains',
  webhooks: 'maxWebhooks',
};

const LIMIT_KEYS = GOVERNED_RESOURCES.map((r) => LIMIT_KEY_BY_RESOURCE[r]);

export interface LimitExceededNotice {
  tenantId: string;
  resource: GovernedResource;
  usage: number;
  limit: number;
  overage: number;
}

export type LimitExceededListener = (notice: LimitExceededNotice) => void;

// ── Tier factories ────────────────────────────────────────────────────────────

export function individualLimits(): TenantLimits {
  return {
    apiCallsPerMonth: 5_000,
    storageGb: 1,
    bandwidthGb: 5,
    maxUsers: 1,
    maxCourses: 5,
    maxBookings: 20,
    maxChildTenants: 0,
    maxCustomDomains: 0,
    maxWebhooks: 0,
    supportLevel: 'email',
    slaUptime: null,
    backupRetentionDays: 7,
    version: 1,
  };
}

export function smallBusinessLimits(): TenantLimits {
  return {
    apiCallsPerMonth: 25_000,
    storageGb: 10,
    bandwidthGb: 50,
    maxUsers: 5,
    maxCourses: 25,
    maxBookings: 500,
    maxChildTenants: 0,
    maxCustomDomains: 1,
    maxWebhooks: 2,
    supportLevel: 'email',
    slaUptime: 0.95,
    backupRetentionDays: 14,
    version: 1,
  };
}

export function mediumLimits(): TenantLimits {
  return {
    apiCallsPerMonth: 100_000,
    storageGb: 50,
    bandwidthGb: 200,
    maxUsers: 25,
    maxCourses: 100,
    maxBookings: 2_000,
    maxChildTenants: 3,
    maxCustomDomains: 3,
    maxWebhooks: 5,
    supportLevel: 'priority',
    slaUptime: 0.98,
    backupRetentionDays: 30,
    version: 1,
  };
}

export function professionalLimits(): TenantLimits {
  return {
    apiCallsPerMonth: 100_000,
    storageGb: 50,
    bandwidthGb: 200,
    maxUsers: 25,
    maxCourses: 100,
    maxBookings: 1_000,
    maxChildTenants: 0,
    maxCustomDomains: 2,
    maxWebhooks: 3,
    supportLevel: 'priority',
    slaUptime: 0.97,
    backupRetentionDays: 30,
    version: 1,
  };
}

export function enterpriseLimits(): TenantLimits {
  return {
    apiCallsPerMonth: 1_000_000,
    storageGb: 500,
    bandwidthGb: 2_000,
    maxUsers: 1_000,
    maxCourses: 1_000,
    maxBookings: 50_000,
    maxChildTenants: 50,
    maxCustomDomains: 10,
    maxWebhooks: 20,
    supportLevel: 'dedicated',
    slaUptime: 0.995,
    backupRetentionDays: 90,
    version: 1,
  };
}

export function customLimits(): TenantLimits {
  return {
    apiCallsPerMonth: UNBOUNDED,
    storageGb: UNBOUNDED,
    bandwidthGb: UNBOUNDED,
    maxUsers: UNBOUNDED,
    maxCourses: UNBOUNDED,
    maxBookings: UNBOUNDED,
    maxChildTenants: UNBOUNDED,
    maxCustomDomains: UNBOUNDED,
    maxWebhooks: UNBOUNDED,
    supportLevel: 'dedicated',
    slaUptime: 0.999,
    backupRetentionDays: 365,
    version: 1,
  };
}

export function limitsForTier(tier: TenantTier): TenantLimits {
  switch (tier) {
    case 'individual':
      return individualLimits();
    case 'smallBusiness':
      return smallBusinessLimits();
    case 'medium':
      return mediumLimits();
    case 'professional':
      return professionalLimits();
    case 'enterprise':
      return enterpriseLimits();
    case 'custom':
      return customLimits();
    default: {
      const unreachable: never = tier;
      throw new ValidationError('tier', `Unknown tier: ${String(unreachable)}`, 'invalid_tier');
    }
  }
}

/**
 * Default limits for a child: metered resources at a tenth of the parent,
 * seats and webhooks at a fifth, no grandchildren or custom domains.
 */
export function deriveChildLimits(parent: TenantLimits): TenantLimits {
  const metered = (v: number): number => Math.floor(v / POLICY.childLimitFraction.metered);
  const seats = (v: number): number => Math.floor(v / POLICY.childLimitFraction.seats);
  return {
    apiCallsPerMonth: metered(parent.apiCallsPerMonth),
    storageGb: metered(parent.storageGb),
    bandwidthGb: metered(parent.bandwidthGb),
    maxUsers: seats(parent.maxUsers),
    maxCourses: seats(parent.maxCourses),
    maxBookings: metered(parent.maxBookings),
    maxChildTenants: 0,
    maxCustomDomains: 0,
    maxWebhooks: seats(parent.maxWebhooks),
    supportLevel: parent.supportLevel,
    slaUptime: parent.slaUptime,
    backupRetentionDays: parent.backupRetentionDays,
    version: 1,
  };
}

/** `max(0, usage − limit)`; an unbounded limit never overages. */
export function overage(usage: number, limit: number): number {
  if (limit >= UNBOUNDED) return 0;
  return Decimal.max(0, new Decimal(usage).minus(limit)).toNumber();
}

// ── TenantLimitGovernor ───────────────────────────────────────────────────────

export interface TenantLimitGovernorOptions {
  tenants: TenantRepository;
  usage: UsageCounterStore;
  features?: Pick<FeatureToggles, 'auditLogging'>;
  clock?: () => Date;
}

export class TenantLimitGovernor {
  private readonly tenants: TenantRepository;
  private readonly usage: UsageCounterStore;
  private readonly auditEnabled: boolean;
  private readonly clock: () => Date;
  private readonly listeners: Set<LimitExceededListener> = new Set();

  constructor(options: TenantLimitGovernorOptions) {
    this.tenants = options.tenants;
    this.usage = options.usage;
    this.auditEnabled = (options.features ?? APP_CONFIG.features).auditLogging;
    this.clock = options.clock ?? (() => new Date());
    this.usage.onChange((counter, resource, previous) => this.checkCrossing(counter.tenantId, resource, previous, counter.usage));
  }

  resolveLimits(tenant: Tenant): TenantLimits {
    const limits = this.resolve(tenant, new Set());
    const stored = this.usage.stateStorage.loadLimits(tenant.id);
    return { ...limits, version: stored?.version ?? 1 };
  }

  computeOverage(tenant: Tenant, usage: ResourceUsage): ResourceOverage {
    const limits = this.resolveLimits(tenant);
    const out: ResourceOverage = emptyUsage();
    for (const resource of GOVERNED_RESOURCES) {
      out[resource] = overage(usage[resource], limits[LIMIT_KEY_BY_RESOURCE[resource]]);
    }
    return out;
  }

  /** Stores explicit overrides once `validateOverrides` accepts them. */
  configureLimits(tenantId: string, overrides: Partial<TenantLimitValues>, actor = 'system'): TenantLimits {
    const tenant = this.requireTenant(tenantId);
    const entries = this.validateOverrides(tenant.parentTenantId, overrides, tenant.id);

    const merged: Tenant = {
      ...tenant,
      limitOverrides: { ...tenant.limitOverrides, ...overrides },
      updatedAt: this.clock(),
    };
    this.tenants.save(merged);

    const previousVersion = this.usage.stateStorage.loadLimits(tenantId)?.version ?? 1;
    const resolved = { ...this.resolve(merged, new Set()), version: previousVersion + 1 };
    this.usage.stateStorage.saveLimits(tenantId, resolved);

    logger.info('Tenant limits configured', { tenantId, keys: entries, version: resolved.version });
    audit(this.auditEnabled, 'limits.configured', { tenantId, actor, overrides });
    return resolved;
  }

  /**
   * Checks override values, and for a child each one against what the parent has
   * left after the consumption of its other children. Returns the keys present.
   */
  validateOverrides(parentTenantId: string | undefined, overrides: Partial<TenantLimitValues>, tenantId?: string): LimitKey[] {
    const entries = LIMIT_KEYS.filter((key) => overrides[key] !== undefined);
    for (const key of entries) {
      const value = overrides[key];
      if (value === undefined || !Number.isInteger(value) || value < 0 || value > UNBOUNDED) {
        throw new ValidationError(key, `${key} must be a non-negative integer`, 'invalid_limit');
      }
    }
    if (!parentTenantId || entries.length === 0) return entries;

    const parent = this.requireTenant(parentTenantId);
    const parentLimits = this.resolveLimits(parent);
    const siblings = this.tenants.children(parent.id).filter((c) => c.id !== tenantId);
    for (const resource of GOVERNED_RESOURCES) {
      const key = LIMIT_KEY_BY_RESOURCE[resource];
      const requested = overrides[key];
      if (requested === undefined || parentLimits[key] >= UNBOUNDED) continue;
      const consumed = siblings.reduce((s, c) => s + this.usage.get(c.id).usage[resource], 0);
      const remaining = Math.max(0, parentLimits[key] - consumed);
      if (requested > remaining) {
        logger.warn('Child limit rejected by parent allocation', { tenantId, resource, requested, remaining });
        throw new ServiceError(
          'validation',
          'hierarchy_limit_exceeded',
          `${key} of ${requested} exceeds the parent's remaining allocation of ${remaining}`,
          { ...(tenantId ? { tenantId } : {}), parentTenantId: parent.id, resource, requested, remaining },
        );
      }
    }
    return entries;
  }

  /** Resolves and stores the current limits without changing overrides. */
  refreshLimits(tenantId: string): TenantLimits {
    const tenant = this.requireTenant(tenantId);
    const resolved = this.resolveLimits(tenant);
    this.usage.stateStorage.saveLimits(tenantId, resolved);
    return resolved;
  }

  getTenantUsage(tenantId: string): TenantUsageReport {
    const tenant = this.requireTenant(tenantId);
    const limits = this.resolveLimits(tenant);
    const counter = this.usage.get(tenantId);
    const now = this.clock();

    const periodEnd = shiftBucket('monthly', counter.periodStart, 1).getTime();
    const periodLength = periodEnd - counter.periodStart.getTime();
    const elapsed = Math.min(periodLength, Math.max(0, now.getTime() - counter.periodStart.getTime()));
    const fraction = periodLength > 0 ? elapsed / periodLength : 0;

    const projected = { ...counter.usage };
    for (const resource of GOVERNED_RESOURCES) {
      if (isMetered(resource) && fraction > 0) {
        projected[resource] = Math.round((counter.usage[resource] / fraction) * 100) / 100;
      }
    }

    const overages: ResourceOverage = emptyUsage();
    for (const resource of GOVERNED_RESOURCES) {
      overages[resource] = overage(counter.usage[resource], limits[LIMIT_KEY_BY_RESOURCE[resource]]);
    }

    return {
      tenantId,
      limits,
      usage: counter.usage,
      overages,
      projectedUsage: { projected, confidence: Math.round(fraction * 100) / 100 },
      periodStart: counter.periodStart,
      generatedAt: now,
    };
  }

  onLimitExceeded(listener: LimitExceededListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private checkCrossing(tenantId: string, resource: GovernedResource, previous: number, usage: ResourceUsage): void {
    if (this.listeners.size === 0) return;
    const tenant = this.tenants.get(tenantId);
    if (!tenant) return;
    const limit = this.resolveLimits(tenant)[LIMIT_KEY_BY_RESOURCE[resource]];
    const current = usage[resource];
    if (limit >= UNBOUNDED || previous > limit || current <= limit) return;

    const notice: LimitExceededNotice = { tenantId, resource, usage: current, limit, overage: overage(current, limit) };
    logger.warn('Tenant limit exceeded', { ...notice });
    for (const listener of this.listeners) {
      try {
        listener(notice);
      } catch (err) {
        logger.error('Limit listener failed', toError(err), { tenantId, resource });
      }
    }
  }

  private resolve(tenant: Tenant, visiting: Set<string>): TenantLimits {
    if (visiting.has(tenant.id)) {
      throw new ValidationError('parentTenantId', `Tenant hierarchy cycle at ${tenant.id}`, 'hierarchy_cycle');
    }
    visiting.add(tenant.id);

    let base: TenantLimits;
    if (tenant.tier) {
      base = limitsForTier(tenant.tier);
    } else if (tenant.parentTenantId) {
      const parent = this.requireTenant(tenant.parentTenantId);
      base = deriveChildLimits(this.resolve(parent, visiting));
    } else {
      throw new ValidationError('tier', `Tenant ${tenant.id} has neither a tier nor a parent`, 'tier_required');
    }

    const resolved: TenantLimits = { ...base };
    for (const key of LIMIT_KEYS) {
      const override = tenant.limitOverrides?.[key];
      if (override !== undefined) resolved[key] = override;
    }
    return resolved;
  }

  private requireTenant(tenantId: string): Tenant {
    const tenant = this.tenants.get(tenantId);
    if (!tenant) throw new NotFoundError('tenant', tenantId);
    return tenant;
  }
}

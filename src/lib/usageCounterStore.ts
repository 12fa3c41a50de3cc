import { getLogger } from './logger';
import { ValidationError, toError } from './errors';
import { bucketStart } from './dateRange';
import {
  GOVERNED_RESOURCES,
  GovernedResource,
  ResourceUsage,
  TenantLimits,
  TenantUsageCounter,
} from '../types/tenant';

const logger = getLogger('usageCounterStore');

// ── Storage contract ──────────────────────────────────────────────────────────

/** Latest resolved limits and current-period usage, keyed by tenant. */
export interface TenantStateStorage {
  loadUsage(tenantId: string): TenantUsageCounter | null;
  saveUsage(counter: TenantUsageCounter): void;
  loadLimits(tenantId: string): TenantLimits | null;
  saveLimits(tenantId: string, limits: TenantLimits): void;
}

export function emptyUsage(): ResourceUsage {
  return {
    apiCalls: 0,
    storageGb: 0,
    bandwidthGb: 0,
    users: 0,
    courses: 0,
    bookings: 0,
    childTenants: 0,
    customDomains: 0,
    webhooks: 0,
  };
}

function copyCounter(counter: TenantUsageCounter): TenantUsageCounter {
  return {
    tenantId: counter.tenantId,
    periodStart: new Date(counter.periodStart.getTime()),
    usage: { ...counter.usage },
    updatedAt: new Date(counter.updatedAt.getTime()),
  };
}

export class InMemoryTenantStateStorage implements TenantStateStorage {
  private usage: Map<string, TenantUsageCounter> = new Map();
  private limits: Map<string, TenantLimits> = new Map();

  loadUsage(tenantId: string): TenantUsageCounter | null {
    const counter = this.usage.get(tenantId);
    return counter ? copyCounter(counter) : null;
  }

  saveUsage(counter: TenantUsageCounter): void {
    this.usage.set(counter.tenantId, copyCounter(counter));
  }

  loadLimits(tenantId: string): TenantLimits | null {
    const limits = this.limits.get(tenantId);
    return limits ? { ...limits } : null;
  }

  saveLimits(tenantId: string, limits: TenantLimits): void {
    this.limits.set(tenantId, { ...limits });
  }
}

// ── UsageCounterStore ─────────────────────────────────────────────────────────

export type UsageChangeListener = (counter: TenantUsageCounter, resource: GovernedResource, previous: number) => void;

export interface UsageCounterStoreOptions {
  storage?: TenantStateStorage;
  clock?: () => Date;
}

/** Externally fed consumption counters for the current billing period. */
export class UsageCounterStore {
  private readonly storage: TenantStateStorage;
  private readonly clock: () => Date;
  private readonly listeners: Set<UsageChangeListener> = new Set();

  constructor(options: UsageCounterStoreOptions = {}) {
    this.storage = options.storage ?? new InMemoryTenantStateStorage();
    this.clock = options.clock ?? (() => new Date());
  }

  get stateStorage(): TenantStateStorage {
    return this.storage;
  }

  get(tenantId: string): TenantUsageCounter {
    const existing = this.storage.loadUsage(tenantId);
    if (existing) return existing;
    const now = this.clock();
    return { tenantId, periodStart: bucketStart('monthly', now), usage: emptyUsage(), updatedAt: now };
  }

  record(tenantId: string, resource: GovernedResource, amount: number): TenantUsageCounter {
    this.assertAmount(resource, amount);
    const counter = this.get(tenantId);
    const previous = counter.usage[resource];
    counter.usage[resource] = previous + amount;
    return this.commit(counter, resource, previous);
  }

  set(tenantId: string, resource: GovernedResource, value: number): TenantUsageCounter {
    this.assertAmount(resource, value);
    const counter = this.get(tenantId);
    const previous = counter.usage[resource];
    counter.usage[resource] = value;
    return this.commit(counter, resource, previous);
  }

  /** Starts a new billing period with zeroed metered counters; seat-like counts carry over. */
  resetPeriod(tenantId: string, periodStart: Date): TenantUsageCounter {
    const previous = this.get(tenantId);
    const usage = emptyUsage();
    for (const resource of GOVERNED_RESOURCES) {
      if (!isMetered(resource)) usage[resource] = previous.usage[resource];
    }
    const counter: TenantUsageCounter = { tenantId, periodStart, usage, updatedAt: this.clock() };
    this.storage.saveUsage(counter);
    logger.info('Usage period reset', { tenantId, periodStart: periodStart.toISOString() });
    return copyCounter(counter);
  }

  onChange(listener: UsageChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(counter: TenantUsageCounter, resource: GovernedResource, previous: number): TenantUsageCounter {
    counter.updatedAt = this.clock();
    this.storage.saveUsage(counter);
    logger.debug('Usage counter updated', { tenantId: counter.tenantId, resource, value: counter.usage[resource] });
    for (const listener of this.listeners) {
      try {
        listener(copyCounter(counter), resource, previous);
      } catch (err) {
        logger.error('Usage listener failed', toError(err), { tenantId: counter.tenantId, resource });
      }
    }
    return copyCounter(counter);
  }

  private assertAmount(resource: GovernedResource, amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError(resource, `Usage for ${resource} must be a finite non-negative number`, 'invalid_usage');
    }
  }
}

/** Resources consumed per billing period rather than held. */
export function isMetered(resource: GovernedResource): boolean {
  switch (resource) {
    case 'apiCalls':
    case 'bandwidthGb':
    case 'bookings':
      return true;
    case 'storageGb':
    case 'users':
    case 'courses':
    case 'childTenants':
    case 'customDomains':
    case 'webhooks':
      return false;
    default: {
      const unreachable: never = resource;
      throw new ValidationError('resource', `Unknown resource: ${String(unreachable)}`);
    }
  }
}

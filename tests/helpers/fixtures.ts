import { DEFAULT_FEATURES, FeatureToggles } from '../../src/lib/config';
import { RevenueEventLedger, RevenueEventInput, createRevenueEvent } from '../../src/lib/revenueEventLedger';
import { MetricsAggregator } from '../../src/lib/metricsAggregator';
import { InMemoryTenantRepository } from '../../src/lib/tenantRepository';
import { UsageCounterStore } from '../../src/lib/usageCounterStore';
import { TenantLimitGovernor } from '../../src/lib/tenantLimitGovernor';
import { TenantManager, allowListAuthorizer } from '../../src/lib/tenantManager';
import type { RevenueEvent, RevenueEventType, StoredRevenueEvent } from '../../src/types/revenue';
import type { Tenant, TenantTier } from '../../src/types/tenant';

export function fixedClock(iso: string): () => Date {
  const t = new Date(iso).getTime();
  return () => new Date(t);
}

export function features(overrides: Partial<FeatureToggles> = {}): FeatureToggles {
  return { ...DEFAULT_FEATURES, benchmarking: false, ...overrides };
}

export function ev(
  tenantId: string,
  eventType: RevenueEventType,
  amount: string | number,
  iso: string,
  extra: Partial<Omit<RevenueEventInput, 'tenantId' | 'eventType' | 'amount' | 'timestamp'>> = {},
): RevenueEvent {
  return createRevenueEvent({ tenantId, eventType, amount, timestamp: new Date(iso), currency: 'USD', ...extra });
}

export async function appendAll(ledger: RevenueEventLedger, events: RevenueEvent[]): Promise<StoredRevenueEvent[]> {
  const stored: StoredRevenueEvent[] = [];
  for (const e of events) stored.push(await ledger.append(e));
  return stored;
}

export function revenueStack(nowIso: string, overrides: Partial<FeatureToggles> = {}) {
  const clock = fixedClock(nowIso);
  const ledger = new RevenueEventLedger({ clock });
  const aggregator = new MetricsAggregator({ ledger, features: features(overrides), reportingCurrency: 'USD', clock });
  return { clock, ledger, aggregator };
}

export function tenantStack(nowIso: string, admins: string[] = ['admin']) {
  const clock = fixedClock(nowIso);
  const repository = new InMemoryTenantRepository();
  const usage = new UsageCounterStore({ clock });
  const governor = new TenantLimitGovernor({ tenants: repository, usage, features: features(), clock });
  const tenants = new TenantManager({
    tenants: repository,
    governor,
    usage,
    authorizer: allowListAuthorizer(admins),
    features: features(),
    clock,
  });
  return { clock, repository, usage, governor, tenants };
}

export function activeTenant(tenants: TenantManager, slug: string, tier: TenantTier): Tenant {
  const created = tenants.createTenant({ name: slug, slug, tier });
  return tenants.activate(created.id);
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the call to throw');
}

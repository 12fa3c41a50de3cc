import { v4 as uuidv4 } from 'uuid';
import { getLogger, audit } from './logger';
import { APP_CONFIG, FeatureToggles } from './config';
import { AuthorizationError, NotFoundError, ValidationError } from './errors';
import type { TenantRepository } from './tenantRepository';
import { TenantLimitGovernor } from './tenantLimitGovernor';
import { UsageCounterStore } from './usageCounterStore';
import {
  SUSPENSION_REASONS,
  TENANT_TIERS,
  SuspensionReason,
  Tenant,
  TenantCreateRequest,
  TenantStatus,
} from '../types/tenant';

const logger = getLogger('tenantManager');

// ─── Lifecycle ───────────────────────────────────────────────────────────────

export const STATUS_TRANSITIONS: Record<TenantStatus, readonly TenantStatus[]> = {
  provisioning: ['active', 'deleted'],
  active: ['suspended', 'inactive', 'deleted'],
  suspended: ['active', 'inactive', 'deleted'],
  inactive: ['deleted'],
  deleted: [],
};

export function canTransition(from: TenantStatus, to: TenantStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

const SLUG_PATTERN = /^[a-z0-9-]+$/;

/** Decides whether an actor may perform destructive tenant operations. */
export interface TenantAuthorizer {
  canDeleteTenant(actor: string, tenantId: string): boolean;
}

export function allowListAuthorizer(actors: string[]): TenantAuthorizer {
  const allowed = new Set(actors);
  return { canDeleteTenant: (actor) => allowed.has(actor) };
}

function isSuspensionReason(value: unknown): value is SuspensionReason {
  return SUSPENSION_REASONS.some((r) => r === value);
}

// ─── TenantManager ───────────────────────────────────────────────────────────

export interface TenantManagerOptions {
  tenants: TenantRepository;
  governor: TenantLimitGovernor;
  usage: UsageCounterStore;
  authorizer?: TenantAuthorizer;
  features?: Pick<FeatureToggles, 'auditLogging'>;
  clock?: () => Date;
}

export class TenantManager {
  private readonly tenants: TenantRepository;
  private readonly governor: TenantLimitGovernor;
  private readonly usage: UsageCounterStore;
  private readonly authorizer: TenantAuthorizer;
  private readonly auditEnabled: boolean;
  private readonly clock: () => Date;

  constructor(options: TenantManagerOptions) {
    this.tenants = options.tenants;
    this.governor = options.governor;
    this.usage = options.usage;
    this.authorizer = options.authorizer ?? allowListAuthorizer([]);
    this.auditEnabled = (options.features ?? APP_CONFIG.features).auditLogging;
    this.clock = options.clock ?? (() => new Date());
  }

  createTenant(request: TenantCreateRequest): Tenant {
    this.validateRequest(request);
    if (!request.tier) {
      throw new ValidationError('tier', 'A root tenant requires a tier', 'tier_required');
    }
    if (request.limitOverrides) this.governor.validateOverrides(undefined, request.limitOverrides);
    return this.insert(request, undefined);
  }

  createChildTenant(parentId: string, request: TenantCreateRequest): Tenant {
    this.validateRequest(request);
    if (request.tier) {
      throw new ValidationError('tier', 'Child tenants derive their limits from the parent', 'child_tier_not_allowed');
    }
    const parent = this.getTenant(parentId);
    if (parent.status === 'deleted' || parent.status === 'inactive') {
      throw new ValidationError('parentTenantId', `Parent tenant ${parentId} is ${parent.status}`, 'parent_not_active');
    }

    const max = this.governor.resolveLimits(parent).maxChildTenants;
    if (max === 0) {
      throw new ValidationError('parentTenantId', 'Parent tier does not allow child tenants', 'child_tenants_not_allowed');
    }
    const existing = this.listChildTenants(parentId).length;
    if (existing >= max) {
      throw new ValidationError('parentTenantId', `Parent already has ${existing} of ${max} child tenants`, 'child_tenant_limit_reached');
    }

    if (request.limitOverrides) this.governor.validateOverrides(parentId, request.limitOverrides);

    const child = this.insert(request, parentId);
    this.usage.set(parentId, 'childTenants', existing + 1);
    return child;
  }

  getTenant(tenantId: string): Tenant {
    const tenant = this.tenants.get(tenantId);
    if (!tenant) throw new NotFoundError('tenant', tenantId);
    return tenant;
  }

  hasTenant(tenantId: string): boolean {
    return this.tenants.get(tenantId) !== null;
  }

  listTenants(): Tenant[] {
    return this.tenants.list().filter((t) => t.status !== 'deleted');
  }

  listChildTenants(parentId: string): Tenant[] {
    return this.tenants.children(parentId).filter((t) => t.status !== 'deleted');
  }

  activate(tenantId: string, actor = 'system'): Tenant {
    const tenant = this.getTenant(tenantId);
    if (tenant.status !== 'provisioning') throw this.illegal(tenant, 'active');
    return this.transition(tenant, 'active', actor);
  }

  /** Requires a reason; without one the tenant is left untouched. */
  suspend(tenantId: string, reason: SuspensionReason | undefined, actor = 'system'): Tenant {
    if (!isSuspensionReason(reason)) {
      logger.warn('Suspension rejected: reason missing', { tenantId });
      throw new ValidationError('reason', 'A suspension reason is required', 'suspension_reason_required');
    }
    const tenant = this.getTenant(tenantId);
    return this.transition(tenant, 'suspended', actor, { suspensionReason: reason, suspendedAt: this.clock() });
  }

  reactivate(tenantId: string, actor = 'system'): Tenant {
    const tenant = this.getTenant(tenantId);
    if (tenant.status !== 'suspended') {
      throw this.illegal(tenant, 'active');
    }
    return this.transition(tenant, 'active', actor, { suspensionReason: undefined, suspendedAt: undefined });
  }

  deactivate(tenantId: string, actor = 'system'): Tenant {
    return this.transition(this.getTenant(tenantId), 'inactive', actor);
  }

  /** Irreversible. Authorisation is decided before the tenant is looked up. */
  deleteTenant(tenantId: string, actor: string): Tenant {
    if (!this.authorizer.canDeleteTenant(actor, tenantId)) {
      logger.warn('Tenant deletion denied', { actor });
      throw new AuthorizationError('tenant.delete');
    }
    const tenant = this.getTenant(tenantId);
    const children = this.listChildTenants(tenantId);
    if (children.length > 0) {
      throw new ValidationError('tenantId', `Tenant still has ${children.length} child tenants`, 'has_child_tenants');
    }
    const deleted = this.transition(tenant, 'deleted', actor);
    if (tenant.parentTenantId) {
      this.usage.set(tenant.parentTenantId, 'childTenants', this.listChildTenants(tenant.parentTenantId).length);
    }
    return deleted;
  }

  private transition(tenant: Tenant, to: TenantStatus, actor: string, patch: Partial<Tenant> = {}): Tenant {
    if (!canTransition(tenant.status, to)) throw this.illegal(tenant, to);

    const { suspensionReason, suspendedAt, ...rest } = { ...tenant, ...patch };
    const updated: Tenant = {
      ...rest,
      ...(suspensionReason ? { suspensionReason } : {}),
      ...(suspendedAt ? { suspendedAt } : {}),
      status: to,
      updatedAt: this.clock(),
    };
    this.tenants.save(updated);

    logger.info('Tenant status changed', { tenantId: tenant.id, from: tenant.status, to });
    audit(this.auditEnabled, 'tenant.status_changed', {
      tenantId: tenant.id,
      actor,
      from: tenant.status,
      to,
      ...(updated.suspensionReason ? { reason: updated.suspensionReason } : {}),
    });
    return updated;
  }

  private illegal(tenant: Tenant, to: TenantStatus): ValidationError {
    logger.warn('Illegal tenant status transition', { tenantId: tenant.id, from: tenant.status, to });
    return new ValidationError('status', `Cannot move tenant from ${tenant.status} to ${to}`, 'invalid_status_transition', {
      from: tenant.status,
      to,
    });
  }

  private insert(request: TenantCreateRequest, parentTenantId: string | undefined): Tenant {
    const tenant: Tenant = {
      id: uuidv4(),
      name: request.name.trim(),
      slug: request.slug,
      ...(request.tier ? { tier: request.tier } : {}),
      status: 'provisioning',
      ...(parentTenantId ? { parentTenantId } : {}),
      ...(request.limitOverrides ? { limitOverrides: { ...request.limitOverrides } } : {}),
      createdAt: this.clock(),
      branding: { ...request.branding },
      settings: { ...request.settings },
      metadata: { ...request.metadata },
    };
    this.tenants.save(tenant);
    this.governor.refreshLimits(tenant.id);

    logger.info('Tenant created', { tenantId: tenant.id, slug: tenant.slug, parentTenantId });
    audit(this.auditEnabled, 'tenant.created', { tenantId: tenant.id, slug: tenant.slug, parentTenantId });
    return tenant;
  }

  private validateRequest(request: TenantCreateRequest): void {
    if (typeof request.name !== 'string' || request.name.trim().length === 0) {
      throw new ValidationError('name', 'Tenant name is required');
    }
    if (!SLUG_PATTERN.test(request.slug)) {
      throw new ValidationError('slug', 'Slug may only contain lowercase letters, digits and hyphens', 'invalid_slug');
    }
    if (this.tenants.findBySlug(request.slug)) {
      throw new ValidationError('slug', `Slug already in use: ${request.slug}`, 'slug_already_exists');
    }
    if (request.tier !== undefined && !TENANT_TIERS.some((t) => t === request.tier)) {
      throw new ValidationError('tier', `Unknown tier: ${request.tier}`, 'invalid_tier');
    }
  }
}

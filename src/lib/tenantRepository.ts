import type { Tenant } from '../types/tenant';

/** Tenant aggregate storage. Parent/child links are plain id references. */
export interface TenantRepository {
  get(tenantId: string): Tenant | null;
  findBySlug(slug: string): Tenant | null;
  save(tenant: Tenant): void;
  list(): Tenant[];
  children(parentId: string): Tenant[];
}

function cloneTenant(t: Tenant): Tenant {
  return {
    ...t,
    ...(t.limitOverrides ? { limitOverrides: { ...t.limitOverrides } } : {}),
    branding: { ...t.branding },
    settings: { ...t.settings },
    metadata: { ...t.metadata },
  };
}

export class InMemoryTenantRepository implements TenantRepository {
  private tenants: Map<string, Tenant> = new Map();

  get(tenantId: string): Tenant | null {
    const t = this.tenants.get(tenantId);
    return t ? cloneTenant(t) : null;
  }

  findBySlug(slug: string): Tenant | null {
    for (const t of this.tenants.values()) {
      if (t.slug === slug) return cloneTenant(t);
    }
    return null;
  }

  save(tenant: Tenant): void {
    this.tenants.set(tenant.id, cloneTenant(tenant));
  }

  list(): Tenant[] {
    return [...this.tenants.values()].map(cloneTenant);
  }

  children(parentId: string): Tenant[] {
    return [...this.tenants.values()].filter((t) => t.parentTenantId === parentId).map(cloneTenant);
  }
}

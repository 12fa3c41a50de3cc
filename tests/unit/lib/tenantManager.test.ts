import { describe, it, expect } from '@jest/globals';
import { AuthorizationError } from '../../../src/lib/errors';
import { canTransition } from '../../../src/lib/tenantManager';
import { activeTenant, captureError, tenantStack } from '../../helpers/fixtures';

const NOW = '2024-07-16T12:00:00.000Z';

describe('TenantManager', () => {
  it('creates root tenants in provisioning', () => {
    const { tenants } = tenantStack(NOW);
    const tenant = tenants.createTenant({ name: '  Pine Valley ', slug: 'pine-valley', tier: 'smallBusiness' });
    expect(tenant.status).toBe('provisioning');
    expect(tenant.name).toBe('Pine Valley');
    expect(tenant.createdAt.toISOString()).toBe(NOW);
    expect(tenants.hasTenant(tenant.id)).toBe(true);
  });

  it('validates slugs and tiers', () => {
    const { tenants } = tenantStack(NOW);
    tenants.createTenant({ name: 'Pine Valley', slug: 'pine-valley', tier: 'smallBusiness' });

    expect(captureError(() => tenants.createTenant({ name: 'Bad', slug: 'Bad Slug', tier: 'medium' }))).toMatchObject({
      code: 'invalid_slug',
    });
    expect(
      captureError(() => tenants.createTenant({ name: 'Again', slug: 'pine-valley', tier: 'medium' })),
    ).toMatchObject({ code: 'slug_already_exists' });
    expect(captureError(() => tenants.createTenant({ name: 'No tier', slug: 'no-tier' }))).toMatchObject({
      code: 'tier_required',
    });
  });

  it('walks the lifecycle', () => {
    const { tenants } = tenantStack(NOW);
    const tenant = activeTenant(tenants, 'pine-valley', 'medium');
    expect(tenant.status).toBe('active');

    const suspended = tenants.suspend(tenant.id, 'nonPayment');
    expect(suspended.status).toBe('suspended');
    expect(suspended.suspensionReason).toBe('nonPayment');
    expect(suspended.suspendedAt?.toISOString()).toBe(NOW);

    const reactivated = tenants.reactivate(tenant.id);
    expect(reactivated.status).toBe('active');
    expect(reactivated.suspensionReason).toBeUndefined();
    expect(reactivated.suspendedAt).toBeUndefined();

    expect(tenants.deactivate(tenant.id).status).toBe('inactive');
    expect(captureError(() => tenants.reactivate(tenant.id))).toMatchObject({ code: 'invalid_status_transition' });
  });

  it('refuses to suspend without a reason and leaves the status unchanged', () => {
    const { tenants } = tenantStack(NOW);
    const tenant = activeTenant(tenants, 'pine-valley', 'medium');
    expect(captureError(() => tenants.suspend(tenant.id, undefined))).toMatchObject({
      kind: 'validation',
      code: 'suspension_reason_required',
    });
    expect(tenants.getTenant(tenant.id).status).toBe('active');
  });

  it('only allows listed transitions', () => {
    expect(canTransition('provisioning', 'active')).toBe(true);
    expect(canTransition('inactive', 'active')).toBe(false);
    expect(canTransition('deleted', 'active')).toBe(false);
  });

  it('authorises deletion before looking the tenant up', () => {
    const { tenants } = tenantStack(NOW);
    const err = captureError(() => tenants.deleteTenant('missing', 'intruder'));
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err).toMatchObject({ kind: 'authorization', code: 'forbidden' });
  });

  it('deletes tenants and hides them from listings', () => {
    const { tenants } = tenantStack(NOW);
    const tenant = activeTenant(tenants, 'pine-valley', 'medium');
    expect(tenants.deleteTenant(tenant.id, 'admin').status).toBe('deleted');
    expect(tenants.listTenants()).toEqual([]);
  });

  it('enforces child tenant allowances', () => {
    const { tenants, usage } = tenantStack(NOW);
    const solo = activeTenant(tenants, 'solo', 'individual');
    expect(captureError(() => tenants.createChildTenant(solo.id, { name: 'Kid', slug: 'kid' }))).toMatchObject({
      code: 'child_tenants_not_allowed',
    });

    const parent = activeTenant(tenants, 'links-group', 'medium');
    for (const slug of ['east', 'west', 'north']) {
      tenants.createChildTenant(parent.id, { name: slug, slug });
    }
    expect(usage.get(parent.id).usage.childTenants).toBe(3);
    expect(captureError(() => tenants.createChildTenant(parent.id, { name: 'South', slug: 'south' }))).toMatchObject({
      code: 'child_tenant_limit_reached',
    });
  });

  it('keeps child limits inside the parent allocation', () => {
    const { tenants, governor, repository } = tenantStack(NOW);
    const parent = activeTenant(tenants, 'links-group', 'medium');

    expect(
      captureError(() => tenants.createChildTenant(parent.id, { name: 'East', slug: 'east', tier: 'enterprise' })),
    ).toMatchObject({ kind: 'validation', code: 'child_tier_not_allowed', context: { field: 'tier' } });
    expect(
      captureError(() =>
        tenants.createChildTenant(parent.id, { name: 'East', slug: 'east', limitOverrides: { apiCallsPerMonth: 9_000_000 } }),
      ),
    ).toMatchObject({
      kind: 'validation',
      code: 'hierarchy_limit_exceeded',
      context: { parentTenantId: parent.id, resource: 'apiCalls', requested: 9_000_000, remaining: 100_000 },
    });
    expect(tenants.listChildTenants(parent.id)).toEqual([]);
    expect(repository.list()).toHaveLength(1);

    const child = tenants.createChildTenant(parent.id, {
      name: 'East',
      slug: 'east',
      limitOverrides: { apiCallsPerMonth: 40_000 },
    });
    expect(governor.resolveLimits(child).apiCallsPerMonth).toBe(40_000);
    expect(governor.resolveLimits(child).maxUsers).toBe(governor.resolveLimits(parent).maxUsers / 5);
  });

  it('keeps parents with children and recounts after a child is deleted', () => {
    const { tenants, usage } = tenantStack(NOW);
    const parent = activeTenant(tenants, 'links-group', 'medium');
    const child = tenants.createChildTenant(parent.id, { name: 'East', slug: 'east' });

    expect(captureError(() => tenants.deleteTenant(parent.id, 'admin'))).toMatchObject({ code: 'has_child_tenants' });
    tenants.deleteTenant(child.id, 'admin');
    expect(usage.get(parent.id).usage.childTenants).toBe(0);
    expect(tenants.listChildTenants(parent.id)).toEqual([]);
    expect(tenants.deleteTenant(parent.id, 'admin').status).toBe('deleted');
  });

  it('reports unknown tenants as not found', () => {
    const { tenants } = tenantStack(NOW);
    expect(captureError(() => tenants.getTenant('missing'))).toMatchObject({ code: 'tenant_not_found' });
    expect(tenants.hasTenant('missing')).toBe(false);
  });
});

import { describe, it, expect } from '@jest/globals';
import {
  ItemMigrationOutcome,
  TenantDataMigrator,
  TenantMigrationService,
  selectedItems,
  settleStatus,
} from '../../../src/lib/tenantMigration';
import type { MigrationItem, MigrationOptions } from '../../../src/types/tenant';
import { activeTenant, features, tenantStack } from '../../helpers/fixtures';

const NOW = '2024-07-16T12:00:00.000Z';
const ALL: MigrationOptions = { includeUsers: true, includeCourses: true, includeBookings: true, includeSettings: true };
const NONE: MigrationOptions = { includeUsers: false, includeCourses: false, includeBookings: false, includeSettings: false };

type Plan = Partial<Record<MigrationItem, ItemMigrationOutcome | Error | 'hang'>>;

class ScriptedMigrator implements TenantDataMigrator {
  readonly calls: MigrationItem[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(
    private readonly plan: Plan,
    private readonly onCall?: (item: MigrationItem) => void,
  ) {}

  async migrate(item: MigrationItem, _from: string, _to: string, signal: AbortSignal): Promise<ItemMigrationOutcome> {
    this.calls.push(item);
    this.signals.push(signal);
    this.onCall?.(item);
    const step = this.plan[item] ?? { migrated: 1, failed: 0 };
    if (step === 'hang') {
      return new Promise<ItemMigrationOutcome>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    if (step instanceof Error) throw step;
    return step;
  }
}

function setup(plan: Plan, onCall?: (item: MigrationItem) => void, timeoutMs = 1_000) {
  const stack = tenantStack(NOW);
  const from = activeTenant(stack.tenants, 'old-course', 'medium');
  const to = activeTenant(stack.tenants, 'new-course', 'medium');
  const migrator = new ScriptedMigrator(plan, onCall);
  const service = new TenantMigrationService(stack.tenants, migrator, {
    features: features(),
    timeoutMs,
    clock: stack.clock,
  });
  return { ...stack, from, to, migrator, service };
}

describe('settleStatus', () => {
  it('settles on the terminal status for the counts', () => {
    expect(settleStatus({ totalItems: 5, successfulItems: 5, failedItems: 0 }, false)).toBe('completed');
    expect(settleStatus({ totalItems: 5, successfulItems: 3, failedItems: 2 }, false)).toBe('partiallyCompleted');
    expect(settleStatus({ totalItems: 2, successfulItems: 0, failedItems: 2 }, false)).toBe('failed');
    expect(settleStatus({ totalItems: 5, successfulItems: 5, failedItems: 0 }, true)).toBe('cancelled');
  });

  it('selects item groups in a fixed order', () => {
    expect(selectedItems({ ...NONE, includeSettings: true, includeUsers: true })).toEqual(['users', 'settings']);
  });
});

describe('TenantMigrationService', () => {
  it('completes when every item group moves', async () => {
    const { service, from, to } = setup({ users: { migrated: 10, failed: 0 }, courses: { migrated: 3, failed: 0 } });
    const result = await service.migrateTenantData(from.id, to.id, { ...NONE, includeUsers: true, includeCourses: true });

    expect(result.status).toBe('completed');
    expect(result.migratedItems).toEqual(['users', 'courses']);
    expect(result.statistics).toEqual({ totalItems: 13, successfulItems: 13, failedItems: 0 });
    expect(result.errors).toEqual([]);
    expect(service.getMigration(result.migrationId)).toEqual(result);
  });

  it('is partially completed when some groups fail', async () => {
    const { service, from, to } = setup({ users: { migrated: 10, failed: 0 }, bookings: new Error('boom') });
    const result = await service.migrateTenantData(from.id, to.id, { ...NONE, includeUsers: true, includeBookings: true });

    expect(result.status).toBe('partiallyCompleted');
    expect(result.statistics).toEqual({ totalItems: 11, successfulItems: 10, failedItems: 1 });
    expect(result.errors).toEqual(['bookings: tenantDataMigrator failed: boom']);
  });

  it('fails when nothing moves', async () => {
    const { service, from, to } = setup({ settings: { migrated: 0, failed: 2, errors: ['bad key', 'bad value'] } });
    const result = await service.migrateTenantData(from.id, to.id, { ...NONE, includeSettings: true });

    expect(result.status).toBe('failed');
    expect(result.migratedItems).toEqual([]);
    expect(result.errors).toEqual(['settings: bad key', 'settings: bad value']);
  });

  it('records a timed-out group as failed', async () => {
    const { service, from, to } = setup({ users: 'hang' }, undefined, 20);
    const result = await service.migrateTenantData(from.id, to.id, { ...NONE, includeUsers: true });
    expect(result.status).toBe('failed');
    expect(result.errors).toEqual(['users: tenantDataMigrator timed out after 20ms']);
  });

  it('aborts a timed-out group even when the caller passed a signal', async () => {
    const { service, from, to, migrator } = setup({ users: 'hang' }, undefined, 20);
    const caller = new AbortController();
    const result = await service.migrateTenantData(from.id, to.id, { ...NONE, includeUsers: true }, caller.signal);

    expect(result.errors).toEqual(['users: tenantDataMigrator timed out after 20ms']);
    expect(migrator.signals[0].aborted).toBe(true);
    expect(caller.signal.aborted).toBe(false);
  });

  it('is cancelled when aborted before starting', async () => {
    const { service, from, to, migrator } = setup({});
    const controller = new AbortController();
    controller.abort();
    const result = await service.migrateTenantData(from.id, to.id, ALL, controller.signal);

    expect(result.status).toBe('cancelled');
    expect(migrator.calls).toEqual([]);
    expect(result.statistics.totalItems).toBe(0);
  });

  it('stops between groups once aborted', async () => {
    const controller = new AbortController();
    const { service, from, to, migrator } = setup({}, (item) => {
      if (item === 'courses') controller.abort();
    });
    const result = await service.migrateTenantData(from.id, to.id, ALL, controller.signal);

    expect(result.status).toBe('cancelled');
    expect(migrator.calls).toEqual(['users', 'courses']);
    expect(result.migratedItems).toEqual(['users', 'courses']);
  });

  it('validates the request', async () => {
    const { service, from, to, tenants } = setup({});
    await expect(service.migrateTenantData(from.id, from.id, ALL)).rejects.toMatchObject({ code: 'invalid_migration' });
    await expect(service.migrateTenantData(from.id, to.id, NONE)).rejects.toMatchObject({ code: 'invalid_migration' });
    await expect(service.migrateTenantData(from.id, 'missing', ALL)).rejects.toMatchObject({
      code: 'tenant_not_found',
    });

    tenants.deleteTenant(to.id, 'admin');
    await expect(service.migrateTenantData(from.id, to.id, ALL)).rejects.toMatchObject({ code: 'invalid_migration' });
  });
});

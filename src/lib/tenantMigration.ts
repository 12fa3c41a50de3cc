/**
 * Tenant data migration.
 *
 * Copies the selected item groups from one tenant to another through an
 * external migrator. Status runs pending → inProgress → one terminal state;
 * `partiallyCompleted` only when at least one item moved and at least one failed.
 */

import { v4 as uuidv4 } from 'uuid';
import { getLogger, audit } from './logger';
import { APP_CONFIG, FeatureToggles } from './config';
import { ValidationError } from './errors';
import { callCollaborator } from './collaborator';
import { TenantManager } from './tenantManager';
import type {
  MigrationItem,
  MigrationOptions,
  MigrationResult,
  MigrationStatistics,
  MigrationStatus,
} from '../types/tenant';

const logger = getLogger('tenantMigration');

export interface ItemMigrationOutcome {
  migrated: number;
  failed: number;
  errors?: string[];
}

/** External service that moves one group of tenant records. */
export interface TenantDataMigrator {
  migrate(item: MigrationItem, fromTenantId: string, toTenantId: string, signal: AbortSignal): Promise<ItemMigrationOutcome>;
}

export const MIGRATION_TRANSITIONS: Record<MigrationStatus, readonly MigrationStatus[]> = {
  pending: ['inProgress', 'cancelled'],
  inProgress: ['completed', 'partiallyCompleted', 'failed', 'cancelled'],
  completed: [],
  partiallyCompleted: [],
  failed: [],
  cancelled: [],
};

export function selectedItems(options: MigrationOptions): MigrationItem[] {
  const items: MigrationItem[] = [];
  if (options.includeUsers) items.push('users');
  if (options.includeCourses) items.push('courses');
  if (options.includeBookings) items.push('bookings');
  if (options.includeSettings) items.push('settings');
  return items;
}

/** Terminal status for the collected statistics. */
export function settleStatus(stats: MigrationStatistics, cancelled: boolean): MigrationStatus {
  if (cancelled) return 'cancelled';
  if (stats.failedItems === 0) return 'completed';
  if (stats.successfulItems > 0) return 'partiallyCompleted';
  return 'failed';
}

export class TenantMigrationService {
  private readonly history: Map<string, MigrationResult> = new Map();
  private readonly auditEnabled: boolean;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly tenants: TenantManager,
    private readonly migrator: TenantDataMigrator,
    options: { features?: Pick<FeatureToggles, 'auditLogging'>; timeoutMs?: number; clock?: () => Date } = {},
  ) {
    this.auditEnabled = (options.features ?? APP_CONFIG.features).auditLogging;
    this.timeoutMs = options.timeoutMs ?? APP_CONFIG.collaboratorTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async migrateTenantData(
    fromTenantId: string,
    toTenantId: string,
    options: MigrationOptions,
    signal?: AbortSignal,
  ): Promise<MigrationResult> {
    if (fromTenantId === toTenantId) {
      throw new ValidationError('toTenantId', 'Source and target tenant must differ', 'invalid_migration');
    }
    const items = selectedItems(options);
    if (items.length === 0) {
      throw new ValidationError('options', 'Select at least one item group to migrate', 'invalid_migration');
    }
    for (const id of [fromTenantId, toTenantId]) {
      const tenant = this.tenants.getTenant(id);
      if (tenant.status === 'deleted') {
        throw new ValidationError('tenantId', `Tenant ${id} is deleted`, 'invalid_migration');
      }
    }

    const migrationId = uuidv4();
    const startTime = this.clock();
    let status: MigrationStatus = 'pending';
    const advance = (to: MigrationStatus): void => {
      if (!MIGRATION_TRANSITIONS[status].includes(to)) {
        throw new ValidationError('status', `Migration cannot move from ${status} to ${to}`, 'invalid_status_transition');
      }
      logger.debug('Migration status changed', { migrationId, from: status, to });
      status = to;
    };

    const stats: MigrationStatistics = { totalItems: 0, successfulItems: 0, failedItems: 0 };
    const migrated: MigrationItem[] = [];
    const errors: string[] = [];
    let cancelled = false;

    advance('inProgress');
    logger.info('Tenant migration started', { migrationId, fromTenantId, toTenantId, items });

    for (const item of items) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }
      try {
        const outcome = await callCollaborator(
          'tenantDataMigrator',
          this.timeoutMs,
          (callSignal) =>
            this.migrator.migrate(item, fromTenantId, toTenantId, signal ? AbortSignal.any([signal, callSignal]) : callSignal),
          'migration_failed',
        );
        stats.totalItems += outcome.migrated + outcome.failed;
        stats.successfulItems += outcome.migrated;
        stats.failedItems += outcome.failed;
        if (outcome.migrated > 0) migrated.push(item);
        for (const message of outcome.errors ?? []) errors.push(`${item}: ${message}`);
      } catch (err) {
        stats.totalItems += 1;
        stats.failedItems += 1;
        errors.push(`${item}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    advance(settleStatus(stats, cancelled));

    const result: MigrationResult = {
      migrationId,
      fromTenantId,
      toTenantId,
      status,
      startTime,
      endTime: this.clock(),
      migratedItems: migrated,
      errors,
      statistics: stats,
    };
    this.history.set(migrationId, result);

    logger.info('Tenant migration finished', { migrationId, status, ...stats });
    audit(this.auditEnabled, 'tenant.migrated', { migrationId, fromTenantId, toTenantId, status });
    return result;
  }

  getMigration(migrationId: string): MigrationResult | null {
    return this.history.get(migrationId) ?? null;
  }
}

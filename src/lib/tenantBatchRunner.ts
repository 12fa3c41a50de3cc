import { getLogger } from './logger';
import { ServiceFailure, toFailure } from './errors';

const logger = getLogger('tenantBatchRunner');

export type BatchItemOutcome<R> =
  | { tenantId: string; status: 'succeeded'; result: R; durationMs: number }
  | { tenantId: string; status: 'failed'; error: ServiceFailure; durationMs: number }
  | { tenantId: string; status: 'cancelled' };

export interface BatchSummary<R> {
  outcomes: BatchItemOutcome<R>[];
  succeeded: number;
  failed: number;
  cancelled: number;
  durationMs: number;
}

export interface BatchRunOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Runs `task` once per tenant with bounded concurrency. Outcomes keep the order
 * of `tenantIds`. A failing tenant never stops the batch; once `signal` aborts,
 * tenants not yet started are reported as cancelled.
 */
export async function runTenantBatch<R>(
  tenantIds: readonly string[],
  task: (tenantId: string, signal?: AbortSignal) => Promise<R>,
  options: BatchRunOptions = {},
): Promise<BatchSummary<R>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  const signal = options.signal;
  const startedAt = Date.now();
  const outcomes: BatchItemOutcome<R>[] = tenantIds.map((tenantId) => ({ tenantId, status: 'cancelled' }));
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < tenantIds.length) {
      if (signal?.aborted) return;
      const index = cursor++;
      const tenantId = tenantIds[index];
      const t0 = Date.now();
      try {
        const result = await task(tenantId, signal);
        outcomes[index] = { tenantId, status: 'succeeded', result, durationMs: Date.now() - t0 };
      } catch (err) {
        const error = toFailure(err);
        logger.warn('Tenant batch item failed', { tenantId, code: error.code });
        outcomes[index] = { tenantId, status: 'failed', error, durationMs: Date.now() - t0 };
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, tenantIds.length) }, () => worker());
  await Promise.all(workers);

  const summary: BatchSummary<R> = {
    outcomes,
    succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    cancelled: outcomes.filter((o) => o.status === 'cancelled').length,
    durationMs: Date.now() - startedAt,
  };

  logger.info('Tenant batch finished', {
    total: tenantIds.length,
    succeeded: summary.succeeded,
    failed: summary.failed,
    cancelled: summary.cancelled,
    durationMs: summary.durationMs,
  });
  return summary;
}

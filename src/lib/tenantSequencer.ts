import { getLogger } from './logger';

const logger = getLogger('tenantSequencer');

// ─── Types ────────────────────────────────────────────────────────────────────

interface SequencerWaiter {
  start: () => void;
}

interface SequencerMetrics {
  totalRuns: number;
  totalContentions: number;
  currentlyHeld: number;
}

// ─── TenantSequencer ──────────────────────────────────────────────────────────

/**
 * Single-writer-per-key execution. Tasks sharing a key run one at a time in
 * arrival order; tasks for different keys never wait for each other.
 */
export class TenantSequencer {
  private held: Set<string> = new Set();
  private waitQueues: Map<string, SequencerWaiter[]> = new Map();
  private metrics: SequencerMetrics = { totalRuns: 0, totalContentions: 0, currentlyHeld: 0 };

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  pendingCount(key: string): number {
    return this.waitQueues.get(key)?.length ?? 0;
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  getMetrics(): SequencerMetrics {
    return { ...this.metrics, currentlyHeld: this.held.size };
  }

  private acquire(key: string): Promise<void> {
    if (!this.held.has(key)) {
      this.grant(key);
      return Promise.resolve();
    }

    this.metrics.totalContentions++;
    logger.debug('Sequencer contention, enqueuing writer', { key, waiting: this.pendingCount(key) + 1 });

    return new Promise<void>((resolve) => {
      const queue = this.waitQueues.get(key) ?? [];
      queue.push({ start: resolve });
      this.waitQueues.set(key, queue);
    });
  }

  private grant(key: string): void {
    this.held.add(key);
    this.metrics.totalRuns++;
  }

  private release(key: string): void {
    const queue = this.waitQueues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.waitQueues.delete(key);

    if (!next) {
      this.held.delete(key);
      return;
    }
    // Ownership passes straight to the next waiter so no newcomer can cut in.
    this.metrics.totalRuns++;
    next.start();
  }
}

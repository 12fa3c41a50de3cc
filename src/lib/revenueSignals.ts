/**
 * @module revenueSignals
 * @description Live revenue figures that follow the ledger. Subscribers get the
 * current value on subscribe and a push whenever an append changes it.
 *
 * The running total is maintained incrementally. MRR and churn are derived from
 * the subscription lifecycle events seen so far, kept in timestamp order, so a
 * late-arriving event lands in the right place.
 */

import Decimal from 'decimal.js';
import { getLogger } from './logger';
import { APP_CONFIG, FeatureToggles } from './config';
import { toError } from './errors';
import { ZERO, sum, toCents, ratio } from './money';
import { bucketStart } from './dateRange';
import { activeSubscriptionsAt, signedAmount } from './metricsAggregator';
import { RevenueEventLedger, compareEvents } from './revenueEventLedger';
import type { StoredRevenueEvent } from '../types/revenue';

const logger = getLogger('revenueSignals');

const ALL_TIME = { startDate: new Date(0), endDate: new Date(8.64e15) };

export interface SignalValues {
  totalRevenue: Decimal;
  monthlyRecurringRevenue: Decimal;
  annualRecurringRevenue: Decimal;
  churnRate: number;
}

export type SignalName = keyof SignalValues;

export type SignalListener<K extends SignalName> = (value: SignalValues[K]) => void;

type ListenerMap = { [K in SignalName]: Set<SignalListener<K>> };

export interface RevenueSignalsOptions {
  ledger: RevenueEventLedger;
  tenantId?: string;
  features?: Pick<FeatureToggles, 'realtimeUpdates'>;
  reportingCurrency?: string;
}

/** Monthly amount currently billed per active subscription, replayed in order. */
export function subscriptionAmounts(lifecycle: StoredRevenueEvent[]): Map<string, Decimal> {
  const amounts = new Map<string, Decimal>();
  for (const event of lifecycle) {
    const id = event.subscriptionId;
    if (!id) continue;
    switch (event.eventType) {
      case 'subscriptionCreated':
      case 'subscriptionRenewed':
        amounts.set(id, event.amount);
        break;
      case 'subscriptionUpgraded':
        amounts.set(id, (amounts.get(id) ?? ZERO).plus(event.amount));
        break;
      case 'subscriptionDowngraded':
        amounts.set(id, Decimal.max(ZERO, (amounts.get(id) ?? ZERO).minus(event.amount)));
        break;
      case 'subscriptionCancelled':
        amounts.delete(id);
        break;
      default:
        break;
    }
  }
  return amounts;
}

/** Churn for the calendar month that contains `latest`. */
export function monthChurn(lifecycle: StoredRevenueEvent[], latest: Date): number {
  const monthStart = bucketStart('monthly', latest);
  const active = activeSubscriptionsAt(lifecycle, monthStart);
  const cancelled = new Set<string>();
  for (const event of lifecycle) {
    if (
      event.eventType === 'subscriptionCancelled' &&
      event.subscriptionId &&
      event.timestamp.getTime() >= monthStart.getTime() &&
      active.has(event.subscriptionId)
    ) {
      cancelled.add(event.subscriptionId);
    }
  }
  return ratio(new Decimal(cancelled.size), new Decimal(active.size), 4);
}

export class RevenueSignals {
  private readonly listeners: ListenerMap = {
    totalRevenue: new Set(),
    monthlyRecurringRevenue: new Set(),
    annualRecurringRevenue: new Set(),
    churnRate: new Set(),
  };
  private readonly lifecycle: StoredRevenueEvent[] = [];
  private readonly realtime: boolean;
  private readonly tenantId: string | undefined;
  private readonly currency: string;
  private readonly detach: () => void;
  private latest: Date | null = null;
  private values: SignalValues = {
    totalRevenue: ZERO,
    monthlyRecurringRevenue: ZERO,
    annualRecurringRevenue: ZERO,
    churnRate: 0,
  };

  constructor(options: RevenueSignalsOptions) {
    this.realtime = (options.features ?? APP_CONFIG.features).realtimeUpdates;
    this.tenantId = options.tenantId;
    this.currency = (options.reportingCurrency ?? APP_CONFIG.reportingCurrency).toUpperCase();

    this.detach = options.ledger.onAppend((event) => this.apply(event));
    const seed = options.ledger.query({ tenantId: this.tenantId, dateRange: ALL_TIME }).events;
    let total = ZERO;
    for (const event of seed) {
      if (!this.accepts(event)) continue;
      total = total.plus(signedAmount(event));
      this.track(event);
    }
    this.values = this.derive(total);
  }

  current(): SignalValues {
    return { ...this.values };
  }

  subscribe<K extends SignalName>(name: K, listener: SignalListener<K>): () => void {
    this.listeners[name].add(listener);
    this.deliver(listener, this.values[name], name);
    return () => {
      this.listeners[name].delete(listener);
    };
  }

  close(): void {
    this.detach();
    for (const set of Object.values(this.listeners)) set.clear();
  }

  private apply(event: StoredRevenueEvent): void {
    if (!this.accepts(event)) return;
    this.track(event);
    const before = this.values;
    const after = this.derive(before.totalRevenue.plus(signedAmount(event)));
    this.values = after;

    if (!this.realtime) return;
    if (!after.totalRevenue.eq(before.totalRevenue)) this.emit('totalRevenue', after.totalRevenue);
    if (!after.monthlyRecurringRevenue.eq(before.monthlyRecurringRevenue)) {
      this.emit('monthlyRecurringRevenue', after.monthlyRecurringRevenue);
      this.emit('annualRecurringRevenue', after.annualRecurringRevenue);
    }
    if (after.churnRate !== before.churnRate) this.emit('churnRate', after.churnRate);
  }

  private accepts(event: StoredRevenueEvent): boolean {
    return event.currency === this.currency && (this.tenantId === undefined || event.tenantId === this.tenantId);
  }

  private track(event: StoredRevenueEvent): void {
    if (!this.latest || event.timestamp.getTime() > this.latest.getTime()) this.latest = event.timestamp;
    if (!event.subscriptionId) return;
    let index = this.lifecycle.length;
    while (index > 0 && compareEvents(this.lifecycle[index - 1], event) > 0) index--;
    this.lifecycle.splice(index, 0, event);
  }

  private derive(total: Decimal): SignalValues {
    const mrr = toCents(sum(subscriptionAmounts(this.lifecycle).values()));
    return {
      totalRevenue: total,
      monthlyRecurringRevenue: mrr,
      annualRecurringRevenue: mrr.times(12),
      churnRate: this.latest ? monthChurn(this.lifecycle, this.latest) : 0,
    };
  }

  private emit<K extends SignalName>(name: K, value: SignalValues[K]): void {
    for (const listener of this.listeners[name]) this.deliver(listener, value, name);
  }

  private deliver<K extends SignalName>(listener: SignalListener<K>, value: SignalValues[K], name: K): void {
    try {
      listener(value);
    } catch (err) {
      logger.error('Signal listener failed', toError(err), { signal: name });
    }
  }
}

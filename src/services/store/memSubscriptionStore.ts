import type { NotificationRecord, Subscription } from '../../types/entities.js';
import type { SubscriptionStore } from './subscriptionStore.js';

/**
 * In-memory SubscriptionStore for local runs and tests
 */
export class MemSubscriptionStore implements SubscriptionStore {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly records: NotificationRecord[] = [];

  constructor(subscriptions: Subscription[] = []) {
    for (const subscription of subscriptions) {
      this.put(subscription);
    }
  }

  put(subscription: Subscription): void {
    this.subscriptions.set(subscription.id, structuredClone(subscription));
  }

  get(subscriptionId: string): Subscription | undefined {
    const subscription = this.subscriptions.get(subscriptionId);
    return subscription ? structuredClone(subscription) : undefined;
  }

  async listActive(): Promise<Subscription[]> {
    return [...this.subscriptions.values()]
      .filter((subscription) => subscription.status === 'ACTIVE')
      .map((subscription) => structuredClone(subscription));
  }

  async markExpired(subscriptionId: string, expiredAt: string): Promise<boolean> {
    const subscription = this.subscriptions.get(subscriptionId);
    if (subscription?.status !== 'ACTIVE') {
      return false;
    }
    this.subscriptions.set(subscriptionId, { ...subscription, status: 'EXPIRED', updatedAt: expiredAt });
    return true;
  }

  async appendNotificationRecord(record: NotificationRecord): Promise<void> {
    this.records.push(structuredClone(record));
  }

  async queryRecords(subscriptionId: string, since: string): Promise<NotificationRecord[]> {
    const sinceMs = Date.parse(since);
    return this.records
      .filter((record) => record.subscriptionId === subscriptionId && Date.parse(record.sentAt) >= sinceMs)
      .sort((a, b) => Date.parse(a.sentAt) - Date.parse(b.sentAt))
      .map((record) => structuredClone(record));
  }

  allRecords(): NotificationRecord[] {
    return this.records.map((record) => structuredClone(record));
  }
}

import type { NotificationRecord, Subscription } from '../../types/entities.js';

/**
 * Persistence boundary for subscriptions and the notification record log
 */
export interface SubscriptionStore {
  listActive(): Promise<Subscription[]>;
  /** false when the subscription was no longer ACTIVE */
  markExpired(subscriptionId: string, expiredAt: string): Promise<boolean>;
  appendNotificationRecord(record: NotificationRecord): Promise<void>;
  /** Records with sentAt >= since, oldest first */
  queryRecords(subscriptionId: string, since: string): Promise<NotificationRecord[]>;
}

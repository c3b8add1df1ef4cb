import { SubscriptionModel } from '../../models/subscription.js';
import { NotificationRecordModel } from '../../models/notificationRecord.js';
import type { NotificationRecord, Subscription } from '../../types/entities.js';
import type { SubscriptionStore } from './subscriptionStore.js';

/**
 * SubscriptionStore over the DynamoDB single table
 */
export class DynamoSubscriptionStore implements SubscriptionStore {
  listActive(): Promise<Subscription[]> {
    return SubscriptionModel.listActive();
  }

  markExpired(subscriptionId: string, expiredAt: string): Promise<boolean> {
    return SubscriptionModel.markExpired(subscriptionId, expiredAt);
  }

  appendNotificationRecord(record: NotificationRecord): Promise<void> {
    return NotificationRecordModel.append(record);
  }

  queryRecords(subscriptionId: string, since: string): Promise<NotificationRecord[]> {
    return NotificationRecordModel.query(subscriptionId, since);
  }
}

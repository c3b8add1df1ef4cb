import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { QueryCommandOutput } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName } from '../lib/dynamodb.js';
import { logger } from '../lib/logger.js';
import { toError } from '../lib/errors.js';
import { KeyBuilder } from '../types/entities.js';
import type { NotificationRecord, NotificationRecordItem } from '../types/entities.js';
import { notificationRecordSchema } from '../types/schemas.js';

const TABLE_NAME = getTableName();

// Upper bound for RECORD# sort keys; ISO timestamps start with a digit.
const RECORD_RANGE_END = 'RECORD#~';

export class NotificationRecordModel {
  /**
   * Append-only: a record is never overwritten, mutated or deleted here.
   */
  static async append(record: NotificationRecord): Promise<void> {
    const item: NotificationRecordItem = {
      ...KeyBuilder.notificationRecord(record.subscriptionId, record.sentAt, record.recordId),
      ...record,
      entityType: 'NotificationRecord',
    };

    try {
      await docClient.send(
        new PutCommand({
          TableName: TABLE_NAME,
          Item: item,
          ConditionExpression: 'attribute_not_exists(PK)',
        })
      );
    } catch (error) {
      logger.error('Failed to append notification record', toError(error), {
        subscriptionId: record.subscriptionId,
        digestId: record.digestId,
      });
      throw error;
    }
  }

  /**
   * Records for one subscription with sentAt >= since, oldest first
   */
  static async query(subscriptionId: string, since: string): Promise<NotificationRecord[]> {
    const records: NotificationRecord[] = [];
    let exclusiveStartKey: QueryCommandOutput['LastEvaluatedKey'];

    try {
      do {
        const result = await docClient.send(
          new QueryCommand({
            TableName: TABLE_NAME,
            KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
            ExpressionAttributeValues: {
              ':pk': KeyBuilder.subscription(subscriptionId).PK,
              ':from': KeyBuilder.recordRangeStart(since),
              ':to': RECORD_RANGE_END,
            },
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        for (const item of result.Items ?? []) {
          const parsed = notificationRecordSchema.safeParse(item);
          if (parsed.success) {
            records.push(parsed.data);
          } else {
            logger.warn('Skipping invalid notification record item', {
              subscriptionId,
              SK: item['SK'],
            });
          }
        }

        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return records;
    } catch (error) {
      logger.error('Failed to query notification records', toError(error), { subscriptionId, since });
      throw error;
    }
  }
}

export default NotificationRecordModel;

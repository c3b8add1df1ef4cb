import { QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { QueryCommandOutput } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName, DynamoDBErrorCodes, isDynamoDBError } from '../lib/dynamodb.js';
import { logger } from '../lib/logger.js';
import { toError } from '../lib/errors.js';
import { KeyBuilder } from '../types/entities.js';
import type { Subscription } from '../types/entities.js';
import { subscriptionSchema } from '../types/schemas.js';

const TABLE_NAME = getTableName();

/**
 * Subscriptions are written by the user-facing service. The engine only reads
 * ACTIVE ones and flips them to EXPIRED once their expiry date has passed.
 */
export class SubscriptionModel {
  /**
   * All ACTIVE subscriptions, read page by page from GSI1.
   * Items that fail validation are logged and skipped.
   */
  static async listActive(): Promise<Subscription[]> {
    const subscriptions: Subscription[] = [];
    let exclusiveStartKey: QueryCommandOutput['LastEvaluatedKey'];

    try {
      do {
        const result = await docClient.send(
          new QueryCommand({
            TableName: TABLE_NAME,
            IndexName: 'GSI1',
            KeyConditionExpression: 'GSI1PK = :gsi1pk',
            ExpressionAttributeValues: {
              ':gsi1pk': KeyBuilder.subscriptionsByStatus('ACTIVE'),
            },
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        for (const item of result.Items ?? []) {
          const parsed = subscriptionSchema.safeParse(item);
          if (parsed.success) {
            subscriptions.push(parsed.data);
          } else {
            logger.warn('Skipping invalid subscription item', {
              PK: item['PK'],
              issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
          }
        }

        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return subscriptions;
    } catch (error) {
      logger.error('Failed to list active subscriptions', toError(error));
      throw error;
    }
  }

  /**
   * Flip ACTIVE to EXPIRED. Returns false when the subscription is no longer
   * ACTIVE (paused or cancelled in the meantime).
   */
  static async markExpired(subscriptionId: string, expiredAt: string): Promise<boolean> {
    try {
      await docClient.send(
        new UpdateCommand({
          TableName: TABLE_NAME,
          Key: KeyBuilder.subscription(subscriptionId),
          UpdateExpression: 'SET #status = :expired, #updatedAt = :now, #GSI1PK = :gsi1pk',
          ExpressionAttributeNames: {
            '#status': 'status',
            '#updatedAt': 'updatedAt',
            '#GSI1PK': 'GSI1PK',
          },
          ExpressionAttributeValues: {
            ':expired': 'EXPIRED',
            ':active': 'ACTIVE',
            ':now': expiredAt,
            ':gsi1pk': KeyBuilder.subscriptionsByStatus('EXPIRED'),
          },
          ConditionExpression: 'attribute_exists(PK) AND #status = :active',
        })
      );

      logger.info('Subscription expired', { subscriptionId });
      return true;
    } catch (error) {
      if (isDynamoDBError(error, DynamoDBErrorCodes.CONDITIONAL_CHECK_FAILED)) {
        logger.warn('Subscription was not active when expiring', { subscriptionId });
        return false;
      }
      logger.error('Failed to expire subscription', toError(error), { subscriptionId });
      throw error;
    }
  }
}

export default SubscriptionModel;

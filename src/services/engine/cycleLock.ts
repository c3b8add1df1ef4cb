/**
 * Cycle lock
 *
 * Extension point for running more than one engine instance against the same
 * subscriptions: a cycle runs only while its instance holds the lock.
 * Single-instance deployments use the no-op lock.
 */

import { DeleteCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { Clock } from '../../lib/clock.js';
import { docClient, getTableName, DynamoDBErrorCodes, isDynamoDBError } from '../../lib/dynamodb.js';
import { toError } from '../../lib/errors.js';
import { logger as defaultLogger, Logger } from '../../lib/logger.js';
import { toIso } from '../../lib/time.js';
import { generateUUID } from '../../lib/uuid.js';
import { KeyBuilder } from '../../types/entities.js';

export type ReleaseLock = () => Promise<void>;

export interface CycleLock {
  /** A release function when acquired, null when another holder has it */
  tryAcquire(): Promise<ReleaseLock | null>;
}

export const noopCycleLock: CycleLock = {
  tryAcquire: async () => async () => undefined,
};

export interface DynamoCycleLockOptions {
  clock: Clock;
  ttlSeconds: number;
  lockName?: string;
  ownerId?: string;
  logger?: Logger;
}

/**
 * Lease lock on a single item. An expired lease can be taken over, so a
 * crashed holder blocks other instances for at most ttlSeconds.
 */
export class DynamoCycleLock implements CycleLock {
  private readonly lockName: string;
  private readonly ownerId: string;
  private readonly log: Logger;

  constructor(private readonly options: DynamoCycleLockOptions) {
    this.lockName = options.lockName ?? 'engine-cycle';
    this.ownerId = options.ownerId ?? generateUUID();
    this.log = (options.logger ?? defaultLogger).child({ component: 'DynamoCycleLock' });
  }

  async tryAcquire(): Promise<ReleaseLock | null> {
    const nowSeconds = Math.floor(this.options.clock.now() / 1000);
    const keys = KeyBuilder.cycleLock(this.lockName);

    try {
      await docClient.send(
        new PutCommand({
          TableName: getTableName(),
          Item: {
            ...keys,
            entityType: 'CycleLock',
            ownerId: this.ownerId,
            acquiredAt: toIso(this.options.clock.now()),
            expiresAt: nowSeconds + this.options.ttlSeconds,
            ttl: nowSeconds + this.options.ttlSeconds,
          },
          ConditionExpression: 'attribute_not_exists(PK) OR expiresAt < :now OR ownerId = :owner',
          ExpressionAttributeValues: {
            ':now': nowSeconds,
            ':owner': this.ownerId,
          },
        })
      );
    } catch (error) {
      if (isDynamoDBError(error, DynamoDBErrorCodes.CONDITIONAL_CHECK_FAILED)) {
        this.log.info('Cycle lock held by another instance', { lockName: this.lockName });
        return null;
      }
      this.log.error('Failed to acquire cycle lock', toError(error), { lockName: this.lockName });
      throw error;
    }

    return async () => {
      try {
        await docClient.send(
          new DeleteCommand({
            TableName: getTableName(),
            Key: keys,
            ConditionExpression: 'ownerId = :owner',
            ExpressionAttributeValues: { ':owner': this.ownerId },
          })
        );
      } catch (error) {
        // Lease already taken over or expired; nothing to release
        if (!isDynamoDBError(error, DynamoDBErrorCodes.CONDITIONAL_CHECK_FAILED)) {
          this.log.warn('Failed to release cycle lock', {
            lockName: this.lockName,
            error: toError(error).message,
          });
        }
      }
    };
  }
}

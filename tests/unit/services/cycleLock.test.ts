/**
 * Cycle Lock Unit Tests
 */

import { DeleteCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { docClient } from '../../../src/lib/dynamodb';
import { logger } from '../../../src/lib/logger';
import { DynamoCycleLock, noopCycleLock } from '../../../src/services/engine/cycleLock';
import { FakeClock } from '../../helpers/fixtures';

jest.mock('../../../src/lib/logger');

jest.mock('../../../src/lib/dynamodb', () => ({
  ...jest.requireActual('../../../src/lib/dynamodb'),
  getTableName: jest.fn(() => 'CourtAlerts'),
  docClient: {
    send: jest.fn(),
  },
}));

const mockSend = docClient.send as jest.Mock;

const conditionalCheckFailed = () =>
  Object.assign(new Error('The conditional request failed'), { name: 'ConditionalCheckFailedException' });

describe('DynamoCycleLock', () => {
  // 2026-10-20T06:00:00Z
  const nowSeconds = 1792476000;
  let lock: DynamoCycleLock;

  beforeEach(() => {
    jest.clearAllMocks();
    lock = new DynamoCycleLock({
      clock: new FakeClock('2026-10-20T06:00:00.000Z'),
      ttlSeconds: 120,
      ownerId: 'instance-1',
    });
  });

  it('should acquire the lease with a conditional put', async () => {
    // Arrange
    mockSend.mockResolvedValueOnce({});

    // Act
    const release = await lock.tryAcquire();

    // Assert
    expect(release).toEqual(expect.any(Function));
    const command = mockSend.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutCommand);
    expect(command.input).toEqual({
      TableName: 'CourtAlerts',
      Item: {
        PK: 'LOCK#engine-cycle',
        SK: 'LOCK#engine-cycle',
        entityType: 'CycleLock',
        ownerId: 'instance-1',
        acquiredAt: '2026-10-20T06:00:00.000Z',
        expiresAt: nowSeconds + 120,
        ttl: nowSeconds + 120,
      },
      ConditionExpression: 'attribute_not_exists(PK) OR expiresAt < :now OR ownerId = :owner',
      ExpressionAttributeValues: { ':now': nowSeconds, ':owner': 'instance-1' },
    });
  });

  it('should return null while another instance holds the lease', async () => {
    mockSend.mockRejectedValueOnce(conditionalCheckFailed());

    await expect(lock.tryAcquire()).resolves.toBeNull();
  });

  it('should rethrow unexpected errors', async () => {
    mockSend.mockRejectedValueOnce(new Error('Throttled'));

    await expect(lock.tryAcquire()).rejects.toThrow('Throttled');
  });

  it('should release only a lease it still owns', async () => {
    // Arrange
    mockSend.mockResolvedValue({});
    const release = await lock.tryAcquire();

    // Act
    await release?.();

    // Assert
    const command = mockSend.mock.calls[1]?.[0];
    expect(command).toBeInstanceOf(DeleteCommand);
    expect(command.input).toEqual({
      TableName: 'CourtAlerts',
      Key: { PK: 'LOCK#engine-cycle', SK: 'LOCK#engine-cycle' },
      ConditionExpression: 'ownerId = :owner',
      ExpressionAttributeValues: { ':owner': 'instance-1' },
    });
  });

  it('should not throw when the release fails', async () => {
    // Arrange
    mockSend.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('Network down'));
    const release = await lock.tryAcquire();

    // Act & Assert
    await expect(release?.()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Failed to release cycle lock', {
      lockName: 'engine-cycle',
      error: 'Network down',
    });
  });
});

describe('noopCycleLock', () => {
  it('should always acquire', async () => {
    const release = await noopCycleLock.tryAcquire();

    expect(release).not.toBeNull();
    await expect(release?.()).resolves.toBeUndefined();
  });
});

/**
 * NotificationRecord Model Unit Tests
 */

import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { NotificationRecordModel } from '../../../src/models/notificationRecord';
import { docClient } from '../../../src/lib/dynamodb';
import { logger } from '../../../src/lib/logger';
import type { NotificationRecord } from '../../../src/types/entities';

jest.mock('../../../src/lib/logger');

jest.mock('../../../src/lib/dynamodb', () => ({
  ...jest.requireActual('../../../src/lib/dynamodb'),
  getTableName: jest.fn(() => 'CourtAlerts'),
  docClient: {
    send: jest.fn(),
  },
}));

const mockSend = docClient.send as jest.Mock;

const record: NotificationRecord = {
  recordId: 'rec-1',
  subscriptionId: 'sub-1',
  digestId: 'digest-1',
  sentAt: '2026-10-20T06:00:00.000Z',
  coveredWindow: {
    sourceId: 'club-a',
    courtId: 'A1',
    start: '2026-10-20T10:00:00.000Z',
    end: '2026-10-20T11:00:00.000Z',
  },
};

describe('NotificationRecordModel', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('append', () => {
    it('should put the record under its subscription with a time-ordered sort key', async () => {
      // Arrange
      mockSend.mockResolvedValueOnce({});

      // Act
      await NotificationRecordModel.append(record);

      // Assert
      const command = mockSend.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(PutCommand);
      expect(command.input).toEqual({
        TableName: 'CourtAlerts',
        Item: {
          PK: 'SUBSCRIPTION#sub-1',
          SK: 'RECORD#2026-10-20T06:00:00.000Z#rec-1',
          entityType: 'NotificationRecord',
          ...record,
        },
        ConditionExpression: 'attribute_not_exists(PK)',
      });
    });

    it('should log and rethrow when the write fails', async () => {
      const error = new Error('DynamoDB error');
      mockSend.mockRejectedValueOnce(error);

      await expect(NotificationRecordModel.append(record)).rejects.toThrow('DynamoDB error');
      expect(logger.error).toHaveBeenCalledWith('Failed to append notification record', error, {
        subscriptionId: 'sub-1',
        digestId: 'digest-1',
      });
    });
  });

  describe('query', () => {
    it('should read the sort key range from the given time', async () => {
      // Arrange
      mockSend.mockResolvedValueOnce({
        Items: [{ PK: 'SUBSCRIPTION#sub-1', SK: 'RECORD#2026-10-20T06:00:00.000Z#rec-1', ...record }],
      });

      // Act
      const result = await NotificationRecordModel.query('sub-1', '2026-10-19T06:00:00.000Z');

      // Assert
      expect(result).toEqual([record]);
      const command = mockSend.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(QueryCommand);
      expect(command.input).toMatchObject({
        KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
        ExpressionAttributeValues: {
          ':pk': 'SUBSCRIPTION#sub-1',
          ':from': 'RECORD#2026-10-19T06:00:00.000Z',
          ':to': 'RECORD#~',
        },
      });
    });

    it('should follow pagination and skip malformed items', async () => {
      mockSend
        .mockResolvedValueOnce({ Items: [record], LastEvaluatedKey: { PK: 'x', SK: 'y' } })
        .mockResolvedValueOnce({ Items: [{ SK: 'RECORD#broken' }] });

      const result = await NotificationRecordModel.query('sub-1', '2026-10-19T06:00:00.000Z');

      expect(result).toEqual([record]);
      expect(mockSend).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith('Skipping invalid notification record item', {
        subscriptionId: 'sub-1',
        SK: 'RECORD#broken',
      });
    });
  });
});

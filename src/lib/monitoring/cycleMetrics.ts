/**
 * Cycle Metrics
 *
 * CloudWatch metrics for detection cycles. Publishing is best effort:
 * a failed PutMetricData is logged and never fails the cycle.
 */

import { CloudWatchClient, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import type { MetricDatum } from '@aws-sdk/client-cloudwatch';
import { logger } from '../logger.js';

const NAMESPACE = 'CourtAlerts/Engine';

export type CycleOutcome = 'SUCCEEDED' | 'FAILED' | 'SKIPPED' | 'CANCELLED';

export interface CycleMetrics {
  cycleId: string;
  outcome: CycleOutcome;
  durationMs: number;
  sourcesRefreshed: number;
  sourcesFailed: number;
  transitionsDetected: number;
  windowsOpened: number;
  matches: number;
  notificationsSent: number;
  notificationsSuppressed: number;
  dispatchFailures: number;
}

export type CycleMetricsPublisher = (metrics: CycleMetrics) => Promise<void>;

export const buildMetricData = (metrics: CycleMetrics, timestamp: Date): MetricDatum[] => {
  const dimensions = [{ Name: 'Outcome', Value: metrics.outcome }];
  const count = (name: string, value: number): MetricDatum => ({
    MetricName: name,
    Dimensions: dimensions,
    Value: value,
    Unit: StandardUnit.Count,
    Timestamp: timestamp,
  });

  return [
    count('SourcesRefreshed', metrics.sourcesRefreshed),
    count('SourcesFailed', metrics.sourcesFailed),
    count('TransitionsDetected', metrics.transitionsDetected),
    count('WindowsOpened', metrics.windowsOpened),
    count('Matches', metrics.matches),
    count('NotificationsSent', metrics.notificationsSent),
    count('NotificationsSuppressed', metrics.notificationsSuppressed),
    count('DispatchFailures', metrics.dispatchFailures),
    {
      MetricName: 'CycleDuration',
      Dimensions: dimensions,
      Value: metrics.durationMs,
      Unit: StandardUnit.Milliseconds,
      Timestamp: timestamp,
    },
  ];
};

/**
 * Build a publisher bound to one CloudWatch client
 */
export function createCloudWatchPublisher(
  cloudwatch: CloudWatchClient = new CloudWatchClient({})
): CycleMetricsPublisher {
  return async (metrics) => {
    try {
      await cloudwatch.send(
        new PutMetricDataCommand({
          Namespace: NAMESPACE,
          MetricData: buildMetricData(metrics, new Date()),
        })
      );
    } catch (error) {
      logger.warn('Failed to publish CloudWatch metrics', {
        cycleId: metrics.cycleId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };
}

export const noopMetricsPublisher: CycleMetricsPublisher = async () => undefined;

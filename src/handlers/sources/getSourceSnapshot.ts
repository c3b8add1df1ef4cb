import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  badRequestResponse,
  getPathParameter,
  handleError,
  notFoundResponse,
  successResponse,
} from '../../lib/response.js';
import { logger } from '../../lib/logger.js';
import type { AvailabilityEngine } from '../../services/engine/availabilityEngine.js';

export type SnapshotReader = Pick<AvailabilityEngine, 'getCachedSnapshot'>;

/**
 * GET /sources/{sourceId}/snapshot
 * Serves the cached grid with a freshness marker; never calls the booking system.
 */
export const createGetSourceSnapshotHandler =
  (engine: SnapshotReader) =>
  async (event: Pick<APIGatewayProxyEvent, 'pathParameters'>): Promise<APIGatewayProxyResult> => {
    try {
      const sourceId = getPathParameter(event.pathParameters, 'sourceId');
      if (!sourceId) {
        return badRequestResponse('sourceId path parameter is required');
      }

      const view = engine.getCachedSnapshot(sourceId);
      if (!view) {
        return notFoundResponse('Source');
      }

      logger.debug('Snapshot read', { sourceId, status: view.status });

      // Source error details stay internal; readers only see the freshness status
      return successResponse({
        sourceId: view.sourceId,
        status: view.status,
        refreshedAt: view.refreshedAt ?? null,
        ageSeconds: view.ageSeconds ?? null,
        snapshot: view.snapshot ?? null,
      });
    } catch (error) {
      return handleError(error);
    }
  };

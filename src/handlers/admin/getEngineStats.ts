import type { APIGatewayProxyResult } from 'aws-lambda';
import { handleError, successResponse } from '../../lib/response.js';
import type { AvailabilityEngine } from '../../services/engine/availabilityEngine.js';

/**
 * GET /admin/engine/stats
 */
export const createGetEngineStatsHandler =
  (engine: Pick<AvailabilityEngine, 'getEngineStats'>) => async (): Promise<APIGatewayProxyResult> => {
    try {
      return successResponse(engine.getEngineStats());
    } catch (error) {
      return handleError(error);
    }
  };

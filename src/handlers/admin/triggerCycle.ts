import type { APIGatewayProxyResult } from 'aws-lambda';
import { logger } from '../../lib/logger.js';
import { handleError, successResponse } from '../../lib/response.js';
import type { AvailabilityEngine } from '../../services/engine/availabilityEngine.js';

/**
 * POST /admin/engine/cycles
 * Runs a detection cycle now (or joins the running one) and returns its summary.
 */
export const createTriggerCycleHandler =
  (engine: Pick<AvailabilityEngine, 'triggerManualCycle'>) => async (): Promise<APIGatewayProxyResult> => {
    try {
      logger.info('Manual cycle requested');
      const summary = await engine.triggerManualCycle();
      return successResponse(summary, 'Cycle completed');
    } catch (error) {
      return handleError(error);
    }
  };

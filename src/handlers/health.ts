import type { APIGatewayProxyResult } from 'aws-lambda';
import { serviceUnavailableResponse, successResponse } from '../lib/response.js';
import type { AvailabilityEngine } from '../services/engine/availabilityEngine.js';

/**
 * Health check endpoint handler
 * Healthy while the engine loop is running
 */
export const createHealthHandler =
  (engine: Pick<AvailabilityEngine, 'isRunning' | 'getEngineStats'>, now: () => Date = () => new Date()) =>
  async (): Promise<APIGatewayProxyResult> => {
    if (!engine.isRunning()) {
      return serviceUnavailableResponse('Engine is not running');
    }

    const stats = engine.getEngineStats();
    return successResponse({
      status: 'healthy',
      timestamp: now().toISOString(),
      environment: process.env['NODE_ENV'] || 'unknown',
      lastCycleTime: stats.lastCycleTime ?? null,
      sourcesTracked: stats.sourcesTracked,
    });
  };

/**
 * Routes API Gateway proxy events to the engine's read and admin handlers
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { notFoundResponse } from '../lib/response.js';
import type { AvailabilityEngine } from '../services/engine/availabilityEngine.js';
import { createGetEngineStatsHandler } from './admin/getEngineStats.js';
import { createTriggerCycleHandler } from './admin/triggerCycle.js';
import { createHealthHandler } from './health.js';
import { createGetSourceSnapshotHandler } from './sources/getSourceSnapshot.js';

export type EngineRouteEvent = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'pathParameters'>;

const SNAPSHOT_PATH = /^\/sources\/([^/]+)\/snapshot\/?$/;

export function createEngineRouter(engine: AvailabilityEngine) {
  const getSnapshot = createGetSourceSnapshotHandler(engine);
  const getStats = createGetEngineStatsHandler(engine);
  const triggerCycle = createTriggerCycleHandler(engine);
  const health = createHealthHandler(engine);

  return async (event: EngineRouteEvent): Promise<APIGatewayProxyResult> => {
    const method = event.httpMethod.toUpperCase();

    if (method === 'GET' && event.path === '/health') {
      return health();
    }
    if (method === 'GET' && event.path === '/admin/engine/stats') {
      return getStats();
    }
    if (method === 'POST' && event.path === '/admin/engine/cycles') {
      return triggerCycle();
    }

    const snapshotMatch = method === 'GET' ? SNAPSHOT_PATH.exec(event.path) : null;
    if (snapshotMatch?.[1]) {
      return getSnapshot({ pathParameters: { ...event.pathParameters, sourceId: snapshotMatch[1] } });
    }

    return notFoundResponse('Route');
  };
}

/**
 * Everything the engine shares, constructed once and passed in explicitly.
 * Tests build one with fake sources, a fake clock and the in-memory store.
 */

import { systemClock } from '../../lib/clock.js';
import type { Clock } from '../../lib/clock.js';
import { DEFAULT_ENGINE_CONFIG } from '../../lib/config/engine.js';
import type { EngineConfig } from '../../lib/config/engine.js';
import { logger as defaultLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { noopMetricsPublisher } from '../../lib/monitoring/cycleMetrics.js';
import type { CycleMetricsPublisher } from '../../lib/monitoring/cycleMetrics.js';
import type { SourceRegistry } from '../../sources/sourceRegistry.js';
import type { DigestDispatcher } from '../notifications/dispatcher.js';
import type { SubscriptionStore } from '../store/subscriptionStore.js';
import { noopCycleLock } from './cycleLock.js';
import type { CycleLock } from './cycleLock.js';

export interface EngineContext {
  config: EngineConfig;
  registry: SourceRegistry;
  store: SubscriptionStore;
  dispatcher: DigestDispatcher;
  clock: Clock;
  cycleLock: CycleLock;
  publishMetrics: CycleMetricsPublisher;
  logger: Logger;
}

export type EngineContextInput = Pick<EngineContext, 'registry' | 'store' | 'dispatcher'> &
  Partial<Omit<EngineContext, 'registry' | 'store' | 'dispatcher' | 'config'>> & {
    config?: Partial<EngineConfig>;
  };

export function createEngineContext(input: EngineContextInput): EngineContext {
  return {
    registry: input.registry,
    store: input.store,
    dispatcher: input.dispatcher,
    config: { ...DEFAULT_ENGINE_CONFIG, ...input.config },
    clock: input.clock ?? systemClock,
    cycleLock: input.cycleLock ?? noopCycleLock,
    publishMetrics: input.publishMetrics ?? noopMetricsPublisher,
    logger: input.logger ?? defaultLogger,
  };
}

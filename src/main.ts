/**
 * Court Alerts engine process
 *
 * Builds the engine context from the environment, starts the detection loop
 * and stops it cleanly on SIGTERM/SIGINT. The returned router is what an
 * API layer embedding this process hands its proxy events to.
 */

import { getDomainConfig } from './config/domain.js';
import { createEngineRouter } from './handlers/router.js';
import { systemClock } from './lib/clock.js';
import { loadEngineConfig } from './lib/config/engine.js';
import { toError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { createCloudWatchPublisher, noopMetricsPublisher } from './lib/monitoring/cycleMetrics.js';
import { MockBookingSource, loadDemoCatalog } from './sources/mockBookingSource.js';
import { SourceRegistry } from './sources/sourceRegistry.js';
import { AvailabilityEngine } from './services/engine/availabilityEngine.js';
import { createEngineContext } from './services/engine/context.js';
import { DynamoCycleLock, noopCycleLock } from './services/engine/cycleLock.js';
import { SesDigestDispatcher } from './services/notifications/dispatcher.js';
import { DynamoSubscriptionStore } from './services/store/dynamoSubscriptionStore.js';

export function buildRegistry(demoSources: boolean, timeZone: string): SourceRegistry {
  const registry = new SourceRegistry();
  if (demoSources) {
    new MockBookingSource(loadDemoCatalog(), { clock: systemClock, timeZone }).registerAll(registry);
  }
  return registry;
}

export interface EngineProcess {
  engine: AvailabilityEngine;
  router: ReturnType<typeof createEngineRouter>;
}

export async function main(): Promise<EngineProcess> {
  const config = loadEngineConfig();
  const domain = getDomainConfig();
  const registry = buildRegistry(config.demoSources, config.timeZone);

  if (registry.size === 0) {
    logger.warn('No availability sources registered; set DEMO_SOURCES=true for the mock booking system');
  }

  const engine = new AvailabilityEngine(
    createEngineContext({
      config,
      registry,
      store: new DynamoSubscriptionStore(),
      dispatcher: new SesDigestDispatcher({
        fromEmail: domain.fromEmail,
        applicationName: domain.applicationName,
        frontendUrl: domain.frontendUrl,
        timeZone: config.timeZone,
      }),
      cycleLock: config.cycleLockEnabled
        ? new DynamoCycleLock({ clock: systemClock, ttlSeconds: config.cycleLockTtlSeconds })
        : noopCycleLock,
      publishMetrics: config.metricsEnabled ? createCloudWatchPublisher() : noopMetricsPublisher,
    })
  );

  await engine.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutdown signal received', { signal });
    engine.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Engine did not stop cleanly', toError(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return { engine, router: createEngineRouter(engine) };
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Engine failed to start', toError(error));
    process.exit(1);
  });
}

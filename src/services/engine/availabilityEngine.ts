/**
 * Availability Engine
 *
 * The single background loop that drives
 *   refresh -> detect -> consolidate -> match -> gate -> record -> dispatch
 * and the only writer of cache state and notification records.
 *
 * Cycles never overlap: a manual trigger during a cycle joins it, and the next
 * scheduled cycle is armed only after the previous one settles. Within a
 * cycle, sources refresh through a bounded pool and each source is detected
 * and consolidated right after its own refresh; matching and gating start once
 * every refresh has settled.
 *
 * Windows whose matches could not be gated or recorded (store failure,
 * cancellation) are held and offered again next cycle, clipped to what the
 * current snapshot still shows as open. The gate's overlap dedup keeps
 * subscriptions that were already told from hearing about them twice.
 */

import { mapWithConcurrency, withTimeout } from '../../lib/concurrency.js';
import {
  DispatchError,
  EngineNotRunningError,
  EngineStartupError,
  OperationTimeoutError,
  toError,
} from '../../lib/errors.js';
import { logCycleCompletion, logCycleError, logCycleStart } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import type { CycleMetrics, CycleOutcome } from '../../lib/monitoring/cycleMetrics.js';
import { durationMinutes, localDate, toIso, toMillis } from '../../lib/time.js';
import { generateUUID } from '../../lib/uuid.js';
import type { ConsolidatedWindow, SourceId, Subscription } from '../../types/entities.js';
import { SnapshotCache } from '../cache/snapshotCache.js';
import type { CachedSnapshotView, SourceHealth } from '../cache/snapshotCache.js';
import { detectTransitions } from '../detection/changeDetector.js';
import { consolidateWindows, consolidationStats, stillOpenParts } from '../detection/slotConsolidator.js';
import { matchSubscriptions } from '../matching/subscriptionMatcher.js';
import { NotificationGate } from '../notifications/notificationGate.js';
import type { PlannedDigest } from '../notifications/notificationGate.js';
import type { DigestWindow } from '../notifications/dispatcher.js';
import type { EngineContext } from './context.js';
import type { ReleaseLock } from './cycleLock.js';

export type CycleTrigger = 'scheduled' | 'manual' | 'startup';

export interface CycleSummary {
  cycleId: string;
  trigger: CycleTrigger;
  outcome: CycleOutcome;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  sourcesRefreshed: number;
  sourcesFailed: number;
  sourcesUnchanged: number;
  transitionsDetected: number;
  windowsOpened: number;
  /** Held windows from earlier cycles offered again */
  windowsRetried: number;
  matches: number;
  expiredSubscriptions: number;
  /** Digests dispatched successfully */
  notificationsSent: number;
  notificationsSuppressed: number;
  recordsWritten: number;
  dispatchFailures: number;
  deferredSubscriptions: number;
}

export interface EngineStats {
  running: boolean;
  totalCycles: number;
  successfulCycles: number;
  failedCycles: number;
  skippedCycles: number;
  cancelledCycles: number;
  notificationsSent: number;
  notificationsSuppressed: number;
  dispatchFailures: number;
  lastCycleTime?: string;
  lastCycle?: CycleSummary;
  sourcesTracked: number;
  sources: SourceHealth[];
}

interface SourcePass {
  sourceId: SourceId;
  ok: boolean;
  unchanged: boolean;
  transitions: number;
  windows: ConsolidatedWindow[];
}

type CycleCounters = Omit<
  CycleSummary,
  'cycleId' | 'trigger' | 'outcome' | 'startedAt' | 'completedAt' | 'durationMs'
>;

const windowKey = (window: ConsolidatedWindow): string =>
  [window.sourceId, window.courtId, window.start, window.end].join('|');

const emptyCounters = (): CycleCounters => ({
  sourcesRefreshed: 0,
  sourcesFailed: 0,
  sourcesUnchanged: 0,
  transitionsDetected: 0,
  windowsOpened: 0,
  windowsRetried: 0,
  matches: 0,
  expiredSubscriptions: 0,
  notificationsSent: 0,
  notificationsSuppressed: 0,
  recordsWritten: 0,
  dispatchFailures: 0,
  deferredSubscriptions: 0,
});

export class AvailabilityEngine {
  private readonly cache: SnapshotCache;
  private readonly gate: NotificationGate;
  private readonly log: Logger;

  private running = false;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<CycleSummary> | undefined;
  private abortController: AbortController | undefined;

  private readonly totals = {
    totalCycles: 0,
    successfulCycles: 0,
    failedCycles: 0,
    skippedCycles: 0,
    cancelledCycles: 0,
    notificationsSent: 0,
    notificationsSuppressed: 0,
    dispatchFailures: 0,
  };
  private lastCycle: CycleSummary | undefined;
  private readonly heldWindows = new Map<SourceId, ConsolidatedWindow[]>();

  constructor(private readonly context: EngineContext) {
    const { config, clock, registry, store } = context;
    this.log = context.logger.child({ component: 'AvailabilityEngine' });
    this.cache = new SnapshotCache({
      registry,
      clock,
      timeZone: config.timeZone,
      fetchDays: config.fetchDays,
      refreshTimeoutMs: config.refreshTimeoutMs,
      staleAfterMs: config.staleAfterMs,
      logger: context.logger,
    });
    this.gate = new NotificationGate({
      store,
      clock,
      timeZone: config.timeZone,
      storeTimeoutMs: config.storeTimeoutMs,
      logger: context.logger,
    });
  }

  /**
   * Load subscriptions, run the baseline cycle and arm the schedule.
   * Failing to load subscriptions is the engine's only fatal error.
   */
  async start(): Promise<CycleSummary> {
    if (this.running) {
      throw new Error('Engine is already running');
    }

    let subscriptions: Subscription[];
    try {
      subscriptions = await this.storeCall('listActive', this.context.store.listActive());
    } catch (error) {
      const startupError = new EngineStartupError('Unable to load subscriptions at startup', error);
      this.log.error('Engine failed to start', startupError, { cause: toError(error).message });
      throw startupError;
    }

    this.running = true;
    this.log.info('Engine started', {
      sources: this.context.registry.size,
      subscriptions: subscriptions.length,
      refreshIntervalMs: this.context.config.refreshIntervalMs,
    });

    const summary = await this.runCycle('startup', subscriptions);
    this.scheduleNext();
    return summary;
  }

  /**
   * Stop scheduling, cancel in-flight refreshes and wait for the running
   * cycle up to the shutdown deadline. A digest already being recorded and
   * dispatched is finished; no further digests are started.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    clearTimeout(this.timer);
    this.timer = undefined;
    this.abortController?.abort();

    const inFlight = this.inFlight;
    if (inFlight) {
      try {
        await withTimeout(inFlight, this.context.config.shutdownDeadlineMs);
      } catch (error) {
        this.log.warn('Shutdown deadline reached with a cycle still running', {
          deadlineMs: this.context.config.shutdownDeadlineMs,
          error: toError(error).message,
        });
      }
    }
    this.log.info('Engine stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a cycle now, or join the one already running
   */
  async triggerManualCycle(): Promise<CycleSummary> {
    if (!this.running) {
      throw new EngineNotRunningError();
    }
    return this.runCycle('manual');
  }

  /**
   * Cache-only read for the user-facing API; undefined for unknown sources
   */
  getCachedSnapshot(sourceId: SourceId): CachedSnapshotView | undefined {
    if (!this.context.registry.has(sourceId)) {
      return undefined;
    }
    return this.cache.getCachedSnapshot(sourceId);
  }

  getEngineStats(): EngineStats {
    return {
      running: this.running,
      ...this.totals,
      lastCycleTime: this.lastCycle?.completedAt,
      lastCycle: this.lastCycle,
      sourcesTracked: this.context.registry.size,
      sources: this.cache.health(this.context.registry.sourceIds()),
    };
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      void this.runScheduled();
    }, this.context.config.refreshIntervalMs);
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.runCycle('scheduled');
    } finally {
      this.scheduleNext();
    }
  }

  private runCycle(trigger: CycleTrigger, preloaded?: Subscription[]): Promise<CycleSummary> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const cycle = this.executeCycle(trigger, preloaded).finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Never rejects: every failure ends up in the summary and the stats
   */
  private async executeCycle(trigger: CycleTrigger, preloaded?: Subscription[]): Promise<CycleSummary> {
    const { clock } = this.context;
    const cycleId = generateUUID();
    const log = this.context.logger.child({ cycleId });
    const startedMs = clock.now();
    const counters = emptyCounters();
    let outcome: CycleOutcome = 'SUCCEEDED';
    let release: ReleaseLock | null = null;

    logCycleStart(log, trigger);

    try {
      release = await this.context.cycleLock.tryAcquire();
      if (!release) {
        outcome = 'SKIPPED';
      } else {
        const controller = new AbortController();
        this.abortController = controller;
        outcome = await this.runPipeline(log, controller.signal, counters, preloaded);
      }
    } catch (error) {
      outcome = 'FAILED';
      logCycleError(log, toError(error));
    } finally {
      this.abortController = undefined;
      if (release) {
        try {
          await release();
        } catch (error) {
          log.warn('Failed to release cycle lock', { error: toError(error).message });
        }
      }
    }

    const completedMs = clock.now();
    const summary: CycleSummary = {
      cycleId,
      trigger,
      outcome,
      startedAt: toIso(startedMs),
      completedAt: toIso(completedMs),
      durationMs: completedMs - startedMs,
      ...counters,
    };

    this.recordSummary(summary);
    logCycleCompletion(log, summary.durationMs, { ...counters, outcome, trigger });
    await this.publishMetrics(summary);
    return summary;
  }

  private async runPipeline(
    log: Logger,
    signal: AbortSignal,
    counters: CycleCounters,
    preloaded?: Subscription[]
  ): Promise<CycleOutcome> {
    const { config, clock, registry, store } = this.context;

    // Phase 1: refresh, detect and consolidate per source
    const sourceIds = registry.sourceIds();
    const passes = await mapWithConcurrency(sourceIds, config.maxConcurrentRefreshes, (sourceId) =>
      this.refreshSource(sourceId, signal, log)
    );

    const opened: ConsolidatedWindow[] = [];
    for (const pass of passes) {
      if (!pass.ok) {
        counters.sourcesFailed++;
        continue;
      }
      counters.sourcesRefreshed++;
      if (pass.unchanged) counters.sourcesUnchanged++;
      counters.transitionsDetected += pass.transitions;
      opened.push(...pass.windows);
    }
    counters.windowsOpened = opened.length;

    const retried = this.takeHeldWindows(opened);
    counters.windowsRetried = retried.length;
    const windows = [...opened, ...retried];

    if (signal.aborted) {
      this.holdWindows(windows);
      return 'CANCELLED';
    }
    if (sourceIds.length > 0 && counters.sourcesRefreshed === 0) {
      this.holdWindows(windows);
      log.warn('Every source failed to refresh', { sources: sourceIds.length });
      return 'FAILED';
    }

    // Phase 2: expire lapsed subscriptions, match the rest
    let subscriptions: Subscription[];
    try {
      subscriptions = preloaded ?? (await this.storeCall('listActive', store.listActive()));
    } catch (error) {
      this.holdWindows(windows);
      throw error;
    }
    counters.expiredSubscriptions = await this.expireSubscriptions(subscriptions, log);
    if (windows.length === 0) {
      return 'SUCCEEDED';
    }

    const matches = matchSubscriptions(windows, subscriptions, {
      now: clock.now(),
      timeZone: config.timeZone,
    });
    counters.matches = matches.length;
    if (matches.length === 0) {
      return 'SUCCEEDED';
    }

    // Phase 3: gate, then record and dispatch one digest at a time
    const plan = await this.gate.planDigests(matches);
    counters.notificationsSuppressed = plan.suppressed.length;
    counters.deferredSubscriptions = plan.deferredSubscriptionIds.length;
    const deferred = new Set(plan.deferredSubscriptionIds);
    this.holdWindows(
      matches.filter((match) => deferred.has(match.subscription.id)).map((match) => match.sourceWindow)
    );
    for (const suppressed of plan.suppressed) {
      log.debug('Match suppressed', {
        subscriptionId: suppressed.match.subscription.id,
        courtId: suppressed.match.window.courtId,
        start: suppressed.match.window.start,
        reason: suppressed.reason,
      });
    }

    for (const [index, digest] of plan.digests.entries()) {
      if (signal.aborted) {
        const remaining = plan.digests.slice(index);
        this.holdWindows(remaining.flatMap((pending) => pending.matches.map((match) => match.sourceWindow)));
        log.warn('Cycle cancelled between digests', { remainingDigests: remaining.length });
        return 'CANCELLED';
      }
      const recorded = await this.deliverDigest(digest, counters, log);
      if (!recorded) {
        this.holdWindows(digest.matches.map((match) => match.sourceWindow));
      }
    }

    return 'SUCCEEDED';
  }

  private async refreshSource(sourceId: SourceId, signal: AbortSignal, log: Logger): Promise<SourcePass> {
    const result = await this.cache.refresh(sourceId, signal);
    if (!result.ok) {
      return { sourceId, ok: false, unchanged: false, transitions: 0, windows: [] };
    }

    const { previous, current, sourceUnchanged } = result.value;
    if (sourceUnchanged) {
      log.debug('Source reports no update since last snapshot; skipping detection', { sourceId });
      return { sourceId, ok: true, unchanged: true, transitions: 0, windows: [] };
    }

    const transitions = detectTransitions(previous, current, {
      detectedAt: toIso(this.context.clock.now()),
    });
    const windows = consolidateWindows(transitions);

    if (transitions.length > 0) {
      log.info('Transitions detected', {
        sourceId,
        transitions: transitions.length,
        ...consolidationStats(transitions, windows),
      });
    }

    return { sourceId, ok: true, unchanged: false, transitions: transitions.length, windows };
  }

  /**
   * Held windows still open in the current snapshots, minus any that were
   * just detected again
   */
  private takeHeldWindows(opened: readonly ConsolidatedWindow[]): ConsolidatedWindow[] {
    const now = this.context.clock.now();
    const seen = new Set(opened.map(windowKey));
    const retried: ConsolidatedWindow[] = [];

    for (const [sourceId, held] of this.heldWindows) {
      const snapshot = this.cache.currentSnapshot(sourceId);
      for (const window of held) {
        for (const part of stillOpenParts(window, snapshot, now)) {
          const key = windowKey(part);
          if (seen.has(key)) continue;
          seen.add(key);
          retried.push(part);
        }
      }
    }
    this.heldWindows.clear();
    return retried;
  }

  private holdWindows(windows: readonly ConsolidatedWindow[]): void {
    for (const window of windows) {
      const held = this.heldWindows.get(window.sourceId) ?? [];
      if (!held.some((candidate) => windowKey(candidate) === windowKey(window))) {
        held.push(window);
      }
      this.heldWindows.set(window.sourceId, held);
    }
    if (windows.length > 0) {
      this.log.info('Holding windows for the next cycle', { windows: windows.length });
    }
  }

  private async expireSubscriptions(subscriptions: Subscription[], log: Logger): Promise<number> {
    const now = this.context.clock.now();
    const today = localDate(now, this.context.config.timeZone);
    let expired = 0;

    for (const subscription of subscriptions) {
      if (subscription.status !== 'ACTIVE' || !subscription.expiryDate || subscription.expiryDate >= today) {
        continue;
      }
      try {
        const changed = await this.storeCall(
          'markExpired',
          this.context.store.markExpired(subscription.id, toIso(now))
        );
        if (changed) expired++;
      } catch (error) {
        log.error('Failed to expire subscription', toError(error), { subscriptionId: subscription.id });
      }
    }
    return expired;
  }

  /**
   * Record every window of the digest, then dispatch it. A digest whose
   * records could not all be written is not sent. Resolves false in that case.
   */
  private async deliverDigest(digest: PlannedDigest, counters: CycleCounters, log: Logger): Promise<boolean> {
    const { subscription, digestId } = digest;

    try {
      for (const match of digest.matches) {
        await this.gate.record(match, digestId);
        counters.recordsWritten++;
      }
    } catch (error) {
      log.error('Failed to record digest; not dispatching', toError(error), {
        subscriptionId: subscription.id,
        digestId,
      });
      return false;
    }

    const windows = digest.matches
      .map((match): DigestWindow => ({
        sourceId: match.window.sourceId,
        courtId: match.window.courtId,
        courtName: this.cache.currentSnapshot(match.window.sourceId)?.courtNames?.[match.window.courtId],
        start: match.window.start,
        end: match.window.end,
        durationMinutes: durationMinutes(match.window),
        sourceWindow: match.sourceWindow,
      }))
      .sort((a, b) => toMillis(a.start) - toMillis(b.start));

    let failure: string | undefined;
    try {
      const result = await withTimeout(
        this.context.dispatcher.sendDigest(
          {
            subscriptionId: subscription.id,
            ownerId: subscription.ownerId,
            email: subscription.notifyEmail,
            minSlotDurationMinutes: subscription.minSlotDurationMinutes,
          },
          windows
        ),
        this.context.config.dispatchTimeoutMs,
        () => new OperationTimeoutError('sendDigest', this.context.config.dispatchTimeoutMs)
      );
      if (!result.delivered) {
        failure = result.error;
      }
    } catch (error) {
      failure = toError(error).message;
    }

    if (failure !== undefined) {
      counters.dispatchFailures++;
      log.error('Digest dispatch failed', new DispatchError(subscription.id, digestId, failure), {
        subscriptionId: subscription.id,
        digestId,
        windows: windows.length,
      });
      return true;
    }

    counters.notificationsSent++;
    log.info('Digest dispatched', { subscriptionId: subscription.id, digestId, windows: windows.length });
    return true;
  }

  private storeCall<T>(operation: string, work: Promise<T>): Promise<T> {
    const timeoutMs = this.context.config.storeTimeoutMs;
    return withTimeout(work, timeoutMs, () => new OperationTimeoutError(operation, timeoutMs));
  }

  private recordSummary(summary: CycleSummary): void {
    this.totals.totalCycles++;
    switch (summary.outcome) {
      case 'SUCCEEDED':
        this.totals.successfulCycles++;
        break;
      case 'FAILED':
        this.totals.failedCycles++;
        break;
      case 'SKIPPED':
        this.totals.skippedCycles++;
        break;
      case 'CANCELLED':
        this.totals.cancelledCycles++;
        break;
    }
    this.totals.notificationsSent += summary.notificationsSent;
    this.totals.notificationsSuppressed += summary.notificationsSuppressed;
    this.totals.dispatchFailures += summary.dispatchFailures;
    this.lastCycle = summary;
  }

  private async publishMetrics(summary: CycleSummary): Promise<void> {
    if (!this.context.config.metricsEnabled) {
      return;
    }
    const metrics: CycleMetrics = {
      cycleId: summary.cycleId,
      outcome: summary.outcome,
      durationMs: summary.durationMs,
      sourcesRefreshed: summary.sourcesRefreshed,
      sourcesFailed: summary.sourcesFailed,
      transitionsDetected: summary.transitionsDetected,
      windowsOpened: summary.windowsOpened,
      matches: summary.matches,
      notificationsSent: summary.notificationsSent,
      notificationsSuppressed: summary.notificationsSuppressed,
      dispatchFailures: summary.dispatchFailures,
    };
    try {
      await this.context.publishMetrics(metrics);
    } catch (error) {
      this.log.warn('Metrics publisher failed', { error: toError(error).message });
    }
  }
}

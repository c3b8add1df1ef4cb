/**
 * Snapshot Cache & Refresher
 *
 * Holds the current and previous snapshot per source. Each source's state is
 * a single frozen entry object that refresh() replaces wholesale, so readers
 * holding an entry (or a snapshot taken from it) never see a torn update.
 * Reads never call an adapter.
 */

import type { Clock } from '../../lib/clock.js';
import { withTimeout } from '../../lib/concurrency.js';
import {
  SourceDataInvalidError,
  SourceError,
  SourceTimeoutError,
  SourceUnavailableError,
  isSourceError,
  toError,
} from '../../lib/errors.js';
import { logger as defaultLogger, Logger } from '../../lib/logger.js';
import { toIso, toMillis, upcomingDateRange } from '../../lib/time.js';
import type { Snapshot, SourceId } from '../../types/entities.js';
import type { SourceRegistry } from '../../sources/sourceRegistry.js';
import { buildSnapshot } from './snapshotValidation.js';

export interface RefreshOutcome {
  sourceId: SourceId;
  previous?: Snapshot;
  current: Snapshot;
  /** Both snapshots report the same sourceUpdatedAt: the booking system has not refreshed */
  sourceUnchanged: boolean;
}

export type RefreshResult =
  | { ok: true; value: RefreshOutcome }
  | { ok: false; error: SourceError };

interface CacheEntry {
  readonly current?: Snapshot;
  readonly previous?: Snapshot;
  readonly refreshedAt?: string;
  readonly lastAttemptAt?: string;
  readonly lastError?: SourceError;
  readonly consecutiveFailures: number;
}

export type SnapshotFreshness = 'fresh' | 'stale' | 'missing';

export interface CachedSnapshotView {
  sourceId: SourceId;
  status: SnapshotFreshness;
  snapshot?: Snapshot;
  refreshedAt?: string;
  ageSeconds?: number;
  /** Error code of the latest failed refresh, never the error itself */
  lastErrorCode?: string;
}

export interface SourceHealth {
  sourceId: SourceId;
  status: SnapshotFreshness;
  lastAttemptAt?: string;
  lastSuccessAt?: string;
  consecutiveFailures: number;
  lastErrorCode?: string;
  lastErrorMessage?: string;
}

export interface SnapshotCacheOptions {
  registry: SourceRegistry;
  clock: Clock;
  timeZone: string;
  fetchDays: number;
  refreshTimeoutMs: number;
  staleAfterMs: number;
  logger?: Logger;
}

const EMPTY_ENTRY: CacheEntry = Object.freeze({ consecutiveFailures: 0 });

export class SnapshotCache {
  private readonly entries = new Map<SourceId, CacheEntry>();
  private readonly log: Logger;

  constructor(private readonly options: SnapshotCacheOptions) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'SnapshotCache' });
  }

  /**
   * Fetch, validate and install a new snapshot for one source.
   * Never throws: failures come back as the error branch and leave the
   * current snapshot in place.
   */
  async refresh(sourceId: SourceId, signal?: AbortSignal): Promise<RefreshResult> {
    const attemptAt = toIso(this.options.clock.now());
    const adapter = this.options.registry.get(sourceId);
    if (!adapter) {
      return this.fail(sourceId, attemptAt, new SourceUnavailableError(sourceId, 'No adapter registered'));
    }
    if (signal?.aborted) {
      return this.fail(sourceId, attemptAt, new SourceUnavailableError(sourceId, 'Refresh cancelled'));
    }

    const dateRange = upcomingDateRange(
      this.options.clock.now(),
      this.options.timeZone,
      this.options.fetchDays
    );
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let payload: unknown;
    try {
      payload = await withTimeout(
        adapter.fetchSnapshot(sourceId, dateRange, { signal: controller.signal }),
        this.options.refreshTimeoutMs,
        () => {
          controller.abort();
          return new SourceTimeoutError(sourceId, this.options.refreshTimeoutMs);
        }
      );
    } catch (error) {
      const sourceError = isSourceError(error)
        ? error
        : new SourceUnavailableError(sourceId, toError(error).message, error);
      return this.fail(sourceId, attemptAt, sourceError);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    let snapshot: Snapshot;
    try {
      snapshot = buildSnapshot(sourceId, payload);
    } catch (error) {
      const sourceError = isSourceError(error)
        ? error
        : new SourceUnavailableError(sourceId, toError(error).message, error);
      return this.fail(sourceId, attemptAt, sourceError);
    }

    const entry = this.entry(sourceId);
    const previous = entry.current;
    this.entries.set(
      sourceId,
      Object.freeze({
        current: snapshot,
        previous,
        refreshedAt: toIso(this.options.clock.now()),
        lastAttemptAt: attemptAt,
        consecutiveFailures: 0,
      })
    );

    const sourceUnchanged =
      previous?.sourceUpdatedAt !== undefined &&
      previous.sourceUpdatedAt === snapshot.sourceUpdatedAt;

    this.log.debug('Snapshot installed', {
      sourceId,
      courts: Object.keys(snapshot.slotsByCourt).length,
      coldStart: previous === undefined,
      sourceUnchanged,
    });

    return { ok: true, value: { sourceId, previous, current: snapshot, sourceUnchanged } };
  }

  currentSnapshot(sourceId: SourceId): Snapshot | undefined {
    return this.entries.get(sourceId)?.current;
  }

  previousSnapshot(sourceId: SourceId): Snapshot | undefined {
    return this.entries.get(sourceId)?.previous;
  }

  /**
   * User-facing read. Serves the last good snapshot with a freshness marker.
   */
  getCachedSnapshot(sourceId: SourceId): CachedSnapshotView {
    const entry = this.entry(sourceId);
    const status = this.freshness(entry);
    if (!entry.current || !entry.refreshedAt) {
      return {
        sourceId,
        status,
        ...(entry.lastError && { lastErrorCode: entry.lastError.code }),
      };
    }

    return {
      sourceId,
      status,
      snapshot: entry.current,
      refreshedAt: entry.refreshedAt,
      ageSeconds: Math.max(0, Math.floor((this.options.clock.now() - toMillis(entry.refreshedAt)) / 1000)),
      ...(entry.lastError && { lastErrorCode: entry.lastError.code }),
    };
  }

  health(sourceIds: SourceId[]): SourceHealth[] {
    return sourceIds.map((sourceId) => {
      const entry = this.entry(sourceId);
      return {
        sourceId,
        status: this.freshness(entry),
        lastAttemptAt: entry.lastAttemptAt,
        lastSuccessAt: entry.refreshedAt,
        consecutiveFailures: entry.consecutiveFailures,
        lastErrorCode: entry.lastError?.code,
        lastErrorMessage: entry.lastError?.message,
      };
    });
  }

  private entry(sourceId: SourceId): CacheEntry {
    return this.entries.get(sourceId) ?? EMPTY_ENTRY;
  }

  private freshness(entry: CacheEntry): SnapshotFreshness {
    if (!entry.current || !entry.refreshedAt) {
      return 'missing';
    }
    if (entry.lastError) {
      return 'stale';
    }
    const age = this.options.clock.now() - toMillis(entry.refreshedAt);
    return age > this.options.staleAfterMs ? 'stale' : 'fresh';
  }

  private fail(sourceId: SourceId, attemptAt: string, error: SourceError): RefreshResult {
    const entry = this.entry(sourceId);
    this.entries.set(
      sourceId,
      Object.freeze({
        ...entry,
        lastAttemptAt: attemptAt,
        lastError: error,
        consecutiveFailures: entry.consecutiveFailures + 1,
      })
    );

    if (error instanceof SourceDataInvalidError) {
      this.log.error('Discarded inconsistent snapshot; flagged for review', error, {
        sourceId,
        issues: error.issues,
      });
    } else {
      this.log.warn('Source refresh failed', {
        sourceId,
        code: error.code,
        error: error.message,
        consecutiveFailures: entry.consecutiveFailures + 1,
      });
    }

    return { ok: false, error };
  }
}

/**
 * Notification Gate
 *
 * Decides SEND or SUPPRESS for each match, in order:
 *   1. duplicate: the subscription was already told about an overlapping window
 *      on the same court within notificationFrequencyHours (or earlier in the
 *      same cycle)
 *   2. daily_cap: digests sent since local midnight >= maxNotificationsPerDay
 * Admitted matches of one subscription in one cycle become a single digest.
 * Dedup keys on overlap, not equality, so a slightly shifted re-detection of a
 * reported window is still suppressed.
 */

import type { Clock } from '../../lib/clock.js';
import { withTimeout } from '../../lib/concurrency.js';
import { OperationTimeoutError, toError } from '../../lib/errors.js';
import { logger as defaultLogger, Logger } from '../../lib/logger.js';
import { HOUR_MS, startOfLocalDay, toIso, toMillis, windowsOverlap } from '../../lib/time.js';
import { generateUUID } from '../../lib/uuid.js';
import type { CoveredWindow, NotificationRecord, Subscription } from '../../types/entities.js';
import type { SubscriptionMatch } from '../matching/subscriptionMatcher.js';
import type { SubscriptionStore } from '../store/subscriptionStore.js';

export type GateDecision = 'SEND' | 'SUPPRESS';
export type SuppressReason = 'duplicate' | 'daily_cap';

export type AdmitResult =
  | { decision: 'SEND'; reason: 'admitted' }
  | { decision: 'SUPPRESS'; reason: SuppressReason };

export interface PlannedDigest {
  digestId: string;
  subscription: Subscription;
  matches: SubscriptionMatch[];
}

export interface SuppressedMatch {
  match: SubscriptionMatch;
  reason: SuppressReason;
}

export interface GatePlan {
  digests: PlannedDigest[];
  suppressed: SuppressedMatch[];
  /** Subscriptions whose history could not be read; nothing was decided for their matches */
  deferredSubscriptionIds: string[];
}

const sameCourt = (a: CoveredWindow, b: CoveredWindow): boolean =>
  a.sourceId === b.sourceId && a.courtId === b.courtId;

/**
 * Pure gate policy over a subscription's recent history and the windows
 * already admitted for it in this cycle
 */
export function evaluateMatch(
  match: SubscriptionMatch,
  history: readonly NotificationRecord[],
  pending: readonly CoveredWindow[],
  nowMs: number,
  dayStartMs: number
): AdmitResult {
  const { subscription, window } = match;
  const dedupFrom = nowMs - subscription.notificationFrequencyHours * HOUR_MS;

  const alreadyReported =
    history.some(
      (record) =>
        toMillis(record.sentAt) >= dedupFrom &&
        sameCourt(record.coveredWindow, window) &&
        windowsOverlap(record.coveredWindow, window)
    ) || pending.some((admitted) => sameCourt(admitted, window) && windowsOverlap(admitted, window));
  if (alreadyReported) {
    return { decision: 'SUPPRESS', reason: 'duplicate' };
  }

  const digestsToday = new Set(
    history.filter((record) => toMillis(record.sentAt) >= dayStartMs).map((record) => record.digestId)
  );
  if (digestsToday.size >= subscription.maxNotificationsPerDay) {
    return { decision: 'SUPPRESS', reason: 'daily_cap' };
  }

  return { decision: 'SEND', reason: 'admitted' };
}

export interface NotificationGateOptions {
  store: SubscriptionStore;
  clock: Clock;
  timeZone: string;
  storeTimeoutMs: number;
  logger?: Logger;
}

export class NotificationGate {
  private readonly log: Logger;

  constructor(private readonly options: NotificationGateOptions) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'NotificationGate' });
  }

  async admit(match: SubscriptionMatch): Promise<AdmitResult> {
    const now = this.options.clock.now();
    const dayStart = startOfLocalDay(now, this.options.timeZone);
    const history = await this.loadHistory(match.subscription, now, dayStart);
    return evaluateMatch(match, history, [], now, dayStart);
  }

  /**
   * Append the record for one admitted window. Must complete before the
   * digest carrying it is dispatched.
   */
  async record(match: SubscriptionMatch, digestId: string): Promise<NotificationRecord> {
    const record: NotificationRecord = {
      recordId: generateUUID(),
      subscriptionId: match.subscription.id,
      digestId,
      sentAt: toIso(this.options.clock.now()),
      coveredWindow: { ...match.window },
    };

    await withTimeout(
      this.options.store.appendNotificationRecord(record),
      this.options.storeTimeoutMs,
      () => new OperationTimeoutError('appendNotificationRecord', this.options.storeTimeoutMs)
    );
    return record;
  }

  /**
   * Gate a whole cycle's matches, grouped into one digest per subscription.
   * Matches are evaluated in the order given.
   */
  async planDigests(matches: readonly SubscriptionMatch[]): Promise<GatePlan> {
    const now = this.options.clock.now();
    const dayStart = startOfLocalDay(now, this.options.timeZone);
    const bySubscription = new Map<string, SubscriptionMatch[]>();
    for (const match of matches) {
      const group = bySubscription.get(match.subscription.id) ?? [];
      group.push(match);
      bySubscription.set(match.subscription.id, group);
    }

    const plan: GatePlan = { digests: [], suppressed: [], deferredSubscriptionIds: [] };

    for (const [subscriptionId, group] of bySubscription) {
      const first = group[0];
      if (!first) continue;

      let history: NotificationRecord[];
      try {
        history = await this.loadHistory(first.subscription, now, dayStart);
      } catch (error) {
        this.log.error('Failed to read notification history', toError(error), { subscriptionId });
        plan.deferredSubscriptionIds.push(subscriptionId);
        continue;
      }

      const admitted: SubscriptionMatch[] = [];
      for (const match of group) {
        const result = evaluateMatch(
          match,
          history,
          admitted.map((candidate) => candidate.window),
          now,
          dayStart
        );
        if (result.decision === 'SEND') {
          admitted.push(match);
        } else {
          plan.suppressed.push({ match, reason: result.reason });
        }
      }

      if (admitted.length > 0) {
        plan.digests.push({ digestId: generateUUID(), subscription: first.subscription, matches: admitted });
      }
    }

    this.log.debug('Gate plan ready', {
      matches: matches.length,
      digests: plan.digests.length,
      suppressed: plan.suppressed.length,
      deferred: plan.deferredSubscriptionIds.length,
    });

    return plan;
  }

  private loadHistory(
    subscription: Subscription,
    now: number,
    dayStart: number
  ): Promise<NotificationRecord[]> {
    const since = Math.min(now - subscription.notificationFrequencyHours * HOUR_MS, dayStart);
    return withTimeout(
      this.options.store.queryRecords(subscription.id, toIso(since)),
      this.options.storeTimeoutMs,
      () => new OperationTimeoutError('queryRecords', this.options.storeTimeoutMs)
    );
  }
}

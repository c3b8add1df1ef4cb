/**
 * Subscription Matcher
 *
 * Pairs consolidated windows with the subscriptions that want them. Preferred
 * times are local wall-clock ranges in the engine time zone; a window that only
 * partly overlaps a preferred range still matches when the overlap alone is at
 * least the subscription's minimum duration, and the match carries that
 * overlapping sub-window.
 */

import {
  MINUTE_MS,
  addDays,
  atLocalMinutes,
  durationMinutes,
  localDate,
  minutesOfDay,
  toIso,
  toMillis,
  weekdayOfDate,
} from '../../lib/time.js';
import type {
  ConsolidatedWindow,
  CoveredWindow,
  PreferredTime,
  Subscription,
} from '../../types/entities.js';

export interface SubscriptionMatch {
  subscription: Subscription;
  /** Overlap of the source window with one preferred-time range */
  window: CoveredWindow;
  sourceWindow: ConsolidatedWindow;
  preferredTime: PreferredTime;
}

export interface MatchOptions {
  now: number;
  timeZone: string;
}

export const isLive = (subscription: Subscription, today: string): boolean =>
  subscription.status === 'ACTIVE' &&
  (subscription.expiryDate === undefined || subscription.expiryDate >= today);

export const wantsCourt = (subscription: Subscription, window: ConsolidatedWindow): boolean =>
  subscription.sourcePreferences.some(
    (preference) =>
      preference.sourceId === window.sourceId &&
      (preference.courtIds.length === 0 || preference.courtIds.includes(window.courtId))
  );

/**
 * Sub-windows of `window` inside `preferredTime`, one per matching local day,
 * that last at least `minMinutes`
 */
export function preferredOverlaps(
  window: ConsolidatedWindow,
  preferredTime: PreferredTime,
  minMinutes: number,
  timeZone: string
): CoveredWindow[] {
  const start = toMillis(window.start);
  const end = toMillis(window.end);
  const startMinutes = minutesOfDay(preferredTime.startTime);
  const endMinutes = minutesOfDay(preferredTime.endTime);

  const overlaps: CoveredWindow[] = [];
  const lastDay = localDate(end, timeZone);

  for (let day = localDate(start, timeZone); day <= lastDay; day = addDays(day, 1)) {
    if (weekdayOfDate(day) !== preferredTime.dayOfWeek) continue;

    const overlapStart = Math.max(start, atLocalMinutes(day, startMinutes, timeZone));
    const overlapEnd = Math.min(end, atLocalMinutes(day, endMinutes, timeZone));

    if (overlapEnd > overlapStart && overlapEnd - overlapStart >= minMinutes * MINUTE_MS) {
      overlaps.push({
        sourceId: window.sourceId,
        courtId: window.courtId,
        start: toIso(overlapStart),
        end: toIso(overlapEnd),
      });
    }
  }

  return overlaps;
}

export function matchSubscriptions(
  windows: readonly ConsolidatedWindow[],
  subscriptions: readonly Subscription[],
  options: MatchOptions
): SubscriptionMatch[] {
  const today = localDate(options.now, options.timeZone);
  const live = subscriptions.filter((subscription) => isLive(subscription, today));
  const matches: SubscriptionMatch[] = [];
  const seen = new Set<string>();

  for (const window of windows) {
    for (const subscription of live) {
      if (!wantsCourt(subscription, window)) continue;
      if (durationMinutes(window) < subscription.minSlotDurationMinutes) continue;

      for (const preferredTime of subscription.preferredTimes) {
        const overlaps = preferredOverlaps(
          window,
          preferredTime,
          subscription.minSlotDurationMinutes,
          options.timeZone
        );

        for (const overlap of overlaps) {
          const key = [subscription.id, overlap.sourceId, overlap.courtId, overlap.start, overlap.end].join('|');
          if (seen.has(key)) continue;
          seen.add(key);
          matches.push({ subscription, window: overlap, sourceWindow: window, preferredTime });
        }
      }
    }
  }

  return matches;
}

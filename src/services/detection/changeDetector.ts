/**
 * Change Detector
 *
 * Diffs two snapshots of one source into OPENED/CLOSED transitions. For each
 * OPEN slot of the current snapshot, the parts not already OPEN in the previous
 * snapshot become OPENED events (and symmetrically for CLOSED), so events
 * follow the source's own slot boundaries and cover only time whose status
 * actually changed. Absent, BOOKED and UNKNOWN all count as not open.
 *
 * When the fetch range has rolled forward, only the time both snapshots cover
 * is compared; days that just came into range are a baseline, like a cold
 * start.
 */

import { toIso, toMillis } from '../../lib/time.js';
import type {
  CourtId,
  Slot,
  Snapshot,
  TransitionEvent,
  TransitionKind,
} from '../../types/entities.js';

type Interval = readonly [start: number, end: number];

const openIntervals = (slots: readonly Readonly<Slot>[] | undefined): Interval[] =>
  (slots ?? [])
    .filter((slot) => slot.status === 'OPEN')
    .map((slot): Interval => [toMillis(slot.start), toMillis(slot.end)])
    .sort((a, b) => a[0] - b[0]);

/**
 * Parts of `base` not covered by any of `cuts` (sorted, non-overlapping)
 */
export const subtractIntervals = (base: Interval, cuts: readonly Interval[]): Interval[] => {
  const remaining: Interval[] = [];
  let cursor = base[0];

  for (const [cutStart, cutEnd] of cuts) {
    if (cutEnd <= cursor) continue;
    if (cutStart >= base[1]) break;
    if (cutStart > cursor) {
      remaining.push([cursor, cutStart]);
    }
    cursor = Math.max(cursor, cutEnd);
    if (cursor >= base[1]) break;
  }

  if (cursor < base[1]) {
    remaining.push([cursor, base[1]]);
  }
  return remaining;
};

const sameCourtSet = (a: Snapshot, b: Snapshot): boolean => {
  const courtsA = Object.keys(a.slotsByCourt);
  const courtsB = new Set(Object.keys(b.slotsByCourt));
  return courtsA.length === courtsB.size && courtsA.every((courtId) => courtsB.has(courtId));
};

const sameDateRange = (a: Snapshot, b: Snapshot): boolean =>
  a.dateRange.from === b.dateRange.from && a.dateRange.to === b.dateRange.to;

const dateRangesOverlap = (a: Snapshot, b: Snapshot): boolean =>
  a.dateRange.from <= b.dateRange.to && b.dateRange.from <= a.dateRange.to;

/**
 * Same court set and overlapping date ranges
 */
export const areComparable = (previous: Snapshot, current: Snapshot): boolean =>
  dateRangesOverlap(previous, current) && sameCourtSet(previous, current);

const slotSpan = (snapshot: Snapshot): Interval | undefined => {
  let start = Infinity;
  let end = -Infinity;
  for (const courtSlots of Object.values(snapshot.slotsByCourt)) {
    for (const slot of courtSlots) {
      start = Math.min(start, toMillis(slot.start));
      end = Math.max(end, toMillis(slot.end));
    }
  }
  return start < end ? [start, end] : undefined;
};

/**
 * Time covered by both snapshots' slots; undefined when they share none
 */
export const sharedSpan = (previous: Snapshot, current: Snapshot): Interval | undefined => {
  const a = slotSpan(previous);
  const b = slotSpan(current);
  if (!a || !b) return undefined;
  const start = Math.max(a[0], b[0]);
  const end = Math.min(a[1], b[1]);
  return start < end ? [start, end] : undefined;
};

const clipIntervals = (intervals: readonly Interval[], [lo, hi]: Interval): Interval[] =>
  intervals
    .filter(([start, end]) => end > lo && start < hi)
    .map(([start, end]): Interval => [Math.max(start, lo), Math.min(end, hi)]);

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const compareTransitions = (a: TransitionEvent, b: TransitionEvent): number =>
  compareStrings(a.courtId, b.courtId) ||
  toMillis(a.window.start) - toMillis(b.window.start) ||
  toMillis(a.window.end) - toMillis(b.window.end) ||
  compareStrings(a.kind, b.kind);

export interface DetectOptions {
  /** Defaults to the current snapshot's capturedAt */
  detectedAt?: string;
}

export function detectTransitions(
  previous: Snapshot | undefined,
  current: Snapshot,
  options: DetectOptions = {}
): TransitionEvent[] {
  // Cold start: the first snapshot is a baseline
  if (!previous) {
    return [];
  }

  const detectedAt = options.detectedAt ?? current.capturedAt;
  const events: TransitionEvent[] = [];
  const emit = (courtId: CourtId, kind: TransitionKind, [start, end]: Interval) => {
    events.push({
      sourceId: current.sourceId,
      courtId,
      window: { start: toIso(start), end: toIso(end) },
      kind,
      detectedAt,
    });
  };

  const span = sameDateRange(previous, current) ? undefined : sharedSpan(previous, current);
  if (!areComparable(previous, current) || (!sameDateRange(previous, current) && !span)) {
    // Full replace: every OPEN slot of the new grid is new
    for (const [courtId, slots] of Object.entries(current.slotsByCourt)) {
      for (const interval of openIntervals(slots)) {
        emit(courtId, 'OPENED', interval);
      }
    }
    return events.sort(compareTransitions);
  }

  const within = (intervals: Interval[]): Interval[] => (span ? clipIntervals(intervals, span) : intervals);

  for (const [courtId, currentSlots] of Object.entries(current.slotsByCourt)) {
    const nowOpen = within(openIntervals(currentSlots));
    const wasOpen = within(openIntervals(previous.slotsByCourt[courtId]));

    for (const slot of nowOpen) {
      for (const segment of subtractIntervals(slot, wasOpen)) {
        emit(courtId, 'OPENED', segment);
      }
    }
    for (const slot of wasOpen) {
      for (const segment of subtractIntervals(slot, nowOpen)) {
        emit(courtId, 'CLOSED', segment);
      }
    }
  }

  return events.sort(compareTransitions);
}

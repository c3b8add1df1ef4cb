/**
 * Slot Consolidator
 *
 * Merges the OPENED transitions of one cycle into maximal continuous windows
 * per (source, court). Overlapping and touching windows merge; nothing merges
 * across courts.
 */

import { toIso, toMillis } from '../../lib/time.js';
import type { ConsolidatedWindow, Snapshot, TransitionEvent } from '../../types/entities.js';

interface OpenRun {
  sourceId: string;
  courtId: string;
  start: number;
  end: number;
}

const groupKey = (sourceId: string, courtId: string) => `${sourceId}\u0000${courtId}`;

export function consolidateWindows(events: readonly TransitionEvent[]): ConsolidatedWindow[] {
  const groups = new Map<string, OpenRun[]>();

  for (const event of events) {
    if (event.kind !== 'OPENED') continue;
    const key = groupKey(event.sourceId, event.courtId);
    const runs = groups.get(key) ?? [];
    runs.push({
      sourceId: event.sourceId,
      courtId: event.courtId,
      start: toMillis(event.window.start),
      end: toMillis(event.window.end),
    });
    groups.set(key, runs);
  }

  const windows: ConsolidatedWindow[] = [];
  const sortedKeys = [...groups.keys()].sort();

  for (const key of sortedKeys) {
    const runs = (groups.get(key) ?? []).sort((a, b) => a.start - b.start || a.end - b.end);
    let current: OpenRun | undefined;

    for (const run of runs) {
      if (current && run.start <= current.end) {
        current.end = Math.max(current.end, run.end);
        continue;
      }
      if (current) windows.push(toWindow(current));
      current = { ...run };
    }
    if (current) windows.push(toWindow(current));
  }

  return windows;
}

const toWindow = (run: OpenRun): ConsolidatedWindow => ({
  sourceId: run.sourceId,
  courtId: run.courtId,
  start: toIso(run.start),
  end: toIso(run.end),
});

/**
 * Parts of a previously detected window that `snapshot` still shows as OPEN
 * and that end after `notBefore`, merged the same way as fresh openings
 */
export function stillOpenParts(
  window: ConsolidatedWindow,
  snapshot: Snapshot | undefined,
  notBefore: number
): ConsolidatedWindow[] {
  if (!snapshot || snapshot.sourceId !== window.sourceId) {
    return [];
  }
  const windowStart = toMillis(window.start);
  const windowEnd = toMillis(window.end);
  const parts: ConsolidatedWindow[] = [];
  let current: OpenRun | undefined;

  const runs = (snapshot.slotsByCourt[window.courtId] ?? [])
    .filter((slot) => slot.status === 'OPEN')
    .map((slot) => ({
      sourceId: window.sourceId,
      courtId: window.courtId,
      start: Math.max(toMillis(slot.start), windowStart),
      end: Math.min(toMillis(slot.end), windowEnd),
    }))
    .filter((run) => run.start < run.end && run.end > notBefore)
    .sort((a, b) => a.start - b.start);

  for (const run of runs) {
    if (current && run.start <= current.end) {
      current.end = Math.max(current.end, run.end);
      continue;
    }
    if (current) parts.push(toWindow(current));
    current = run;
  }
  if (current) parts.push(toWindow(current));

  return parts;
}

export interface ConsolidationStats {
  openedEvents: number;
  windows: number;
  /** windows / openedEvents; 1 when nothing merged, 0 when there was nothing to merge */
  ratio: number;
}

export function consolidationStats(
  events: readonly TransitionEvent[],
  windows: readonly ConsolidatedWindow[]
): ConsolidationStats {
  const openedEvents = events.filter((event) => event.kind === 'OPENED').length;
  return {
    openedEvents,
    windows: windows.length,
    ratio: openedEvents === 0 ? 0 : windows.length / openedEvents,
  };
}

/**
 * Turns an adapter payload into a cache-ready Snapshot: schema validation,
 * grid invariants, canonical UTC timestamps, per-court ordering and a deep
 * freeze.
 */

import { DataInconsistencyError, SourceDataInvalidError } from '../../lib/errors.js';
import { toIso, toMillis } from '../../lib/time.js';
import type { CourtId, Slot, Snapshot, SourceId } from '../../types/entities.js';
import { snapshotPayloadSchema } from '../../types/schemas.js';

const freezeSlot = (slot: Slot): Readonly<Slot> =>
  Object.freeze({
    courtId: slot.courtId,
    start: toIso(toMillis(slot.start)),
    end: toIso(toMillis(slot.end)),
    status: slot.status,
    ...(slot.price !== undefined && { price: slot.price }),
    ...(slot.currency !== undefined && { currency: slot.currency }),
  });

export function buildSnapshot(sourceId: SourceId, payload: unknown): Snapshot {
  const parsed = snapshotPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SourceDataInvalidError(
      sourceId,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  const issues: string[] = [];

  if (data.sourceId !== sourceId) {
    issues.push(`payload is for source ${data.sourceId}`);
  }

  const slotsByCourt: Record<CourtId, readonly Readonly<Slot>[]> = {};
  for (const [courtId, rawSlots] of Object.entries(data.slotsByCourt)) {
    const slots = rawSlots.map(freezeSlot).sort((a, b) => toMillis(a.start) - toMillis(b.start));

    let previous: Readonly<Slot> | undefined;
    for (const slot of slots) {
      if (slot.courtId !== courtId) {
        issues.push(`slot ${slot.start} filed under court ${courtId} belongs to ${slot.courtId}`);
      }
      if (toMillis(slot.start) >= toMillis(slot.end)) {
        issues.push(`slot ${slot.start} on court ${courtId} does not end after it starts`);
      }
      if (previous && toMillis(slot.start) < toMillis(previous.end)) {
        issues.push(`slots ${previous.start} and ${slot.start} on court ${courtId} overlap`);
      }
      previous = slot;
    }

    slotsByCourt[courtId] = Object.freeze(slots);
  }

  if (issues.length > 0) {
    throw new DataInconsistencyError(sourceId, issues);
  }

  return Object.freeze({
    sourceId,
    capturedAt: toIso(toMillis(data.capturedAt)),
    dateRange: Object.freeze({ ...data.dateRange }),
    slotsByCourt: Object.freeze(slotsByCourt),
    ...(data.courtNames && { courtNames: Object.freeze({ ...data.courtNames }) }),
    ...(data.sourceUpdatedAt && { sourceUpdatedAt: toIso(toMillis(data.sourceUpdatedAt)) }),
  });
}

/**
 * Shared test fixtures: builders, a controllable clock, a scriptable source
 * and a dispatcher that records what it was asked to send.
 */

import type { Clock } from '../../src/lib/clock';
import { SourceUnavailableError } from '../../src/lib/errors';
import type { AvailabilitySource, FetchSnapshotOptions } from '../../src/sources/availabilitySource';
import type {
  DigestDispatcher,
  DigestRecipient,
  DigestWindow,
  DispatchResult,
} from '../../src/services/notifications/dispatcher';
import type {
  CourtId,
  DateRange,
  Slot,
  SlotStatus,
  Snapshot,
  SourceId,
  Subscription,
} from '../../src/types/entities';
import type { SnapshotPayload } from '../../src/types/schemas';

export const DEFAULT_RANGE: DateRange = { from: '2026-10-20', to: '2026-10-27' };

export type SlotSpec = [start: string, end: string, status: SlotStatus];

/**
 * Slot times are written as HH:MM on 2026-10-20 (a Tuesday), UTC
 */
export const at = (hhmm: string, date = '2026-10-20'): string => `${date}T${hhmm}:00.000Z`;

export const slots = (courtId: CourtId, specs: SlotSpec[]): Slot[] =>
  specs.map(([start, end, status]) => ({ courtId, start: at(start), end: at(end), status }));

export function buildPayload(
  sourceId: SourceId,
  courts: Record<CourtId, SlotSpec[]>,
  overrides: Partial<SnapshotPayload> = {}
): SnapshotPayload {
  const slotsByCourt: Record<CourtId, Slot[]> = {};
  for (const [courtId, specs] of Object.entries(courts)) {
    slotsByCourt[courtId] = slots(courtId, specs);
  }
  return {
    sourceId,
    capturedAt: '2026-10-20T06:00:00.000Z',
    dateRange: DEFAULT_RANGE,
    slotsByCourt,
    ...overrides,
  };
}

export function buildSnapshot(
  sourceId: SourceId,
  courts: Record<CourtId, SlotSpec[]>,
  overrides: Partial<Snapshot> = {}
): Snapshot {
  return { ...buildPayload(sourceId, courts), ...overrides };
}

export function buildSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-1',
    ownerId: 'owner-1',
    notifyEmail: 'player@example.com',
    sourcePreferences: [{ sourceId: 'club-a', courtIds: [] }],
    preferredTimes: [{ dayOfWeek: 1, startTime: '09:00', endTime: '12:00' }],
    minSlotDurationMinutes: 60,
    maxNotificationsPerDay: 3,
    notificationFrequencyHours: 24,
    status: 'ACTIVE',
    createdAt: '2026-10-01T00:00:00.000Z',
    updatedAt: '2026-10-01T00:00:00.000Z',
    ...overrides,
  };
}

export class FakeClock implements Clock {
  private current: number;

  constructor(iso: string) {
    this.current = Date.parse(iso);
  }

  now(): number {
    return this.current;
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

type Scripted = { payload: SnapshotPayload } | { error: Error } | { hang: true };

/**
 * Source whose responses are set per source id by the test
 */
export class FakeSource implements AvailabilitySource {
  readonly name = 'fake';
  readonly calls: Array<{ sourceId: SourceId; dateRange: DateRange }> = [];
  private readonly scripts = new Map<SourceId, Scripted>();

  respondWith(payload: SnapshotPayload): this {
    this.scripts.set(payload.sourceId, { payload });
    return this;
  }

  failWith(sourceId: SourceId, error: Error): this {
    this.scripts.set(sourceId, { error });
    return this;
  }

  /** Never resolves; rejects once the request is aborted */
  hang(sourceId: SourceId): this {
    this.scripts.set(sourceId, { hang: true });
    return this;
  }

  async fetchSnapshot(
    sourceId: SourceId,
    dateRange: DateRange,
    options?: FetchSnapshotOptions
  ): Promise<SnapshotPayload> {
    this.calls.push({ sourceId, dateRange });
    const script = this.scripts.get(sourceId);
    if (!script) {
      throw new SourceUnavailableError(sourceId, 'No scripted response');
    }
    if ('error' in script) {
      throw script.error;
    }
    if ('hang' in script) {
      return new Promise<SnapshotPayload>((_, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    return structuredClone(script.payload);
  }
}

export class RecordingDispatcher implements DigestDispatcher {
  readonly sent: Array<{ recipient: DigestRecipient; windows: DigestWindow[] }> = [];
  failWith: string | undefined;

  async sendDigest(recipient: DigestRecipient, windows: DigestWindow[]): Promise<DispatchResult> {
    if (this.failWith !== undefined) {
      return { delivered: false, error: this.failWith };
    }
    this.sent.push({ recipient, windows });
    return { delivered: true, messageId: `msg-${this.sent.length}` };
  }
}

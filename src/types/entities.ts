/**
 * Entity Type Definitions - Court Alerts Engine
 *
 * Availability entities (snapshots, transitions, windows) live in memory only.
 * Subscriptions and notification records follow the DynamoDB single-table
 * design used by the persistence layer.
 */

/**
 * Opaque, stable identifier of one booking system / club
 */
export type SourceId = string;

export type CourtId = string;

/**
 * Status of a slot as reported by the booking system
 */
export type SlotStatus = 'OPEN' | 'BOOKED' | 'UNKNOWN';

export interface Slot {
  courtId: CourtId;
  start: string; // ISO 8601
  end: string; // ISO 8601
  status: SlotStatus;
  price?: number;
  currency?: string;
}

/**
 * Inclusive calendar range, YYYY-MM-DD
 */
export interface DateRange {
  from: string;
  to: string;
}

export interface TimeWindow {
  start: string;
  end: string;
}

/**
 * Point-in-time availability grid for one source.
 * Deep-frozen by the cache once validated; slots per court are ordered by start.
 */
export interface Snapshot {
  readonly sourceId: SourceId;
  readonly capturedAt: string;
  readonly dateRange: Readonly<DateRange>;
  readonly slotsByCourt: Readonly<Record<CourtId, readonly Readonly<Slot>[]>>;
  readonly courtNames?: Readonly<Record<CourtId, string>>;
  /** When the booking system itself last refreshed, if it reports that */
  readonly sourceUpdatedAt?: string;
}

export type TransitionKind = 'OPENED' | 'CLOSED';

export interface TransitionEvent {
  sourceId: SourceId;
  courtId: CourtId;
  window: TimeWindow;
  kind: TransitionKind;
  detectedAt: string;
}

/**
 * Maximal contiguous OPEN interval on one court within one detection cycle
 */
export interface ConsolidatedWindow {
  sourceId: SourceId;
  courtId: CourtId;
  start: string;
  end: string;
}

export type CoveredWindow = ConsolidatedWindow;

export type SubscriptionStatus = 'ACTIVE' | 'PAUSED' | 'EXPIRED' | 'CANCELLED';

export interface SourcePreference {
  sourceId: SourceId;
  courtIds: CourtId[]; // empty = any court of the source
}

export interface PreferredTime {
  dayOfWeek: number; // 0 = Monday ... 6 = Sunday
  startTime: string; // HH:MM
  endTime: string; // HH:MM, or 24:00 for end of day
}

export interface Subscription {
  id: string;
  ownerId: string;
  notifyEmail: string;
  sourcePreferences: SourcePreference[];
  preferredTimes: PreferredTime[];
  minSlotDurationMinutes: number;
  expiryDate?: string; // YYYY-MM-DD
  maxNotificationsPerDay: number;
  notificationFrequencyHours: number;
  status: SubscriptionStatus;
  createdAt: string;
  updatedAt: string;
}

/**
 * Append-only audit / dedup log entry. One per admitted window; windows sent
 * in the same digest share a digestId.
 */
export interface NotificationRecord {
  recordId: string;
  subscriptionId: string;
  digestId: string;
  sentAt: string;
  coveredWindow: CoveredWindow;
}

/**
 * DynamoDB item shapes
 */
export interface SubscriptionItem extends Subscription {
  PK: string; // SUBSCRIPTION#{id}
  SK: string; // SUBSCRIPTION#{id}
  GSI1PK: string; // SUBSCRIPTIONS#STATUS#{status}
  GSI1SK: string; // CREATED#{createdAt}
  entityType: 'Subscription';
}

export interface NotificationRecordItem extends NotificationRecord {
  PK: string; // SUBSCRIPTION#{subscriptionId}
  SK: string; // RECORD#{sentAt}#{recordId}
  entityType: 'NotificationRecord';
}

/**
 * Key builders for the single-table layout
 */
export const KeyBuilder = {
  subscription: (subscriptionId: string) => ({
    PK: `SUBSCRIPTION#${subscriptionId}`,
    SK: `SUBSCRIPTION#${subscriptionId}`,
  }),
  subscriptionsByStatus: (status: SubscriptionStatus) => `SUBSCRIPTIONS#STATUS#${status}`,
  notificationRecord: (subscriptionId: string, sentAt: string, recordId: string) => ({
    PK: `SUBSCRIPTION#${subscriptionId}`,
    SK: `RECORD#${sentAt}#${recordId}`,
  }),
  recordRangeStart: (sentAtFrom: string) => `RECORD#${sentAtFrom}`,
  cycleLock: (lockName: string) => ({
    PK: `LOCK#${lockName}`,
    SK: `LOCK#${lockName}`,
  }),
} as const;

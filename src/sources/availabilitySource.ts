import type { DateRange, SourceId } from '../types/entities.js';
import type { SnapshotPayload } from '../types/schemas.js';

export interface FetchSnapshotOptions {
  /** Aborted when the refresh times out or the engine shuts down */
  signal?: AbortSignal;
}

/**
 * Adapter for one booking platform. An adapter may serve several sources
 * (clubs) of the same platform.
 *
 * Implementations reject with SourceUnavailableError, SourceTimeoutError or
 * SourceDataInvalidError. Anything else is treated as unavailability.
 */
export interface AvailabilitySource {
  readonly name: string;
  fetchSnapshot(
    sourceId: SourceId,
    dateRange: DateRange,
    options?: FetchSnapshotOptions
  ): Promise<SnapshotPayload>;
}

/**
 * Mock booking system for local runs and demos.
 *
 * Generates a full slot grid for each demo club and flips slot status with a
 * hash of (club, court, slot start, refresh epoch), so consecutive epochs
 * produce a realistic trickle of openings and closures while a single epoch
 * always returns the same grid.
 */

import { z } from 'zod';
import demoSources from '../../config/demo-sources.json';
import type { Clock } from '../lib/clock.js';
import { SourceUnavailableError } from '../lib/errors.js';
import { MINUTE_MS, addDays, atLocalMinutes, toIso } from '../lib/time.js';
import type { CourtId, DateRange, Slot, SourceId } from '../types/entities.js';
import type { SnapshotPayload } from '../types/schemas.js';
import type { AvailabilitySource, FetchSnapshotOptions } from './availabilitySource.js';
import type { SourceRegistry } from './sourceRegistry.js';

const demoClubSchema = z
  .object({
    sourceId: z.string().min(1),
    name: z.string().min(1),
    openHour: z.number().int().min(0).max(23),
    closeHour: z.number().int().min(1).max(24),
    slotMinutes: z.number().int().positive(),
    price: z.number().nonnegative().optional(),
    currency: z.string().length(3).optional(),
    openProbability: z.number().min(0).max(1),
    courts: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })).min(1),
  })
  .refine((club) => club.openHour < club.closeHour, {
    message: 'Club must close after it opens',
  });

export const demoCatalogSchema = z.object({
  epochMinutes: z.number().int().positive().default(5),
  clubs: z.array(demoClubSchema),
});

export type DemoCatalog = z.infer<typeof demoCatalogSchema>;
export type DemoClub = DemoCatalog['clubs'][number];

export const loadDemoCatalog = (): DemoCatalog => demoCatalogSchema.parse(demoSources);

/**
 * FNV-1a, scaled to [0, 1)
 */
const unitHash = (key: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash / 0x100000000;
};

export interface MockBookingSourceOptions {
  clock: Clock;
  timeZone: string;
}

export class MockBookingSource implements AvailabilitySource {
  readonly name = 'mock-booking';
  private readonly clubs: Map<SourceId, DemoClub>;

  constructor(
    private readonly catalog: DemoCatalog,
    private readonly options: MockBookingSourceOptions
  ) {
    this.clubs = new Map(catalog.clubs.map((club) => [club.sourceId, club]));
  }

  sourceIds(): SourceId[] {
    return [...this.clubs.keys()];
  }

  registerAll(registry: SourceRegistry): SourceRegistry {
    for (const sourceId of this.sourceIds()) {
      registry.register(sourceId, this);
    }
    return registry;
  }

  async fetchSnapshot(
    sourceId: SourceId,
    dateRange: DateRange,
    fetchOptions?: FetchSnapshotOptions
  ): Promise<SnapshotPayload> {
    if (fetchOptions?.signal?.aborted) {
      throw new SourceUnavailableError(sourceId, 'Request aborted');
    }

    const club = this.clubs.get(sourceId);
    if (!club) {
      throw new SourceUnavailableError(sourceId, `Unknown demo club: ${sourceId}`);
    }

    const now = this.options.clock.now();
    const epochMs = this.catalog.epochMinutes * MINUTE_MS;
    const epoch = Math.floor(now / epochMs);

    const slotsByCourt: Record<CourtId, Slot[]> = {};
    const courtNames: Record<CourtId, string> = {};
    for (const court of club.courts) {
      courtNames[court.id] = court.name;
      slotsByCourt[court.id] = this.buildCourtSlots(club, court.id, dateRange, epoch);
    }

    return {
      sourceId,
      capturedAt: toIso(now),
      dateRange,
      slotsByCourt,
      courtNames,
      sourceUpdatedAt: toIso(epoch * epochMs),
    };
  }

  private buildCourtSlots(club: DemoClub, courtId: CourtId, dateRange: DateRange, epoch: number): Slot[] {
    const slots: Slot[] = [];
    const lastMinute = club.closeHour * 60;

    for (let date = dateRange.from; date <= dateRange.to; date = addDays(date, 1)) {
      for (let minute = club.openHour * 60; minute + club.slotMinutes <= lastMinute; minute += club.slotMinutes) {
        const start = toIso(atLocalMinutes(date, minute, this.options.timeZone));
        const end = toIso(atLocalMinutes(date, minute + club.slotMinutes, this.options.timeZone));
        const open = unitHash(`${club.sourceId}|${courtId}|${start}|${epoch}`) < club.openProbability;

        slots.push({
          courtId,
          start,
          end,
          status: open ? 'OPEN' : 'BOOKED',
          ...(club.price !== undefined && { price: club.price }),
          ...(club.currency !== undefined && { currency: club.currency }),
        });
      }
    }

    return slots;
  }
}

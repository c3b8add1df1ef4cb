/**
 * Subscription Matcher Unit Tests
 *
 * 2026-10-20 is a Tuesday (dayOfWeek 1); "today" is Sunday 2026-10-18.
 */

import { matchSubscriptions } from '../../../src/services/matching/subscriptionMatcher';
import type { ConsolidatedWindow } from '../../../src/types/entities';
import { at, buildSubscription } from '../../helpers/fixtures';

const NOW = Date.parse('2026-10-18T12:00:00.000Z');
const UTC = { now: NOW, timeZone: 'UTC' };

const window = (start: string, end: string, overrides: Partial<ConsolidatedWindow> = {}): ConsolidatedWindow => ({
  sourceId: 'club-a',
  courtId: 'A1',
  start,
  end,
  ...overrides,
});

describe('matchSubscriptions', () => {
  describe('preferred times', () => {
    it('should match a Tuesday 10:00-11:00 window against Tuesday 09:00-12:00', () => {
      // Arrange
      const subscription = buildSubscription();
      const candidate = window(at('10:00'), at('11:00'));

      // Act
      const matches = matchSubscriptions([candidate], [subscription], UTC);

      // Assert
      expect(matches).toHaveLength(1);
      expect(matches[0]?.subscription.id).toBe('sub-1');
      expect(matches[0]?.window).toEqual(candidate);
      expect(matches[0]?.sourceWindow).toBe(candidate);
    });

    it('should not match a 30-minute Tuesday 08:00-08:30 window', () => {
      const matches = matchSubscriptions([window(at('08:00'), at('08:30'))], [buildSubscription()], UTC);

      expect(matches).toEqual([]);
    });

    it('should carry only the overlapping sub-window', () => {
      const matches = matchSubscriptions([window(at('08:00'), at('11:00'))], [buildSubscription()], UTC);

      expect(matches.map((match) => [match.window.start, match.window.end])).toEqual([
        [at('09:00'), at('11:00')],
      ]);
      expect(matches[0]?.sourceWindow.start).toBe(at('08:00'));
    });

    it('should reject a long window whose overlap is shorter than the minimum', () => {
      const matches = matchSubscriptions([window(at('11:30'), at('13:30'))], [buildSubscription()], UTC);

      expect(matches).toEqual([]);
    });

    it('should accept an overlap of exactly the minimum', () => {
      const matches = matchSubscriptions([window(at('11:00'), at('13:00'))], [buildSubscription()], UTC);

      expect(matches.map((match) => [match.window.start, match.window.end])).toEqual([
        [at('11:00'), at('12:00')],
      ]);
    });

    it('should not match on another weekday', () => {
      const wednesday = window(at('10:00', '2026-10-21'), at('11:00', '2026-10-21'));

      expect(matchSubscriptions([wednesday], [buildSubscription()], UTC)).toEqual([]);
    });

    it('should match each local day of a window that crosses midnight', () => {
      // Arrange: Monday 22:00 to Tuesday 10:00
      const subscription = buildSubscription({
        preferredTimes: [
          { dayOfWeek: 0, startTime: '21:00', endTime: '24:00' },
          { dayOfWeek: 1, startTime: '09:00', endTime: '12:00' },
        ],
      });
      const overnight = window('2026-10-19T22:00:00.000Z', at('10:00'));

      // Act
      const matches = matchSubscriptions([overnight], [subscription], UTC);

      // Assert
      expect(matches.map((match) => [match.window.start, match.window.end])).toEqual([
        ['2026-10-19T22:00:00.000Z', '2026-10-20T00:00:00.000Z'],
        [at('09:00'), at('10:00')],
      ]);
    });

    it('should interpret preferred times in the engine time zone', () => {
      // Europe/Vilnius is UTC+3 on 2026-10-20: 07:00Z is 10:00 local
      const candidate = window('2026-10-20T07:00:00.000Z', '2026-10-20T08:00:00.000Z');

      const matches = matchSubscriptions([candidate], [buildSubscription()], {
        now: NOW,
        timeZone: 'Europe/Vilnius',
      });

      expect(matches).toHaveLength(1);
      expect(matches[0]?.window).toEqual(candidate);
    });

    describe('on the day clocks go back', () => {
      // Vilnius is UTC+3 until 04:00 local on Sunday 2026-10-25, UTC+2 afterwards
      const overnight = window('2026-10-24T20:00:00.000Z', '2026-10-25T09:00:00.000Z');
      const sundayMorning = { dayOfWeek: 6, startTime: '09:00', endTime: '12:00' };
      const VILNIUS = { now: NOW, timeZone: 'Europe/Vilnius' };

      it('should measure the overlap against the winter-time range', () => {
        // Local overlap is 09:00-11:00 EET, two hours
        const subscription = buildSubscription({
          minSlotDurationMinutes: 150,
          preferredTimes: [sundayMorning],
        });

        expect(matchSubscriptions([overnight], [subscription], VILNIUS)).toEqual([]);
      });

      it('should carry the sub-window that starts at 09:00 local', () => {
        const subscription = buildSubscription({
          minSlotDurationMinutes: 120,
          preferredTimes: [sundayMorning],
        });

        const matches = matchSubscriptions([overnight], [subscription], VILNIUS);

        expect(matches.map((match) => [match.window.start, match.window.end])).toEqual([
          ['2026-10-25T07:00:00.000Z', '2026-10-25T09:00:00.000Z'],
        ]);
      });
    });

    it('should deduplicate identical sub-windows from different preferred times', () => {
      const subscription = buildSubscription({
        preferredTimes: [
          { dayOfWeek: 1, startTime: '09:00', endTime: '12:00' },
          { dayOfWeek: 1, startTime: '10:00', endTime: '11:00' },
        ],
      });

      const matches = matchSubscriptions([window(at('10:00'), at('11:00'))], [subscription], UTC);

      expect(matches).toHaveLength(1);
    });

    it('should match once per satisfied preferred time when sub-windows differ', () => {
      const subscription = buildSubscription({
        preferredTimes: [
          { dayOfWeek: 1, startTime: '09:00', endTime: '11:00' },
          { dayOfWeek: 1, startTime: '10:00', endTime: '12:00' },
        ],
      });

      const matches = matchSubscriptions([window(at('09:00'), at('12:00'))], [subscription], UTC);

      expect(matches.map((match) => [match.window.start, match.window.end])).toEqual([
        [at('09:00'), at('11:00')],
        [at('10:00'), at('12:00')],
      ]);
    });
  });

  describe('source and court preferences', () => {
    const candidate = window(at('10:00'), at('11:00'));

    it('should treat empty courtIds as any court of the source', () => {
      const subscription = buildSubscription({ sourcePreferences: [{ sourceId: 'club-a', courtIds: [] }] });

      expect(matchSubscriptions([candidate], [subscription], UTC)).toHaveLength(1);
    });

    it('should require a listed court when courtIds are given', () => {
      const wantsA2 = buildSubscription({ sourcePreferences: [{ sourceId: 'club-a', courtIds: ['A2'] }] });
      const wantsA1 = buildSubscription({
        id: 'sub-2',
        sourcePreferences: [{ sourceId: 'club-a', courtIds: ['A1', 'A2'] }],
      });

      const matches = matchSubscriptions([candidate], [wantsA2, wantsA1], UTC);

      expect(matches.map((match) => match.subscription.id)).toEqual(['sub-2']);
    });

    it('should not match a window from another source', () => {
      const subscription = buildSubscription({ sourcePreferences: [{ sourceId: 'club-b', courtIds: [] }] });

      expect(matchSubscriptions([candidate], [subscription], UTC)).toEqual([]);
    });
  });

  describe('subscription state', () => {
    const candidate = window(at('10:00'), at('11:00'));

    it('should skip subscriptions that are not ACTIVE', () => {
      const paused = buildSubscription({ status: 'PAUSED' });
      const cancelled = buildSubscription({ id: 'sub-2', status: 'CANCELLED' });

      expect(matchSubscriptions([candidate], [paused, cancelled], UTC)).toEqual([]);
    });

    it('should skip subscriptions past their expiry date', () => {
      const expired = buildSubscription({ expiryDate: '2026-10-17' });
      const lastDay = buildSubscription({ id: 'sub-2', expiryDate: '2026-10-18' });

      const matches = matchSubscriptions([candidate], [expired, lastDay], UTC);

      expect(matches.map((match) => match.subscription.id)).toEqual(['sub-2']);
    });

    it('should let every qualifying subscription match the same window', () => {
      const matches = matchSubscriptions(
        [candidate],
        [buildSubscription(), buildSubscription({ id: 'sub-2' })],
        UTC
      );

      expect(matches.map((match) => match.subscription.id)).toEqual(['sub-1', 'sub-2']);
    });
  });

  it('should never return a window shorter than the subscription minimum', () => {
    // Arrange
    const subscriptions = [30, 60, 90, 120].map((minutes) =>
      buildSubscription({
        id: `sub-${minutes}`,
        minSlotDurationMinutes: minutes,
        preferredTimes: [{ dayOfWeek: 1, startTime: '07:00', endTime: '13:00' }],
      })
    );
    const windows = [
      window(at('08:00'), at('08:30')),
      window(at('09:00'), at('10:00'), { courtId: 'A2' }),
      window(at('06:00'), at('08:00'), { courtId: 'A3' }),
      window(at('12:00'), at('14:00'), { courtId: 'A4' }),
    ];

    // Act
    const matches = matchSubscriptions(windows, subscriptions, UTC);

    // Assert
    expect(matches.length).toBeGreaterThan(0);
    for (const match of matches) {
      const minutes = (Date.parse(match.window.end) - Date.parse(match.window.start)) / 60000;
      expect(minutes).toBeGreaterThanOrEqual(match.subscription.minSlotDurationMinutes);
    }
  });
});

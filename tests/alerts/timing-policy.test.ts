import { describe, it, expect } from 'vitest';
import {
  computeFireTimes,
  alertMinutesFor,
  durationTier,
  isMissedWindow,
  type TimingPreferences,
} from '../../src/alerts/index.js';
import { DEFAULT_PREFERENCES } from '../../src/preferences/index.js';
import { eventAt, BASE_TIME, MINUTE, MEET_LINK } from '../fixtures/events.js';

const prefs = (overrides: Partial<TimingPreferences> = {}): TimingPreferences => ({
  ...DEFAULT_PREFERENCES,
  ...overrides,
});

describe('durationTier', () => {
  it('should classify meetings under 30 minutes as short', () => {
    expect(durationTier(eventAt('a', 10, 29))).toBe('short');
  });

  it('should classify 30 to 60 minute meetings as medium', () => {
    expect(durationTier(eventAt('a', 10, 30))).toBe('medium');
    expect(durationTier(eventAt('a', 10, 60))).toBe('medium');
  });

  it('should classify meetings over 60 minutes as long', () => {
    expect(durationTier(eventAt('a', 10, 61))).toBe('long');
  });
});

describe('alertMinutesFor', () => {
  it('should use the default minutes when length-based timing is off', () => {
    expect(alertMinutesFor(eventAt('a', 60, 90), prefs({ defaultAlertMinutes: 7 }))).toBe(7);
  });

  it('should use the tier minutes when length-based timing is on', () => {
    const tiered = prefs({
      useLengthBasedTiming: true,
      shortMeetingAlertMinutes: 1,
      mediumMeetingAlertMinutes: 3,
      longMeetingAlertMinutes: 10,
    });

    expect(alertMinutesFor(eventAt('a', 60, 15), tiered)).toBe(1);
    expect(alertMinutesFor(eventAt('a', 60, 45), tiered)).toBe(3);
    expect(alertMinutesFor(eventAt('a', 60, 120), tiered)).toBe(10);
  });

  it('should use 1, 2 and 5 minutes for 20, 45 and 90 minute meetings by default', () => {
    const tiered = prefs({ useLengthBasedTiming: true });

    expect([20, 45, 90].map(length => alertMinutesFor(eventAt('a', 60, length), tiered))).toEqual([1, 2, 5]);
  });
});

describe('computeFireTimes', () => {
  it('should schedule one overlay reminder before the start', () => {
    const event = eventAt('a', 30);

    const alerts = computeFireTimes(event, prefs(), BASE_TIME);

    expect(alerts).toHaveLength(1);
    expect(alerts[0].triggerAt).toBe(event.startAt - 5 * MINUTE);
    expect(alerts[0].kind).toEqual({ type: 'reminder', minutesBefore: 5, channel: 'overlay' });
    expect(alerts[0].event).toBe(event);
  });

  it('should fire at the start when zero minutes are configured', () => {
    const event = eventAt('a', 30);

    const [alert] = computeFireTimes(event, prefs({ defaultAlertMinutes: 0 }), BASE_TIME);

    expect(alert.triggerAt).toBe(event.startAt);
  });

  it('should never schedule an alert after the meeting starts', () => {
    const events = [eventAt('a', 1), eventAt('b', 4), eventAt('c', 45, 90)];
    const tiered = prefs({ useLengthBasedTiming: true, soundEnabled: true, soundAlertMinutes: 2 });

    for (const event of events) {
      for (const alert of computeFireTimes(event, tiered, BASE_TIME)) {
        expect(alert.triggerAt).toBeLessThanOrEqual(event.startAt);
        expect(alert.triggerAt).toBeGreaterThanOrEqual(BASE_TIME);
      }
    }
  });

  it('should fire a missed reminder immediately when the meeting is still ahead', () => {
    // Reminder time was two minutes ago
    const event = eventAt('a', 3);

    const alerts = computeFireTimes(event, prefs(), BASE_TIME);

    expect(alerts).toHaveLength(1);
    expect(alerts[0].triggerAt).toBe(BASE_TIME);
    expect(isMissedWindow(alerts[0], BASE_TIME)).toBe(true);
  });

  it('should not report an on-time reminder as missed', () => {
    const [alert] = computeFireTimes(eventAt('a', 30), prefs(), BASE_TIME);

    expect(isMissedWindow(alert, BASE_TIME)).toBe(false);
  });

  it('should return nothing for a meeting that has started', () => {
    expect(computeFireTimes(eventAt('a', -5), prefs(), BASE_TIME)).toEqual([]);
    expect(computeFireTimes(eventAt('a', 0), prefs(), BASE_TIME)).toEqual([]);
  });

  it('should return nothing for a meeting that has ended', () => {
    expect(computeFireTimes(eventAt('a', -60, 30), prefs(), BASE_TIME)).toEqual([]);
  });

  describe('sound alert', () => {
    it('should add a sound reminder at its own lead time', () => {
      const event = eventAt('a', 30);

      const alerts = computeFireTimes(event, prefs({ soundEnabled: true, soundAlertMinutes: 1 }), BASE_TIME);

      expect(alerts.map(a => a.triggerAt)).toEqual([event.startAt - 5 * MINUTE, event.startAt - MINUTE]);
      expect(alerts[1].kind).toEqual({ type: 'reminder', minutesBefore: 1, channel: 'sound' });
    });

    it('should skip the sound reminder when it coincides with the overlay reminder', () => {
      const alerts = computeFireTimes(eventAt('a', 30), prefs({ soundEnabled: true, soundAlertMinutes: 5 }), BASE_TIME);

      expect(alerts).toHaveLength(1);
      expect(alerts[0].kind).toEqual({ type: 'reminder', minutesBefore: 5, channel: 'overlay' });
    });

    it('should skip a sound reminder whose time has passed', () => {
      const alerts = computeFireTimes(eventAt('a', 2), prefs({ soundEnabled: true, soundAlertMinutes: 3 }), BASE_TIME);

      expect(alerts).toHaveLength(1);
      expect(alerts[0].kind.type).toBe('reminder');
    });

    it('should not add a sound reminder when sound is disabled', () => {
      const alerts = computeFireTimes(eventAt('a', 30), prefs({ soundEnabled: false, soundAlertMinutes: 1 }), BASE_TIME);

      expect(alerts).toHaveLength(1);
    });
  });

  describe('meeting start', () => {
    it('should add a meeting-start alert for auto-join meetings with a link', () => {
      const event = eventAt('a', 30, 30, { links: [MEET_LINK] });

      const alerts = computeFireTimes(event, prefs({ autoJoinEnabled: true }), BASE_TIME);

      expect(alerts).toHaveLength(2);
      expect(alerts[1].kind).toEqual({ type: 'meeting-start' });
      expect(alerts[1].triggerAt).toBe(event.startAt);
    });

    it('should not add a meeting-start alert without a trusted link', () => {
      const event = eventAt('a', 30, 30, { links: ['https://meet.example.com/abc'] });

      const alerts = computeFireTimes(event, prefs({ autoJoinEnabled: true }), BASE_TIME);

      expect(alerts.map(a => a.kind.type)).toEqual(['reminder']);
    });

    it('should not add a meeting-start alert when auto-join is off', () => {
      const event = eventAt('a', 30, 30, { links: [MEET_LINK] });

      expect(computeFireTimes(event, prefs(), BASE_TIME).map(a => a.kind.type)).toEqual(['reminder']);
    });
  });
});

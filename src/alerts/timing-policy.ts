/**
 * Timing Policy
 *
 * Pure mapping from an event and the user's timing preferences to the
 * alerts that should be queued for it.
 */

import type { CalendarEvent } from '../calendar/types.js';
import { eventDuration } from '../calendar/event.js';
import { primaryMeetingLink } from '../calendar/links.js';
import type { AlertPreferences } from '../preferences/schema.js';
import type { Alert } from './types.js';
import { reminderAlert, meetingStartAlert } from './alert.js';

const MINUTE_MS = 60_000;

export type TimingPreferences = Pick<
  AlertPreferences,
  | 'defaultAlertMinutes'
  | 'useLengthBasedTiming'
  | 'shortMeetingAlertMinutes'
  | 'mediumMeetingAlertMinutes'
  | 'longMeetingAlertMinutes'
  | 'soundEnabled'
  | 'soundAlertMinutes'
  | 'autoJoinEnabled'
>;

export type DurationTier = 'short' | 'medium' | 'long';

/**
 * Short: under 30 minutes. Medium: 30 to 60 minutes inclusive. Long: over 60.
 */
export function durationTier(event: Pick<CalendarEvent, 'startAt' | 'endAt'>): DurationTier {
  const minutes = Math.floor(eventDuration(event) / MINUTE_MS);
  if (minutes < 30) return 'short';
  if (minutes <= 60) return 'medium';
  return 'long';
}

/**
 * Minutes before start at which the overlay reminder fires
 */
export function alertMinutesFor(event: Pick<CalendarEvent, 'startAt' | 'endAt'>, prefs: TimingPreferences): number {
  if (!prefs.useLengthBasedTiming) {
    return prefs.defaultAlertMinutes;
  }

  switch (durationTier(event)) {
    case 'short':
      return prefs.shortMeetingAlertMinutes;
    case 'medium':
      return prefs.mediumMeetingAlertMinutes;
    case 'long':
      return prefs.longMeetingAlertMinutes;
  }
}

/**
 * Compute the alerts for one event as of `now`.
 *
 * A reminder whose time has already passed while the meeting is still ahead
 * (late launch, wake from sleep) comes back with `triggerAt = now` so the
 * scheduler fires it on its next pass. Ended events yield nothing; started
 * events get no new reminders.
 */
export function computeFireTimes(event: CalendarEvent, prefs: TimingPreferences, now: number): Alert[] {
  if (event.endAt < now || event.startAt <= now) {
    return [];
  }

  const alerts: Alert[] = [];

  const reminderMinutes = alertMinutesFor(event, prefs);
  const reminderAt = event.startAt - reminderMinutes * MINUTE_MS;
  alerts.push(reminderAlert(event, Math.max(reminderAt, now), reminderMinutes, 'overlay', now));

  if (prefs.soundEnabled) {
    const soundAt = event.startAt - prefs.soundAlertMinutes * MINUTE_MS;
    if (soundAt > now && soundAt !== reminderAt) {
      alerts.push(reminderAlert(event, soundAt, prefs.soundAlertMinutes, 'sound', now));
    }
  }

  if (prefs.autoJoinEnabled && primaryMeetingLink(event) !== undefined) {
    alerts.push(meetingStartAlert(event, now));
  }

  return alerts;
}

/**
 * Whether an alert computed at `now` is a missed-window reminder
 */
export function isMissedWindow(alert: Alert, now: number): boolean {
  return (
    alert.kind.type === 'reminder' &&
    alert.triggerAt === now &&
    alert.event.startAt - alert.kind.minutesBefore * MINUTE_MS <= now
  );
}

import { randomUUID } from 'crypto';
import type { CalendarEvent } from '../calendar/types.js';
import type { Alert, AlertKind, AlertSnapshot } from './types.js';

export function createAlert(event: CalendarEvent, triggerAt: number, kind: AlertKind, now: number = Date.now()): Alert {
  return {
    id: randomUUID(),
    event,
    triggerAt,
    kind,
    createdAt: now,
  };
}

export function reminderAlert(
  event: CalendarEvent,
  triggerAt: number,
  minutesBefore: number,
  channel: 'overlay' | 'sound',
  now?: number
): Alert {
  return createAlert(event, triggerAt, { type: 'reminder', minutesBefore, channel }, now);
}

export function snoozeAlert(event: CalendarEvent, until: number, now?: number): Alert {
  return createAlert(event, until, { type: 'snooze', until }, now);
}

export function meetingStartAlert(event: CalendarEvent, now?: number): Alert {
  return createAlert(event, event.startAt, { type: 'meeting-start' }, now);
}

export function isDue(alert: Alert, now: number): boolean {
  return now >= alert.triggerAt;
}

/**
 * Milliseconds until the alert fires; negative once overdue
 */
export function remaining(alert: Alert, now: number): number {
  return alert.triggerAt - now;
}

export function isSnooze(alert: Alert): alert is Alert & { kind: Extract<AlertKind, { type: 'snooze' }> } {
  return alert.kind.type === 'snooze';
}

export function describeAlertKind(kind: AlertKind): string {
  switch (kind.type) {
    case 'reminder':
      return kind.channel === 'sound'
        ? `sound-reminder(${kind.minutesBefore}min)`
        : `reminder(${kind.minutesBefore}min)`;
    case 'snooze':
      return `snooze(until: ${new Date(kind.until).toISOString()})`;
    case 'meeting-start':
      return 'meeting-start';
  }
}

export function toSnapshot(alert: Alert): AlertSnapshot {
  return {
    id: alert.id,
    eventId: alert.event.id,
    eventTitle: alert.event.title,
    triggerAt: alert.triggerAt,
    kind: { ...alert.kind },
    label: describeAlertKind(alert.kind),
  };
}

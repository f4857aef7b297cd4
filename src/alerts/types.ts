import type { CalendarEvent } from '../calendar/types.js';

// ============================================================================
// Alert Types
// ============================================================================

/**
 * Which output a reminder is timed for. Sound reminders have their own
 * minutes-before preference but are presented the same way.
 */
export type ReminderChannel = 'overlay' | 'sound';

export type AlertKind =
  | { type: 'reminder'; minutesBefore: number; channel: ReminderChannel }
  | { type: 'snooze'; until: number }
  | { type: 'meeting-start' };

export type AlertKindType = AlertKind['type'];

/**
 * One pending notification
 */
export interface Alert {
  /** Unique, never reused */
  readonly id: string;
  /** Event the alert refers to (shared, never mutated) */
  readonly event: CalendarEvent;
  /** Instant the alert must fire (epoch ms) */
  readonly triggerAt: number;
  readonly kind: AlertKind;
  /** Creation instant (epoch ms) */
  readonly createdAt: number;
}

/**
 * Read-only view of a queued alert, for badges and debugging
 */
export interface AlertSnapshot {
  id: string;
  eventId: string;
  eventTitle: string;
  triggerAt: number;
  kind: AlertKind;
  label: string;
}

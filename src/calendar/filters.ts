import type { CalendarEvent } from './types.js';

export interface EventFilterOptions {
  /** Keep all-day events (default: false) */
  includeAllDayEvents?: boolean;
}

/**
 * Whether the signed-in user declined this meeting
 */
export function isDeclinedBySelf(event: CalendarEvent): boolean {
  return event.attendees.some(a => a.isSelf && a.responseStatus === 'declined');
}

/**
 * Reduce a synced event list to the meetings worth alerting on:
 * no cancelled events, no events the user declined, and all-day events
 * only when asked for.
 */
export function filterSchedulableEvents(
  events: readonly CalendarEvent[],
  options: EventFilterOptions = {}
): CalendarEvent[] {
  const includeAllDay = options.includeAllDayEvents ?? false;

  return events.filter(event => {
    if (event.status === 'cancelled') return false;
    if (isDeclinedBySelf(event)) return false;
    if (event.isAllDay && !includeAllDay) return false;
    return true;
  });
}

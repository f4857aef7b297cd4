// ============================================================================
// Calendar Types
// ============================================================================

/**
 * Event status as reported by the calendar provider
 */
export type EventStatus = 'confirmed' | 'tentative' | 'cancelled';

/**
 * Attendee response status
 */
export type AttendeeResponse = 'accepted' | 'declined' | 'tentative' | 'needsAction';

/**
 * Video meeting provider detected from a link
 */
export type MeetingProvider = 'meet' | 'zoom' | 'teams' | 'webex' | 'generic';

export interface Attendee {
  email: string;
  displayName?: string;
  /** True when this attendee is the signed-in user */
  isSelf: boolean;
  responseStatus: AttendeeResponse;
}

/**
 * A calendar meeting as produced by calendar sync.
 * The engine only ever reads these.
 */
export interface CalendarEvent {
  readonly id: string;
  readonly title: string;
  /** Start instant (epoch ms) */
  readonly startAt: number;
  /** End instant (epoch ms) */
  readonly endAt: number;
  readonly organizer?: string;
  readonly description?: string;
  readonly location?: string;
  readonly calendarId: string;
  readonly isAllDay: boolean;
  readonly status: EventStatus;
  readonly attendees: readonly Attendee[];
  /** Meeting links (video calls, dial-in pages) */
  readonly links: readonly string[];
}

/**
 * Time range for event source queries (epoch ms, end exclusive)
 */
export interface TimeRange {
  from: number;
  to: number;
}

/**
 * External store of synced events
 */
export interface EventSource {
  listEvents(range: TimeRange): Promise<CalendarEvent[]>;
}

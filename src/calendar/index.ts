export type {
  CalendarEvent,
  Attendee,
  AttendeeResponse,
  EventStatus,
  MeetingProvider,
  TimeRange,
  EventSource,
} from './types.js';

export {
  CalendarEventSchema,
  InvalidEventError,
  createCalendarEvent,
  createEventWithParsedLinks,
  eventDuration,
  hasStarted,
  hasEnded,
  type CalendarEventInput,
} from './event.js';

export {
  TRUSTED_MEETING_DOMAINS,
  extractMeetingLinks,
  isTrustedMeetingUrl,
  detectProvider,
  primaryMeetingLink,
  isOnlineMeeting,
} from './links.js';

export { filterSchedulableEvents, isDeclinedBySelf, type EventFilterOptions } from './filters.js';

export { InMemoryEventSource } from './event-source.js';

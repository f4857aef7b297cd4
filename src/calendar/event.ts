import { z } from 'zod';
import type { CalendarEvent } from './types.js';
import { extractMeetingLinks } from './links.js';

const AttendeeSchema = z.object({
  email: z.string().min(1),
  displayName: z.string().optional(),
  isSelf: z.boolean().default(false),
  responseStatus: z.enum(['accepted', 'declined', 'tentative', 'needsAction']).default('needsAction'),
});

export const CalendarEventSchema = z
  .object({
    id: z.string().trim().min(1, 'Event id must not be blank'),
    title: z.string().default(''),
    startAt: z.number().finite(),
    endAt: z.number().finite(),
    organizer: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
    calendarId: z.string().default('primary'),
    isAllDay: z.boolean().default(false),
    status: z.enum(['confirmed', 'tentative', 'cancelled']).default('confirmed'),
    attendees: z.array(AttendeeSchema).default([]),
    links: z.array(z.string()).default([]),
  })
  .refine(e => e.endAt >= e.startAt, { message: 'Event must not end before it starts', path: ['endAt'] });

export type CalendarEventInput = z.input<typeof CalendarEventSchema>;

/**
 * Rejected calendar event input
 */
export class InvalidEventError extends Error {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`Invalid calendar event: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join(', ')}`);
    this.name = 'InvalidEventError';
    this.issues = issues;
  }
}

/**
 * Build a CalendarEvent, filling defaults for optional fields
 */
export function createCalendarEvent(input: CalendarEventInput): CalendarEvent {
  const result = CalendarEventSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidEventError(
      result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
    );
  }
  return result.data;
}

/**
 * Build an event whose links are taken from Google Meet URLs found in its
 * title, description and location.
 */
export function createEventWithParsedLinks(input: Omit<CalendarEventInput, 'links'>): CalendarEvent {
  const text = [input.title, input.description, input.location]
    .filter((part): part is string => typeof part === 'string')
    .join(' ');
  return createCalendarEvent({ ...input, links: extractMeetingLinks(text) });
}

/**
 * Event length in milliseconds
 */
export function eventDuration(event: Pick<CalendarEvent, 'startAt' | 'endAt'>): number {
  return event.endAt - event.startAt;
}

export function hasStarted(event: CalendarEvent, now: number): boolean {
  return event.startAt <= now;
}

export function hasEnded(event: CalendarEvent, now: number): boolean {
  return event.endAt < now;
}

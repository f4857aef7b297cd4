import { describe, it, expect } from 'vitest';
import {
  createCalendarEvent,
  createEventWithParsedLinks,
  InvalidEventError,
  extractMeetingLinks,
  isTrustedMeetingUrl,
  detectProvider,
  primaryMeetingLink,
  isOnlineMeeting,
  filterSchedulableEvents,
  InMemoryEventSource,
  hasStarted,
  hasEnded,
} from '../../src/calendar/index.js';
import { eventAt, BASE_TIME, MINUTE, MEET_LINK } from '../fixtures/events.js';

describe('createCalendarEvent', () => {
  it('should fill optional fields with defaults', () => {
    const event = createCalendarEvent({ id: 'evt-1', startAt: BASE_TIME, endAt: BASE_TIME + 30 * MINUTE });

    expect(event).toEqual({
      id: 'evt-1',
      title: '',
      startAt: BASE_TIME,
      endAt: BASE_TIME + 30 * MINUTE,
      calendarId: 'primary',
      isAllDay: false,
      status: 'confirmed',
      attendees: [],
      links: [],
    });
  });

  it('should reject a blank id', () => {
    expect(() => createCalendarEvent({ id: ' ', startAt: BASE_TIME, endAt: BASE_TIME })).toThrow(InvalidEventError);
  });

  it('should reject an event that ends before it starts', () => {
    try {
      createCalendarEvent({ id: 'evt-1', startAt: BASE_TIME, endAt: BASE_TIME - 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidEventError);
      if (error instanceof InvalidEventError) {
        expect(error.issues).toEqual([{ path: 'endAt', message: 'Event must not end before it starts' }]);
      }
    }
  });

  it('should parse Meet links from the description', () => {
    const event = createEventWithParsedLinks({
      id: 'evt-1',
      title: 'Planning',
      startAt: BASE_TIME,
      endAt: BASE_TIME + 30 * MINUTE,
      description: `Join at ${MEET_LINK}. Agenda to follow.`,
    });

    expect(event.links).toEqual([MEET_LINK]);
  });

  it('should report start and end relative to now', () => {
    const event = eventAt('a', 0, 30);

    expect(hasStarted(event, BASE_TIME)).toBe(true);
    expect(hasEnded(event, BASE_TIME + 30 * MINUTE)).toBe(false);
    expect(hasEnded(event, BASE_TIME + 31 * MINUTE)).toBe(true);
  });
});

describe('meeting links', () => {
  it('should extract distinct Meet links and ignore others', () => {
    const text = `${MEET_LINK}, https://zoom.us/j/123 and again (${MEET_LINK})`;

    expect(extractMeetingLinks(text)).toEqual([MEET_LINK]);
  });

  it('should trust https links on known domains and their subdomains', () => {
    expect(isTrustedMeetingUrl(MEET_LINK)).toBe(true);
    expect(isTrustedMeetingUrl('https://us02web.zoom.us/j/123')).toBe(true);
  });

  it('should not trust lookalike, plain http or malformed links', () => {
    expect(isTrustedMeetingUrl('https://zoom.us.example.com/j/123')).toBe(false);
    expect(isTrustedMeetingUrl('http://meet.google.com/abc-defg-hij')).toBe(false);
    expect(isTrustedMeetingUrl('not a url')).toBe(false);
  });

  it('should detect the provider', () => {
    expect(detectProvider(MEET_LINK)).toBe('meet');
    expect(detectProvider('https://zoom.us/j/1')).toBe('zoom');
    expect(detectProvider('https://teams.microsoft.com/l/meetup-join/1')).toBe('teams');
    expect(detectProvider('https://acme.webex.com/meet/1')).toBe('webex');
    expect(detectProvider('https://whereby.com/room')).toBe('generic');
  });

  it('should prefer Meet, then other video providers, then any trusted link', () => {
    expect(primaryMeetingLink({ links: ['https://zoom.us/j/1', MEET_LINK] })).toBe(MEET_LINK);
    expect(primaryMeetingLink({ links: ['https://whereby.com/room', 'https://zoom.us/j/1'] })).toBe('https://zoom.us/j/1');
    expect(primaryMeetingLink({ links: ['https://whereby.com/room'] })).toBe('https://whereby.com/room');
    expect(primaryMeetingLink({ links: ['https://example.com/call'] })).toBeUndefined();
  });

  it('should report online meetings', () => {
    expect(isOnlineMeeting({ links: [MEET_LINK] })).toBe(true);
    expect(isOnlineMeeting({ links: [] })).toBe(false);
  });
});

describe('filterSchedulableEvents', () => {
  const events = [
    eventAt('confirmed', 10),
    eventAt('cancelled', 20, 30, { status: 'cancelled' }),
    eventAt('declined', 30, 30, {
      attendees: [{ email: 'me@example.com', isSelf: true, responseStatus: 'declined' }],
    }),
    eventAt('other-declined', 40, 30, {
      attendees: [{ email: 'them@example.com', responseStatus: 'declined' }],
    }),
    eventAt('all-day', -540, 1440, { isAllDay: true }),
  ];

  it('should drop cancelled, self-declined and all-day events', () => {
    expect(filterSchedulableEvents(events).map(e => e.id)).toEqual(['confirmed', 'other-declined']);
  });

  it('should keep all-day events when asked', () => {
    expect(filterSchedulableEvents(events, { includeAllDayEvents: true }).map(e => e.id)).toEqual([
      'confirmed',
      'other-declined',
      'all-day',
    ]);
  });
});

describe('InMemoryEventSource', () => {
  it('should list events overlapping the range in start order', async () => {
    const source = new InMemoryEventSource([eventAt('later', 120), eventAt('soon', 10), eventAt('past', -120)]);

    const events = await source.listEvents({ from: BASE_TIME, to: BASE_TIME + 60 * MINUTE });

    expect(events.map(e => e.id)).toEqual(['soon']);
  });

  it('should apply upserts and removals', async () => {
    const source = new InMemoryEventSource([eventAt('a', 10)]);

    source.upsert(eventAt('a', 20));
    source.upsert(eventAt('b', 30));
    expect(source.remove('missing')).toBe(false);

    const events = await source.listEvents({ from: BASE_TIME, to: BASE_TIME + 60 * MINUTE });
    expect(events.map(e => [e.id, e.startAt])).toEqual([
      ['a', BASE_TIME + 20 * MINUTE],
      ['b', BASE_TIME + 30 * MINUTE],
    ]);
    expect(source.size).toBe(2);
  });
});

import type { CalendarEvent, EventSource, TimeRange } from './types.js';

/**
 * Event source backed by an in-memory list.
 * Useful for hosts that already hold synced events, and for tests.
 */
export class InMemoryEventSource implements EventSource {
  private events = new Map<string, CalendarEvent>();

  constructor(events: readonly CalendarEvent[] = []) {
    this.replaceAll(events);
  }

  /**
   * Replace the stored events, as a full calendar sync would
   */
  replaceAll(events: readonly CalendarEvent[]): void {
    this.events = new Map(events.map(e => [e.id, e]));
  }

  upsert(event: CalendarEvent): void {
    this.events.set(event.id, event);
  }

  remove(eventId: string): boolean {
    return this.events.delete(eventId);
  }

  /**
   * Events overlapping the range, ordered by start time
   */
  async listEvents(range: TimeRange): Promise<CalendarEvent[]> {
    return Array.from(this.events.values())
      .filter(e => e.endAt >= range.from && e.startAt < range.to)
      .sort((a, b) => a.startAt - b.startAt);
  }

  get size(): number {
    return this.events.size;
  }
}

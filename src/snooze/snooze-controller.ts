import type { CalendarEvent } from '../calendar/types.js';
import type { Alert } from '../alerts/types.js';
import type { PresentationGateway, SnoozeHandler } from '../presentation/types.js';
import type { PreferencesProvider } from '../preferences/preferences-store.js';
import { moduleLogger } from '../observability/logger.js';

const logger = moduleLogger('SnoozeController');

export const SnoozeErrorCode = {
  INVALID_MINUTES: 'INVALID_MINUTES',
  UNKNOWN_EVENT: 'UNKNOWN_EVENT',
  SNOOZE_DISABLED: 'SNOOZE_DISABLED',
  NOT_SCHEDULING: 'NOT_SCHEDULING',
} as const;

export type SnoozeErrorCode = (typeof SnoozeErrorCode)[keyof typeof SnoozeErrorCode];

/**
 * A snooze request that was refused before anything changed
 */
export class SnoozeRejectedError extends Error {
  readonly code: SnoozeErrorCode;

  constructor(code: SnoozeErrorCode, message: string) {
    super(message);
    this.name = 'SnoozeRejectedError';
    this.code = code;
  }
}

export type SnoozeResult = { success: true; alert: Alert } | { success: false; error: SnoozeRejectedError };

/**
 * The scheduler operations the controller depends on
 */
export interface SnoozeTarget {
  scheduleSnooze(event: CalendarEvent, minutes: number): Alert | null;
  isRunning(): boolean;
}

export interface SnoozeControllerDeps {
  scheduler: SnoozeTarget;
  gateway: PresentationGateway;
  preferences: PreferencesProvider;
}

/**
 * Turns "snooze N minutes" into a new snooze alert in the live queue.
 * The caller passes the originating event explicitly, so the request does not
 * depend on what is on screen by the time it arrives.
 */
export class SnoozeController implements SnoozeHandler {
  private readonly scheduler: SnoozeTarget;
  private readonly gateway: PresentationGateway;
  private readonly preferences: PreferencesProvider;

  constructor(deps: SnoozeControllerDeps) {
    this.scheduler = deps.scheduler;
    this.gateway = deps.gateway;
    this.preferences = deps.preferences;
  }

  snooze(event: CalendarEvent, minutes: number): SnoozeResult {
    const rejection = this.validate(event, minutes);
    if (rejection) {
      logger.warn({ code: rejection.code, minutes }, rejection.message);
      return { success: false, error: rejection };
    }

    // Only dismiss what belongs to this event; another meeting's alert stays up
    const shownId = this.gateway.currentEventId?.() ?? null;
    if (shownId === null || shownId === event.id) {
      this.gateway.hideAlert();
    }

    const alert = this.scheduler.scheduleSnooze(event, minutes);
    if (!alert) {
      const error = new SnoozeRejectedError(SnoozeErrorCode.INVALID_MINUTES, 'Scheduler refused the snooze request');
      logger.warn({ eventId: event.id, minutes }, error.message);
      return { success: false, error };
    }

    logger.info({ eventId: event.id, minutes, triggerAt: alert.triggerAt }, 'Alert snoozed');
    return { success: true, alert };
  }

  private validate(event: CalendarEvent | null | undefined, minutes: number): SnoozeRejectedError | null {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      return new SnoozeRejectedError(SnoozeErrorCode.INVALID_MINUTES, `Snooze minutes must be a positive integer, got ${minutes}`);
    }
    if (!event || typeof event.id !== 'string' || event.id.trim() === '') {
      return new SnoozeRejectedError(SnoozeErrorCode.UNKNOWN_EVENT, 'Snooze requested for an unknown event');
    }
    if (!this.preferences.current().allowSnooze) {
      return new SnoozeRejectedError(SnoozeErrorCode.SNOOZE_DISABLED, 'Snooze is disabled in preferences');
    }
    if (!this.scheduler.isRunning()) {
      return new SnoozeRejectedError(SnoozeErrorCode.NOT_SCHEDULING, 'Alert scheduling is not running');
    }
    return null;
  }
}

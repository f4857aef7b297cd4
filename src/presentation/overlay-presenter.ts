import type { CalendarEvent } from '../calendar/types.js';
import type { PreferencesProvider } from '../preferences/preferences-store.js';
import { moduleLogger, errorMessage } from '../observability/logger.js';
import type {
  PresentationGateway,
  SnoozeHandler,
  OverlaySurface,
  SoundPlayer,
  FocusStatus,
  LinkOpener,
} from './types.js';

const logger = moduleLogger('OverlayPresenter');

export interface OverlayPresenterDeps {
  surface: OverlaySurface;
  preferences: PreferencesProvider;
  sound?: SoundPlayer;
  focus?: FocusStatus;
  linkOpener?: LinkOpener;
}

/**
 * Presentation gateway that drives a host-provided overlay surface.
 *
 * Keeps its own visibility state. At most one event is shown at a time;
 * showing the same event again is a no-op. Failures of the host ports are
 * logged and never reach the caller.
 */
export class OverlayPresenter implements PresentationGateway {
  private readonly surface: OverlaySurface;
  private readonly preferences: PreferencesProvider;
  private readonly sound?: SoundPlayer;
  private readonly focus?: FocusStatus;
  private readonly linkOpener?: LinkOpener;
  private snoozeHandler: SnoozeHandler | null = null;
  private shownEvent: CalendarEvent | null = null;
  private shownFromSnooze = false;

  constructor(deps: OverlayPresenterDeps) {
    this.surface = deps.surface;
    this.preferences = deps.preferences;
    this.sound = deps.sound;
    this.focus = deps.focus;
    this.linkOpener = deps.linkOpener;
  }

  /**
   * Set (or clear) the non-owning back-reference used for snooze requests
   */
  attachSnoozeHandler(handler: SnoozeHandler | null): void {
    this.snoozeHandler = handler;
  }

  showAlert(event: CalendarEvent, isFromSnooze: boolean): void {
    if (this.shownEvent?.id === event.id) {
      logger.debug({ eventId: event.id }, 'Alert already visible for event, skipping');
      return;
    }

    if (!this.focusAllowsAlert()) {
      logger.info({ eventId: event.id }, 'Alert suppressed by Do Not Disturb');
      return;
    }

    this.hideAlert();

    const prefs = this.preferences.current();
    this.shownEvent = event;
    this.shownFromSnooze = isFromSnooze;

    try {
      this.surface.open(event, {
        isFromSnooze,
        snoozeOptions: prefs.snoozeOptions,
        allowSnooze: prefs.allowSnooze,
      });
    } catch (error) {
      logger.error({ eventId: event.id, error: errorMessage(error) }, 'Failed to open alert overlay');
      this.shownEvent = null;
      this.shownFromSnooze = false;
      return;
    }

    if (prefs.playAlertSound && this.sound) {
      try {
        this.sound.playAlert();
      } catch (error) {
        logger.warn({ eventId: event.id, error: errorMessage(error) }, 'Failed to play alert sound');
      }
    }

    logger.info({ eventId: event.id, title: event.title, isFromSnooze }, 'Alert shown');
  }

  hideAlert(): void {
    if (this.sound) {
      try {
        this.sound.stop();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Failed to stop alert sound');
      }
    }

    if (!this.shownEvent) {
      return;
    }

    const eventId = this.shownEvent.id;
    this.shownEvent = null;
    this.shownFromSnooze = false;

    try {
      this.surface.close();
    } catch (error) {
      logger.error({ eventId, error: errorMessage(error) }, 'Failed to close alert overlay');
    }

    logger.info({ eventId }, 'Alert hidden');
  }

  openMeetingLink(url: string, event: CalendarEvent): void {
    if (!this.linkOpener) {
      logger.warn({ eventId: event.id }, 'No link opener configured, showing alert instead');
      this.showAlert(event, false);
      return;
    }

    try {
      this.linkOpener.open(url);
      logger.info({ eventId: event.id, url }, 'Opened meeting link');
    } catch (error) {
      logger.error({ eventId: event.id, error: errorMessage(error) }, 'Failed to open meeting link');
      this.showAlert(event, false);
    }
  }

  /**
   * Snooze the alert currently on screen. Returns false when nothing is
   * shown, no snooze handler is attached, or the handler refused.
   */
  snoozeActive(minutes: number): boolean {
    const event = this.shownEvent;
    if (!event) {
      logger.warn({ minutes }, 'Snooze requested with no alert visible');
      return false;
    }

    if (!this.snoozeHandler) {
      logger.warn({ eventId: event.id }, 'Snooze requested but no snooze handler is attached');
      return false;
    }

    return this.snoozeHandler.snooze(event, minutes).success;
  }

  /**
   * Dismiss the alert on screen without rescheduling it
   */
  dismiss(): void {
    this.hideAlert();
  }

  isVisible(): boolean {
    return this.shownEvent !== null;
  }

  activeEvent(): CalendarEvent | null {
    return this.shownEvent;
  }

  currentEventId(): string | null {
    return this.shownEvent?.id ?? null;
  }

  isShowingSnoozedAlert(): boolean {
    return this.shownFromSnooze;
  }

  private focusAllowsAlert(): boolean {
    if (!this.focus) return true;

    let dndActive = false;
    try {
      dndActive = this.focus.isDoNotDisturbActive();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Focus status unavailable, assuming not active');
    }

    return !dndActive || this.preferences.current().overrideFocusMode;
  }
}

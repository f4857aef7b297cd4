/**
 * Alert Engine
 *
 * Top-level assembly. Owns the preferences store, scheduler, snooze
 * controller and presentation gateway, and wires them together explicitly:
 * the scheduler holds the gateway it was started with, the presenter holds a
 * non-owning reference back to the snooze controller, and preference changes
 * reach the scheduler through a subscription made here.
 */

import type { CalendarEvent, EventSource, TimeRange } from './calendar/types.js';
import { filterSchedulableEvents } from './calendar/filters.js';
import type { AlertSnapshot } from './alerts/types.js';
import { ConfigLoader, type EngineConfig, type EngineConfigInput } from './config/schema.js';
import {
  PreferencesStore,
  type PreferencesListener,
} from './preferences/preferences-store.js';
import { TIMING_PREFERENCE_KEYS, type AlertPreferencesInput } from './preferences/schema.js';
import type { PresentationGateway } from './presentation/types.js';
import { OverlayPresenter, type OverlayPresenterDeps } from './presentation/overlay-presenter.js';
import { AlertScheduler } from './scheduler/alert-scheduler.js';
import type { SchedulerStats } from './scheduler/types.js';
import { SnoozeController, type SnoozeResult } from './snooze/snooze-controller.js';
import { moduleLogger, configureLogging, errorMessage } from './observability/logger.js';

const logger = moduleLogger('AlertEngine');

const HOUR_MS = 3_600_000;

export interface AlertEngineOptions {
  /** Custom presentation gateway. Takes precedence over `overlay`. */
  gateway?: PresentationGateway;
  /** Host ports for the built-in overlay presenter */
  overlay?: Omit<OverlayPresenterDeps, 'preferences'>;
  /** Existing store, or initial values for a new one */
  preferences?: PreferencesStore | AlertPreferencesInput;
  /** Queried by sync() */
  eventSource?: EventSource;
  /** Scheduler, calendar and logging settings; `logging` reconfigures the shared logger */
  config?: EngineConfigInput;
  /** Clock (default: Date.now) */
  now?: () => number;
}

export class AlertEngine {
  readonly preferences: PreferencesStore;
  readonly scheduler: AlertScheduler;
  readonly snoozeController: SnoozeController;
  readonly gateway: PresentationGateway;
  readonly presenter: OverlayPresenter | null;
  private readonly config: EngineConfig;
  private readonly eventSource?: EventSource;
  private readonly now: () => number;
  private unsubscribePreferences: (() => void) | null;
  private syncedEvents: CalendarEvent[] = [];
  private active = false;

  constructor(options: AlertEngineOptions) {
    this.config = ConfigLoader.parse(options.config ?? {});
    // Only an explicit logging section replaces the shared logger
    if (options.config?.logging !== undefined) {
      configureLogging(this.config.logging);
    }
    this.now = options.now ?? (() => Date.now());
    this.eventSource = options.eventSource;

    this.preferences =
      options.preferences instanceof PreferencesStore
        ? options.preferences
        : new PreferencesStore(options.preferences ?? {});

    if (options.gateway) {
      this.gateway = options.gateway;
      this.presenter = null;
    } else if (options.overlay) {
      this.presenter = new OverlayPresenter({ ...options.overlay, preferences: this.preferences });
      this.gateway = this.presenter;
    } else {
      throw new Error('AlertEngine needs either a gateway or overlay ports');
    }

    this.scheduler = new AlertScheduler(this.preferences, {
      ...this.config.scheduler,
      now: this.now,
    });

    this.snoozeController = new SnoozeController({
      scheduler: this.scheduler,
      gateway: this.gateway,
      preferences: this.preferences,
    });

    this.presenter?.attachSnoozeHandler(this.snoozeController);
    this.unsubscribePreferences = this.preferences.onChange(this.handlePreferencesChange);

    logger.info({ config: this.config.scheduler, hasEventSource: !!this.eventSource }, 'Alert engine created');
  }

  /**
   * Pull the upcoming window from the event source and reschedule.
   * Returns the number of events scheduled, or null when the source failed
   * (the existing schedule is left running).
   */
  async sync(range?: TimeRange): Promise<number | null> {
    if (!this.eventSource) {
      logger.warn('sync() called without an event source');
      return null;
    }

    const now = this.now();
    const window = range ?? { from: now, to: now + this.config.calendar.lookAheadHours * HOUR_MS };

    let events: CalendarEvent[];
    try {
      events = await this.eventSource.listEvents(window);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Event source query failed, keeping current schedule');
      return null;
    }

    return this.start(events);
  }

  /**
   * Schedule alerts for a freshly synced event list. Returns the number of
   * events kept after filtering.
   */
  start(events: readonly CalendarEvent[]): number {
    this.syncedEvents = [...events];
    this.active = true;

    const schedulable = filterSchedulableEvents(events, {
      includeAllDayEvents: this.preferences.current().includeAllDayEvents,
    });

    logger.info({ received: events.length, schedulable: schedulable.length }, 'Scheduling synced events');
    this.scheduler.start(schedulable, this.gateway);

    return schedulable.length;
  }

  snooze(event: CalendarEvent, minutes: number): SnoozeResult {
    return this.snoozeController.snooze(event, minutes);
  }

  stop(): void {
    this.active = false;
    this.syncedEvents = [];
    this.scheduler.stop();
    this.gateway.hideAlert();
  }

  snapshot(): AlertSnapshot[] {
    return this.scheduler.snapshot();
  }

  getStats(): SchedulerStats {
    return this.scheduler.getStats();
  }

  /**
   * Stop scheduling and drop every reference the engine wired up
   */
  dispose(): void {
    this.stop();
    this.unsubscribePreferences?.();
    this.unsubscribePreferences = null;
    this.presenter?.attachSnoozeHandler(null);
    this.scheduler.removeAllListeners();
    logger.info('Alert engine disposed');
  }

  private readonly handlePreferencesChange: PreferencesListener = (_preferences, changedKeys) => {
    if (!this.active) return;

    if (changedKeys.includes('includeAllDayEvents')) {
      // The filtered event set itself changes, so reschedule from the synced list
      this.start(this.syncedEvents);
      return;
    }

    if (changedKeys.some(key => TIMING_PREFERENCE_KEYS.includes(key))) {
      this.scheduler.preferencesChanged();
    }
  };
}

export function createAlertEngine(options: AlertEngineOptions): AlertEngine {
  return new AlertEngine(options);
}

import { EventEmitter } from 'events';
import type { CalendarEvent } from '../calendar/types.js';
import { primaryMeetingLink } from '../calendar/links.js';
import type { Alert, AlertSnapshot } from '../alerts/types.js';
import { AlertQueue } from '../alerts/queue.js';
import { computeFireTimes, isMissedWindow } from '../alerts/timing-policy.js';
import { snoozeAlert, isSnooze, describeAlertKind, toSnapshot } from '../alerts/alert.js';
import type { PresentationGateway } from '../presentation/types.js';
import type { PreferencesProvider } from '../preferences/preferences-store.js';
import { moduleLogger, errorMessage } from '../observability/logger.js';
import {
  AlertSchedulerConfig,
  DispatchAction,
  DispatchRecord,
  SchedulerState,
  SchedulerStats,
  SchedulerEvents,
} from './types.js';
import { sleep } from './sleep.js';

const logger = moduleLogger('AlertScheduler');

const MINUTE_MS = 60_000;

// ============================================================================
// Alert Scheduler
// ============================================================================

/**
 * Owns the live alert queue for the current event set and a single wait loop
 * that sleeps until the next trigger time.
 *
 * All queue mutation happens synchronously in start/stop/recompute/
 * scheduleSnooze and in the loop's dispatch step, so callers never need to
 * lock. Any change that could move the next deadline earlier restarts the
 * loop.
 */
export class AlertScheduler extends EventEmitter {
  private readonly queue = new AlertQueue();
  private readonly config: Required<Omit<AlertSchedulerConfig, 'now'>>;
  private readonly now: () => number;
  private events: CalendarEvent[] = [];
  private gateway: PresentationGateway | null = null;
  private loopController: AbortController | null = null;
  private state: SchedulerState = 'idle';
  private dispatchedCount = 0;
  private loopErrors = 0;

  constructor(
    private readonly preferences: PreferencesProvider,
    config: AlertSchedulerConfig = {}
  ) {
    super();
    this.config = {
      idleSleepMs: config.idleSleepMs ?? 3_600_000,
      errorBackoffMs: config.errorBackoffMs ?? 5_000,
      wakeToleranceMs: config.wakeToleranceMs ?? 100,
    };
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * (Re)initialize scheduling for a full event set. Safe to call repeatedly;
   * pending snoozes that are still in the future survive.
   */
  start(events: readonly CalendarEvent[], gateway: PresentationGateway): void {
    const byId = new Map<string, CalendarEvent>();
    for (const event of events) {
      byId.set(event.id, event);
    }

    this.events = Array.from(byId.values());
    this.gateway = gateway;

    logger.info(
      {
        eventCount: this.events.length,
        firstEvents: this.events.slice(0, 3).map(e => ({ id: e.id, title: e.title, startAt: e.startAt })),
      },
      'Starting alert scheduling'
    );

    this.rebuild();
  }

  /**
   * Rebuild the queue from the last event set and current preferences.
   * Does nothing unless scheduling is active.
   */
  recompute(): void {
    if (this.state !== 'scheduled' || !this.gateway) {
      logger.debug({ state: this.state }, 'No active schedule to recompute');
      return;
    }

    logger.info({ eventCount: this.events.length }, 'Recomputing alerts');
    this.rebuild();
  }

  /**
   * Called by the owner of preferences after a timing preference changed
   */
  preferencesChanged(): void {
    logger.info('Alert preferences changed, rescheduling alerts');
    this.recompute();
  }

  /**
   * Halt all scheduling. Idempotent.
   */
  stop(): void {
    const wasScheduled = this.state === 'scheduled';
    this.stopTimers();
    this.events = [];
    this.gateway = null;
    this.state = 'stopped';

    if (wasScheduled) {
      this.emitQueueChanged();
      logger.info('Alert scheduling stopped');
    }
  }

  /**
   * Queue a snooze alert `minutes` from now. Any reminder or earlier snooze
   * still pending for the event is superseded; a meeting-start alert is kept.
   * The snooze is not limited by the meeting's start or end.
   *
   * Returns null, leaving the queue untouched, for invalid requests and
   * while scheduling is not active.
   */
  scheduleSnooze(event: CalendarEvent, minutes: number): Alert | null {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      logger.warn({ minutes }, 'Rejected snooze with non-positive minutes');
      return null;
    }
    if (!event || typeof event.id !== 'string' || event.id.trim() === '') {
      logger.warn('Rejected snooze for event without id');
      return null;
    }
    if (this.state !== 'scheduled') {
      logger.warn({ eventId: event.id, state: this.state }, 'Rejected snooze while scheduling is inactive');
      return null;
    }

    const now = this.now();
    const until = now + minutes * MINUTE_MS;

    const superseded = this.queue.removeWhere(
      a => a.event.id === event.id && a.kind.type !== 'meeting-start'
    );
    const alert = snoozeAlert(event, until, now);
    this.queue.insert(alert);

    logger.info(
      {
        eventId: event.id,
        minutes,
        triggerAt: new Date(until).toISOString(),
        meetingStarted: event.startAt < now,
        superseded: superseded.length,
      },
      'Snooze scheduled'
    );

    this.emitQueueChanged();

    if (this.queue.peek()?.id === alert.id || superseded.length > 0) {
      this.refreshLoop();
    }

    return alert;
  }

  /**
   * Read-only copy of the queue, earliest first
   */
  snapshot(): AlertSnapshot[] {
    return this.queue.toArray().map(toSnapshot);
  }

  getState(): SchedulerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.loopController !== null && !this.loopController.signal.aborted;
  }

  getStats(): SchedulerStats {
    return {
      state: this.state,
      eventCount: this.events.length,
      queuedAlerts: this.queue.size,
      nextTriggerAt: this.queue.peek()?.triggerAt ?? null,
      dispatchedCount: this.dispatchedCount,
      loopErrors: this.loopErrors,
    };
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private stopTimers(): void {
    if (this.loopController) {
      this.loopController.abort();
      this.loopController = null;
    }
    this.queue.clear();
  }

  private rebuild(): void {
    const now = this.now();

    const preserved = this.queue.filter(a => isSnooze(a) && a.triggerAt > now);
    const snoozedEventIds = new Set(preserved.map(a => a.event.id));

    this.stopTimers();

    const prefs = this.preferences.current();
    let immediate = 0;

    for (const event of this.events) {
      try {
        let alerts = computeFireTimes(event, prefs, now);
        if (snoozedEventIds.has(event.id)) {
          // The pending snooze stands in for the reminders; auto-join still applies
          alerts = alerts.filter(alert => alert.kind.type === 'meeting-start');
        }
        for (const alert of alerts) {
          if (isMissedWindow(alert, now)) {
            immediate++;
            logger.info({ eventId: event.id, title: event.title }, 'Missed alert time, firing immediately');
          }
        }
        this.queue.insertAll(alerts);
      } catch (error) {
        logger.error({ eventId: event.id, error: errorMessage(error) }, 'Failed to compute alerts for event');
      }
    }

    this.queue.insertAll(preserved);
    this.state = 'scheduled';

    logger.info(
      { scheduled: this.queue.size, preservedSnoozes: preserved.length, immediate },
      'Alerts scheduled'
    );

    this.emitQueueChanged();
    this.refreshLoop();
  }

  /**
   * Cancel any in-flight wait and start a fresh loop
   */
  private refreshLoop(): void {
    if (this.loopController) {
      this.loopController.abort();
    }

    const controller = new AbortController();
    this.loopController = controller;

    this.runLoop(controller.signal).catch(err => {
      logger.error({ error: errorMessage(err) }, 'Alert loop terminated unexpectedly');
    });
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    // Let the caller finish its synchronous work before anything fires
    await Promise.resolve();

    while (!signal.aborted) {
      try {
        const next = this.queue.peek();

        if (!next) {
          logger.debug({ sleepMs: this.config.idleSleepMs }, 'No alerts scheduled, waiting for updates');
          await sleep(this.config.idleSleepMs, signal);
          continue;
        }

        const delta = next.triggerAt - this.now();
        if (delta > this.config.wakeToleranceMs) {
          logger.debug(
            { sleepMs: delta, eventId: next.event.id, kind: describeAlertKind(next.kind) },
            'Sleeping until next alert'
          );
          const elapsed = await sleep(delta, signal);
          if (!elapsed) break;
        }

        if (signal.aborted) break;

        if (this.dispatchDue() === 0) {
          // Woke inside the tolerance window; wait out the rest of the deadline
          const head = this.queue.peek();
          if (head) {
            const resumed = await sleep(Math.max(head.triggerAt - this.now(), 1), signal);
            if (!resumed) break;
          }
        }
      } catch (error) {
        if (signal.aborted) break;

        this.loopErrors++;
        const message = errorMessage(error);
        logger.error({ error: message, backoffMs: this.config.errorBackoffMs }, 'Error in alert loop');
        this.emit(SchedulerEvents.LOOP_ERROR, { error: message, at: this.now() });

        const resumed = await sleep(this.config.errorBackoffMs, signal);
        if (!resumed) break;
      }
    }

    logger.debug('Alert loop cancelled');
  }

  /**
   * Fire every due alert, earliest first, and return how many fired. After a
   * suspend several may be overdue at once; they go out back to back.
   */
  private dispatchDue(): number {
    const now = this.now();
    const due = this.queue.takeDue(now);
    if (due.length === 0) {
      return 0;
    }

    logger.info(
      { count: due.length, alerts: due.map(a => ({ eventId: a.event.id, kind: describeAlertKind(a.kind) })) },
      'Triggered alerts'
    );

    let index = 0;
    try {
      for (; index < due.length; index++) {
        this.dispatch(due[index], now);
      }
    } finally {
      // Alerts after a failed dispatch go back in the queue for the next pass
      if (index < due.length - 1) {
        this.queue.insertAll(due.slice(index + 1));
      }
      this.emitQueueChanged();
    }

    logger.info({ processed: due.length, remaining: this.queue.size }, 'Processed triggered alerts');
    return due.length;
  }

  private dispatch(alert: Alert, now: number): void {
    const gateway = this.gateway;
    let action: DispatchAction = 'skipped';
    let failure: string | undefined;

    if (!gateway) {
      logger.warn({ alertId: alert.id }, 'No presentation gateway, alert skipped');
    } else {
      try {
        action = this.present(alert, gateway);
      } catch (error) {
        failure = errorMessage(error);
        logger.error(
          { eventId: alert.event.id, kind: describeAlertKind(alert.kind), error: failure },
          'Presentation failed'
        );
      }
    }

    this.dispatchedCount++;

    const record: DispatchRecord = {
      alert: toSnapshot(alert),
      action,
      dispatchedAt: now,
      ...(failure !== undefined ? { error: failure } : {}),
    };
    this.emit(SchedulerEvents.ALERT_DISPATCHED, record);
  }

  private present(alert: Alert, gateway: PresentationGateway): DispatchAction {
    const { event, kind } = alert;

    switch (kind.type) {
      case 'reminder':
        logger.info({ eventId: event.id, kind: describeAlertKind(kind) }, 'Showing reminder');
        gateway.showAlert(event, false);
        return 'show';

      case 'snooze':
        logger.info({ eventId: event.id }, 'Re-showing snoozed alert');
        gateway.showAlert(event, true);
        return 'show';

      case 'meeting-start': {
        const link = primaryMeetingLink(event);
        if (this.preferences.current().autoJoinEnabled && link && gateway.openMeetingLink) {
          logger.info({ eventId: event.id }, 'Auto-joining meeting');
          gateway.openMeetingLink(link, event);
          return 'open-link';
        }
        gateway.showAlert(event, false);
        return 'show';
      }
    }
  }

  private emitQueueChanged(): void {
    try {
      this.emit(SchedulerEvents.QUEUE_CHANGED, this.snapshot());
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Queue listener failed');
    }
  }
}

import type { AlertSnapshot } from '../alerts/types.js';

// ============================================================================
// Scheduler Types
// ============================================================================

/**
 * idle: nothing started yet. scheduled: wait loop running.
 * stopped: explicitly stopped, queue and events cleared.
 */
export type SchedulerState = 'idle' | 'scheduled' | 'stopped';

/**
 * Alert scheduler configuration
 */
export interface AlertSchedulerConfig {
  /** Sleep while the queue is empty (default: 3600000 = 1h) */
  idleSleepMs?: number;
  /** Pause after an unexpected loop error (default: 5000) */
  errorBackoffMs?: number;
  /** Deadlines closer than this skip the long sleep; alerts still fire only once due (default: 100) */
  wakeToleranceMs?: number;
  /** Clock (default: Date.now) */
  now?: () => number;
}

/**
 * What the scheduler did with a fired alert
 */
export type DispatchAction = 'show' | 'open-link' | 'skipped';

export interface DispatchRecord {
  alert: AlertSnapshot;
  action: DispatchAction;
  dispatchedAt: number;
  /** Present when the gateway threw */
  error?: string;
}

export interface SchedulerStats {
  state: SchedulerState;
  eventCount: number;
  queuedAlerts: number;
  nextTriggerAt: number | null;
  dispatchedCount: number;
  loopErrors: number;
}

/**
 * Names of the events AlertScheduler emits
 */
export const SchedulerEvents = {
  /** (record: DispatchRecord) */
  ALERT_DISPATCHED: 'alert:dispatched',
  /** (snapshot: AlertSnapshot[]) */
  QUEUE_CHANGED: 'queue:changed',
  /** ({ error: string, at: number }) */
  LOOP_ERROR: 'loop:error',
} as const;

import type { CalendarEvent } from '../calendar/types.js';

// ============================================================================
// Presentation Gateway Contract
// ============================================================================

/**
 * The only way the scheduler makes an alert visible or audible.
 *
 * Calls are synchronous and must return promptly: slow work such as building
 * windows belongs inside the implementation. Implementations catch their own
 * failures.
 */
export interface PresentationGateway {
  /**
   * Show the alert for an event. A no-op when that event is already shown;
   * replaces an alert for any other event.
   */
  showAlert(event: CalendarEvent, isFromSnooze: boolean): void;
  /** Hide whatever is shown. Safe when nothing is. */
  hideAlert(): void;
  /** Open a meeting link for auto-join */
  openMeetingLink?(url: string, event: CalendarEvent): void;
  /** Id of the event currently shown, or null */
  currentEventId?(): string | null;
}

/**
 * Receives snooze requests made from the alert UI
 */
export interface SnoozeHandler {
  snooze(event: CalendarEvent, minutes: number): { success: boolean };
}

// ============================================================================
// Host Ports (used by OverlayPresenter)
// ============================================================================

export interface OverlayOptions {
  isFromSnooze: boolean;
  snoozeOptions: readonly number[];
  allowSnooze: boolean;
}

/**
 * Full-screen surface supplied by the host application
 */
export interface OverlaySurface {
  open(event: CalendarEvent, options: OverlayOptions): void;
  close(): void;
}

export interface SoundPlayer {
  playAlert(): void;
  stop(): void;
}

export interface FocusStatus {
  /** True while the OS is in Do Not Disturb / Focus mode */
  isDoNotDisturbActive(): boolean;
}

export interface LinkOpener {
  open(url: string): void;
}

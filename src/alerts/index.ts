export type { Alert, AlertKind, AlertKindType, AlertSnapshot, ReminderChannel } from './types.js';

export {
  createAlert,
  reminderAlert,
  snoozeAlert,
  meetingStartAlert,
  isDue,
  remaining,
  isSnooze,
  describeAlertKind,
  toSnapshot,
} from './alert.js';

export { AlertQueue } from './queue.js';

export {
  computeFireTimes,
  alertMinutesFor,
  durationTier,
  isMissedWindow,
  type TimingPreferences,
  type DurationTier,
} from './timing-policy.js';

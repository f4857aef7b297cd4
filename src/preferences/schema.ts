import { z } from 'zod';

export const MIN_ALERT_MINUTES = 0;
export const MAX_ALERT_MINUTES = 60;

// Out-of-range minute values are clamped rather than rejected
const alertMinutes = (fallback: number) =>
  z
    .number()
    .finite()
    .transform(value => Math.max(MIN_ALERT_MINUTES, Math.min(MAX_ALERT_MINUTES, Math.round(value))))
    .default(fallback);

export const AlertPreferencesSchema = z.object({
  // Timing
  defaultAlertMinutes: alertMinutes(5),
  useLengthBasedTiming: z.boolean().default(false),
  shortMeetingAlertMinutes: alertMinutes(1),
  mediumMeetingAlertMinutes: alertMinutes(2),
  longMeetingAlertMinutes: alertMinutes(5),

  // Sound alert, timed independently of the overlay
  soundEnabled: z.boolean().default(false),
  soundAlertMinutes: alertMinutes(1),

  // Behaviour
  autoJoinEnabled: z.boolean().default(false),
  includeAllDayEvents: z.boolean().default(false),
  overrideFocusMode: z.boolean().default(true),
  playAlertSound: z.boolean().default(true),
  allowSnooze: z.boolean().default(true),
  snoozeOptions: z
    .array(z.number().int().min(1).max(240))
    .min(1)
    .transform(options => [...new Set(options)].sort((a, b) => a - b))
    .default([1, 5, 10]),
});

export type AlertPreferences = z.infer<typeof AlertPreferencesSchema>;
export type AlertPreferencesInput = z.input<typeof AlertPreferencesSchema>;
export type PreferenceKey = keyof AlertPreferences;

/**
 * Keys whose change requires rebuilding the alert queue
 */
export const TIMING_PREFERENCE_KEYS: readonly PreferenceKey[] = [
  'defaultAlertMinutes',
  'useLengthBasedTiming',
  'shortMeetingAlertMinutes',
  'mediumMeetingAlertMinutes',
  'longMeetingAlertMinutes',
  'soundEnabled',
  'soundAlertMinutes',
  'autoJoinEnabled',
];

export const DEFAULT_PREFERENCES: AlertPreferences = AlertPreferencesSchema.parse({});

export {
  AlertPreferencesSchema,
  DEFAULT_PREFERENCES,
  TIMING_PREFERENCE_KEYS,
  MIN_ALERT_MINUTES,
  MAX_ALERT_MINUTES,
  type AlertPreferences,
  type AlertPreferencesInput,
  type PreferenceKey,
} from './schema.js';

export {
  PreferencesStore,
  PreferencesValidationError,
  type PreferencesListener,
  type PreferencesProvider,
} from './preferences-store.js';

import {
  AlertPreferencesSchema,
  type AlertPreferences,
  type AlertPreferencesInput,
  type PreferenceKey,
} from './schema.js';
import { moduleLogger, errorMessage } from '../observability/logger.js';

const logger = moduleLogger('PreferencesStore');

const PREFERENCE_KEYS: readonly PreferenceKey[] = AlertPreferencesSchema.keyof().options;

export type PreferencesListener = (
  preferences: Readonly<AlertPreferences>,
  changedKeys: readonly PreferenceKey[]
) => void;

/**
 * Read side of the preferences store, all the scheduler needs
 */
export interface PreferencesProvider {
  current(): Readonly<AlertPreferences>;
}

export class PreferencesValidationError extends Error {
  readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: Array<{ path: string; message: string }>) {
    super(`Invalid preferences: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    this.name = 'PreferencesValidationError';
    this.errors = errors;
  }
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, i) => value === b[i]);
  }
  return a === b;
}

/**
 * Owns the user's alert preferences. Every write is validated and clamped
 * before listeners see it; listeners are told which keys changed.
 */
export class PreferencesStore implements PreferencesProvider {
  private preferences: Readonly<AlertPreferences>;
  private readonly listeners = new Set<PreferencesListener>();

  constructor(initial: AlertPreferencesInput = {}) {
    this.preferences = Object.freeze(this.parse(initial));
  }

  current(): Readonly<AlertPreferences> {
    return this.preferences;
  }

  /**
   * Apply a partial update. Returns the keys whose value actually changed.
   */
  update(patch: AlertPreferencesInput): PreferenceKey[] {
    const next = this.parse({ ...this.preferences, ...patch });
    const changed = PREFERENCE_KEYS.filter(key => !sameValue(next[key], this.preferences[key]));

    if (changed.length === 0) {
      return [];
    }

    this.preferences = Object.freeze(next);
    logger.info({ changed }, 'Alert preferences changed');
    this.notify(changed);

    return changed;
  }

  /**
   * Restore every preference to its default
   */
  reset(): PreferenceKey[] {
    const defaults = this.parse({});
    return this.update(defaults);
  }

  /**
   * Subscribe to changes. Returns an unsubscribe function.
   */
  onChange(listener: PreferencesListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(changed: PreferenceKey[]): void {
    for (const listener of this.listeners) {
      try {
        listener(this.preferences, changed);
      } catch (error) {
        logger.error({ error: errorMessage(error), changed }, 'Preferences listener failed');
      }
    }
  }

  private parse(input: AlertPreferencesInput): AlertPreferences {
    const result = AlertPreferencesSchema.safeParse(input);
    if (!result.success) {
      throw new PreferencesValidationError(
        result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }
    return result.data;
  }
}

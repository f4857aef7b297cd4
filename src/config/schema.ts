import { z } from 'zod';

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Largest delay a Node timer accepts without overflowing to 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Wait loop tuning
const SchedulerConfigSchema = z.object({
  // Sleep used while the queue is empty; any queue change cancels it early
  idleSleepMs: z.number().int().min(1000).max(MAX_TIMER_DELAY_MS).default(3_600_000),
  // Pause after an unexpected loop error before the next iteration
  errorBackoffMs: z.number().int().min(0).max(60_000).default(5_000),
  // Deadlines closer than this skip the long sleep and are re-checked shortly after
  wakeToleranceMs: z.number().int().min(0).max(1_000).default(100),
});

const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  prettyPrint: z.boolean().default(false),
  redactPaths: z.array(z.string()).default([]),
});

const CalendarConfigSchema = z.object({
  // How far ahead sync() asks the event source for meetings
  lookAheadHours: z.number().int().min(1).max(24 * 14).default(24),
});

export const EngineConfigSchema = z.object({
  scheduler: SchedulerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  calendar: CalendarConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;

/**
 * Configuration validation error
 * Supports both string[] and {path, message}[] formats
 */
export class ConfigValidationError extends Error {
  public readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: string[] | Array<{ path: string; message: string }>) {
    const normalizedErrors = errors.map(e => (typeof e === 'string' ? { path: '', message: e } : e));

    const message = normalizedErrors
      .map(e => (e.path ? `${e.path}: ${e.message}` : e.message))
      .join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = normalizedErrors;
  }
}

// Configuration loader with validation
export class ConfigLoader {
  private static instance: EngineConfig | null = null;

  /**
   * Validate raw configuration, filling defaults
   */
  static validate(
    raw: unknown
  ): { success: true; data: EngineConfig } | { success: false; errors: Array<{ path: string; message: string }> } {
    const result = EngineConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
      return {
        success: false,
        errors: result.error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      };
    }
    return { success: true, data: result.data };
  }

  /**
   * Validate and cross-check raw configuration without storing it
   */
  static parse(raw: unknown): EngineConfig {
    const result = this.validate(raw);
    if (!result.success) {
      throw new ConfigValidationError(result.errors);
    }

    if (result.data.scheduler.errorBackoffMs >= result.data.scheduler.idleSleepMs) {
      throw new ConfigValidationError([
        { path: 'scheduler.errorBackoffMs', message: 'must be shorter than scheduler.idleSleepMs' },
      ]);
    }

    return result.data;
  }

  static load(raw: unknown): EngineConfig {
    const config = this.parse(raw);
    this.instance = config;
    return config;
  }

  static get(): EngineConfig {
    if (!this.instance) {
      throw new Error('Configuration not loaded. Call ConfigLoader.load() first.');
    }
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

/**
 * Build a raw configuration object from ALERT_* environment variables.
 * Unset variables are left out so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigInput {
  const scheduler: { idleSleepMs?: number; errorBackoffMs?: number } = {};
  const idleSleepMs = parseInteger(env.ALERT_IDLE_SLEEP_MS);
  const errorBackoffMs = parseInteger(env.ALERT_ERROR_BACKOFF_MS);
  if (idleSleepMs !== undefined) scheduler.idleSleepMs = idleSleepMs;
  if (errorBackoffMs !== undefined) scheduler.errorBackoffMs = errorBackoffMs;

  const logging: { level?: z.infer<typeof LogLevelSchema>; prettyPrint?: boolean } = {};
  if (env.ALERT_LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.ALERT_LOG_LEVEL.toLowerCase());
    if (!level.success) {
      throw new ConfigValidationError([
        { path: 'logging.level', message: `unknown level '${env.ALERT_LOG_LEVEL}'` },
      ]);
    }
    logging.level = level.data;
  }
  if (env.ALERT_LOG_PRETTY !== undefined) {
    logging.prettyPrint = env.ALERT_LOG_PRETTY === 'true' || env.ALERT_LOG_PRETTY === '1';
  }

  return { scheduler, logging };
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return ConfigLoader.load(configFromEnv(env));
}

export {
  EngineConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  configFromEnv,
  loadConfigFromEnv,
  MAX_TIMER_DELAY_MS,
  type EngineConfig,
  type EngineConfigInput,
  type SchedulerConfig,
  type LoggingConfig,
  type CalendarConfig,
} from './schema.js';

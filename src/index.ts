// Engine
export { AlertEngine, createAlertEngine, type AlertEngineOptions } from './engine.js';

// Configuration
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
} from './config/index.js';

// Calendar
export * from './calendar/index.js';

// Alerts
export * from './alerts/index.js';

// Preferences
export * from './preferences/index.js';

// Presentation
export * from './presentation/index.js';

// Scheduling
export * from './scheduler/index.js';

// Snooze
export * from './snooze/index.js';

// Observability
export {
  createLogger,
  getLogger,
  initLogger,
  configureLogging,
  moduleLogger,
  redactSensitiveStrings,
  errorMessage,
  type LoggerConfig,
  type LogLevel,
  type ModuleLogger,
} from './observability/index.js';

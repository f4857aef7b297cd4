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
} from './logger.js';

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';
import type { LoggingConfig } from '../config/schema.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const DEFAULT_REDACT_PATHS = [
  'accessToken',
  'refreshToken',
  'token',
  'secret',
  '*.accessToken',
  '*.refreshToken',
  '*.token',
  'event.description',
  'event.attendees',
  '*.event.description',
  '*.event.attendees',
];

// Meeting URLs routinely embed join passcodes in their query string.
const SENSITIVE_PATTERNS = [
  { pattern: /([?&](?:pwd|passcode|password|pin|tk)=)[^&#\s"]+/gi, replacement: '$1[REDACTED]' },
  { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /:\/\/[^:/\s]+:[^@/\s]+@/g, replacement: '://[REDACTED]@' },
];

export interface LoggerConfig {
  level?: LogLevel;
  prettyPrint?: boolean;
  redactPaths?: string[];
  serviceName?: string;
  version?: string;
  /** Explicit destination, mainly for capturing output in tests */
  destination?: DestinationStream;
}

export function redactSensitiveStrings(value: unknown): unknown {
  if (typeof value === 'string') {
    let result = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  if (Array.isArray(value)) {
    return value.map(redactSensitiveStrings);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = redactSensitiveStrings(val);
    }
    return result;
  }

  return value;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = 'info',
    prettyPrint = false,
    redactPaths = [],
    serviceName = 'meeting-alert-engine',
    version = '0.1.0',
    destination,
  } = config;

  const options: LoggerOptions = {
    level,
    name: serviceName,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...redactPaths],
      censor: '[REDACTED]',
    },
    base: {
      service: serviceName,
      version,
      pid: process.pid,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
      log: (obj: Record<string, unknown>) => {
        const redacted = redactSensitiveStrings(obj);
        return redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)
          ? { ...redacted }
          : obj;
      },
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/**
 * Replace the shared logger. Loggers from moduleLogger() follow the
 * replacement; plain child loggers created earlier keep their old parent.
 */
export function initLogger(config: LoggerConfig): Logger {
  loggerInstance = createLogger(config);
  return loggerInstance;
}

/**
 * Apply the logging section of the engine configuration
 */
export function configureLogging(config: LoggingConfig): Logger {
  return initLogger({
    level: config.level,
    prettyPrint: config.prettyPrint,
    redactPaths: config.redactPaths,
  });
}

export interface ModuleLogger {
  readonly trace: Logger['trace'];
  readonly debug: Logger['debug'];
  readonly info: Logger['info'];
  readonly warn: Logger['warn'];
  readonly error: Logger['error'];
}

const moduleChildren = new WeakMap<Logger, Map<string, Logger>>();

function moduleChild(module: string): Logger {
  const root = getLogger();
  let children = moduleChildren.get(root);
  if (!children) {
    children = new Map();
    moduleChildren.set(root, children);
  }
  let child = children.get(module);
  if (!child) {
    child = root.child({ module });
    children.set(module, child);
  }
  return child;
}

/**
 * Module-scoped logger resolved against the current shared logger on every
 * call, so initLogger()/configureLogging() apply to modules already loaded.
 */
export function moduleLogger(module: string): ModuleLogger {
  return {
    get trace() {
      const child = moduleChild(module);
      return child.trace.bind(child);
    },
    get debug() {
      const child = moduleChild(module);
      return child.debug.bind(child);
    },
    get info() {
      const child = moduleChild(module);
      return child.info.bind(child);
    },
    get warn() {
      const child = moduleChild(module);
      return child.warn.bind(child);
    },
    get error() {
      const child = moduleChild(module);
      return child.error.bind(child);
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

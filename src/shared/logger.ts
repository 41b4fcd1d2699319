import pino, { type Logger, type DestinationStream } from 'pino';
import { loadConfig } from '../config/defaults';

const REDACT_PATHS = ['token', 'apiKey', 'password', 'secret'];

/** Throws ConfigError when LOG_LEVEL is not a known level. */
export function createRootLogger(destination?: DestinationStream): Logger {
  const options = {
    level: loadConfig(process.env).log_level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;

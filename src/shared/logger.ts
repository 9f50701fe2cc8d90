import pino, { type Logger, type DestinationStream } from 'pino';

const REDACT_PATHS = ['token', 'apiKey', 'password', 'secret', 'headers.authorization'];

export function createRootLogger(destination?: DestinationStream): Logger {
  const options = {
    level: process.env.LOG_LEVEL || 'info',
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

// stderr, so stdout carries only the CLI's own output (e.g. --json).
const logger = createRootLogger(pino.destination({ dest: 2, sync: true }));

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;

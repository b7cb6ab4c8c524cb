import pino, { type Logger, type DestinationStream } from 'pino';

export function createRootLogger(destination?: DestinationStream, level = 'info'): Logger {
  const options = {
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide fallback logger, built on first use.
 * stderr keeps stdout free for --dry-run documents and --json summaries.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createRootLogger(pino.destination(2));
  }
  return defaultLogger;
}

export function createLogger(context: Record<string, unknown>, parent: Logger = getDefaultLogger()): Logger {
  return parent.child(context);
}

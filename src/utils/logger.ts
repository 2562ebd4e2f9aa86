import { type Logger, pino } from 'pino';

let _logger: Logger | null = null;

function defaultLevel(): string {
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function getLogger(): Logger {
  // Created on first use so LOG_LEVEL set by the CLI (--verbose) is honoured
  if (!_logger) {
    const isDevelopment = process.env.NODE_ENV === undefined || process.env.NODE_ENV === 'development';

    // stdout belongs to command output; pretty printing only when a human is watching stderr
    const transport =
      isDevelopment && process.stderr.isTTY
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined;

    _logger = transport
      ? pino({ level: process.env.LOG_LEVEL ?? defaultLevel(), transport })
      : pino({ level: process.env.LOG_LEVEL ?? defaultLevel() }, process.stderr);
  }
  return _logger;
}

export const logger: Logger = new Proxy({} as Logger, {
  get(_target, prop: keyof Logger) {
    const realLogger = getLogger();
    const value = realLogger[prop];

    return typeof value === 'function' ? value.bind(realLogger) : value;
  },
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}

/**
 * The slice of a logger that the migration engine writes diagnostics to.
 * A pino logger satisfies it; tests can pass plain spies.
 */
export interface DiagnosticSink {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

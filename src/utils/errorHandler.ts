import { DomainError } from '../domain/shared/errors.js';
import { createErrorDetails } from './errorMapping.js';
import { logger } from './logger.js';

export type CommandHandler<TArgs extends unknown[] = unknown[]> = (...args: TArgs) => Promise<void>;

/**
 * Wrap a CLI action so a thrown error is logged, summarised on stderr and
 * turned into a non-zero exit code instead of an unhandled rejection.
 */
export function withErrorHandling<TArgs extends unknown[]>(
  commandName: string,
  handler: CommandHandler<TArgs>,
): CommandHandler<TArgs> {
  return async (...args: TArgs): Promise<void> => {
    const log = logger.child({ command: commandName });

    try {
      log.debug('Command started');
      await handler(...args);
      log.debug('Command finished');
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.error({ err, details: createErrorDetails(err) }, 'Command failed');

      const details = err instanceof DomainError ? ` [${err.code}]` : '';
      console.error(`✗ ${commandName} failed${details}: ${err.message}`);
      process.exitCode = 1;
    }
  };
}

export function safeExecute<T>(fn: () => T | Promise<T>, context?: string): Promise<T> {
  const log = context ? logger.child({ context }) : logger;

  return Promise.resolve()
    .then(() => fn())
    .catch((error: unknown) => {
      log.error({ err: error }, 'Safe execution failed');
      throw error;
    });
}

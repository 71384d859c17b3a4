/**
 * Database Logger Interface
 * Abstraction to avoid circular dependencies with @vibingway/logger
 */
export interface DatabaseLogger {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

/**
 * No-op logger implementation for when no logger is provided
 */
export class NoOpLogger implements DatabaseLogger {
  info(): void {
    // No operation
  }

  warn(): void {
    // No operation
  }

  error(): void {
    // No operation
  }
}

let globalLogger: DatabaseLogger = new NoOpLogger();

/**
 * Inject a logger implementation
 */
export function injectLogger(logger: DatabaseLogger): void {
  globalLogger = logger;
}

export function getLogger(): DatabaseLogger {
  return globalLogger;
}

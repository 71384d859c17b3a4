import { humanJoin } from './utils/string.js';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public isOperational: boolean = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A command could not be carried out. The message is shown to the user.
 */
export class Failure extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'FAILURE', true, options);
    this.name = 'Failure';
  }
}

/**
 * A command did nothing harmful but the user should know why. The message is
 * shown to the user.
 */
export class Warning extends AppError {
  constructor(message: string) {
    super(message, 'WARNING');
    this.name = 'Warning';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    if (field) {
      this.message = `${field}: ${message}`;
    }
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

export class TimeoutError extends AppError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class AudioError extends AppError {
  constructor(message: string, public guildId?: string, options?: { cause?: unknown }) {
    super(message, 'AUDIO_ERROR', true, options);
    this.name = 'AudioError';
  }
}

/**
 * `ManageGuild` and `manage_guild` both read as `manage server`.
 */
export function formatPermissionName(permission: string): string {
  return permission
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace('guild', 'server');
}

export class BotMissingPermissionsError extends AppError {
  constructor(public readonly missingPermissions: readonly string[]) {
    const names = humanJoin(missingPermissions.map(formatPermissionName), { code: true });
    super(`I require the ${names} permission(s) to do that.`, 'BOT_MISSING_PERMISSIONS');
    this.name = 'BotMissingPermissionsError';
  }
}

// Banner images

export class BannerError extends Failure {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BannerError';
  }
}

export class CannotDownloadImageError extends BannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CannotDownloadImageError';
  }
}

export class ImageDoesNotExistError extends BannerError {
  constructor(message: string = 'The image has been deleted.') {
    super(message);
    this.name = 'ImageDoesNotExistError';
  }
}

export class BadImageError extends BannerError {
  constructor(message: string) {
    super(message);
    this.name = 'BadImageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Retry mechanism for failed operations. User-facing and state errors are
 * never retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  delay: number = 1000,
): Promise<T> {
  let lastError: Error = new Error('No attempts made');

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError instanceof Failure ||
          lastError instanceof Warning ||
          lastError instanceof InvalidStateError ||
          lastError instanceof ValidationError) {
        throw lastError;
      }

      if (attempt < maxRetries) {
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError;
}

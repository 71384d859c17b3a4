import { createLogger } from '@vibingway/logger';
import { notice, type Notice } from '../application/ports/notifier.js';
import { BotMissingPermissionsError, Failure, Warning, errorMessage } from '../errors.js';
import type { CommandErrorContext, ErrorReporter } from '../application/ports/error-reporter.js';
import { buildEmbed } from './ui/embeds.js';
import { respond, type Respondable } from './ui/respond.js';

const log = createLogger('debug');

export const UNHANDLED_ERROR_MESSAGE =
  'An unhandled error has occured while running this command and has been reported to the developer.';

export type CommandOutcome = 'success' | 'failure' | 'warning' | 'error';

export interface HandledError {
  notice: Notice;
  outcome: CommandOutcome;
}

/**
 * Map an error to what the user sees. Anything that is not a user-facing
 * error is `error`.
 */
export function classifyError(error: unknown): HandledError {
  if (error instanceof BotMissingPermissionsError || error instanceof Failure) {
    return { notice: notice.failure(error.message), outcome: 'failure' };
  }
  if (error instanceof Warning) {
    return { notice: notice.warning(error.message), outcome: 'warning' };
  }
  return { notice: notice.failure(UNHANDLED_ERROR_MESSAGE), outcome: 'error' };
}

/**
 * The one place command errors end up. Unexpected errors are logged and
 * reported through the logging webhook when one is configured.
 */
export class CommandErrorHandler {
  constructor(private readonly reporter?: ErrorReporter) {}

  async handle(interaction: Respondable, context: CommandErrorContext, error: unknown): Promise<CommandOutcome> {
    const handled = classifyError(error);

    if (handled.outcome === 'error') {
      log.error({ command: context.command, error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
        'An error occured in command');
      if (this.reporter) {
        void this.reporter.report(error, context).catch((reportError: unknown) =>
          log.error({ error: errorMessage(reportError) }, 'Error report failed'));
      }
    }

    try {
      await respond(interaction, { embeds: [buildEmbed(handled.notice)] });
    } catch (replyError) {
      log.error({ command: context.command, error: errorMessage(replyError) }, 'Failed to answer interaction with error');
    }
    return handled.outcome;
  }
}

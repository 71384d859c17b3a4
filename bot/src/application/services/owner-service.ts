import type { SqliteDatabase } from '@vibingway/database';
import { createLogger } from '@vibingway/logger';
import { Failure, errorMessage } from '../../errors.js';
import { createTableRepresentation, truncate } from '../../utils/string.js';
import type { CommandRegistrar } from '../ports/command-registrar.js';
import { notice, type Notice } from '../ports/notifier.js';
import type { Prompter } from '../ports/prompter.js';

const log = createLogger('owner');

export const ExitCodes = {
  SHUTDOWN: 0,
  RESTART: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export type SyncScope = 'all' | 'global' | 'admin';

/** Longest table that still fits an embed description inside a code block. */
const MAX_TABLE_LENGTH = 4000;

export interface OwnerServiceOptions {
  db: SqliteDatabase;
  registrar: CommandRegistrar;
  adminUserIds: readonly string[];
  adminGuildIds: readonly string[];
}

/**
 * `notice` is the answer to the confirmation. `exitCode` is only set when the
 * process should now exit.
 */
export interface LifecycleResult {
  notice?: Notice;
  exitCode?: ExitCode;
}

export class OwnerService {
  constructor(private readonly options: OwnerServiceOptions) {}

  isAdmin(userId: string): boolean {
    return this.options.adminUserIds.includes(userId);
  }

  checkAdmin(userId: string): void {
    if (!this.isAdmin(userId)) {
      throw new Failure('You are not allowed to use this command.');
    }
  }

  restart(prompter: Prompter): Promise<LifecycleResult> {
    return this.confirmExit(prompter, {
      question: 'Are you sure you want to restart the bot?',
      cancelled: 'Restart cancelled.',
      confirmed: 'Restarting. See you soon!',
      exitCode: ExitCodes.RESTART,
    });
  }

  shutdown(prompter: Prompter): Promise<LifecycleResult> {
    return this.confirmExit(prompter, {
      question: 'Are you sure you want to shut down the bot?',
      cancelled: 'Shutdown cancelled.',
      confirmed: 'Shutting down. See you soon!',
      exitCode: ExitCodes.SHUTDOWN,
    });
  }

  /**
   * Run a statement against the settings store. Queries render their rows as
   * a text table; other statements report the number of changed rows.
   */
  sql(query: string): Notice {
    const text = query.trim();
    if (!text) {
      throw new Failure('Please provide an SQL statement.');
    }

    try {
      const statement = this.options.db.prepare(text);

      if (statement.reader) {
        const rows = statement.all().filter(isRow);
        if (rows.length === 0) {
          return notice.success('The query returned no rows.');
        }
        const table = truncate(createTableRepresentation(rows), MAX_TABLE_LENGTH);
        return notice.success(`\`\`\`\n${table}\n\`\`\``, { footer: `${rows.length} row(s)` });
      }

      const result = statement.run();
      return notice.success(`The statement changed \`${result.changes}\` row(s).`);
    } catch (error) {
      log.warn({ query: text, error: errorMessage(error) }, 'SQL statement failed');
      throw new Failure(`The statement failed: \`${errorMessage(error)}\``, { cause: error });
    }
  }

  async sync(scope: SyncScope): Promise<Notice> {
    const { registrar, adminGuildIds } = this.options;

    try {
      if (scope === 'global' || scope === 'all') {
        const count = await registrar.registerGlobal();
        log.info({ count }, 'Global commands synchronized');
      }
      if (scope === 'admin' || scope === 'all') {
        const count = await registrar.registerAdmin(adminGuildIds);
        log.info({ count, guilds: adminGuildIds.length }, 'Admin commands synchronized');
      }
    } catch (error) {
      log.error({ scope, error: errorMessage(error) }, 'Command synchronization failed');
      throw new Failure('I could not synchronize the commands.', { cause: error });
    }

    switch (scope) {
      case 'all':
        return notice.success(':white_check_mark: All commands synchronized.');
      case 'global':
        return notice.success(':white_check_mark: Global commands synchronized.');
      case 'admin':
        return notice.success(':white_check_mark: Admin commands synchronized.');
    }
  }

  private async confirmExit(
    prompter: Prompter,
    text: { question: string; cancelled: string; confirmed: string; exitCode: ExitCode }
  ): Promise<LifecycleResult> {
    const outcome = await prompter.confirm({ message: text.question });

    if (outcome.status === 'timedOut') {
      return {};
    }
    if (outcome.status === 'cancelled' || !outcome.value) {
      return { notice: notice.success(text.cancelled) };
    }

    log.warn({ exitCode: text.exitCode }, 'Exit requested by owner');
    return { notice: notice.success(text.confirmed), exitCode: text.exitCode };
  }
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

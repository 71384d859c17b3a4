export interface CommandErrorContext {
  command: string;
  userTag: string;
  channelId: string | null;
}

/**
 * Forwards unexpected command errors to the developers.
 */
export interface ErrorReporter {
  report(error: unknown, context: CommandErrorContext): Promise<void>;
}

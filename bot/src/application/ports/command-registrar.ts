/**
 * Publishes slash command definitions to the chat platform.
 */
export interface CommandRegistrar {
  /** Resolves the number of commands registered. */
  registerGlobal(): Promise<number>;
  registerAdmin(guildIds: readonly string[]): Promise<number>;
}

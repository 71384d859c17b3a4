/**
 * What the banner service needs to know about a guild the bot is in.
 */
export interface GuildBannerTarget {
  id: string;
  name: string;
  /** The guild has the BANNER feature (boost level). */
  supportsBanner: boolean;
  /** The bot holds Manage Guild. */
  canManageGuild: boolean;
}

/**
 * Guild Directory Port
 * Looks up guilds and applies banners through the chat platform
 */
export interface GuildDirectory {
  list(): GuildBannerTarget[];
  get(guildId: string): GuildBannerTarget | undefined;
  /**
   * Resolves false when the platform refused for lack of permissions.
   */
  setBanner(guildId: string, image: Buffer, reason?: string): Promise<boolean>;
}

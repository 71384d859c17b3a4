import type { InteractionEditReplyOptions, InteractionReplyOptions } from 'discord.js';

/**
 * The reply surface shared by command and component interactions.
 */
export interface Respondable {
  readonly deferred: boolean;
  readonly replied: boolean;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
}

type ResponsePayload = Pick<InteractionReplyOptions, 'embeds' | 'components'>;

/**
 * Answer once: reply, fill in a deferred reply, or follow up when a reply
 * already exists.
 */
export async function respond(interaction: Respondable, payload: ResponsePayload): Promise<void> {
  if (interaction.deferred && !interaction.replied) {
    await interaction.editReply(payload);
  } else if (interaction.replied) {
    await interaction.followUp(payload);
  } else {
    await interaction.reply(payload);
  }
}

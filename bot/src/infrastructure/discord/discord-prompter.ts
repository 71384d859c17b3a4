import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  DiscordjsError,
  DiscordjsErrorCodes,
  StringSelectMenuBuilder,
  type InteractionEditReplyOptions,
  type InteractionReplyOptions,
  type Message,
  type MessageComponentInteraction,
} from 'discord.js';
import { createLogger } from '@vibingway/logger';
import { notice } from '../../application/ports/notifier.js';
import type { ChooseRequest, ConfirmRequest, PromptOutcome, Prompter } from '../../application/ports/prompter.js';
import { errorMessage } from '../../errors.js';
import { buildEmbed } from '../../presentation/ui/embeds.js';
import { truncate } from '../../utils/string.js';

const log = createLogger('prompter');

export const DEFAULT_PROMPT_TIMEOUT_MS = 60_000;

const CHOOSE_ID = 'prompt:choose';
const CONFIRM_ID = 'prompt:confirm';
const CANCEL_ID = 'prompt:cancel';

/**
 * The parts of a repliable interaction a prompt needs.
 */
export interface PromptTarget {
  readonly user: { id: string };
  readonly deferred: boolean;
  readonly replied: boolean;
  reply(options: InteractionReplyOptions & { fetchReply: true }): Promise<Message>;
  editReply(options: InteractionEditReplyOptions): Promise<Message>;
  followUp(options: InteractionReplyOptions): Promise<Message>;
}

type PromptPayload = Pick<InteractionReplyOptions, 'embeds' | 'components'>;

/**
 * Asks questions through message components attached to the interaction's
 * reply. Only the invoking user can answer.
 */
export class DiscordPrompter implements Prompter {
  constructor(
    private readonly target: PromptTarget,
    private readonly timeoutMs: number = DEFAULT_PROMPT_TIMEOUT_MS
  ) {}

  async choose<T>(request: ChooseRequest<T>): Promise<PromptOutcome<T>> {
    const menu = new StringSelectMenuBuilder()
      .setCustomId(CHOOSE_ID)
      .setPlaceholder(request.placeholder ?? 'Make a selection')
      .addOptions(request.choices.map((choice, index) => ({ label: truncate(choice.label, 100), value: String(index) })));

    const message = await this.send({
      embeds: [buildEmbed(notice.message(request.message, { fields: request.fields }))],
      components: [
        new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu),
        new ActionRowBuilder<ButtonBuilder>().addComponents(cancelButton('Cancel')),
      ],
    });

    const component = await this.awaitComponent(message);
    if (!component) {
      return { status: 'timedOut' };
    }
    await component.update({ components: [] });

    if (component.isStringSelectMenu()) {
      const choice = request.choices[Number(component.values[0])];
      if (choice) {
        return { status: 'selected', value: choice.value };
      }
    }
    return { status: 'cancelled' };
  }

  async confirm(request: ConfirmRequest): Promise<PromptOutcome<boolean>> {
    const message = await this.send({
      embeds: [buildEmbed(notice.message(request.message))],
      components: [
        new ActionRowBuilder<ButtonBuilder>().addComponents(
          new ButtonBuilder()
            .setCustomId(CONFIRM_ID)
            .setLabel(request.confirmLabel ?? 'Confirm')
            .setStyle(ButtonStyle.Success),
          cancelButton(request.cancelLabel ?? 'Cancel')
        ),
      ],
    });

    const component = await this.awaitComponent(message);
    if (!component) {
      return { status: 'timedOut' };
    }
    await component.update({ components: [] });

    return { status: 'selected', value: component.customId === CONFIRM_ID };
  }

  private send(payload: PromptPayload): Promise<Message> {
    if (this.target.deferred && !this.target.replied) {
      return this.target.editReply(payload);
    }
    if (this.target.replied) {
      return this.target.followUp(payload);
    }
    return this.target.reply({ ...payload, fetchReply: true });
  }

  /**
   * Resolves undefined when the deadline passes without an answer.
   */
  private async awaitComponent(message: Message): Promise<MessageComponentInteraction | undefined> {
    const userId = this.target.user.id;

    try {
      return await message.awaitMessageComponent({
        filter: (interaction) => interaction.user.id === userId,
        time: this.timeoutMs,
      });
    } catch (error) {
      if (!(error instanceof DiscordjsError) || error.code !== DiscordjsErrorCodes.InteractionCollectorError) {
        throw error;
      }
      await message.edit({ components: [] }).catch((editError: unknown) =>
        log.debug({ error: errorMessage(editError) }, 'Unable to remove prompt components'));
      return undefined;
    }
  }
}

function cancelButton(label: string): ButtonBuilder {
  return new ButtonBuilder().setCustomId(CANCEL_ID).setLabel(label).setStyle(ButtonStyle.Secondary);
}

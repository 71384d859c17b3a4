import {
  ComponentType,
  GuildMember,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { createLogger } from '@vibingway/logger';
import type { VoiceChannelRef } from '../../application/player/playlist-player.js';
import type { MusicRequest, MusicResult, MusicService } from '../../application/services/music-service.js';
import { isRepeatMode } from '../../domain/value-objects/repeat-mode.js';
import { Failure, errorMessage } from '../../errors.js';
import { DiscordPrompter } from '../../infrastructure/discord/discord-prompter.js';
import { memberVoiceChannel, toVoiceChannelRef } from '../../infrastructure/discord/voice-channels.js';
import { classifyError } from '../error-handler.js';
import { buildEmbed } from '../ui/embeds.js';
import {
  PLAYLIST_VIEW_TIMEOUT_MS,
  PlaylistButton,
  nextPlaylistPage,
  playlistButtons,
  renderPlaylistPage,
} from '../ui/playlist-view.js';
import { respond } from '../ui/respond.js';

const log = createLogger('music-controller');

/**
 * Music Controller
 * Maps `/music` subcommands onto the music service
 */
export class MusicController {
  constructor(
    private readonly music: MusicService,
    private readonly promptTimeoutMs: number
  ) {}

  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const request = this.createRequest(interaction);
    const subcommand = interaction.options.getSubcommand();

    switch (subcommand) {
      case 'join':
        await this.reply(interaction, await this.music.join(request, this.selectedVoiceChannel(interaction)));
        break;
      case 'leave':
        await this.reply(interaction, await this.music.leave(request));
        break;
      case 'play': {
        const source = interaction.options.getString('source');
        const position = interaction.options.getInteger('position');
        if (source) {
          // Searching and loading can outlast the initial response window.
          await interaction.deferReply();
        }
        await this.reply(interaction, await this.music.play(request, { source, position }));
        break;
      }
      case 'pause':
        await this.reply(interaction, await this.music.pause(request));
        break;
      case 'resume':
        await this.reply(interaction, await this.music.resume(request));
        break;
      case 'stop':
        await this.reply(interaction, await this.music.stop(request));
        break;
      case 'skip':
        await this.reply(interaction, await this.music.skip(request));
        break;
      case 'seek':
        await this.reply(interaction, await this.music.seek(request, interaction.options.getInteger('seconds', true)));
        break;
      case 'playlist':
        await this.showPlaylist(interaction, request.guildId);
        break;
      case 'remove':
        await this.reply(interaction, await this.music.remove(request, interaction.options.getInteger('position', true)));
        break;
      case 'clear':
        await this.reply(interaction, await this.music.clear(request));
        break;
      case 'shuffle':
        await this.reply(interaction, await this.music.shuffle(request));
        break;
      case 'nowplaying':
        await this.reply(interaction, this.music.nowPlaying(request.guildId));
        break;
      case 'repeat': {
        const mode = interaction.options.getString('mode');
        if (mode !== null && !isRepeatMode(mode)) {
          throw new Failure(`Unknown repeat mode \`${mode}\`.`);
        }
        await this.reply(interaction, await this.music.repeat(request, mode ?? undefined));
        break;
      }
      case 'volume':
        await this.reply(interaction, await this.music.volume(request, interaction.options.getInteger('volume') ?? undefined));
        break;
      default:
        throw new Failure(`Unknown music command \`${subcommand}\`.`);
    }
  }

  private createRequest(interaction: ChatInputCommandInteraction): MusicRequest {
    const { guildId } = interaction;
    if (!guildId) {
      throw new Failure('This command can only be used in a server.');
    }

    const member = interaction.member instanceof GuildMember ? interaction.member : null;
    return {
      guildId,
      userId: interaction.user.id,
      textChannelId: interaction.channelId,
      voiceChannel: memberVoiceChannel(member),
      prompter: new DiscordPrompter(interaction, this.promptTimeoutMs),
    };
  }

  private selectedVoiceChannel(interaction: ChatInputCommandInteraction): VoiceChannelRef | undefined {
    const option = interaction.options.getChannel('channel');
    if (!option) {
      return undefined;
    }
    const channel = interaction.guild?.channels.cache.get(option.id);
    if (!channel?.isVoiceBased()) {
      throw new Failure('Please choose a voice channel.');
    }
    return toVoiceChannelRef(channel);
  }

  private async reply(interaction: ChatInputCommandInteraction, result: MusicResult): Promise<void> {
    await respond(interaction, { embeds: [buildEmbed(result.notice)] });
  }

  /**
   * Paginated playlist browser. Only the invoking user can turn pages.
   */
  private async showPlaylist(interaction: ChatInputCommandInteraction, guildId: string): Promise<void> {
    let page = this.music.playlistPage(guildId, 0);

    const message = await interaction.reply({
      embeds: [buildEmbed(renderPlaylistPage(page))],
      components: [playlistButtons()],
      fetchReply: true,
    });

    const collector = message.createMessageComponentCollector({
      componentType: ComponentType.Button,
      filter: (button) => button.user.id === interaction.user.id,
      time: PLAYLIST_VIEW_TIMEOUT_MS,
    });

    const turnPage = async (button: ButtonInteraction): Promise<void> => {
      if (button.customId === PlaylistButton.STOP) {
        collector.stop('stopped');
        await button.update({ components: [playlistButtons(true)] });
        return;
      }

      try {
        page = this.music.playlistPage(guildId, nextPlaylistPage(page.page, button.customId));
        await button.update({ embeds: [buildEmbed(renderPlaylistPage(page))] });
      } catch (error) {
        collector.stop('failed');
        await button.update({ embeds: [buildEmbed(classifyError(error).notice)], components: [] });
      }
    };

    collector.on('collect', (button) => {
      turnPage(button).catch((error: unknown) =>
        log.error({ guildId, error: errorMessage(error) }, 'Playlist browser update failed'));
    });

    collector.on('end', (_collected, reason) => {
      if (reason !== 'time') {
        return;
      }
      interaction.editReply({ components: [playlistButtons(true)] }).catch((error: unknown) =>
        log.debug({ guildId, error: errorMessage(error) }, 'Unable to disable playlist browser'));
    });
  }
}

import {
  ChannelType,
  SlashCommandBuilder,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { REPEAT_MODES } from '../domain/value-objects/repeat-mode.js';
import { MAX_VOLUME, MIN_BANNER_INTERVAL, MIN_VOLUME } from '../domain/entities/guild-settings.js';

export const musicCommand = new SlashCommandBuilder()
  .setName('music')
  .setDescription('Music commands.')
  .setDMPermission(false)
  .addSubcommand((sub) =>
    sub
      .setName('join')
      .setDescription('Add or move me to a voice channel.')
      .addChannelOption((opt) =>
        opt
          .setName('channel')
          .setDescription('The channel to join or move me to. If not specified I will join the channel you are currently in.')
          .addChannelTypes(ChannelType.GuildVoice, ChannelType.GuildStageVoice)
          .setRequired(false)))
  .addSubcommand((sub) => sub.setName('leave').setDescription('Remove me from a voice channel.'))
  .addSubcommand((sub) =>
    sub
      .setName('play')
      .setDescription('Play music from a source.')
      .addStringOption((opt) =>
        opt.setName('source').setDescription('A URL or the name of a video to play.').setRequired(false))
      .addIntegerOption((opt) =>
        opt.setName('position').setDescription('The position in the playlist to play from.').setMinValue(1).setRequired(false)))
  .addSubcommand((sub) => sub.setName('pause').setDescription('Pause the currently playing track.'))
  .addSubcommand((sub) => sub.setName('resume').setDescription('Resume the currently paused track.'))
  .addSubcommand((sub) => sub.setName('stop').setDescription('Stop playback.'))
  .addSubcommand((sub) => sub.setName('skip').setDescription('Skip the current track.'))
  .addSubcommand((sub) =>
    sub
      .setName('seek')
      .setDescription('Jump to a point in the current track.')
      .addIntegerOption((opt) =>
        opt.setName('seconds').setDescription('Seconds from the start of the track.').setMinValue(0).setRequired(true)))
  .addSubcommand((sub) => sub.setName('playlist').setDescription('View the playlist.'))
  .addSubcommand((sub) =>
    sub
      .setName('remove')
      .setDescription('Remove a track from the playlist.')
      .addIntegerOption((opt) =>
        opt.setName('position').setDescription('Position of the track in the playlist.').setMinValue(1).setRequired(true)))
  .addSubcommand((sub) => sub.setName('clear').setDescription('Clear the playlist.'))
  .addSubcommand((sub) => sub.setName('shuffle').setDescription('Shuffle the playlist.'))
  .addSubcommand((sub) => sub.setName('nowplaying').setDescription('View information about the currently playing track.'))
  .addSubcommand((sub) =>
    sub
      .setName('repeat')
      .setDescription('Enable track or playlist repeating.')
      .addStringOption((opt) =>
        opt
          .setName('mode')
          .setDescription('The repeat mode.')
          .addChoices(...REPEAT_MODES.map((mode) => ({ name: mode, value: mode })))
          .setRequired(false)))
  .addSubcommand((sub) =>
    sub
      .setName('volume')
      .setDescription('Check or change the playlist volume.')
      .addIntegerOption((opt) =>
        opt
          .setName('volume')
          .setDescription('Volume in percent from 0% to 150%.')
          .setMinValue(MIN_VOLUME)
          .setMaxValue(MAX_VOLUME)
          .setRequired(false)));

export const bannerCommand = new SlashCommandBuilder()
  .setName('banner')
  .setDescription('Banner commands.')
  .setDMPermission(false)
  .addSubcommand((sub) =>
    sub
      .setName('add')
      .setDescription('Add a new banner. Maximum file size is 10MB.')
      .addStringOption((opt) =>
        opt.setName('url').setDescription('URL of the banner image. Must be a PNG, JPG or GIF.').setRequired(true)))
  .addSubcommand((sub) => sub.setName('list').setDescription('View a list of all banners and set / remove banners.'))
  .addSubcommand((sub) =>
    sub
      .setName('toggle')
      .setDescription('Toggle automated banner changing.')
      .addStringOption((opt) =>
        opt
          .setName('enabled')
          .setDescription('Turn the rotation on or off.')
          .addChoices({ name: 'on', value: 'on' }, { name: 'off', value: 'off' })
          .setRequired(false)))
  .addSubcommand((sub) =>
    sub
      .setName('interval')
      .setDescription('Set the banner change interval.')
      .addIntegerOption((opt) =>
        opt
          .setName('interval')
          .setDescription('The delay inbetween banner changes in minutes.')
          .setMinValue(MIN_BANNER_INTERVAL)
          .setRequired(false)));

export const helpCommand = new SlashCommandBuilder()
  .setName('help')
  .setDescription('A brief overview over my features.');

export const ownerCommand = new SlashCommandBuilder()
  .setName('owner')
  .setDescription('Owner-only commands.')
  .setDMPermission(false)
  .addSubcommand((sub) => sub.setName('restart').setDescription('Restart the bot.'))
  .addSubcommand((sub) => sub.setName('shutdown').setDescription('Shut the bot down.'))
  .addSubcommand((sub) =>
    sub
      .setName('sql')
      .setDescription('Run an SQL query.')
      .addStringOption((opt) => opt.setName('sql').setDescription('The statement to run.').setRequired(true)))
  .addSubcommandGroup((group) =>
    group
      .setName('sync')
      .setDescription('Command synchronization commands.')
      .addSubcommand((sub) => sub.setName('all').setDescription('Sync all commands.'))
      .addSubcommand((sub) => sub.setName('global').setDescription('Sync global commands.'))
      .addSubcommand((sub) => sub.setName('admin').setDescription('Sync admin commands.')));

/** Commands available in every guild. */
export function globalCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [musicCommand.toJSON(), bannerCommand.toJSON(), helpCommand.toJSON()];
}

/** Commands registered only in the admin guilds. */
export function adminCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [ownerCommand.toJSON()];
}

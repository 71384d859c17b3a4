import { PermissionFlagsBits, type GuildMember, type VoiceBasedChannel } from 'discord.js';
import type { VoiceChannelRef } from '../../application/player/playlist-player.js';

const REQUIRED_VOICE_PERMISSIONS = [PermissionFlagsBits.Connect, PermissionFlagsBits.Speak];

/**
 * Describe `channel` together with the voice permissions the bot lacks there.
 */
export function toVoiceChannelRef(channel: VoiceBasedChannel): VoiceChannelRef {
  const me = channel.guild.members.me;
  const permissions = me ? channel.permissionsFor(me) : null;

  return {
    id: channel.id,
    name: channel.name,
    missingPermissions: permissions ? permissions.missing(REQUIRED_VOICE_PERMISSIONS) : ['Connect', 'Speak'],
  };
}

export function memberVoiceChannel(member: GuildMember | null): VoiceChannelRef | null {
  const channel = member?.voice.channel;
  return channel ? toVoiceChannelRef(channel) : null;
}

/**
 * Members of `channel` that are not bots.
 */
export function humanMemberCount(channel: VoiceBasedChannel): number {
  return channel.members.filter((member) => !member.user.bot).size;
}

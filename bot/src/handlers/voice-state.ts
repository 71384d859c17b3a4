import { Events, type Client, type VoiceState } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import type { PlayerRegistry } from '../application/player/player-registry.js';
import { errorMessage } from '../errors.js';
import { humanMemberCount } from '../infrastructure/discord/voice-channels.js';

const log = createLogger('voice-state');

export interface VoiceStateChange {
  userId: string;
  oldChannelId: string | null;
  newChannelId: string | null;
}

export type VoiceStateAction =
  | { type: 'none' }
  | { type: 'forcedDisconnect' }
  | { type: 'moved'; channelId: string }
  | { type: 'checkEmpty'; channelId: string };

/**
 * Decide what a voice state change means for the guild's player. The bot
 * leaving voice releases the player and the bot changing channel moves it;
 * anyone else leaving the player's channel makes it check whether humans
 * remain.
 */
export function voiceStateAction(
  change: VoiceStateChange,
  botUserId: string,
  playerChannelId: string | undefined
): VoiceStateAction {
  if (change.oldChannelId === change.newChannelId || playerChannelId === undefined) {
    return { type: 'none' };
  }
  if (change.userId === botUserId) {
    if (change.newChannelId === null) {
      return { type: 'forcedDisconnect' };
    }
    return change.newChannelId === playerChannelId ? { type: 'none' } : { type: 'moved', channelId: change.newChannelId };
  }
  if (change.oldChannelId === playerChannelId) {
    return { type: 'checkEmpty', channelId: playerChannelId };
  }
  return { type: 'none' };
}

export async function handleVoiceStateUpdate(
  oldState: VoiceState,
  newState: VoiceState,
  registry: PlayerRegistry,
  botUserId: string
): Promise<void> {
  const guildId = newState.guild.id;
  const action = voiceStateAction(
    { userId: newState.id, oldChannelId: oldState.channelId, newChannelId: newState.channelId },
    botUserId,
    registry.get(guildId)?.voiceChannelId
  );

  switch (action.type) {
    case 'forcedDisconnect':
      log.info({ guildId }, 'Removed from voice, releasing player');
      await registry.handleForcedDisconnect(guildId);
      break;
    case 'moved':
      await registry.handleMoved(guildId, action.channelId);
      break;
    case 'checkEmpty': {
      const channel = oldState.channel;
      if (channel && humanMemberCount(channel) === 0) {
        await registry.handleChannelEmptied(guildId, action.channelId);
      }
      break;
    }
    case 'none':
      break;
  }
}

export function setupVoiceStateHandlers(client: Client, registry: PlayerRegistry): void {
  client.on(Events.VoiceStateUpdate, (oldState, newState) => {
    const botUserId = client.user?.id;
    if (!botUserId) {
      return;
    }
    handleVoiceStateUpdate(oldState, newState, registry, botUserId).catch((error: unknown) =>
      log.error({ guildId: newState.guild.id, error: errorMessage(error) }, 'Voice state handling failed'));
  });
}

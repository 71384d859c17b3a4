import { createLogger } from '@vibingway/logger';
import type { Track } from '../../domain/entities/track.js';
import type { RepeatMode } from '../../domain/value-objects/repeat-mode.js';
import { TrackSource } from '../../domain/value-objects/track-source.js';
import { Failure, errorMessage } from '../../errors.js';
import { formatMilliseconds, formatPosition } from '../../utils/string.js';
import type { AudioNode } from '../ports/audio-node.js';
import { notice, type Notice } from '../ports/notifier.js';
import type { Prompter } from '../ports/prompter.js';
import { PlayerRegistry } from '../player/player-registry.js';
import { PlaylistPlayer, channelMention, trackLink, type VoiceChannelRef } from '../player/playlist-player.js';
import { TrackResolver, selected } from './track-resolver.js';

const log = createLogger('music-service');

export const PLAYLIST_PAGE_SIZE = 10;

/**
 * Who invoked a music command, and from where.
 */
export interface MusicRequest {
  guildId: string;
  userId: string;
  textChannelId: string;
  /** The invoking user's current voice channel, if any. */
  voiceChannel: VoiceChannelRef | null;
  prompter: Prompter;
}

export interface MusicResult {
  notice: Notice;
  track?: Track;
}

export interface PlayOptions {
  source?: string | null;
  /** 1-based playlist position. */
  position?: number | null;
}

export interface PlaylistPageLine {
  position: number;
  track: Track;
  current: boolean;
}

export interface PlaylistPage {
  page: number;
  pageCount: number;
  first: number;
  last: number;
  lines: PlaylistPageLine[];
  repeat: RepeatMode;
}

const REPEAT_MESSAGES: Record<RepeatMode, string> = {
  off: 'Repeating is now disabled.',
  all: 'Playlist repeating enabled.',
  track: 'Single track repeating enabled.',
};

/**
 * Music command operations. Preconditions are checked before anything is
 * mutated; user-facing problems are thrown as Failure.
 */
export class MusicService {
  private readonly resolver: TrackResolver;

  constructor(
    private readonly node: AudioNode,
    private readonly registry: PlayerRegistry,
    resolver?: TrackResolver
  ) {
    this.resolver = resolver ?? new TrackResolver(node);
  }

  async join(request: MusicRequest, channel?: VoiceChannelRef): Promise<MusicResult> {
    this.checkNodeReady();
    const userChannel = this.checkCanUseVoiceCommand(request, false);
    const target = channel ?? userChannel;

    return this.registry.run(request.guildId, async () => {
      const player = this.registry.get(request.guildId);

      if (player) {
        if (player.voiceChannelId === target.id) {
          return { notice: notice.success(`I'm already connected to ${channelMention(target.id)}.`) };
        }
        await player.moveTo(target);
        return { notice: notice.success(`Moved to ${channelMention(target.id)}.`) };
      }

      await this.registry.create(request.guildId, target, request.textChannelId);
      return { notice: notice.success(`Connected to ${channelMention(target.id)}.`) };
    });
  }

  async leave(request: MusicRequest): Promise<MusicResult> {
    this.checkNodeReady();

    return this.registry.run(request.guildId, async () => {
      const player = this.registry.get(request.guildId);
      if (!player) {
        throw new Failure('I am not connected to any voice channels.');
      }
      const channelId = player.voiceChannelId;
      await this.registry.destroy(request.guildId);
      return { notice: notice.success(`Disconnected from ${channelMention(channelId)}.`) };
    });
  }

  /**
   * Without options, resume from the cursor. With a position, play from
   * there. With a source, resolve it (prompting outside the guild lock) and
   * append the result, starting playback when nothing is loaded.
   */
  async play(request: MusicRequest, options: PlayOptions = {}): Promise<MusicResult> {
    this.checkNodeReady();
    this.checkCanUseVoiceCommand(request, true);

    let source: TrackSource | undefined;
    try {
      source = TrackSource.parse(options.source);
    } catch (error) {
      throw new Failure('That source is too long. Please use a shorter search or URL.', { cause: error });
    }
    const position = options.position ?? undefined;

    if (source && position !== undefined) {
      throw new Failure('The `source` and `position` options are mutually exclusive.');
    }

    if (source) {
      const tracks = await this.resolver.resolve(source, request.prompter);
      return this.registry.run(request.guildId, () => this.addTracks(request, tracks));
    }

    return this.registry.run(request.guildId, async () => {
      const channel = this.checkCanUseVoiceCommand(request, true);
      const player = await this.registry.create(request.guildId, channel, request.textChannelId);
      const { playlist } = player;

      if (position === undefined) {
        const track = playlist.current();
        if (track) {
          await player.play(track);
          return { notice: notice.success(`Starting playback from position ${playlist.position + 1}.`), track };
        }
        if (playlist.isEmpty()) {
          throw new Failure('The playlist is empty.');
        }
        throw new Failure('The playlist is exhausted. Use `/music play position:1` to play from start.');
      }

      if (playlist.isEmpty()) {
        throw new Failure('The playlist is empty.');
      }
      const track = playlist.setPosition(Math.min(position - 1, playlist.length - 1));
      if (!track) {
        throw new Failure('The playlist is empty.');
      }
      await player.play(track);
      return { notice: notice.success(`Playing playlist from position ${position}.`), track };
    });
  }

  async pause(request: MusicRequest): Promise<MusicResult> {
    return this.withActivePlayer(request, async (player, track) => {
      if (player.isPaused) {
        throw new Failure('Playback is already paused.');
      }
      await player.pause();
      return { notice: notice.success(`Paused playback of \`${track.title}\`.`), track };
    });
  }

  async resume(request: MusicRequest): Promise<MusicResult> {
    return this.withActivePlayer(request, async (player, track) => {
      if (!player.isPaused) {
        throw new Failure('Playback is not paused.');
      }
      await player.resume();
      return { notice: notice.success(`Resumed playback of \`${track.title}\`.`), track };
    });
  }

  async stop(request: MusicRequest): Promise<MusicResult> {
    return this.withActivePlayer(request, async (player, track) => {
      await player.stop();
      return { notice: notice.success(`Stopped playback of \`${track.title}\`.`), track };
    });
  }

  async skip(request: MusicRequest): Promise<MusicResult> {
    return this.withActivePlayer(request, async (player, track) => {
      if (player.hasNext()) {
        await player.playNext();
      } else {
        await player.stop();
      }
      return { notice: notice.success(`Skipped playback of \`${track.title}\`.`), track };
    });
  }

  /** Jump within the loaded track. */
  async seek(request: MusicRequest, seconds: number): Promise<MusicResult> {
    return this.withActivePlayer(request, async (player, track) => {
      if (track.isStream) {
        throw new Failure('I can not seek in a live stream.');
      }
      const applied = await player.seek(seconds * 1000);
      return { notice: notice.success(`Moved playback of \`${track.title}\` to \`${formatMilliseconds(applied)}\`.`), track };
    });
  }

  /**
   * One page of the playlist. `page` is zero-based and clamped.
   */
  playlistPage(guildId: string, page: number): PlaylistPage {
    this.checkNodeReady();
    const player = this.requirePlayer(guildId, "I can't show you the playlist without first joining a voice channel.");
    return buildPlaylistPage(player.playlist.items, player.playlist.position, page, player.playlist.repeat);
  }

  async remove(request: MusicRequest, position: number): Promise<MusicResult> {
    this.checkNodeReady();

    return this.registry.run(request.guildId, async () => {
      const player = this.requirePlayer(
        request.guildId,
        "I can't remove a track from the playlist without first joining a voice channel."
      );
      const { playlist } = player;

      if (playlist.isEmpty()) {
        throw new Failure('The playlist is empty.');
      }
      if (!Number.isInteger(position) || position < 1 || position > playlist.length) {
        throw new Failure(`You must specify a position within the playlist range (max: ${playlist.length}).`);
      }

      const track = player.removeTrack(position - 1);
      if (!track) {
        throw new Failure(`You must specify a position within the playlist range (max: ${playlist.length}).`);
      }
      return { notice: notice.success(`Removed ${trackLink(track)} from the playlist.`), track };
    });
  }

  /**
   * Ask for confirmation outside the guild lock, then clear.
   */
  async clear(request: MusicRequest): Promise<MusicResult> {
    this.checkNodeReady();
    const noPlayer = "I can't empty the playlist without first joining a voice channel.";

    const count = await this.registry.run(request.guildId, () => {
      const player = this.requirePlayer(request.guildId, noPlayer);
      if (player.playlist.isEmpty()) {
        throw new Failure('The playlist is empty.');
      }
      return player.playlist.length;
    });

    const outcome = await request.prompter.confirm({
      message: `Are you sure you want to remove ${count} track(s) from the playlist?`,
    });
    if (outcome.status === 'cancelled' || !selected(outcome)) {
      return { notice: notice.success('The playlist was not cleared.') };
    }

    return this.registry.run(request.guildId, () => {
      const player = this.requirePlayer(request.guildId, noPlayer);
      const removed = player.playlist.length;
      player.playlist.clear();
      log.info({ guildId: request.guildId, removed }, 'Playlist cleared');
      return { notice: notice.success(`Removed ${removed} track(s) from the playlist.`) };
    });
  }

  async shuffle(request: MusicRequest): Promise<MusicResult> {
    this.checkNodeReady();
    this.checkCanUseVoiceCommand(request, true);

    return this.registry.run(request.guildId, () => {
      const player = this.requirePlayer(request.guildId, "I can't shuffle the playlist without first joining a voice channel.");
      if (player.playlist.isEmpty()) {
        throw new Failure('The playlist is empty.');
      }
      player.playlist.shuffle();
      return { notice: notice.success(`Shuffled ${player.playlist.length} track(s).`) };
    });
  }

  nowPlaying(guildId: string): MusicResult {
    this.checkNodeReady();
    const player = this.requirePlayer(guildId, "I can't show you track information without first joining a voice channel.");
    const track = player.nowPlaying;
    if (!track) {
      throw new Failure('I am not playing anything at the moment.');
    }

    const { playlist } = player;
    const index = playlist.current() === track ? playlist.position : playlist.indexOf(track);
    const position = index >= 0 ? `#${formatPosition(index + 1)}` : '#???';
    const duration = track.isStream ? 'live' : formatMilliseconds(track.durationMs);
    const description = `${position} ${trackLink(track)} (${formatMilliseconds(player.elapsedMs)} / ${duration})`;

    return {
      notice: notice.message(description, track.artworkUrl ? { thumbnailUrl: track.artworkUrl } : {}),
      track,
    };
  }

  async repeat(request: MusicRequest, mode?: RepeatMode): Promise<MusicResult> {
    this.checkNodeReady();

    const result = await this.registry.run(request.guildId, () => {
      const player = this.requirePlayer(request.guildId, "I can't change the repeat mode without first joining a voice channel.");
      if (mode === undefined) {
        return { notice: notice.success(`Repeat mode is currently set to \`${player.playlist.repeat}\``) };
      }
      player.setRepeat(mode);
      log.info({ guildId: request.guildId, mode }, 'Repeat mode changed');
      return { notice: notice.success(REPEAT_MESSAGES[mode]) };
    });

    if (mode !== undefined) {
      await this.registry.saveRepeatMode(request.guildId, mode);
    }
    return result;
  }

  async volume(request: MusicRequest, volume?: number): Promise<MusicResult> {
    this.checkNodeReady();

    const { changed, current } = await this.registry.run(request.guildId, async () => {
      const player = this.requirePlayer(request.guildId, "I can't change the volume without first joining a voice channel.");
      if (volume === undefined) {
        return { changed: false, current: player.volume };
      }
      return { changed: true, current: await player.setVolume(volume) };
    });

    if (!changed) {
      return { notice: notice.success(`The volume is set to \`${current}%\`.`) };
    }

    await this.registry.saveVolume(request.guildId, current);
    return { notice: notice.success(`Volume set to \`${current}%\`.`) };
  }

  private async addTracks(request: MusicRequest, tracks: Track[]): Promise<MusicResult> {
    const channel = this.checkCanUseVoiceCommand(request, true);
    const player = await this.registry.create(request.guildId, channel, request.textChannelId);
    const { playlist } = player;

    const resumeAtNew = playlist.isEmpty() || playlist.isExhausted();
    const start = playlist.add(tracks) + 1;

    let playbackFailed = false;
    if (!player.isActive) {
      try {
        if (resumeAtNew) {
          const current = playlist.current();
          if (current) {
            await player.play(current);
          }
        } else {
          await player.playNext();
        }
      } catch (error) {
        // The tracks stay queued; the user hears about both.
        log.error({ guildId: request.guildId, error: errorMessage(error) }, 'Failed to start playback of added tracks');
        playbackFailed = true;
      }
    }

    const mention = `<@${request.userId}>`;
    const [first] = tracks;
    const track = tracks.length === 1 ? first : undefined;
    let added = `${mention} added ${tracks.length} tracks to the playlist #${start}.`;
    if (track) {
      const link = track.uri ? `[\`${track.title}\`](${track.uri})` : `\`${track.title}\``;
      added = `${mention} added ${link} to the playlist at position #${start}.`;
    }

    if (playbackFailed) {
      return { notice: notice.warning(`${added} Playback could not be started, try \`/music play\` again.`), track };
    }
    return { notice: notice.success(added), track };
  }

  private async withActivePlayer(
    request: MusicRequest,
    action: (player: PlaylistPlayer, track: Track) => Promise<MusicResult>
  ): Promise<MusicResult> {
    this.checkNodeReady();
    this.checkCanUseVoiceCommand(request, true);

    return this.registry.run(request.guildId, async () => {
      const player = this.registry.get(request.guildId);
      const track = player?.nowPlaying;
      if (!player || !track) {
        throw new Failure('I am not playing anything.');
      }
      return action(player, track);
    });
  }

  private checkNodeReady(): void {
    if (!this.node.isReady()) {
      throw new Failure("Just a moment, I'm still getting things ready...");
    }
  }

  /**
   * The user must be in a voice channel and, with `sameChannel`, in the
   * player's channel when there is a player.
   */
  private checkCanUseVoiceCommand(request: MusicRequest, sameChannel: boolean): VoiceChannelRef {
    const channel = request.voiceChannel;
    if (!channel) {
      throw new Failure('You are not connected to a voice channel.');
    }

    const player = this.registry.get(request.guildId);
    if (sameChannel && player && player.voiceChannelId !== channel.id) {
      throw new Failure(`You are not connected to ${channelMention(player.voiceChannelId)}.`);
    }
    return channel;
  }

  private requirePlayer(guildId: string, message: string): PlaylistPlayer {
    const player = this.registry.get(guildId);
    if (!player) {
      throw new Failure(message);
    }
    return player;
  }
}

export function buildPlaylistPage(
  tracks: readonly Track[],
  cursor: number,
  page: number,
  repeat: RepeatMode,
  pageSize: number = PLAYLIST_PAGE_SIZE
): PlaylistPage {
  const pageCount = Math.max(1, Math.ceil(tracks.length / pageSize));
  const current = Math.min(Math.max(Math.trunc(page), 0), pageCount - 1);
  const startIndex = current * pageSize;

  const lines = tracks.slice(startIndex, startIndex + pageSize).map((track, offset) => ({
    position: startIndex + offset + 1,
    track,
    current: startIndex + offset === cursor,
  }));

  return {
    page: current,
    pageCount,
    first: startIndex + 1,
    last: startIndex + pageSize,
    lines,
    repeat,
  };
}

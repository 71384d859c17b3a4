import { beforeEach, describe, expect, it } from 'vitest';
import {
  NO_SEARCH_RESULTS_MESSAGE,
  TrackResolver,
  UNUSABLE_URL_MESSAGE,
} from '../src/application/services/track-resolver.js';
import { TrackSource } from '../src/domain/value-objects/track-source.js';
import { Failure } from '../src/errors.js';
import { FakeAudioNode, ScriptedPrompter, makeTrack } from './fakes.js';

const PLAYLIST_URL = 'https://example.com/playlist?list=abc';
const TRACK_URL = 'https://example.com/watch?v=abc';

describe('TrackResolver', () => {
  let node: FakeAudioNode;
  let resolver: TrackResolver;

  beforeEach(() => {
    node = new FakeAudioNode();
    resolver = new TrackResolver(node);
  });

  it('should resolve nothing without a source', async () => {
    await expect(resolver.resolve(undefined, new ScriptedPrompter())).resolves.toEqual([]);
    expect(node.resolve).not.toHaveBeenCalled();
    expect(node.search).not.toHaveBeenCalled();
  });

  describe('urls', () => {
    it('should return the single loaded track', async () => {
      const track = makeTrack('a');
      node.resolveResult = { type: 'track', tracks: [track] };

      await expect(resolver.resolve(new TrackSource(TRACK_URL), new ScriptedPrompter())).resolves.toEqual([track]);
      expect(node.resolve).toHaveBeenCalledWith(TRACK_URL);
    });

    it('should fail when nothing was found', async () => {
      node.resolveResult = { type: 'empty' };

      await expect(resolver.resolve(new TrackSource(TRACK_URL), new ScriptedPrompter())).rejects.toThrow(
        UNUSABLE_URL_MESSAGE
      );
    });

    it('should turn node errors into failures', async () => {
      node.resolveResult = { type: 'error', message: 'Unknown file format' };
      await expect(resolver.resolve(new TrackSource(TRACK_URL), new ScriptedPrompter())).rejects.toBeInstanceOf(
        Failure
      );

      node.resolve.mockRejectedValueOnce(new Error('connection refused'));
      await expect(resolver.resolve(new TrackSource(TRACK_URL), new ScriptedPrompter())).rejects.toThrow(
        UNUSABLE_URL_MESSAGE
      );
    });
  });

  describe('playlists', () => {
    const tracks = [makeTrack('a'), makeTrack('b'), makeTrack('c')];

    it('should add every track when the user chooses all', async () => {
      node.resolveResult = { type: 'playlist', name: 'Mix', tracks };
      const prompter = new ScriptedPrompter([0]);

      await expect(resolver.resolve(new TrackSource(PLAYLIST_URL), prompter)).resolves.toEqual(tracks);
      expect(prompter.messages).toEqual([
        'You seem to have requested a playlist containing `3` tracks. Would you like to add them all?',
      ]);
      expect(prompter.choiceLabels).toEqual([['Add all tracks', 'Add first track']]);
    });

    it('should add the first track when the user chooses one', async () => {
      node.resolveResult = { type: 'playlist', name: 'Mix', tracks };

      await expect(resolver.resolve(new TrackSource(PLAYLIST_URL), new ScriptedPrompter([1]))).resolves.toEqual([
        tracks[0],
      ]);
    });

    it('should not ask about a single entry playlist', async () => {
      const single = makeTrack('solo');
      node.resolveResult = { type: 'playlist', name: 'Mix', tracks: [single] };
      const prompter = new ScriptedPrompter();

      await expect(resolver.resolve(new TrackSource(PLAYLIST_URL), prompter)).resolves.toEqual([single]);
      expect(prompter.messages).toEqual([]);
    });

    it('should surface cancellation and timeouts as failures', async () => {
      node.resolveResult = { type: 'playlist', name: 'Mix', tracks };

      await expect(resolver.resolve(new TrackSource(PLAYLIST_URL), new ScriptedPrompter(['cancel']))).rejects.toThrow(
        'You cancelled the request.'
      );
      await expect(resolver.resolve(new TrackSource(PLAYLIST_URL), new ScriptedPrompter(['timeout']))).rejects.toThrow(
        'The interaction timed out.'
      );
    });
  });

  describe('searches', () => {
    it('should offer at most five results and return the chosen one', async () => {
      const results = ['1', '2', '3', '4', '5', '6', '7'].map((id) => makeTrack(id));
      node.searchResult = { type: 'search', tracks: results };
      const prompter = new ScriptedPrompter([2]);

      await expect(resolver.resolve(new TrackSource('lofi beats'), prompter)).resolves.toEqual([results[2]]);
      expect(node.search).toHaveBeenCalledWith('lofi beats');
      expect(prompter.choiceLabels).toEqual([['Track 1', 'Track 2', 'Track 3', 'Track 4', 'Track 5']]);
      expect(prompter.messages).toEqual(['Please choose one of the search results to add to the playlist.']);
    });

    it('should shorten long titles in the choices', async () => {
      node.searchResult = { type: 'search', tracks: [makeTrack('long', { title: 'x'.repeat(100) })] };
      const prompter = new ScriptedPrompter([0]);

      await resolver.resolve(new TrackSource('long'), prompter);

      expect(prompter.choiceLabels[0]).toEqual([`${'x'.repeat(79)}…`]);
    });

    it('should fail without results', async () => {
      node.searchResult = { type: 'empty' };
      await expect(resolver.resolve(new TrackSource('nothing'), new ScriptedPrompter())).rejects.toThrow(
        NO_SEARCH_RESULTS_MESSAGE
      );

      node.search.mockRejectedValueOnce(new Error('timeout'));
      await expect(resolver.resolve(new TrackSource('nothing'), new ScriptedPrompter())).rejects.toThrow(
        NO_SEARCH_RESULTS_MESSAGE
      );
    });

    it('should fail when the user does not pick a result', async () => {
      node.searchResult = { type: 'search', tracks: [makeTrack('a')] };

      await expect(resolver.resolve(new TrackSource('query'), new ScriptedPrompter(['timeout']))).rejects.toThrow(
        'The interaction timed out.'
      );
    });
  });
});

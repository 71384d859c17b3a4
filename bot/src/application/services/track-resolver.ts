import { createLogger } from '@vibingway/logger';
import type { Track } from '../../domain/entities/track.js';
import type { TrackSource } from '../../domain/value-objects/track-source.js';
import { Failure, errorMessage } from '../../errors.js';
import { truncate } from '../../utils/string.js';
import type { AudioNode, LoadResult } from '../ports/audio-node.js';
import type { PromptOutcome, Prompter } from '../ports/prompter.js';

const log = createLogger('track-resolver');

export const SEARCH_RESULT_LIMIT = 5;
export const SEARCH_LABEL_LENGTH = 80;

export const UNUSABLE_URL_MESSAGE = 'I could not find any usable music under that URL.';
export const NO_SEARCH_RESULTS_MESSAGE = 'I could not find any music matching your search.';

/**
 * Turns a search string or URL into tracks, asking the user to pick when the
 * answer is ambiguous. Never touches a playlist.
 */
export class TrackResolver {
  constructor(private readonly node: AudioNode) {}

  async resolve(source: TrackSource | undefined, prompter: Prompter): Promise<Track[]> {
    if (!source) {
      return [];
    }

    switch (source.kind) {
      case 'playlist':
        return this.resolvePlaylist(source.value, prompter);
      case 'url':
        return this.resolveUrl(source.value);
      case 'search':
        return this.resolveSearch(source.value, prompter);
    }
  }

  private async resolvePlaylist(url: string, prompter: Prompter): Promise<Track[]> {
    const tracks = await this.load(url);
    const first = tracks[0];
    if (!first) {
      throw new Failure(UNUSABLE_URL_MESSAGE);
    }
    if (tracks.length === 1) {
      return [first];
    }

    const outcome = await prompter.choose({
      message:
        `You seem to have requested a playlist containing \`${tracks.length.toLocaleString('en-US')}\` tracks. ` +
        'Would you like to add them all?',
      choices: [
        { label: 'Add all tracks', value: true },
        { label: 'Add first track', value: false },
      ],
    });

    return selected(outcome) ? tracks : [first];
  }

  private async resolveUrl(url: string): Promise<Track[]> {
    const [first] = await this.load(url);
    if (!first) {
      throw new Failure(UNUSABLE_URL_MESSAGE);
    }
    return [first];
  }

  private async resolveSearch(query: string, prompter: Prompter): Promise<Track[]> {
    let result: LoadResult;
    try {
      result = await this.node.search(query);
    } catch (error) {
      log.warn({ query, error: errorMessage(error) }, 'Search failed');
      throw new Failure(NO_SEARCH_RESULTS_MESSAGE, { cause: error });
    }

    const candidates = tracksOf(result).slice(0, SEARCH_RESULT_LIMIT);
    if (candidates.length === 0) {
      throw new Failure(NO_SEARCH_RESULTS_MESSAGE);
    }

    const choices = candidates.map((track) => ({ label: truncate(track.title, SEARCH_LABEL_LENGTH), value: track }));
    const outcome = await prompter.choose({
      message: 'Please choose one of the search results to add to the playlist.',
      choices,
      fields: [
        {
          name: 'Search Results',
          value: choices.map(({ label, value }) => (value.uri ? `[${label}](${value.uri})` : label)).join('\n'),
          inline: false,
        },
      ],
      placeholder: 'Choose a track',
    });

    return [selected(outcome)];
  }

  private async load(url: string): Promise<Track[]> {
    let result: LoadResult;
    try {
      result = await this.node.resolve(url);
    } catch (error) {
      log.warn({ url, error: errorMessage(error) }, 'Loading tracks failed');
      throw new Failure(UNUSABLE_URL_MESSAGE, { cause: error });
    }

    if (result.type === 'error') {
      log.warn({ url, error: result.message }, 'Node could not load tracks');
      throw new Failure(UNUSABLE_URL_MESSAGE);
    }
    return tracksOf(result);
  }
}

function tracksOf(result: LoadResult): Track[] {
  switch (result.type) {
    case 'track':
    case 'playlist':
    case 'search':
      return result.tracks;
    case 'empty':
    case 'error':
      return [];
  }
}

/** Unwrap a prompt answer; timeouts and cancellations become failures. */
export function selected<T>(outcome: PromptOutcome<T>): T {
  switch (outcome.status) {
    case 'selected':
      return outcome.value;
    case 'cancelled':
      throw new Failure('You cancelled the request.');
    case 'timedOut':
      throw new Failure('The interaction timed out.');
  }
}

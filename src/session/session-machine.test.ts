import { describe, expect, it } from 'vitest';
import { CancelledError, NotFoundError, TransportError } from '../errors/custom-errors.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../types/anime.types.js';
import { SessionMachine } from './session-machine.js';
import type { SessionRequest } from './session.types.js';

const results: SearchResult[] = [
  { source: 'fake', id: 'naruto', title: 'Naruto' },
  { source: 'fake', id: 'shippuden', title: 'Naruto Shippuden' },
];

const episodes: EpisodeRef[] = [1, 2, 3].map((number) => ({
  source: 'fake',
  animeId: 'naruto',
  number,
  label: String(number),
}));

const descriptor: StreamDescriptor = { url: 'https://cdn.example.com/2.m3u8', userAgent: 'UA1' };

function requestOf(request: SessionRequest | null): SessionRequest {
  if (!request) {
    throw new Error('Expected a request');
  }
  return request;
}

/**
 * Machine with search results loaded
 */
function withResults(): SessionMachine {
  const machine = new SessionMachine();
  const search = requestOf(machine.submit('naruto').request);
  machine.complete(search.id, { kind: 'search', results });
  return machine;
}

/**
 * Machine with the episode list of the first result loaded
 */
function withEpisodes(): SessionMachine {
  const machine = withResults();
  const list = requestOf(machine.select(0).request);
  machine.complete(list.id, { kind: 'episodes', episodes });
  return machine;
}

describe('SessionMachine', () => {
  it('should start idle', () => {
    const snapshot = new SessionMachine().getSnapshot();
    expect(snapshot.stage).toBe('idle');
    expect(snapshot.pending).toBeNull();
  });

  describe('submit', () => {
    it('should issue a search request with the trimmed query', () => {
      const machine = new SessionMachine();

      const transition = machine.submit('  naruto ');

      expect(transition.request).toEqual({ id: 1, kind: 'search', query: 'naruto' });
      expect(machine.getSnapshot().stage).toBe('searching');
      expect(machine.getSnapshot().query).toBe('naruto');
    });

    it('should ignore an empty query', () => {
      const machine = new SessionMachine();

      expect(machine.submit('   ').changed).toBe(false);
      expect(machine.getSnapshot().stage).toBe('idle');
    });

    it('should supersede a search in flight', () => {
      const machine = new SessionMachine();
      const first = requestOf(machine.submit('slow').request);

      const transition = machine.submit('fast');

      expect(transition.effects).toEqual([{ type: 'cancel', requestId: first.id }]);
      expect(transition.request).toEqual({ id: 2, kind: 'search', query: 'fast' });
    });
  });

  describe('stale completions', () => {
    it('should drop results of a superseded search', () => {
      const machine = new SessionMachine();
      const slow = requestOf(machine.submit('slow').request);
      const fast = requestOf(machine.submit('fast').request);
      const fastResults = [{ source: 'fake', id: 'fast', title: 'Fast' }];

      expect(machine.complete(fast.id, { kind: 'search', results: fastResults }).stale).toBe(false);
      expect(machine.complete(slow.id, { kind: 'search', results }).stale).toBe(true);

      expect(machine.getSnapshot().stage).toBe('results');
      expect(machine.getSnapshot().results).toEqual(fastResults);
    });

    it('should drop episodes that arrive after navigating back', () => {
      const machine = withResults();
      const list = requestOf(machine.select(0).request);

      const back = machine.back();
      const late = machine.complete(list.id, { kind: 'episodes', episodes });

      expect(back.effects).toEqual([{ type: 'cancel', requestId: list.id }]);
      expect(late.stale).toBe(true);
      expect(machine.getSnapshot().stage).toBe('results');
      expect(machine.getSnapshot().episodes).toEqual([]);
    });

    it('should drop errors of a superseded request', () => {
      const machine = new SessionMachine();
      const first = requestOf(machine.submit('a').request);
      machine.submit('b');

      expect(machine.fail(first.id, new NotFoundError('gone', 'fake')).stale).toBe(true);
      expect(machine.getSnapshot().stage).toBe('searching');
    });
  });

  describe('navigation', () => {
    it('should walk from results to ready and emit one launch effect', () => {
      const machine = withEpisodes();
      expect(machine.getSnapshot()).toMatchObject({ stage: 'episodes', episodesLoading: false, episodes });

      const resolve = requestOf(machine.select(1).request);
      expect(resolve).toEqual({ id: 3, kind: 'stream', episode: episodes[1] });
      expect(machine.getSnapshot().stage).toBe('resolving');

      const done = machine.complete(resolve.id, { kind: 'stream', descriptor });

      expect(done.effects).toEqual([{ type: 'launch', requestId: resolve.id, descriptor, episode: episodes[1] }]);
      expect(machine.getSnapshot().stage).toBe('ready');
      expect(machine.getSnapshot().stream).toEqual(descriptor);
    });

    it('should ignore selections outside the list', () => {
      const machine = withResults();
      expect(machine.select(5).changed).toBe(false);
      expect(machine.getSnapshot().stage).toBe('results');
    });

    it('should not select episodes while the list is loading', () => {
      const machine = withResults();
      machine.select(0);
      expect(machine.select(0).request).toBeNull();
    });

    it('should go back one level at a time', () => {
      const machine = withEpisodes();
      const resolve = requestOf(machine.select(0).request);
      machine.complete(resolve.id, { kind: 'stream', descriptor });

      machine.back();
      expect(machine.getSnapshot()).toMatchObject({ stage: 'episodes', stream: null });
      machine.back();
      expect(machine.getSnapshot().stage).toBe('results');
      machine.back();
      expect(machine.getSnapshot()).toMatchObject({ stage: 'idle', query: 'naruto' });
      expect(machine.back().changed).toBe(false);
    });

    it('should cancel a search back to idle keeping the query', () => {
      const machine = new SessionMachine();
      const search = requestOf(machine.submit('naruto').request);

      const transition = machine.cancel();

      expect(transition.effects).toEqual([{ type: 'cancel', requestId: search.id }]);
      expect(machine.getSnapshot()).toMatchObject({ stage: 'idle', query: 'naruto', pending: null });
    });

    it('should cancel resolving back to the loaded episode list', () => {
      const machine = withEpisodes();
      machine.select(0);

      machine.back();

      expect(machine.getSnapshot()).toMatchObject({ stage: 'episodes', episodesLoading: false, episodes });
    });

    it('should resolve the following episode with next', () => {
      const machine = withEpisodes();
      const resolve = requestOf(machine.select(0).request);
      machine.complete(resolve.id, { kind: 'stream', descriptor });

      const next = machine.next();

      expect(next.request).toMatchObject({ kind: 'stream', episode: episodes[1] });
      expect(machine.getSnapshot()).toMatchObject({ stage: 'resolving', selectedEpisode: episodes[1] });
    });

    it('should keep ready with a notice when there is no next episode', () => {
      const machine = withEpisodes();
      const resolve = requestOf(machine.select(2).request);
      machine.complete(resolve.id, { kind: 'stream', descriptor });

      const next = machine.next();

      expect(next.request).toBeNull();
      expect(machine.getSnapshot()).toMatchObject({ stage: 'ready', notice: 'Episode 3 is the last one' });
    });
  });

  describe('errors', () => {
    it('should enter the error stage and retry the same query', () => {
      const machine = new SessionMachine();
      const search = requestOf(machine.submit('naruto').request);

      machine.fail(search.id, new TransportError('Request timed out after 12000ms', 'timeout', 'u'));
      expect(machine.getSnapshot()).toMatchObject({
        stage: 'error',
        lastError: { name: 'TransportError', message: 'Request timed out after 12000ms' },
      });

      const retry = machine.retry();

      expect(retry.request).toEqual({ id: 2, kind: 'search', query: 'naruto' });
      expect(machine.getSnapshot()).toMatchObject({ stage: 'searching', lastError: null });
    });

    it('should go back from an episode list error to results', () => {
      const machine = withResults();
      const list = requestOf(machine.select(0).request);
      machine.fail(list.id, new NotFoundError('No episodes', 'fake'));

      machine.back();

      expect(machine.getSnapshot()).toMatchObject({ stage: 'results', lastError: null, results });
    });

    it('should go back from a stream error to the episode list', () => {
      const machine = withEpisodes();
      const resolve = requestOf(machine.select(0).request);
      machine.fail(resolve.id, new NotFoundError('No stream', 'fake'));

      machine.back();

      expect(machine.getSnapshot().stage).toBe('episodes');
    });

    it('should not surface cancellations', () => {
      const machine = new SessionMachine();
      const search = requestOf(machine.submit('naruto').request);

      machine.fail(search.id, new CancelledError());

      expect(machine.getSnapshot()).toMatchObject({ stage: 'idle', lastError: null, pending: null });
    });

    it('should return to the episode list with a notice when the player fails', () => {
      const machine = withEpisodes();
      const resolve = requestOf(machine.select(0).request);
      machine.complete(resolve.id, { kind: 'stream', descriptor });

      machine.launchFailed(resolve.id, new Error('spawn mpv ENOENT'));

      expect(machine.getSnapshot()).toMatchObject({
        stage: 'episodes',
        stream: null,
        lastError: { name: 'Error', message: 'spawn mpv ENOENT' },
      });
    });

    it('should drop launch outcomes of a stream that is no longer ready', () => {
      const machine = withEpisodes();
      const first = requestOf(machine.select(0).request);
      machine.complete(first.id, { kind: 'stream', descriptor });
      const second = requestOf(machine.next().request);
      const nextDescriptor = { url: 'https://cdn.example.com/2.m3u8' };
      machine.complete(second.id, { kind: 'stream', descriptor: nextDescriptor });

      expect(machine.launched(second.id, 'mpv').changed).toBe(true);
      expect(machine.launchFailed(first.id, new Error('spawn mpv ENOENT')).stale).toBe(true);
      expect(machine.launched(first.id, 'mpv').stale).toBe(true);

      expect(machine.getSnapshot()).toMatchObject({
        stage: 'ready',
        stream: nextDescriptor,
        selectedEpisode: episodes[1],
        notice: 'Playing episode 2 with mpv',
        lastError: null,
      });
    });
  });

  it('should cancel pending work on quit', () => {
    const machine = new SessionMachine();
    const search = requestOf(machine.submit('naruto').request);

    const transition = machine.quit();

    expect(transition.effects).toEqual([{ type: 'cancel', requestId: search.id }, { type: 'quit' }]);
    expect(machine.getSnapshot().quitting).toBe(true);
  });
});

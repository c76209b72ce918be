import type { EpisodeRef, SearchResult, StreamDescriptor } from '../types/anime.types.js';

/**
 * Session stages. `episodes` covers both loading and loaded; see `episodesLoading`.
 */
export type Stage = 'idle' | 'searching' | 'results' | 'episodes' | 'resolving' | 'ready' | 'error';

/**
 * Stages a user can rest in without a request in flight
 */
export type StableStage = 'idle' | 'results' | 'episodes' | 'ready';

/**
 * Error as shown to the user
 */
export type SessionError = {
  name: string;
  message: string;
};

/**
 * Work the machine asks its owner to perform
 */
export type SessionRequest =
  | { id: number; kind: 'search'; query: string }
  | { id: number; kind: 'episodes'; result: SearchResult }
  | { id: number; kind: 'stream'; episode: EpisodeRef };

/**
 * Successful outcome of a request, by kind
 */
export type RequestOutcome =
  | { kind: 'search'; results: SearchResult[] }
  | { kind: 'episodes'; episodes: EpisodeRef[] }
  | { kind: 'stream'; descriptor: StreamDescriptor };

/**
 * Side effects other than requests
 */
export type SessionEffect =
  | { type: 'cancel'; requestId: number }
  | { type: 'launch'; requestId: number; descriptor: StreamDescriptor; episode: EpisodeRef }
  | { type: 'quit' };

/**
 * Result of feeding one input to the machine
 */
export type Transition = {
  request: SessionRequest | null;
  effects: SessionEffect[];
  /** The input was a completion for a superseded request and was dropped */
  stale: boolean;
  /** Session state changed */
  changed: boolean;
};

export type SessionState = {
  stage: Stage;
  query: string;
  results: SearchResult[];
  selectedResult: SearchResult | null;
  episodes: EpisodeRef[];
  episodesLoading: boolean;
  selectedEpisode: EpisodeRef | null;
  stream: StreamDescriptor | null;
  lastError: SessionError | null;
  /** Informational message, e.g. the player that was started */
  notice: string | null;
  /** Request in flight, if any */
  pending: SessionRequest | null;
  /** Request that failed and can be retried from the error stage */
  failedRequest: SessionRequest | null;
  quitting: boolean;
};

export type SessionSnapshot = Readonly<SessionState>;

/**
 * User intents accepted by the session
 */
export type SessionIntent =
  | { type: 'submit'; query: string }
  | { type: 'select'; index: number }
  | { type: 'back' }
  | { type: 'cancel' }
  | { type: 'retry' }
  | { type: 'next' }
  | { type: 'quit' };

import { CancelledError, errorMessage } from '../errors/custom-errors.js';
import type { EpisodeRef } from '../types/anime.types.js';
import type {
  RequestOutcome,
  SessionEffect,
  SessionError,
  SessionIntent,
  SessionRequest,
  SessionSnapshot,
  SessionState,
  Stage,
  StableStage,
  Transition,
} from './session.types.js';

/**
 * Stage entered while a request of this kind is in flight
 */
const LOADING_STAGE = {
  search: 'searching',
  episodes: 'episodes',
  stream: 'resolving',
} as const satisfies Record<SessionRequest['kind'], Stage>;

/**
 * Stage to go back to when a request of this kind fails
 */
const FALLBACK_STAGE = {
  search: 'idle',
  episodes: 'results',
  stream: 'episodes',
} as const satisfies Record<SessionRequest['kind'], StableStage>;

function createInitialState(): SessionState {
  return {
    stage: 'idle',
    query: '',
    results: [],
    selectedResult: null,
    episodes: [],
    episodesLoading: false,
    selectedEpisode: null,
    stream: null,
    lastError: null,
    notice: null,
    pending: null,
    failedRequest: null,
    quitting: false,
  };
}

/**
 * Convert any thrown value into the form shown to the user
 */
export function toSessionError(error: unknown): SessionError {
  return {
    name: error instanceof Error ? error.name : 'Error',
    message: errorMessage(error),
  };
}

/**
 * Session state machine. Owns the session and the request generation
 * counter; performs no I/O. Every input returns a Transition describing
 * the request to issue and the effects to run.
 */
export class SessionMachine {
  private state: SessionState = createInitialState();
  private lastRequestId = 0;
  /** Stream request whose descriptor the ready stage holds */
  private readyRequestId: number | null = null;

  getSnapshot(): SessionSnapshot {
    return { ...this.state };
  }

  /**
   * Apply a user intent
   */
  dispatch(intent: SessionIntent): Transition {
    switch (intent.type) {
      case 'submit':
        return this.submit(intent.query);
      case 'select':
        return this.select(intent.index);
      case 'back':
        return this.back();
      case 'cancel':
        return this.cancel();
      case 'retry':
        return this.retry();
      case 'next':
        return this.next();
      case 'quit':
        return this.quit();
    }
  }

  /**
   * Start a new search, superseding anything in flight
   */
  submit(query: string): Transition {
    const trimmed = query.trim();
    if (!trimmed || this.state.quitting) {
      return unchanged();
    }

    this.state.query = trimmed;
    this.state.results = [];
    this.state.selectedResult = null;
    this.state.episodes = [];
    this.state.episodesLoading = false;
    this.state.selectedEpisode = null;
    this.state.stream = null;
    return this.issue({ id: this.nextRequestId(), kind: 'search', query: trimmed });
  }

  /**
   * Pick the item at `index` of the current list (results or episodes)
   */
  select(index: number): Transition {
    if (this.state.stage === 'results') {
      const result = this.state.results[index];
      if (!result) {
        return unchanged();
      }
      this.state.selectedResult = result;
      this.state.episodes = [];
      this.state.selectedEpisode = null;
      return this.issue({ id: this.nextRequestId(), kind: 'episodes', result });
    }

    if (this.state.stage === 'episodes' && !this.state.episodesLoading) {
      const episode = this.state.episodes[index];
      if (!episode) {
        return unchanged();
      }
      return this.resolve(episode);
    }

    return unchanged();
  }

  /**
   * Navigate one level up, cancelling a loading stage
   */
  back(): Transition {
    const effects = this.supersede();

    switch (this.state.stage) {
      case 'searching':
      case 'results':
        this.enter('idle');
        break;
      case 'episodes':
        this.state.episodesLoading = false;
        this.enter('results');
        break;
      case 'resolving':
      case 'ready':
        this.enter('episodes');
        break;
      case 'error':
        this.enter(this.errorFallback());
        break;
      case 'idle':
        return unchanged();
    }

    return { request: null, effects, stale: false, changed: true };
  }

  /**
   * Abandon the request in flight; same as back from a loading stage
   */
  cancel(): Transition {
    if (!this.state.pending) {
      return unchanged();
    }
    return this.back();
  }

  /**
   * Re-issue the request that led to the error stage
   */
  retry(): Transition {
    const failed = this.state.failedRequest;
    if (this.state.stage !== 'error' || !failed) {
      return unchanged();
    }

    switch (failed.kind) {
      case 'search':
        return this.issue({ id: this.nextRequestId(), kind: 'search', query: failed.query });
      case 'episodes':
        return this.issue({ id: this.nextRequestId(), kind: 'episodes', result: failed.result });
      case 'stream':
        return this.issue({ id: this.nextRequestId(), kind: 'stream', episode: failed.episode });
    }
  }

  /**
   * From ready, resolve the episode after the current one
   */
  next(): Transition {
    const current = this.state.selectedEpisode;
    if (this.state.stage !== 'ready' || !current) {
      return unchanged();
    }

    const index = this.state.episodes.indexOf(current);
    const following = index === -1 ? undefined : this.state.episodes[index + 1];
    if (!following) {
      this.state.notice = `Episode ${current.label} is the last one`;
      return { request: null, effects: [], stale: false, changed: true };
    }

    this.state.stream = null;
    return this.resolve(following);
  }

  quit(): Transition {
    const effects = this.supersede();
    this.state.quitting = true;
    effects.push({ type: 'quit' });
    return { request: null, effects, stale: false, changed: true };
  }

  /**
   * Apply a completed request. Dropped unless it is the request in flight.
   */
  complete(requestId: number, outcome: RequestOutcome): Transition {
    const pending = this.state.pending;
    if (!this.isCurrent(requestId) || !pending || pending.kind !== outcome.kind) {
      return stale();
    }

    this.state.pending = null;

    switch (outcome.kind) {
      case 'search':
        this.state.results = outcome.results;
        this.enter('results');
        return { request: null, effects: [], stale: false, changed: true };
      case 'episodes':
        this.state.episodes = outcome.episodes;
        this.state.episodesLoading = false;
        return { request: null, effects: [], stale: false, changed: true };
      case 'stream': {
        const episode = this.state.selectedEpisode;
        this.state.stream = outcome.descriptor;
        this.enter('ready');
        this.readyRequestId = requestId;
        const effects: SessionEffect[] = episode
          ? [{ type: 'launch', requestId, descriptor: outcome.descriptor, episode }]
          : [];
        return { request: null, effects, stale: false, changed: true };
      }
    }
  }

  /**
   * Apply a failed request. Dropped unless it is the request in flight.
   */
  fail(requestId: number, error: unknown): Transition {
    const pending = this.state.pending;
    if (!this.isCurrent(requestId) || !pending) {
      return stale();
    }

    // Cancellations are never shown; leave the loading stage as if the user went back
    if (error instanceof CancelledError) {
      return this.back();
    }

    this.state.pending = null;

    this.state.failedRequest = pending;
    this.state.episodesLoading = false;
    this.state.stage = 'error';
    this.state.lastError = toSessionError(error);
    this.state.notice = null;
    return { request: null, effects: [], stale: false, changed: true };
  }

  /**
   * The player started for the stream of `requestId`. Dropped unless that stream is still the one in ready.
   */
  launched(requestId: number, command: string): Transition {
    if (!this.isReadyFor(requestId)) {
      return stale();
    }
    const label = this.state.selectedEpisode?.label;
    this.state.notice = label ? `Playing episode ${label} with ${command}` : `Started ${command}`;
    return { request: null, effects: [], stale: false, changed: true };
  }

  /**
   * The player could not be started: drop the stream, back to the episode list
   */
  launchFailed(requestId: number, error: unknown): Transition {
    if (!this.isReadyFor(requestId)) {
      return stale();
    }
    this.enter('episodes');
    this.state.lastError = toSessionError(error);
    return { request: null, effects: [], stale: false, changed: true };
  }

  private resolve(episode: EpisodeRef): Transition {
    this.state.selectedEpisode = episode;
    return this.issue({ id: this.nextRequestId(), kind: 'stream', episode });
  }

  private nextRequestId(): number {
    this.lastRequestId++;
    return this.lastRequestId;
  }

  /**
   * Make `issued` the request in flight and enter its loading stage
   */
  private issue(issued: SessionRequest): Transition {
    const effects = this.supersede();

    this.state.pending = issued;
    this.state.failedRequest = null;
    this.state.lastError = null;
    this.state.notice = null;
    this.state.stage = LOADING_STAGE[issued.kind];
    if (issued.kind === 'episodes') {
      this.state.episodesLoading = true;
    }
    if (issued.kind === 'stream') {
      this.state.stream = null;
    }

    return { request: issued, effects, stale: false, changed: true };
  }

  /**
   * Forget the request in flight; its completion will be treated as stale
   */
  private supersede(): SessionEffect[] {
    const pending = this.state.pending;
    if (!pending) {
      return [];
    }
    this.state.pending = null;
    return [{ type: 'cancel', requestId: pending.id }];
  }

  private enter(stage: StableStage): void {
    this.state.stage = stage;
    this.state.lastError = null;
    this.state.failedRequest = null;
    this.state.notice = null;
    if (stage !== 'ready') {
      this.state.stream = null;
    }
  }

  private errorFallback(): StableStage {
    const failed = this.state.failedRequest;
    if (!failed) {
      return 'idle';
    }
    const stage = FALLBACK_STAGE[failed.kind];
    // Without a loaded list there is nothing to show one level up
    if (stage === 'episodes' && this.state.episodes.length === 0) {
      return 'results';
    }
    return stage;
  }

  private isCurrent(requestId: number): boolean {
    return this.state.pending?.id === requestId;
  }

  private isReadyFor(requestId: number): boolean {
    return this.state.stage === 'ready' && this.readyRequestId === requestId;
  }
}

function unchanged(): Transition {
  return { request: null, effects: [], stale: false, changed: false };
}

function stale(): Transition {
  return { request: null, effects: [], stale: true, changed: false };
}

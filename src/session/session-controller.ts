import { errorMessage } from '../errors/custom-errors.js';
import type { ResolutionPipeline } from '../pipeline/resolution-pipeline.js';
import type { PlayerLauncher } from '../player/player-launcher.js';
import { AsyncQueue } from '../queue/async-queue.js';
import { logger } from '../utils/logger.js';
import { SessionMachine } from './session-machine.js';
import type {
  RequestOutcome,
  SessionEffect,
  SessionIntent,
  SessionRequest,
  SessionSnapshot,
  Transition,
} from './session.types.js';

export type SessionPipeline = Pick<ResolutionPipeline, 'search' | 'listEpisodes' | 'resolveStream'>;

export type SessionLauncher = Pick<PlayerLauncher, 'launch'>;

export type SessionListener = (snapshot: SessionSnapshot) => void;

/**
 * Everything that may change the session goes through the queue as one of these
 */
type SessionMessage =
  | { type: 'intent'; intent: SessionIntent }
  | { type: 'completed'; requestId: number; outcome: RequestOutcome }
  | { type: 'failed'; requestId: number; error: unknown }
  | { type: 'launched'; requestId: number; command: string }
  | { type: 'launch-failed'; requestId: number; error: unknown };

export type SessionControllerOptions = {
  pipeline: SessionPipeline;
  launcher: SessionLauncher;
  machine?: SessionMachine;
};

/**
 * Single consumer of session messages. Runs the requests and effects the
 * machine asks for and posts their outcomes back to its own queue.
 */
export class SessionController {
  private readonly pipeline: SessionPipeline;
  private readonly launcher: SessionLauncher;
  private readonly machine: SessionMachine;
  private readonly queue: AsyncQueue<SessionMessage>;
  private readonly listeners = new Set<SessionListener>();
  private readonly inFlight = new Map<number, AbortController>();
  private readonly tasks = new Set<Promise<void>>();
  private closed = false;

  constructor(options: SessionControllerOptions) {
    this.pipeline = options.pipeline;
    this.launcher = options.launcher;
    this.machine = options.machine ?? new SessionMachine();
    this.queue = new AsyncQueue<SessionMessage>(
      (message) => this.handle(message),
      (error, message) => logger.error(`Failed to apply ${message.type} message: ${errorMessage(error)}`),
    );
  }

  getSnapshot(): SessionSnapshot {
    return this.machine.getSnapshot();
  }

  /**
   * Queue a user intent
   */
  dispatch(intent: SessionIntent): void {
    this.post({ type: 'intent', intent });
  }

  /**
   * Receive a snapshot after every applied message
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolve once no request or launch is running and the queue is drained
   */
  async settled(): Promise<void> {
    while (this.tasks.size > 0 || this.queue.getQueueLength() > 0 || this.queue.isProcessing()) {
      // biome-ignore lint/performance/noAwaitInLoops: tasks post messages that may start new tasks
      await Promise.allSettled([...this.tasks]);
      await this.queue.drain();
    }
  }

  /**
   * Abort everything in flight and stop accepting messages
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();

    await this.queue.stop();
    await Promise.allSettled([...this.tasks]);
  }

  private post(message: SessionMessage): void {
    if (this.closed) {
      logger.debug(`Session closed, dropping ${message.type} message`);
      return;
    }
    this.queue.add(message);
  }

  private handle(message: SessionMessage): void {
    const transition = this.apply(message);

    if (transition.stale) {
      logger.debug(`Dropped stale ${message.type} message`);
      return;
    }

    for (const effect of transition.effects) {
      this.runEffect(effect);
    }

    if (transition.request) {
      this.start(transition.request);
    }

    if (transition.changed) {
      this.notify();
    }
  }

  private apply(message: SessionMessage): Transition {
    switch (message.type) {
      case 'intent':
        return this.machine.dispatch(message.intent);
      case 'completed':
        this.inFlight.delete(message.requestId);
        return this.machine.complete(message.requestId, message.outcome);
      case 'failed':
        this.inFlight.delete(message.requestId);
        return this.machine.fail(message.requestId, message.error);
      case 'launched':
        return this.machine.launched(message.requestId, message.command);
      case 'launch-failed':
        return this.machine.launchFailed(message.requestId, message.error);
    }
  }

  private runEffect(effect: SessionEffect): void {
    switch (effect.type) {
      case 'cancel':
        this.inFlight.get(effect.requestId)?.abort();
        this.inFlight.delete(effect.requestId);
        break;
      case 'launch':
        logger.info(`Launching player for episode ${effect.episode.label}`);
        this.track(
          this.launcher.launch(effect.descriptor).then(
            (process) => this.post({ type: 'launched', requestId: effect.requestId, command: process.command }),
            (error: unknown) => {
              logger.error(errorMessage(error));
              this.post({ type: 'launch-failed', requestId: effect.requestId, error });
            },
          ),
        );
        break;
      case 'quit':
        for (const controller of this.inFlight.values()) {
          controller.abort();
        }
        this.inFlight.clear();
        break;
    }
  }

  /**
   * Run a request in the background; its outcome comes back as a message
   */
  private start(request: SessionRequest): void {
    const controller = new AbortController();
    this.inFlight.set(request.id, controller);
    logger.debug(`Starting ${request.kind} request #${request.id}`);

    this.track(
      this.execute(request, controller.signal).then(
        (outcome) => this.post({ type: 'completed', requestId: request.id, outcome }),
        (error: unknown) => {
          logger.debug(`Request #${request.id} failed: ${errorMessage(error)}`);
          this.post({ type: 'failed', requestId: request.id, error });
        },
      ),
    );
  }

  private async execute(request: SessionRequest, signal: AbortSignal): Promise<RequestOutcome> {
    switch (request.kind) {
      case 'search':
        return { kind: 'search', results: await this.pipeline.search(request.query, signal) };
      case 'episodes':
        return { kind: 'episodes', episodes: await this.pipeline.listEpisodes(request.result, signal) };
      case 'stream':
        return { kind: 'stream', descriptor: await this.pipeline.resolveStream(request.episode, signal) };
    }
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task);
    task.finally(() => this.tasks.delete(task)).catch((error: unknown) => {
      logger.error(`Background task failed: ${errorMessage(error)}`);
    });
  }

  private notify(): void {
    const snapshot = this.machine.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error(`Session listener failed: ${errorMessage(error)}`);
      }
    }
  }
}

import type { SessionController } from '../session/session-controller.js';
import type { SessionIntent, SessionSnapshot } from '../session/session.types.js';
import { clampView, createViewState, frame, listHeight, listLength, render, type ViewState } from './render.js';
import type { KeyEvent, Terminal } from './terminal.js';

export type SessionPort = Pick<SessionController, 'dispatch' | 'subscribe' | 'getSnapshot'>;

export type InteractiveControllerOptions = {
  session: SessionPort;
  terminal: Terminal;
  /** Called once the session has accepted a quit */
  onQuit?: () => void;
};

/**
 * Maps key presses to session intents and redraws the screen after every
 * change. Never waits on the network; outcomes arrive through the session
 * subscription.
 */
export class InteractiveController {
  private readonly session: SessionPort;
  private readonly terminal: Terminal;
  private readonly onQuit: () => void;
  private view: ViewState = createViewState();
  private snapshot: SessionSnapshot;
  /** Identity of the list the cursor refers to */
  private listKey: unknown = null;
  private cleanups: Array<() => void> = [];
  private quitNotified = false;

  constructor(options: InteractiveControllerOptions) {
    this.session = options.session;
    this.terminal = options.terminal;
    this.onQuit = options.onQuit ?? (() => {});
    this.snapshot = this.session.getSnapshot();
  }

  getView(): ViewState {
    return { ...this.view };
  }

  start(): void {
    this.terminal.start();
    this.cleanups = [
      this.session.subscribe((snapshot) => this.update(snapshot)),
      this.terminal.onKey((key) => this.handleKey(key)),
      this.terminal.onResize(() => this.redraw()),
    ];
    this.update(this.session.getSnapshot());
  }

  stop(): void {
    for (const cleanup of this.cleanups) {
      cleanup();
    }
    this.cleanups = [];
    this.terminal.stop();
  }

  /**
   * Translate one key press
   */
  handleKey(key: KeyEvent): void {
    if (key.ctrl && key.name === 'c') {
      this.dispatch({ type: 'quit' });
      return;
    }

    if (this.view.editing) {
      this.handleEditingKey(key);
    } else {
      this.handleNavigationKey(key);
    }
    this.redraw();
  }

  private handleEditingKey(key: KeyEvent): void {
    switch (key.name) {
      case 'return':
      case 'enter': {
        const query = this.view.input.trim();
        if (query) {
          this.view.editing = false;
          this.dispatch({ type: 'submit', query });
        }
        return;
      }
      case 'escape':
        if (this.snapshot.stage === 'idle') {
          this.view.input = '';
        } else {
          this.view.editing = false;
        }
        return;
      case 'backspace':
        this.view.input = this.view.input.slice(0, -1);
        return;
    }

    const text = key.sequence;
    // biome-ignore lint/suspicious/noControlCharactersInRegex: printable characters only
    if (!key.ctrl && !key.meta && text && !/[\x00-\x1f\x7f]/.test(text)) {
      this.view.input += text;
    }
  }

  private handleNavigationKey(key: KeyEvent): void {
    const page = listHeight(this.size());

    if (key.sequence === '/') {
      this.view.editing = true;
      this.view.input = '';
      return;
    }

    if (key.sequence === 'G' || (key.name === 'g' && key.shift)) {
      this.moveTo(listLength(this.snapshot) - 1);
      return;
    }

    switch (key.name) {
      case 'q':
        this.dispatch({ type: 'quit' });
        break;
      case 'up':
      case 'k':
        this.moveTo(this.view.cursor - 1);
        break;
      case 'down':
      case 'j':
        this.moveTo(this.view.cursor + 1);
        break;
      case 'pageup':
        this.moveTo(this.view.cursor - page);
        break;
      case 'pagedown':
        this.moveTo(this.view.cursor + page);
        break;
      case 'g':
        this.moveTo(0);
        break;
      case 'return':
      case 'enter':
        if (listLength(this.snapshot) > 0) {
          this.dispatch({ type: 'select', index: this.view.cursor });
        }
        break;
      case 'escape':
      case 'backspace':
      case 'h':
        this.dispatch(this.snapshot.pending ? { type: 'cancel' } : { type: 'back' });
        break;
      case 'r':
        if (this.snapshot.stage === 'error') {
          this.dispatch({ type: 'retry' });
        }
        break;
      case 'n':
        if (this.snapshot.stage === 'ready') {
          this.dispatch({ type: 'next' });
        }
        break;
    }
  }

  private dispatch(intent: SessionIntent): void {
    this.session.dispatch(intent);
  }

  private moveTo(cursor: number): void {
    this.view = clampView({ ...this.view, cursor }, listLength(this.snapshot), listHeight(this.size()));
  }

  /**
   * Take a new snapshot: reset or restore the cursor when the list changes
   */
  private update(snapshot: SessionSnapshot): void {
    this.snapshot = snapshot;

    if (snapshot.stage === 'idle' && !this.view.editing) {
      this.view.editing = true;
      this.view.input = snapshot.query;
    }

    const listKey = this.currentList(snapshot);
    if (listKey !== this.listKey) {
      this.listKey = listKey;
      this.view.cursor = this.preferredCursor(snapshot);
      this.view.scroll = 0;
    }
    this.view = clampView(this.view, listLength(snapshot), listHeight(this.size()));

    if (snapshot.quitting && !this.quitNotified) {
      this.quitNotified = true;
      this.onQuit();
      return;
    }

    this.redraw();
  }

  private currentList(snapshot: SessionSnapshot): unknown {
    if (snapshot.stage === 'results') return snapshot.results;
    if (snapshot.stage === 'episodes' && !snapshot.episodesLoading) return snapshot.episodes;
    return null;
  }

  /**
   * Cursor on the item that was selected last, so going back keeps the place
   */
  private preferredCursor(snapshot: SessionSnapshot): number {
    const selected =
      snapshot.stage === 'results'
        ? snapshot.results.findIndex((result) => result === snapshot.selectedResult)
        : snapshot.episodes.findIndex((episode) => episode === snapshot.selectedEpisode);
    return Math.max(0, selected);
  }

  private size() {
    return { columns: this.terminal.columns, rows: this.terminal.rows };
  }

  private redraw(): void {
    if (this.quitNotified) return;
    this.terminal.write(frame(render(this.snapshot, this.view, this.size())));
  }
}

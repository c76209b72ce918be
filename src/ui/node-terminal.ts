import * as readline from 'node:readline';
import type { KeyEvent, KeyHandler, Terminal } from './terminal.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

type KeypressKey = {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

/**
 * Terminal backed by process stdin/stdout: raw mode keypresses and the
 * alternate screen buffer.
 */
export class NodeTerminal implements Terminal {
  private readonly handlers = new Set<KeyHandler>();
  private started = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  /**
   * Whether both ends are interactive terminals
   */
  static isSupported(input: NodeJS.ReadStream = process.stdin, output: NodeJS.WriteStream = process.stdout): boolean {
    return Boolean(input.isTTY && output.isTTY);
  }

  get columns(): number {
    return this.output.columns ?? 80;
  }

  get rows(): number {
    return this.output.rows ?? 24;
  }

  write(text: string): void {
    this.output.write(text);
  }

  onKey(handler: KeyHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  onResize(handler: () => void): () => void {
    this.output.on('resize', handler);
    return () => {
      this.output.off('resize', handler);
    };
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    readline.emitKeypressEvents(this.input);
    this.input.setRawMode(true);
    this.input.on('keypress', this.handleKeypress);
    this.input.resume();
    this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;

    this.input.off('keypress', this.handleKeypress);
    this.input.setRawMode(false);
    this.input.pause();
    this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }

  private readonly handleKeypress = (str: string | undefined, key: KeypressKey | undefined): void => {
    const event: KeyEvent = {
      name: key?.name,
      sequence: key?.sequence ?? str,
      ctrl: key?.ctrl ?? false,
      meta: key?.meta ?? false,
      shift: key?.shift ?? false,
    };
    for (const handler of this.handlers) {
      handler(event);
    }
  };
}

/**
 * Leave the alternate screen and show the cursor; used when the process dies mid-session
 */
export function restoreScreen(output: NodeJS.WriteStream): void {
  if (output.isTTY) {
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }
}

/**
 * Key press as reported by readline
 */
export type KeyEvent = {
  /** Key name, e.g. "a", "return", "up"; absent for some symbols */
  name?: string;
  /** Raw characters produced by the key */
  sequence?: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
};

export type KeyHandler = (key: KeyEvent) => void;

export type TerminalSize = {
  columns: number;
  rows: number;
};

/**
 * Everything the interactive interface needs from a terminal
 */
export type Terminal = {
  readonly columns: number;
  readonly rows: number;
  write(text: string): void;
  /** @returns Function removing the handler */
  onKey(handler: KeyHandler): () => void;
  /** @returns Function removing the handler */
  onResize(handler: () => void): () => void;
  start(): void;
  stop(): void;
};

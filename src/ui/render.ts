import type { SessionSnapshot } from '../session/session.types.js';
import type { TerminalSize } from './terminal.js';

/**
 * UI-local state that is not part of the session
 */
export type ViewState = {
  /** Search box contents */
  input: string;
  /** Keys go to the search box */
  editing: boolean;
  cursor: number;
  scroll: number;
};

const HEADER_LINES = 3;
const FOOTER_LINES = 2;

export function createViewState(): ViewState {
  return { input: '', editing: true, cursor: 0, scroll: 0 };
}

/**
 * Number of list rows that fit on screen
 */
export function listHeight(size: TerminalSize): number {
  return Math.max(1, size.rows - HEADER_LINES - FOOTER_LINES);
}

/**
 * Number of selectable items in the current stage
 */
export function listLength(snapshot: SessionSnapshot): number {
  if (snapshot.stage === 'results') return snapshot.results.length;
  if (snapshot.stage === 'episodes' && !snapshot.episodesLoading) return snapshot.episodes.length;
  return 0;
}

/**
 * Keep the cursor inside the list and the scroll window around the cursor
 */
export function clampView(view: ViewState, length: number, height: number): ViewState {
  const cursor = length === 0 ? 0 : Math.min(Math.max(view.cursor, 0), length - 1);
  let scroll = Math.min(Math.max(view.scroll, 0), Math.max(0, length - height));
  if (cursor < scroll) {
    scroll = cursor;
  } else if (cursor >= scroll + height) {
    scroll = cursor - height + 1;
  }
  return { ...view, cursor, scroll };
}

function truncate(line: string, width: number): string {
  if (line.length <= width) return line;
  return width <= 1 ? line.slice(0, width) : `${line.slice(0, width - 1)}…`;
}

function stageLabel(snapshot: SessionSnapshot): string {
  switch (snapshot.stage) {
    case 'idle':
      return 'Search';
    case 'searching':
      return 'Searching';
    case 'results':
      return 'Results';
    case 'episodes':
      return snapshot.episodesLoading ? 'Loading episodes' : 'Episodes';
    case 'resolving':
      return 'Resolving stream';
    case 'ready':
      return 'Ready';
    case 'error':
      return 'Error';
  }
}

function listLines(snapshot: SessionSnapshot, view: ViewState, height: number): string[] {
  const marker = (index: number) => (index === view.cursor ? '>' : ' ');

  if (snapshot.stage === 'results') {
    if (snapshot.results.length === 0) return ['No results.'];
    return snapshot.results.slice(view.scroll, view.scroll + height).map((result, offset) => {
      const index = view.scroll + offset;
      const alt = result.altTitle ? ` (${result.altTitle})` : '';
      const count = result.episodeCount !== undefined ? ` · ${result.episodeCount} eps` : '';
      return `${marker(index)} ${index + 1}. ${result.title}${alt}${count} [${result.source}]`;
    });
  }

  return snapshot.episodes.slice(view.scroll, view.scroll + height).map((episode, offset) => {
    const index = view.scroll + offset;
    const title = episode.title ? ` · ${episode.title}` : '';
    return `${marker(index)} Episode ${episode.label}${title}`;
  });
}

function bodyLines(snapshot: SessionSnapshot, view: ViewState, height: number): string[] {
  const show = snapshot.selectedResult?.title ?? '';
  const episode = snapshot.selectedEpisode?.label ?? '';

  switch (snapshot.stage) {
    case 'idle':
      return ['Type a title and press enter to search.'];
    case 'searching':
      return [`Searching for "${snapshot.query}"…`];
    case 'results':
      return listLines(snapshot, view, height);
    case 'episodes':
      if (snapshot.episodesLoading) return [`Loading episodes of ${show}…`];
      return listLines(snapshot, view, height);
    case 'resolving':
      return [`Resolving episode ${episode} of ${show}…`];
    case 'ready': {
      const lines = [`Playing ${show} episode ${episode}`];
      if (snapshot.stream) {
        lines.push(`Stream: ${snapshot.stream.url}`);
        if (snapshot.stream.sourceName) lines.push(`Provider: ${snapshot.stream.sourceName}`);
      }
      return lines;
    }
    case 'error':
      return [`Error: ${snapshot.lastError?.message ?? 'unknown error'}`, '', 'Press r to retry or esc to go back.'];
  }
}

function keyHints(snapshot: SessionSnapshot, view: ViewState): string {
  if (view.editing) {
    return snapshot.stage === 'idle'
      ? 'enter search · esc clear · ctrl+c quit'
      : 'enter search · esc cancel · ctrl+c quit';
  }
  if (snapshot.pending) {
    return 'esc cancel · q quit';
  }
  switch (snapshot.stage) {
    case 'results':
    case 'episodes':
      return '↑/↓ move · enter select · / search · esc back · q quit';
    case 'ready':
      return 'n next episode · esc back · / search · q quit';
    case 'error':
      return 'r retry · esc back · / search · q quit';
    default:
      return '/ search · q quit';
  }
}

function statusLine(snapshot: SessionSnapshot, view: ViewState): string {
  if (snapshot.lastError && snapshot.stage !== 'error') {
    return `! ${snapshot.lastError.message}`;
  }
  if (snapshot.notice) {
    return snapshot.notice;
  }
  return keyHints(snapshot, view);
}

/**
 * Render the whole screen. Always returns exactly `size.rows` lines, none
 * longer than `size.columns`.
 */
export function render(snapshot: SessionSnapshot, view: ViewState, size: TerminalSize): string[] {
  const width = Math.max(1, size.columns);
  const height = listHeight(size);
  const separator = '─'.repeat(width);
  const prompt = view.editing ? `${view.input}█` : snapshot.query;

  const body = bodyLines(snapshot, view, height).slice(0, height);
  while (body.length < height) {
    body.push('');
  }

  const lines = [`shio · ${stageLabel(snapshot)}`, `Search: ${prompt}`, separator, ...body, separator];
  lines.push(statusLine(snapshot, view));

  return lines.slice(0, Math.max(1, size.rows)).map((line) => truncate(line, width));
}

/**
 * Terminal escape sequence redrawing the screen with these lines
 */
export function frame(lines: string[]): string {
  return `\x1b[H${lines.map((line) => `${line}\x1b[K`).join('\r\n')}\x1b[J`;
}

import { ConfigError } from '../errors/custom-errors.js';
import type { StreamDescriptor } from '../types/anime.types.js';

export const PLACEHOLDERS = ['url', 'user_agent', 'referer', 'headers'] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

type Segment = { type: 'text'; value: string } | { type: 'placeholder'; name: Placeholder };

/**
 * One argv entry of the player command, before substitution
 */
export type TemplateToken = Segment[];

/**
 * Parsed player command template
 */
export type CommandTemplate = {
  source: string;
  tokens: TemplateToken[];
};

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((p) => p === name);
}

function invalid(template: string, reason: string): ConfigError {
  return new ConfigError(`Invalid player command template "${template}": ${reason}`);
}

/**
 * Split a command template into argv tokens.
 *
 * Tokens are separated by unquoted whitespace. Single quotes keep their content
 * literal except for placeholders, double quotes group words, and a backslash
 * outside single quotes escapes the next character. `{url}`, `{user_agent}`,
 * `{referer}` and `{headers}` may appear anywhere inside a token.
 *
 * @throws ConfigError when the template is empty, has unbalanced quotes or
 * braces, names an unknown placeholder, uses a placeholder as the executable,
 * or lacks `{url}`
 */
export function parseCommandTemplate(template: string): CommandTemplate {
  const tokens: TemplateToken[] = [];
  let segments: Segment[] = [];
  let text = '';
  let started = false;
  let quote: "'" | '"' | null = null;

  const flushText = () => {
    if (text) {
      segments.push({ type: 'text', value: text });
      text = '';
    }
  };

  const endToken = () => {
    flushText();
    if (started) {
      tokens.push(segments);
    }
    segments = [];
    started = false;
  };

  for (let i = 0; i < template.length; i++) {
    const char = template.charAt(i);

    if (quote === null && /\s/.test(char)) {
      endToken();
      continue;
    }

    started = true;

    if (char === "'" && quote !== '"') {
      quote = quote === "'" ? null : "'";
      continue;
    }

    if (char === '"' && quote !== "'") {
      quote = quote === '"' ? null : '"';
      continue;
    }

    if (char === '\\' && quote !== "'") {
      if (i + 1 >= template.length) {
        throw invalid(template, 'trailing backslash');
      }
      i++;
      text += template.charAt(i);
      continue;
    }

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        throw invalid(template, `unclosed "{" at position ${i}`);
      }
      const name = template.slice(i + 1, close);
      if (!isPlaceholder(name)) {
        const expected = PLACEHOLDERS.map((p) => `{${p}}`).join(', ');
        throw invalid(template, `unknown placeholder "{${name}}" (expected one of ${expected})`);
      }
      flushText();
      segments.push({ type: 'placeholder', name });
      i = close;
      continue;
    }

    if (char === '}') {
      throw invalid(template, `unmatched "}" at position ${i}`);
    }

    text += char;
  }

  if (quote !== null) {
    throw invalid(template, `unterminated ${quote === '"' ? 'double' : 'single'} quote`);
  }

  endToken();

  const [executable] = tokens;
  if (!executable) {
    throw invalid(template, 'command is empty');
  }

  if (executable.some((segment) => segment.type === 'placeholder')) {
    throw invalid(template, 'the executable cannot be a placeholder');
  }

  const hasUrl = tokens.some((token) => token.some((s) => s.type === 'placeholder' && s.name === 'url'));
  if (!hasUrl) {
    throw invalid(template, 'missing {url} placeholder');
  }

  return { source: template, tokens };
}

function placeholderValue(name: Placeholder, descriptor: StreamDescriptor): string {
  switch (name) {
    case 'url':
      return descriptor.url;
    case 'user_agent':
      return descriptor.userAgent ?? '';
    case 'referer':
      return descriptor.referer ?? '';
    case 'headers':
      return formatHeaders(descriptor.headers);
  }
}

/**
 * Extra headers as `Name: value` pairs joined by commas, the form mpv takes in --http-header-fields
 */
export function formatHeaders(headers: Record<string, string> | undefined): string {
  return Object.entries(headers ?? {})
    .map(([name, value]) => `${name}: ${value}`)
    .join(',');
}

/**
 * Substitute a stream descriptor into a parsed template.
 * A token made only of placeholders that all substitute to empty is dropped.
 *
 * @returns argv, executable first
 */
export function buildArgv(template: CommandTemplate, descriptor: StreamDescriptor): string[] {
  const argv: string[] = [];

  for (const token of template.tokens) {
    const value = token
      .map((segment) => (segment.type === 'text' ? segment.value : placeholderValue(segment.name, descriptor)))
      .join('');

    const onlyPlaceholders = token.every((segment) => segment.type === 'placeholder');
    if (value === '' && onlyPlaceholders && token.length > 0) {
      continue;
    }

    argv.push(value);
  }

  return argv;
}

/**
 * Render the command line the player will be started with
 */
export function renderCommand(template: string | CommandTemplate, descriptor: StreamDescriptor): string {
  const parsed = typeof template === 'string' ? parseCommandTemplate(template) : template;
  return buildArgv(parsed, descriptor).join(' ');
}

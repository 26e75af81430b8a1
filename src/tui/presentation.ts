import { describeServer } from '../types/server-descriptor.js';
import type { SessionState } from '../types/session-types.js';
import type { ServerLookup } from '../lib/server-registry.js';

export const SELECTOR_WIDTH = 24;
export const MIN_LOG_WIDTH = 40;
// Rows reserved for status, help and the input box
export const CHROME_ROWS = 6;
export const INPUT_PROMPT = '> ';
export const INPUT_PLACEHOLDER = 'Type RCON command, press Enter to send';
export const HELP_TEXT =
  ' [Tab] switch | [Ctrl+S] start | [Ctrl+X] stop | [Ctrl+R] restart | [Ctrl+D] status | [Ctrl+C] quit';

export interface Rect {
  top: number;
  left: number;
  width: number;
  height: number;
}

export interface DashboardFrame {
  selector: Rect & { items: string[]; selectedIndex: number };
  log: Rect & { lines: readonly string[] };
  status: Rect & { text: string; help: string };
  input: Rect & { text: string; placeholder: boolean };
}

export interface RenderOptions {
  now: number;
  /** 0 keeps the status until it is replaced */
  statusTimeoutMs: number;
  inputText: string;
}

/**
 * Transient status if still fresh, otherwise a description of the active server
 */
export function statusLine(
  state: SessionState,
  registry: ServerLookup,
  now: number,
  statusTimeoutMs: number
): string {
  const fresh =
    state.statusText !== '' &&
    (statusTimeoutMs <= 0 || now - state.statusSetAt < statusTimeoutMs);

  let text: string;
  if (fresh) {
    text = state.statusText;
  } else {
    const server = state.activeServerName ? registry.lookup(state.activeServerName) : undefined;
    text = server ? describeServer(server) : 'No active server';
  }

  if (state.pending > 0) {
    text += ` | ${state.pending} pending`;
  }
  return text;
}

/**
 * Break a log line into rows of at most `width` characters
 */
export function wrapLine(line: string, width: number): string[] {
  const chars = Array.from(line);
  if (width <= 0 || chars.length <= width) return [line];

  const rows: string[] = [];
  for (let i = 0; i < chars.length; i += width) {
    rows.push(chars.slice(i, i + width).join(''));
  }
  return rows;
}

/**
 * The last `height` terminal rows of the log, wrapped to `width`.
 * The newest line is always the bottom row.
 */
export function visibleRows(log: readonly string[], width: number, height: number): string[] {
  if (height <= 0) return [];

  const rows: string[] = [];
  for (let i = log.length - 1; i >= 0 && rows.length < height; i--) {
    rows.unshift(...wrapLine(log[i], width));
  }
  return rows.slice(Math.max(0, rows.length - height));
}

/**
 * Project session state into a frame. Pure: nothing is kept between calls.
 */
export function renderFrame(
  state: SessionState,
  registry: ServerLookup,
  options: RenderOptions
): DashboardFrame {
  const { width, height } = state.viewport;
  const logWidth = Math.max(MIN_LOG_WIDTH, width - SELECTOR_WIDTH - 2);
  const logHeight = Math.max(0, height - CHROME_ROWS);
  const selectorHeight = Math.max(0, height - 5);
  const statusTop = Math.max(0, height - 5);

  const items: string[] = [];
  for (let i = 0; i < registry.size; i++) {
    const server = registry.at(i);
    if (server) items.push(server.name);
  }

  return {
    selector: {
      top: 0,
      left: 0,
      width: SELECTOR_WIDTH,
      height: selectorHeight,
      items,
      selectedIndex: state.selectionIndex,
    },
    log: {
      top: 0,
      left: SELECTOR_WIDTH + 1,
      width: logWidth,
      height: logHeight,
      lines: visibleRows(state.log, logWidth, logHeight),
    },
    status: {
      top: statusTop,
      left: 0,
      width: Math.max(0, width),
      height: 2,
      text: statusLine(state, registry, options.now, options.statusTimeoutMs),
      help: HELP_TEXT,
    },
    input: {
      top: statusTop + 2,
      left: 0,
      width: SELECTOR_WIDTH + 1 + logWidth,
      height: 3,
      text: INPUT_PROMPT + (options.inputText || INPUT_PLACEHOLDER),
      placeholder: options.inputText === '',
    },
  };
}

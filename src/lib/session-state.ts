import type { SessionState } from '../types/session-types.js';
import type { ServerLookup } from './server-registry.js';
import { appendLog } from './log-buffer.js';

/**
 * Initial session: first server active, or nothing selected for an empty registry
 */
export function createSessionState(registry: ServerLookup): SessionState {
  let state: SessionState = {
    activeServerName: undefined,
    log: ['Ready.'],
    statusText: '',
    statusSetAt: 0,
    selectionIndex: 0,
    viewport: { width: 0, height: 0 },
    pending: 0,
    quitting: false,
  };

  const first = registry.at(0);
  if (first) {
    state = {
      ...state,
      activeServerName: first.name,
      log: appendLog(state.log, `Active server: ${first.name}`),
    };
  } else {
    state = { ...state, log: appendLog(state.log, '⚠️ No servers configured. Please check config.yaml') };
  }

  return state;
}

export function withLog(state: SessionState, lines: string | readonly string[]): SessionState {
  return { ...state, log: appendLog(state.log, lines) };
}

export function withStatus(state: SessionState, text: string, now: number): SessionState {
  return { ...state, statusText: text, statusSetAt: now };
}

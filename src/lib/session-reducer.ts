import type { ServerDescriptor } from '../types/server-descriptor.js';
import type {
  CommandResult,
  ContainerAction,
  SessionEvent,
  SessionState,
  Transition,
} from '../types/session-types.js';
import type { ServerLookup } from './server-registry.js';
import { formatEntry } from './log-buffer.js';
import { withLog, withStatus } from './session-state.js';

export const NO_ACTIVE_SERVER = '❌ No active server selected.';

interface ContainerActionText {
  verb: string;
  status: string;
}

const CONTAINER_ACTION_TEXT: Record<ContainerAction, ContainerActionText> = {
  start: { verb: 'Starting container', status: 'Starting container…' },
  stop: { verb: 'Stopping container', status: 'Stopping container…' },
  restart: { verb: 'Restarting container', status: 'Restarting container…' },
  status: { verb: 'Checking status', status: 'Checking status…' },
};

function activeServer(state: SessionState, registry: ServerLookup): ServerDescriptor | undefined {
  if (!state.activeServerName) return undefined;
  return registry.lookup(state.activeServerName);
}

function select(state: SessionState, registry: ServerLookup, step: 1 | -1): Transition {
  const count = registry.size;
  if (count === 0) return { state };

  const index = (((state.selectionIndex + step) % count) + count) % count;
  const server = registry.at(index);
  if (!server) return { state };

  const next = { ...state, selectionIndex: index, activeServerName: server.name };
  return { state: withLog(next, `Active server: ${server.name}`) };
}

function submitCommand(state: SessionState, registry: ServerLookup, text: string, now: number): Transition {
  const command = text.trim();
  if (command === '') return { state };

  const server = activeServer(state, registry);
  if (!server) {
    return { state: withLog(state, NO_ACTIVE_SERVER) };
  }

  let next = withLog(state, formatEntry(`[${server.name}] > `, command));
  next = withStatus(next, 'Sending…', now);
  next = { ...next, pending: next.pending + 1 };

  return {
    state: next,
    effect: { type: 'launch', request: { kind: 'rcon', target: server, payload: command } },
  };
}

function containerAction(
  state: SessionState,
  registry: ServerLookup,
  action: ContainerAction,
  now: number
): Transition {
  const server = activeServer(state, registry);
  if (!server) {
    return { state: withLog(state, NO_ACTIVE_SERVER) };
  }
  if (!server.containerRef) {
    return { state: withLog(state, `[${server.name}] ⚠️ No container configured`) };
  }

  const text = CONTAINER_ACTION_TEXT[action];
  let next = withLog(state, `[${server.name}] 🐳 ${text.verb}: ${server.containerRef}`);
  next = withStatus(next, text.status, now);
  next = { ...next, pending: next.pending + 1 };

  return {
    state: next,
    effect: { type: 'launch', request: { kind: 'container', target: server, payload: action } },
  };
}

// Only an exactly empty reply gets the placeholder; trailing newlines are dropped
function displayOutput(output: string | undefined, placeholder: string): string {
  const raw = output ?? '';
  return raw === '' ? placeholder : raw.trimEnd();
}

function applyResult(state: SessionState, result: CommandResult, now: number): Transition {
  const settled = { ...state, pending: Math.max(0, state.pending - 1) };
  const tag = `[${result.serverName}]`;

  switch (result.kind) {
    case 'rcon': {
      if (result.error) {
        const next = withLog(settled, formatEntry(`${tag} ⚠️ ERROR: `, result.error.message));
        return { state: withStatus(next, 'Command failed', now) };
      }
      const output = displayOutput(result.output, '(no response)');
      const next = withLog(settled, formatEntry(`${tag} < `, output));
      return { state: withStatus(next, 'OK', now) };
    }
    case 'container': {
      if (result.error) {
        const next = withLog(settled, formatEntry(`${tag} 🐳 ${result.action} ERROR: `, result.error.message));
        return { state: withStatus(next, `Container ${result.action} failed`, now) };
      }
      const output = displayOutput(result.output, 'success');
      const next = withLog(settled, formatEntry(`${tag} 🐳 ${result.action}: `, output));
      return { state: withStatus(next, `Container ${result.action} OK`, now) };
    }
  }
}

/**
 * Pure session state machine: (state, event) → (state, optional effect).
 * Once quitting, every event is ignored.
 */
export function reduce(
  state: SessionState,
  event: SessionEvent,
  registry: ServerLookup,
  now: number = Date.now()
): Transition {
  if (state.quitting) {
    return { state };
  }

  switch (event.type) {
    case 'resize':
      return { state: { ...state, viewport: { width: event.width, height: event.height } } };
    case 'select-next':
      return select(state, registry, 1);
    case 'select-previous':
      return select(state, registry, -1);
    case 'submit-command':
      return submitCommand(state, registry, event.text, now);
    case 'container-action':
      return containerAction(state, registry, event.action, now);
    case 'quit':
      return { state: { ...state, quitting: true }, effect: { type: 'quit' } };
    case 'notice':
      return { state: withLog(state, event.text) };
    case 'command-result':
      return applyResult(state, event.result, now);
  }
}

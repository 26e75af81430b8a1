import type {
  CommandRequest,
  CommandResult,
  SessionEffect,
  SessionEvent,
  SessionState,
} from '../types/session-types.js';
import type { ServerLookup } from './server-registry.js';
import { type ControlProtocolClient, executeRcon } from './rcon-executor.js';
import { type ProcessRunner, executeContainerAction } from './container-executor.js';
import type { SessionLogger } from './session-logger.js';
import { reduce } from './session-reducer.js';
import { createSessionState } from './session-state.js';
import { ExecutionError, errorMessage, toErrorInfo } from './errors.js';

export interface DispatcherOptions {
  registry: ServerLookup;
  rconClient: ControlProtocolClient;
  containerRunner: ProcessRunner;
  logger?: SessionLogger;
  initialState?: SessionState;
  now?: () => number;
  /** Called after each batch of queued events has been applied */
  onChange?: (state: SessionState) => void;
  /** Called once when the session reaches its terminal state */
  onQuit?: () => void;
}

// Executors resolve rather than reject; this covers anything they did not anticipate
function failedResult(request: CommandRequest, error: unknown): CommandResult {
  const info = toErrorInfo(new ExecutionError(errorMessage(error)));
  const base = { serverName: request.target.name, label: request.payload, error: info };
  switch (request.kind) {
    case 'rcon':
      return { kind: 'rcon', ...base };
    case 'container':
      return { kind: 'container', action: request.payload, ...base };
  }
}

/**
 * Owns the session state and a FIFO event queue.
 * Events are reduced one at a time; executor results re-enter through the same queue.
 */
export class EventDispatcher {
  private state: SessionState;
  private queue: SessionEvent[] = [];
  private draining = false;
  private stopped = false;
  private inFlight = new Set<Promise<void>>();
  private readonly options: DispatcherOptions;
  private readonly now: () => number;

  constructor(options: DispatcherOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.state = options.initialState ?? createSessionState(options.registry);
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Enqueue an event. Ignored after quit.
   */
  dispatch(event: SessionEvent): void {
    if (this.stopped) return;
    this.queue.push(event);
    this.drain();
  }

  /**
   * Resolves when every launched executor has delivered its result
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private drain(): void {
    // Re-entrant dispatches (e.g. from onChange) are picked up by the running loop
    if (this.draining) return;
    this.draining = true;

    try {
      while (this.queue.length > 0 && !this.stopped) {
        const event = this.queue.shift();
        if (!event) break;

        const transition = reduce(this.state, event, this.options.registry, this.now());
        this.state = transition.state;

        if (transition.effect) {
          this.runEffect(transition.effect);
        }
      }
    } finally {
      this.draining = false;
    }

    if (this.stopped) {
      this.queue = [];
      return;
    }
    this.options.onChange?.(this.state);
  }

  private runEffect(effect: SessionEffect): void {
    switch (effect.type) {
      case 'launch':
        this.launch(effect.request);
        break;
      case 'quit':
        this.stopped = true;
        this.options.onQuit?.();
        break;
    }
  }

  private launch(request: CommandRequest): void {
    this.options.logger?.logRequest(request);

    const task: Promise<void> = this.execute(request)
      .catch((error) => failedResult(request, error))
      .then((result) => {
        this.options.logger?.logResult(result);
        this.dispatch({ type: 'command-result', result });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  private execute(request: CommandRequest): Promise<CommandResult> {
    switch (request.kind) {
      case 'rcon':
        return executeRcon(this.options.rconClient, request.target, request.payload);
      case 'container':
        return executeContainerAction(this.options.containerRunner, request.target, request.payload);
    }
  }
}

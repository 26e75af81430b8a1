import { describe, it, expect, vi } from 'vitest';
import { EventDispatcher } from './event-dispatcher.js';
import { SessionLogger } from './session-logger.js';
import { createRegistry, createServer } from '../../tests/fixtures/servers.js';
import { createMockProcessRunner, createMockRconClient } from '../../tests/mocks/index.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// Lets pending executor promises run their continuations
const settle = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('EventDispatcher', () => {
  it('should deliver an executor result back into the log', async () => {
    const { client } = createMockRconClient({ status: 'Online' });
    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: client,
      containerRunner: createMockProcessRunner(),
      now: () => 1000,
    });

    dispatcher.dispatch({ type: 'submit-command', text: 'status' });
    expect(dispatcher.getState().pending).toBe(1);

    await dispatcher.whenIdle();
    const state = dispatcher.getState();

    expect(state.log.slice(-2)).toEqual(['[A] > status', '[A] < Online']);
    expect(state.statusText).toBe('OK');
    expect(state.pending).toBe(0);
  });

  it('should append overlapping results in arrival order', async () => {
    const first = deferred<string>();
    const second = deferred<string>();
    const { client, connection } = createMockRconClient();
    connection.execute.mockImplementation((command: string) =>
      command === 'first' ? first.promise : second.promise
    );

    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: client,
      containerRunner: createMockProcessRunner(),
    });

    dispatcher.dispatch({ type: 'submit-command', text: 'first' });
    dispatcher.dispatch({ type: 'submit-command', text: 'second' });
    expect(dispatcher.getState().pending).toBe(2);

    second.resolve('two');
    await settle();
    expect(dispatcher.getState().log.slice(-1)).toEqual(['[A] < two']);
    expect(dispatcher.getState().pending).toBe(1);

    first.resolve('one');
    await dispatcher.whenIdle();

    expect(dispatcher.getState().log.slice(-4)).toEqual([
      '[A] > first',
      '[A] > second',
      '[A] < two',
      '[A] < one',
    ]);
    expect(connection.close).toHaveBeenCalledTimes(2);
  });

  it('should route container actions to the process runner', async () => {
    const runner = createMockProcessRunner({ output: 'running\n', exitCode: 0 });
    const dispatcher = new EventDispatcher({
      registry: createRegistry(createServer({ containerRef: 'mc-1' })),
      rconClient: createMockRconClient().client,
      containerRunner: runner,
    });

    dispatcher.dispatch({ type: 'container-action', action: 'status' });
    await dispatcher.whenIdle();

    expect(runner.run).toHaveBeenCalledWith(['inspect', '--format', '{{.State.Status}}', 'mc-1']);
    expect(dispatcher.getState().log.slice(-1)).toEqual(['[A] 🐳 status: running']);
    expect(dispatcher.getState().statusText).toBe('Container status OK');
  });

  it('should never call the runner for a server without a container', async () => {
    const runner = createMockProcessRunner();
    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: createMockRconClient().client,
      containerRunner: runner,
    });

    dispatcher.dispatch({ type: 'container-action', action: 'start' });
    await dispatcher.whenIdle();

    expect(runner.run).not.toHaveBeenCalled();
    expect(dispatcher.getState().log.slice(-1)).toEqual(['[A] ⚠️ No container configured']);
  });

  it('should notify after every dispatch', () => {
    const onChange = vi.fn();
    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: createMockRconClient().client,
      containerRunner: createMockProcessRunner(),
      onChange,
    });

    dispatcher.dispatch({ type: 'resize', width: 80, height: 24 });
    dispatcher.dispatch({ type: 'submit-command', text: '' });

    expect(onChange).toHaveBeenCalledTimes(2);
    expect(onChange).toHaveBeenLastCalledWith(dispatcher.getState());
  });

  it('should stop on quit and drop late results', async () => {
    const reply = deferred<string>();
    const { client, connection } = createMockRconClient();
    connection.execute.mockImplementation(() => reply.promise);
    const onQuit = vi.fn();
    const onChange = vi.fn();

    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: client,
      containerRunner: createMockProcessRunner(),
      onQuit,
      onChange,
    });

    dispatcher.dispatch({ type: 'submit-command', text: 'status' });
    dispatcher.dispatch({ type: 'quit' });
    const logAtQuit = dispatcher.getState().log;

    expect(onQuit).toHaveBeenCalledTimes(1);

    reply.resolve('Online');
    await dispatcher.whenIdle();
    dispatcher.dispatch({ type: 'select-next' });

    expect(dispatcher.getState().log).toBe(logAtQuit);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('should record requests and results with the session logger', async () => {
    const logger = new SessionLogger(false);
    const logRequest = vi.spyOn(logger, 'logRequest');
    const logResult = vi.spyOn(logger, 'logResult');
    const { client } = createMockRconClient({ status: 'Online' });

    const dispatcher = new EventDispatcher({
      registry: createRegistry(),
      rconClient: client,
      containerRunner: createMockProcessRunner(),
      logger,
    });

    dispatcher.dispatch({ type: 'submit-command', text: 'status' });
    await dispatcher.whenIdle();

    expect(logRequest).toHaveBeenCalledWith(expect.objectContaining({ kind: 'rcon', payload: 'status' }));
    expect(logResult).toHaveBeenCalledWith({ kind: 'rcon', serverName: 'A', label: 'status', output: 'Online' });
  });
});

import blessed from 'blessed';
import type { ServerLookup } from '../lib/server-registry.js';
import { EventDispatcher } from '../lib/event-dispatcher.js';
import { KeyboardManager, type KeyEvent } from '../lib/keyboard-manager.js';
import type { ControlProtocolClient } from '../lib/rcon-executor.js';
import type { ProcessRunner } from '../lib/container-executor.js';
import type { SessionLogger } from '../lib/session-logger.js';
import type { SessionState } from '../types/session-types.js';
import { type DashboardFrame, type Rect, renderFrame } from './presentation.js';
import { InputLine } from './input-line.js';

export interface DashboardOptions {
  registry: ServerLookup;
  rconClient: ControlProtocolClient;
  containerRunner: ProcessRunner;
  logger?: SessionLogger;
  statusTimeoutSeconds: number;
}

function place(element: blessed.Widgets.BoxElement, rect: Rect): void {
  element.top = rect.top;
  element.left = rect.left;
  element.width = rect.width;
  element.height = rect.height;
}

function selectorContent(frame: DashboardFrame['selector']): string {
  let content = '{bold}{blue-fg}Servers{/blue-fg}{/bold}\n';
  frame.items.forEach((name, i) => {
    const label = blessed.escape(name);
    content += i === frame.selectedIndex
      ? `{cyan-bg}{15-fg}► ${label}{/15-fg}{/cyan-bg}\n`
      : `  ${label}\n`;
  });
  return content;
}

/**
 * Server dashboard: selector column, rolling log, status line and command input.
 * Resolves when the operator quits.
 */
export function createDashboardUI(
  screen: blessed.Widgets.Screen,
  options: DashboardOptions
): Promise<void> {
  const keyboard = new KeyboardManager();
  const input = new InputLine();
  let tickId: NodeJS.Timeout | null = null;

  const selectorBox = blessed.box({ tags: true });
  // Rows arrive pre-wrapped; letting blessed wrap again would push the newest ones off the bottom
  const logBox = blessed.box({ tags: false, wrap: false });
  const statusBox = blessed.box({ tags: true });
  const inputBox = blessed.box({
    tags: false,
    border: { type: 'line' },
    style: {
      border: { fg: 'blue' },
    },
  });

  screen.append(selectorBox);
  screen.append(logBox);
  screen.append(statusBox);
  screen.append(inputBox);

  function draw(state: SessionState): void {
    const frame = renderFrame(state, options.registry, {
      now: Date.now(),
      statusTimeoutMs: options.statusTimeoutSeconds * 1000,
      inputText: input.value,
    });

    place(selectorBox, frame.selector);
    selectorBox.setContent(selectorContent(frame.selector));

    place(logBox, frame.log);
    logBox.setContent(frame.log.lines.join('\n'));

    place(statusBox, frame.status);
    statusBox.setContent(
      `{gray-fg}${blessed.escape(frame.status.text)}\n${blessed.escape(frame.status.help)}{/gray-fg}`
    );

    place(inputBox, frame.input);
    inputBox.style.fg = frame.input.placeholder ? 'gray' : 'white';
    inputBox.setContent(frame.input.text);

    screen.render();
  }

  return new Promise((resolve) => {
    const dispatcher = new EventDispatcher({
      registry: options.registry,
      rconClient: options.rconClient,
      containerRunner: options.containerRunner,
      logger: options.logger,
      onChange: draw,
      onQuit: () => {
        if (tickId) clearInterval(tickId);
        keyboard.clearAll();
        screen.destroy();
        resolve();
      },
    });

    options.logger?.setFailureHandler((message) => {
      dispatcher.dispatch({ type: 'notice', text: `⚠️ ${message}` });
    });

    const redraw = () => draw(dispatcher.getState());

    keyboard.pushContext(
      'dashboard',
      {
        'tab': () => dispatcher.dispatch({ type: 'select-next' }),
        'S-tab': () => dispatcher.dispatch({ type: 'select-previous' }),
        'enter': () => dispatcher.dispatch({ type: 'submit-command', text: input.take() }),
        'C-s': () => dispatcher.dispatch({ type: 'container-action', action: 'start' }),
        'C-x': () => dispatcher.dispatch({ type: 'container-action', action: 'stop' }),
        'C-r': () => dispatcher.dispatch({ type: 'container-action', action: 'restart' }),
        'C-d': () => dispatcher.dispatch({ type: 'container-action', action: 'status' }),
        'C-c': () => dispatcher.dispatch({ type: 'quit' }),
      },
      true,
      (ch: string | undefined, key: KeyEvent) => {
        if (!input.handleKey(ch, key)) return false;
        redraw();
        return true;
      }
    );

    screen.on('keypress', (ch: string | undefined, key: blessed.Widgets.Events.IKeyEventArg) => {
      keyboard.handleKeypress(ch, key);
    });

    screen.on('resize', () => {
      dispatcher.dispatch({
        type: 'resize',
        width: (screen.width as number) || 80,
        height: (screen.height as number) || 24,
      });
    });

    // Expire the transient status line
    tickId = setInterval(redraw, 1000);

    dispatcher.dispatch({
      type: 'resize',
      width: (screen.width as number) || 80,
      height: (screen.height as number) || 24,
    });
  });
}

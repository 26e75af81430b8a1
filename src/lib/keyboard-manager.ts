/**
 * Subset of blessed's key event that routing depends on
 */
export interface KeyEvent {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

/**
 * Handler function for keyboard events.
 * Return false to indicate the key was not handled and should propagate to lower contexts.
 * Return void/true to indicate the key was handled and should not propagate.
 */
export interface KeyHandler {
  (ch: string | undefined, key: KeyEvent): void | boolean;
}

export interface KeyHandlerMap {
  [key: string]: KeyHandler;
}

interface KeyboardContext {
  name: string;
  handlers: KeyHandlerMap;
  /** Receives keys no handler in this context matched */
  fallback?: KeyHandler;
  /** If true, prevent keys from propagating to lower contexts (even if not handled) */
  blocking: boolean;
}

/**
 * Context-stacked key routing on top of blessed's screen 'keypress' event.
 *
 * blessed fires every screen.key() handler that matches, with no way to stop
 * propagation, so the dashboard installs a single keypress listener and routes
 * through this stack instead. The dashboard pushes one blocking `dashboard`
 * context whose fallback feeds unbound keys to the input line.
 */
export class KeyboardManager {
  private contextStack: KeyboardContext[] = [];

  /**
   * Route a keypress to the top-most context.
   * @returns true if some context consumed the key
   */
  handleKeypress(ch: string | undefined, key: KeyEvent): boolean {
    for (let i = this.contextStack.length - 1; i >= 0; i--) {
      const context = this.contextStack[i];

      if (this.tryContext(context, ch, key)) {
        return true;
      }

      if (context.blocking) {
        return false;
      }
    }

    return false;
  }

  private tryContext(context: KeyboardContext, ch: string | undefined, key: KeyEvent): boolean {
    // Full key name first (e.g. "C-s", "S-tab"), then the bare name, then the character
    const fullKey = key.full || key.name;
    let handler = fullKey ? context.handlers[fullKey] : undefined;

    if (!handler && key.name && !key.ctrl && !key.meta) {
      handler = context.handlers[key.name];
    }

    if (!handler && ch) {
      handler = context.handlers[ch];
    }

    if (handler) {
      return handler(ch, key) !== false;
    }

    if (context.fallback) {
      return context.fallback(ch, key) !== false;
    }

    return false;
  }

  /**
   * Push a new keyboard context onto the stack.
   * @param blocking - keys this context does not handle stop here (default: true)
   */
  pushContext(name: string, handlers: KeyHandlerMap, blocking = true, fallback?: KeyHandler): void {
    this.contextStack.push({ name, handlers, blocking, fallback });
  }

  popContext(): void {
    this.contextStack.pop();
  }

  getCurrentContextName(): string | null {
    return this.contextStack.length > 0
      ? this.contextStack[this.contextStack.length - 1].name
      : null;
  }

  getContextStack(): string[] {
    return this.contextStack.map((c) => c.name);
  }

  clearAll(): void {
    this.contextStack = [];
  }
}

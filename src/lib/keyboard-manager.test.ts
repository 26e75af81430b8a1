import { describe, it, expect, vi } from 'vitest';
import { KeyboardManager } from './keyboard-manager.js';

describe('KeyboardManager', () => {
  it('should route a key to the matching handler', () => {
    const keyboard = new KeyboardManager();
    const onTab = vi.fn();
    keyboard.pushContext('main', { tab: onTab });

    const handled = keyboard.handleKeypress('\t', { name: 'tab', full: 'tab' });

    expect(handled).toBe(true);
    expect(onTab).toHaveBeenCalledTimes(1);
  });

  it('should match modified keys by their full name only', () => {
    const keyboard = new KeyboardManager();
    const onCtrlS = vi.fn();
    const onS = vi.fn();
    keyboard.pushContext('main', { 'C-s': onCtrlS, s: onS });

    keyboard.handleKeypress(undefined, { name: 's', full: 'C-s', ctrl: true });

    expect(onCtrlS).toHaveBeenCalledTimes(1);
    expect(onS).not.toHaveBeenCalled();
  });

  it('should not fall back to the bare name for a modified key', () => {
    const keyboard = new KeyboardManager();
    const onS = vi.fn();
    keyboard.pushContext('main', { s: onS });

    const handled = keyboard.handleKeypress(undefined, { name: 's', full: 'C-s', ctrl: true });

    expect(handled).toBe(false);
    expect(onS).not.toHaveBeenCalled();
  });

  it('should pass unmatched keys to the context fallback', () => {
    const keyboard = new KeyboardManager();
    const fallback = vi.fn().mockReturnValue(true);
    keyboard.pushContext('main', { tab: vi.fn() }, true, fallback);

    const handled = keyboard.handleKeypress('a', { name: 'a', full: 'a' });

    expect(handled).toBe(true);
    expect(fallback).toHaveBeenCalledWith('a', { name: 'a', full: 'a' });
  });

  it('should stop at a blocking context', () => {
    const keyboard = new KeyboardManager();
    const lower = vi.fn();
    keyboard.pushContext('main', { q: lower });
    keyboard.pushContext('modal', { enter: vi.fn() }, true);

    const handled = keyboard.handleKeypress('q', { name: 'q', full: 'q' });

    expect(handled).toBe(false);
    expect(lower).not.toHaveBeenCalled();
  });

  it('should fall through a non-blocking context', () => {
    const keyboard = new KeyboardManager();
    const lower = vi.fn();
    keyboard.pushContext('main', { q: lower });
    keyboard.pushContext('overlay', { enter: vi.fn() }, false);

    keyboard.handleKeypress('q', { name: 'q', full: 'q' });

    expect(lower).toHaveBeenCalledTimes(1);
  });

  it('should treat a handler returning false as unhandled', () => {
    const keyboard = new KeyboardManager();
    keyboard.pushContext('main', { enter: () => false });

    expect(keyboard.handleKeypress('\r', { name: 'enter', full: 'enter' })).toBe(false);
  });

  it('should track the context stack', () => {
    const keyboard = new KeyboardManager();
    keyboard.pushContext('main', {});
    keyboard.pushContext('modal', {});

    expect(keyboard.getContextStack()).toEqual(['main', 'modal']);
    expect(keyboard.getCurrentContextName()).toBe('modal');

    keyboard.popContext();
    expect(keyboard.getCurrentContextName()).toBe('main');

    keyboard.clearAll();
    expect(keyboard.getCurrentContextName()).toBeNull();
    expect(keyboard.handleKeypress('x', { name: 'x', full: 'x' })).toBe(false);
  });
});

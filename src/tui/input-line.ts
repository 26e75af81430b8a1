import type { KeyEvent } from '../lib/keyboard-manager.js';

// Control characters other than tab; tab is routed before it reaches the editor
const CONTROL_CHAR = /[\x00-\x08\x0a-\x1f\x7f]/;

/**
 * Single-line command editor fed by keys the dashboard does not bind
 */
export class InputLine {
  private text = '';

  get value(): string {
    return this.text;
  }

  /**
   * Apply an editing key.
   * @returns false when the key is not an editing key
   */
  handleKey(ch: string | undefined, key: KeyEvent): boolean {
    switch (key.full || key.name) {
      case 'backspace':
        this.text = this.text.slice(0, -1);
        return true;
      case 'C-u':
        this.text = '';
        return true;
      case 'C-w':
        this.text = this.text.replace(/\S+\s*$/, '');
        return true;
    }

    if (ch && !key.ctrl && !key.meta && !CONTROL_CHAR.test(ch) && ch !== '\t') {
      this.text += ch;
      return true;
    }

    return false;
  }

  /**
   * Return the current text and reset the editor
   */
  take(): string {
    const value = this.text;
    this.text = '';
    return value;
  }
}

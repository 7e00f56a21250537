import type { GameKey } from './types';

export interface InputSource {
  isKeyDown(key: GameKey): boolean;
}

export type KeyBindings = Record<GameKey, readonly string[]>;

// Physical key codes (KeyboardEvent.code): Shift and Caps Lock don't change them
export const DEFAULT_BINDINGS: KeyBindings = {
  left: ['ArrowLeft', 'KeyA'],
  right: ['ArrowRight', 'KeyD'],
  pause: ['KeyP'],
  restart: ['KeyR'],
  quit: ['Escape'],
};

// Keys the browser would otherwise scroll the page with
const CAPTURED_CODES = new Set(['ArrowLeft', 'ArrowRight', 'ArrowUp', 'ArrowDown', 'Space']);

function codeOf(e: Event): string | null {
  return 'code' in e && typeof e.code === 'string' && e.code !== '' ? e.code : null;
}

/**
 * Polled keyboard state. Listens on `target` (usually `window`) and answers
 * "is this key held right now"; edge detection is left to the caller.
 */
export class KeyboardInput implements InputSource {
  private pressed = new Set<string>();
  private target: EventTarget;
  private bindings: KeyBindings;

  constructor(target: EventTarget, bindings: KeyBindings = DEFAULT_BINDINGS) {
    this.target = target;
    this.bindings = bindings;
    target.addEventListener('keydown', this.handleKeyDown);
    target.addEventListener('keyup', this.handleKeyUp);
    target.addEventListener('blur', this.handleBlur);
  }

  isKeyDown(key: GameKey): boolean {
    return this.bindings[key].some((code) => this.pressed.has(code));
  }

  // Forget held keys, e.g. when focus moved away while one was down
  release(): void {
    this.pressed.clear();
  }

  dispose(): void {
    this.target.removeEventListener('keydown', this.handleKeyDown);
    this.target.removeEventListener('keyup', this.handleKeyUp);
    this.target.removeEventListener('blur', this.handleBlur);
    this.pressed.clear();
  }

  private handleKeyDown = (e: Event) => {
    const code = codeOf(e);
    if (code === null) return;
    this.pressed.add(code);
    if (CAPTURED_CODES.has(code)) e.preventDefault();
  };

  private handleKeyUp = (e: Event) => {
    const code = codeOf(e);
    if (code === null) return;
    this.pressed.delete(code);
  };

  private handleBlur = () => {
    this.release();
  };
}

import type { Color } from './geometry';
import type { InputSource } from './input';
import type { Renderer, TextStyle } from './renderer';
import type { GameKey } from './types';

export type DrawCommand =
  | { op: 'clear'; color: Color }
  | { op: 'rect'; x: number; y: number; width: number; height: number; color: Color }
  | { op: 'circle'; cx: number; cy: number; radius: number; color: Color }
  | { op: 'text'; text: string; x: number; y: number; style: TextStyle }
  | { op: 'present' };

/** Renderer double that keeps every draw call in order. */
export class RecordingRenderer implements Renderer {
  commands: DrawCommand[] = [];

  clear(color: Color): void {
    this.commands.push({ op: 'clear', color });
  }

  fillRect(x: number, y: number, width: number, height: number, color: Color): void {
    this.commands.push({ op: 'rect', x, y, width, height, color });
  }

  fillCircle(cx: number, cy: number, radius: number, color: Color): void {
    this.commands.push({ op: 'circle', cx, cy, radius, color });
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.commands.push({ op: 'text', text, x, y, style });
  }

  present(): void {
    this.commands.push({ op: 'present' });
  }

  texts(): string[] {
    return this.commands.flatMap((c) => (c.op === 'text' ? [c.text] : []));
  }

  reset(): void {
    this.commands = [];
  }
}

export class ScriptedInput implements InputSource {
  private held = new Set<GameKey>();

  constructor(...keys: GameKey[]) {
    for (const key of keys) this.held.add(key);
  }

  isKeyDown(key: GameKey): boolean {
    return this.held.has(key);
  }

  press(key: GameKey): void {
    this.held.add(key);
  }

  releaseKey(key: GameKey): void {
    this.held.delete(key);
  }

  releaseAll(): void {
    this.held.clear();
  }
}

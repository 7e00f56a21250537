import type { LogLevel } from './logger';

export interface Settings {
  haptics: boolean;
  showHitCounts: boolean;
  logLevel: LogLevel;
}

export type GameOutcome = 'victory' | 'defeat';

export interface GameAPI {
  setLives(lives: number): void;
  finish(outcome: GameOutcome): void;
  quit(): void;
  getSettings(): Settings;
  haptics: {
    tap(): void;
    success(): void;
  };
}

export interface GameInstance {
  start(): void;
  pause(): void;
  resume(): void;
  destroy(): void;
}

export type GameFactory = (
  container: HTMLElement,
  api: GameAPI
) => GameInstance;

export interface GameMetadata {
  id: string;
  name: string;
  icon: string;
  disabled?: boolean;
}

export interface GameDefinition extends GameMetadata {
  factory: () => Promise<{ default: GameFactory }>;
}

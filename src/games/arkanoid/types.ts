import type { CircleShape, Color, RectShape, Vec2 } from './geometry';

export enum EntityKind {
  Ball = 'ball',
  Paddle = 'paddle',
  Brick = 'brick',
}

export type EntityId = number;

interface EntityBase {
  readonly id: EntityId;
  // Tombstone: the registry only drops the entity on its next sweep
  destroyed: boolean;
}

export interface Ball extends EntityBase {
  readonly kind: EntityKind.Ball;
  shape: CircleShape;
  velocity: Vec2;
  speed: number;
}

export interface Paddle extends EntityBase {
  readonly kind: EntityKind.Paddle;
  shape: RectShape;
  velocity: Vec2;
  speed: number;
}

export interface Brick extends EntityBase {
  readonly kind: EntityKind.Brick;
  shape: RectShape;
  requiredHits: number;
}

export interface EntityMap {
  [EntityKind.Ball]: Ball;
  [EntityKind.Paddle]: Paddle;
  [EntityKind.Brick]: Brick;
}

export type Entity = EntityMap[EntityKind];

export interface SpawnArgs {
  [EntityKind.Ball]: [x: number, y: number];
  [EntityKind.Paddle]: [x: number, y: number];
  [EntityKind.Brick]: [x: number, y: number, requiredHits?: number];
}

export enum GameStatus {
  Paused = 'paused',
  GameOver = 'game-over',
  InProgress = 'in-progress',
  Victory = 'victory',
}

export type GameKey = 'left' | 'right' | 'pause' | 'restart' | 'quit';

export const SCREEN_WIDTH = 800;
export const SCREEN_HEIGHT = 600;
export const FRAME_RATE = 60;
export const STARTING_LIVES = 3;

export const BALL_RADIUS = 10;
export const BALL_SPEED = 8;
export const BALL_SPAWN: Vec2 = { x: SCREEN_WIDTH / 2, y: SCREEN_HEIGHT / 2 };

export const PADDLE_WIDTH = 60;
export const PADDLE_HEIGHT = 20;
export const PADDLE_SPEED = 8;
export const PADDLE_SPAWN: Vec2 = { x: SCREEN_WIDTH / 2, y: SCREEN_HEIGHT - 50 };

export const BRICK_WIDTH = 60;
export const BRICK_HEIGHT = 20;

export const BACKGROUND_COLOR: Color = { r: 0, g: 0, b: 0, a: 255 };
export const TEXT_COLOR: Color = { r: 255, g: 255, b: 255, a: 255 };
export const BALL_COLOR: Color = { r: 255, g: 0, b: 0, a: 255 };
export const PADDLE_COLOR: Color = { r: 255, g: 0, b: 0, a: 255 };
export const HIT_COUNT_COLOR: Color = { r: 0, g: 0, b: 0, a: 200 };

// Brick fill by remaining hits (index 0 = one hit left); more hits = more opaque
export const BRICK_COLORS: Color[] = [
  { r: 255, g: 255, b: 0, a: 80 },
  { r: 255, g: 255, b: 0, a: 170 },
  { r: 255, g: 255, b: 0, a: 255 },
];

export const STATUS_TEXT: Record<Exclude<GameStatus, GameStatus.InProgress>, string> = {
  [GameStatus.Paused]: 'Paused',
  [GameStatus.GameOver]: 'Game over!',
  [GameStatus.Victory]: 'You won!',
};

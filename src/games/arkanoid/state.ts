import { createLogger } from '../../core/logger';
import { resolveBrickBall, resolvePaddleBall } from './collision';
import { drawEntity, updateEntity, type DrawOptions, type UpdateContext } from './entities';
import type { Edges } from './geometry';
import type { InputSource } from './input';
import { DEFAULT_LAYOUT, isLevelCleared, seedBricks, type LevelLayout } from './levels';
import { EntityRegistry } from './registry';
import type { Renderer } from './renderer';
import {
  EntityKind,
  GameStatus,
  BACKGROUND_COLOR,
  BALL_SPAWN,
  PADDLE_SPAWN,
  SCREEN_HEIGHT,
  SCREEN_WIDTH,
  STARTING_LIVES,
  STATUS_TEXT,
  TEXT_COLOR,
} from './types';

const log = createLogger('arkanoid');

export const PLAY_FIELD: Edges = { left: 0, right: SCREEN_WIDTH, top: 0, bottom: SCREEN_HEIGHT };

const STATUS_TEXT_SIZE = 35;
const LIVES_TEXT_SIZE = 15;
const TEXT_X = 10;
const TEXT_Y = 10;

/** Everything one game needs between frames. Owned by a single game loop. */
export interface GameSession {
  readonly registry: EntityRegistry;
  readonly layout: LevelLayout;
  status: GameStatus;
  remainingLives: number;
  pausePressedLastFrame: boolean;
}

export interface FrameReport {
  quit: boolean;
  previousStatus: GameStatus;
  status: GameStatus;
  remainingLives: number;
  livesLost: number;
  bricksDestroyed: number;
  paddleHits: number;
}

export type RenderOptions = DrawOptions;

// Until the first restart there is nothing to play
export function createSession(layout: LevelLayout = DEFAULT_LAYOUT): GameSession {
  return {
    registry: new EntityRegistry(),
    layout,
    status: GameStatus.GameOver,
    remainingLives: 0,
    pausePressedLastFrame: false,
  };
}

export function restart(session: GameSession): void {
  session.remainingLives = STARTING_LIVES;
  session.status = GameStatus.Paused;

  const { registry } = session;
  registry.clear();
  seedBricks(registry, session.layout);
  registry.create(EntityKind.Ball, BALL_SPAWN.x, BALL_SPAWN.y);
  registry.create(EntityKind.Paddle, PADDLE_SPAWN.x, PADDLE_SPAWN.y);

  log.debug('Session restarted', { entities: registry.size });
}

// Toggle on the press itself, not for every frame the key stays down
function handlePauseKey(session: GameSession, input: InputSource): void {
  if (!input.isKeyDown('pause')) {
    session.pausePressedLastFrame = false;
    return;
  }

  if (!session.pausePressedLastFrame) {
    if (session.status === GameStatus.Paused) {
      session.status = GameStatus.InProgress;
    } else if (session.status === GameStatus.InProgress) {
      session.status = GameStatus.Paused;
    }
  }
  session.pausePressedLastFrame = true;
}

interface SimulationResult {
  livesLost: number;
  bricksDestroyed: number;
  paddleHits: number;
}

function simulate(session: GameSession, input: InputSource): SimulationResult {
  const { registry } = session;
  const result: SimulationResult = { livesLost: 0, bricksDestroyed: 0, paddleHits: 0 };

  // A missing ball means it fell out last frame
  if (registry.count(EntityKind.Ball) === 0) {
    registry.create(EntityKind.Ball, BALL_SPAWN.x, BALL_SPAWN.y);
    session.remainingLives--;
    result.livesLost++;
  }

  if (isLevelCleared(registry)) session.status = GameStatus.Victory;
  if (session.remainingLives <= 0) session.status = GameStatus.GameOver;

  const ctx: UpdateContext = { input, bounds: PLAY_FIELD };
  registry.updateAll((entity) => updateEntity(entity, ctx));

  registry.forEach(EntityKind.Ball, (ball) => {
    registry.forEach(EntityKind.Brick, (brick) => {
      resolveBrickBall(brick, ball);
    });
    registry.forEach(EntityKind.Paddle, (paddle) => {
      if (resolvePaddleBall(paddle, ball)) result.paddleHits++;
    });
  });

  for (const removed of registry.sweep()) {
    if (removed.kind === EntityKind.Brick) result.bricksDestroyed++;
  }
  return result;
}

function drawStatus(status: GameStatus, renderer: Renderer, options: RenderOptions): void {
  if (status === GameStatus.InProgress) return;
  renderer.drawText(STATUS_TEXT[status], TEXT_X, TEXT_Y, {
    size: STATUS_TEXT_SIZE,
    color: TEXT_COLOR,
    family: options.fontFamily,
  });
}

function drawPlayField(session: GameSession, renderer: Renderer, options: RenderOptions): void {
  for (const entity of session.registry.all()) {
    drawEntity(entity, renderer, options);
  }
  renderer.drawText(`Lives: ${session.remainingLives}`, TEXT_X, TEXT_Y, {
    size: LIVES_TEXT_SIZE,
    color: TEXT_COLOR,
    family: options.fontFamily,
  });
}

/**
 * Runs one frame: input, state transitions, and, while in progress,
 * update → collisions → sweep → draw. Paused and finished games only draw
 * their status line.
 */
export function stepFrame(
  session: GameSession,
  input: InputSource,
  renderer: Renderer,
  options: RenderOptions
): FrameReport {
  const previousStatus = session.status;
  const report: FrameReport = {
    quit: false,
    previousStatus,
    status: previousStatus,
    remainingLives: session.remainingLives,
    livesLost: 0,
    bricksDestroyed: 0,
    paddleHits: 0,
  };

  renderer.clear(BACKGROUND_COLOR);

  if (input.isKeyDown('quit')) {
    report.quit = true;
    return report;
  }

  handlePauseKey(session, input);
  if (input.isKeyDown('restart')) restart(session);

  if (session.status !== GameStatus.InProgress) {
    drawStatus(session.status, renderer, options);
  } else {
    const result = simulate(session, input);
    report.livesLost = result.livesLost;
    report.bricksDestroyed = result.bricksDestroyed;
    report.paddleHits = result.paddleHits;
    drawPlayField(session, renderer, options);
  }

  renderer.present();

  report.status = session.status;
  report.remainingLives = session.remainingLives;
  if (report.status !== previousStatus) {
    log.info(`Status ${previousStatus} -> ${report.status}`, { lives: session.remainingLives });
  }
  return report;
}

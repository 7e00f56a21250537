import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createSession, restart, stepFrame, type GameSession } from './state';
import { RecordingRenderer, ScriptedInput } from './testing';
import { EntityKind, GameStatus } from './types';

const OPTIONS = { fontFamily: 'system-ui, sans-serif', showHitCounts: false };

let renderer: RecordingRenderer;

beforeEach(() => {
  renderer = new RecordingRenderer();
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

function playing(): GameSession {
  const session = createSession();
  restart(session);
  session.status = GameStatus.InProgress;
  return session;
}

function onlyBall(session: GameSession) {
  const [ball] = session.registry.query(EntityKind.Ball);
  return ball;
}

describe('createSession', () => {
  it('waits in game over until the first restart', () => {
    const session = createSession();
    expect(session.status).toBe(GameStatus.GameOver);
    expect(session.remainingLives).toBe(0);
    expect(session.registry.size).toBe(0);
  });
});

describe('restart', () => {
  it('lays out a fresh paused game', () => {
    const session = createSession();
    restart(session);

    expect(session.status).toBe(GameStatus.Paused);
    expect(session.remainingLives).toBe(3);
    expect(session.registry.count(EntityKind.Brick)).toBe(44);
    expect(session.registry.count(EntityKind.Ball)).toBe(1);
    expect(session.registry.count(EntityKind.Paddle)).toBe(1);
    expect(onlyBall(session).shape.position).toEqual({ x: 400, y: 300 });
    expect(session.registry.query(EntityKind.Paddle)[0].shape.position).toEqual({ x: 400, y: 550 });
  });
});

describe('stepFrame', () => {
  it('only shows the status line while not in progress', () => {
    const session = createSession();
    stepFrame(session, new ScriptedInput(), renderer, OPTIONS);

    expect(renderer.commands).toEqual([
      { op: 'clear', color: { r: 0, g: 0, b: 0, a: 255 } },
      {
        op: 'text',
        text: 'Game over!',
        x: 10,
        y: 10,
        style: { size: 35, color: { r: 255, g: 255, b: 255, a: 255 }, family: 'system-ui, sans-serif' },
      },
      { op: 'present' },
    ]);
  });

  it('stops before drawing when quit is held', () => {
    const session = playing();
    const report = stepFrame(session, new ScriptedInput('quit', 'pause'), renderer, OPTIONS);

    expect(report.quit).toBe(true);
    expect(session.status).toBe(GameStatus.InProgress);
    expect(renderer.commands.map((c) => c.op)).toEqual(['clear']);
  });

  it('toggles pause on the key press, not while held', () => {
    const session = createSession();
    restart(session);
    const input = new ScriptedInput('pause');

    expect(stepFrame(session, input, renderer, OPTIONS).status).toBe(GameStatus.InProgress);
    expect(stepFrame(session, input, renderer, OPTIONS).status).toBe(GameStatus.InProgress);

    input.releaseKey('pause');
    stepFrame(session, input, renderer, OPTIONS);
    input.press('pause');
    expect(stepFrame(session, input, renderer, OPTIONS).status).toBe(GameStatus.Paused);
  });

  it('does not unpause a finished game', () => {
    const session = createSession();
    const report = stepFrame(session, new ScriptedInput('pause'), renderer, OPTIONS);
    expect(report.status).toBe(GameStatus.GameOver);
  });

  it('simulates and draws the field while in progress', () => {
    const session = playing();
    renderer.reset();
    const report = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);

    expect(report.status).toBe(GameStatus.InProgress);
    expect(onlyBall(session).shape.position).toEqual({ x: 392, y: 292 });
    expect(renderer.texts()).toEqual(['Lives: 3']);
    // clear + 46 entities + lives + present
    expect(renderer.commands).toHaveLength(49);
  });

  it('restarts from any state', () => {
    const session = playing();
    session.remainingLives = 1;
    onlyBall(session).destroyed = true;
    session.registry.sweep();

    const report = stepFrame(session, new ScriptedInput('restart'), renderer, OPTIONS);
    expect(report.status).toBe(GameStatus.Paused);
    expect(report.remainingLives).toBe(3);
    expect(session.registry.count(EntityKind.Ball)).toBe(1);
  });

  it('respawns the ball a frame after it falls out', () => {
    const session = playing();
    const ball = onlyBall(session);
    ball.shape.position.y = 590;
    ball.velocity.y = 8;

    const first = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(first.livesLost).toBe(0);
    expect(session.registry.count(EntityKind.Ball)).toBe(0);

    const second = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(second.livesLost).toBe(1);
    expect(second.remainingLives).toBe(2);
    expect(second.status).toBe(GameStatus.InProgress);
    expect(onlyBall(session).shape.position).toEqual({ x: 392, y: 292 });
  });

  it('ends the game when the last life is lost', () => {
    const session = playing();
    session.remainingLives = 1;
    onlyBall(session).destroyed = true;
    session.registry.sweep();

    const report = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(report.previousStatus).toBe(GameStatus.InProgress);
    expect(report.status).toBe(GameStatus.GameOver);
    expect(report.remainingLives).toBe(0);

    renderer.reset();
    stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(renderer.texts()).toEqual(['Game over!']);
  });

  it('declares victory once no bricks are left', () => {
    const session = playing();
    for (const brick of session.registry.query(EntityKind.Brick)) brick.destroyed = true;
    session.registry.sweep();

    const report = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(report.status).toBe(GameStatus.Victory);

    renderer.reset();
    stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(renderer.texts()).toEqual(['You won!']);
  });

  it('counts bricks broken by the ball', () => {
    const session = playing();
    const { registry } = session;
    registry.clear();
    const brick = registry.create(EntityKind.Brick, 100, 100);
    const ball = registry.create(EntityKind.Ball, 100, 118);
    registry.create(EntityKind.Paddle, 400, 550);

    const report = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(report.bricksDestroyed).toBe(1);
    expect(registry.get(brick.id)).toBeUndefined();
    expect(ball.velocity).toEqual({ x: -8, y: 8 });

    expect(stepFrame(session, new ScriptedInput(), renderer, OPTIONS).status).toBe(GameStatus.Victory);
  });

  it('counts paddle returns', () => {
    const session = playing();
    const ball = onlyBall(session);
    ball.shape.position = { x: 380, y: 527 };
    ball.velocity = { x: 8, y: 8 };

    const report = stepFrame(session, new ScriptedInput(), renderer, OPTIONS);
    expect(report.paddleHits).toBe(1);
    expect(ball.velocity).toEqual({ x: -8, y: -8 });
  });
});

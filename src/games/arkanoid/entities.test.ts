import { describe, it, expect } from 'vitest';
import { brickColor, createBall, createBrick, createPaddle, drawEntity, updateEntity } from './entities';
import { RecordingRenderer, ScriptedInput } from './testing';
import { EntityKind } from './types';

const FIELD = { left: 0, right: 800, top: 0, bottom: 600 };
const DRAW = { fontFamily: 'system-ui, sans-serif', showHitCounts: true };

describe('entity factories', () => {
  it('launches a ball up and to the left', () => {
    const ball = createBall(7, 400, 300);
    expect(ball.id).toBe(7);
    expect(ball.kind).toBe(EntityKind.Ball);
    expect(ball.velocity).toEqual({ x: -8, y: -8 });
    expect(ball.shape.radius).toBe(10);
    expect(ball.destroyed).toBe(false);
  });

  it('starts the paddle at rest', () => {
    const paddle = createPaddle(1, 400, 550);
    expect(paddle.velocity).toEqual({ x: 0, y: 0 });
    expect(paddle.shape.width).toBe(60);
    expect(paddle.shape.height).toBe(20);
  });

  it('defaults a brick to one hit', () => {
    const brick = createBrick(1, 100, 100);
    expect(brick.requiredHits).toBe(1);
    expect(brick.shape.fill).toEqual({ r: 255, g: 255, b: 0, a: 80 });
  });
});

describe('brickColor', () => {
  it('gets more opaque with more hits left', () => {
    expect(brickColor(1).a).toBe(80);
    expect(brickColor(2).a).toBe(170);
    expect(brickColor(3).a).toBe(255);
  });

  it('clamps out-of-range hit counts', () => {
    expect(brickColor(0).a).toBe(80);
    expect(brickColor(5).a).toBe(255);
  });
});

describe('updateEntity', () => {
  it('moves the paddle left while the key is held', () => {
    const paddle = createPaddle(1, 400, 550);
    updateEntity(paddle, { input: new ScriptedInput('left'), bounds: FIELD });
    expect(paddle.velocity.x).toBe(-8);
    expect(paddle.shape.position.x).toBe(392);
  });

  it('stops the paddle at the left wall', () => {
    const paddle = createPaddle(1, 30, 550);
    updateEntity(paddle, { input: new ScriptedInput('left'), bounds: FIELD });
    expect(paddle.velocity.x).toBe(0);
    expect(paddle.shape.position.x).toBe(30);
  });

  it('falls through to right when left is blocked', () => {
    const paddle = createPaddle(1, 30, 550);
    updateEntity(paddle, { input: new ScriptedInput('left', 'right'), bounds: FIELD });
    expect(paddle.shape.position.x).toBe(38);
  });

  it('stops the paddle with no key held', () => {
    const paddle = createPaddle(1, 400, 550);
    paddle.velocity.x = 8;
    updateEntity(paddle, { input: new ScriptedInput(), bounds: FIELD });
    expect(paddle.velocity.x).toBe(0);
    expect(paddle.shape.position.x).toBe(400);
  });

  it('moves the ball and bounces it off the wall', () => {
    const ball = createBall(1, 12, 300);
    updateEntity(ball, { input: new ScriptedInput(), bounds: FIELD });
    expect(ball.shape.position).toEqual({ x: 4, y: 292 });
    expect(ball.velocity.x).toBe(8);
  });

  it('recolors a brick after it loses a hit', () => {
    const brick = createBrick(1, 100, 100, 3);
    brick.requiredHits = 2;
    updateEntity(brick, { input: new ScriptedInput(), bounds: FIELD });
    expect(brick.shape.fill.a).toBe(170);
  });
});

describe('drawEntity', () => {
  it('draws a rect from its top-left corner', () => {
    const renderer = new RecordingRenderer();
    drawEntity(createPaddle(1, 400, 550), renderer, DRAW);
    expect(renderer.commands).toEqual([
      { op: 'rect', x: 370, y: 540, width: 60, height: 20, color: { r: 255, g: 0, b: 0, a: 255 } },
    ]);
  });

  it('draws a ball as a circle around its center', () => {
    const renderer = new RecordingRenderer();
    drawEntity(createBall(1, 400, 300), renderer, DRAW);
    expect(renderer.commands).toEqual([
      { op: 'circle', cx: 400, cy: 300, radius: 10, color: { r: 255, g: 0, b: 0, a: 255 } },
    ]);
  });

  it('labels multi-hit bricks when hit counts are shown', () => {
    const renderer = new RecordingRenderer();
    drawEntity(createBrick(1, 100, 100, 2), renderer, DRAW);

    expect(renderer.commands).toHaveLength(2);
    expect(renderer.commands[1]).toEqual({
      op: 'text',
      text: '2',
      x: 100,
      y: 100,
      style: {
        size: 12,
        color: { r: 0, g: 0, b: 0, a: 200 },
        family: 'system-ui, sans-serif',
        align: 'center',
        baseline: 'middle',
        bold: true,
      },
    });
  });

  it('skips the label for single-hit bricks or when disabled', () => {
    const renderer = new RecordingRenderer();
    drawEntity(createBrick(1, 100, 100, 1), renderer, DRAW);
    drawEntity(createBrick(2, 100, 100, 3), renderer, { ...DRAW, showHitCounts: false });
    expect(renderer.texts()).toEqual([]);
  });
});

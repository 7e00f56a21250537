import { createCircle, createRect, edges, moveShape, type Color, type Edges, type Shape } from './geometry';
import { resolveBallBounds } from './collision';
import type { InputSource } from './input';
import type { Renderer } from './renderer';
import {
  Ball,
  Brick,
  Entity,
  EntityId,
  EntityKind,
  Paddle,
  BALL_COLOR,
  BALL_RADIUS,
  BALL_SPEED,
  BRICK_COLORS,
  BRICK_HEIGHT,
  BRICK_WIDTH,
  HIT_COUNT_COLOR,
  PADDLE_COLOR,
  PADDLE_HEIGHT,
  PADDLE_SPEED,
  PADDLE_WIDTH,
} from './types';

export interface UpdateContext {
  input: InputSource;
  bounds: Edges;
}

export interface DrawOptions {
  fontFamily: string;
  showHitCounts: boolean;
}

export function createBall(id: EntityId, x: number, y: number): Ball {
  return {
    id,
    kind: EntityKind.Ball,
    destroyed: false,
    shape: createCircle(x, y, BALL_RADIUS, BALL_COLOR),
    velocity: { x: -BALL_SPEED, y: -BALL_SPEED },
    speed: BALL_SPEED,
  };
}

export function createPaddle(id: EntityId, x: number, y: number): Paddle {
  return {
    id,
    kind: EntityKind.Paddle,
    destroyed: false,
    shape: createRect(x, y, PADDLE_WIDTH, PADDLE_HEIGHT, PADDLE_COLOR),
    velocity: { x: 0, y: 0 },
    speed: PADDLE_SPEED,
  };
}

export function createBrick(id: EntityId, x: number, y: number, requiredHits: number = 1): Brick {
  return {
    id,
    kind: EntityKind.Brick,
    destroyed: false,
    shape: createRect(x, y, BRICK_WIDTH, BRICK_HEIGHT, brickColor(requiredHits)),
    requiredHits,
  };
}

export function brickColor(requiredHits: number): Color {
  const index = Math.min(Math.max(requiredHits, 1), BRICK_COLORS.length) - 1;
  return { ...BRICK_COLORS[index] };
}

function updateBall(ball: Ball, bounds: Edges): void {
  moveShape(ball.shape, ball.velocity);
  resolveBallBounds(ball, bounds);
}

function updatePaddle(paddle: Paddle, { input, bounds }: UpdateContext): void {
  const { left, right } = edges(paddle.shape);

  // Gate movement on the play field instead of clamping afterwards
  if (input.isKeyDown('left') && left > bounds.left) {
    paddle.velocity.x = -paddle.speed;
  } else if (input.isKeyDown('right') && right < bounds.right) {
    paddle.velocity.x = paddle.speed;
  } else {
    paddle.velocity.x = 0;
  }

  moveShape(paddle.shape, paddle.velocity);
}

function updateBrick(brick: Brick): void {
  brick.shape.fill = brickColor(brick.requiredHits);
}

export function updateEntity(entity: Entity, ctx: UpdateContext): void {
  switch (entity.kind) {
    case EntityKind.Ball:
      updateBall(entity, ctx.bounds);
      break;
    case EntityKind.Paddle:
      updatePaddle(entity, ctx);
      break;
    case EntityKind.Brick:
      updateBrick(entity);
      break;
  }
}

function drawShape(shape: Shape, renderer: Renderer): void {
  if (shape.kind === 'circle') {
    renderer.fillCircle(shape.position.x, shape.position.y, shape.radius, shape.fill);
    return;
  }
  const { left, top } = edges(shape);
  renderer.fillRect(left, top, shape.width, shape.height, shape.fill);
}

export function drawEntity(entity: Entity, renderer: Renderer, options: DrawOptions): void {
  drawShape(entity.shape, renderer);

  if (entity.kind === EntityKind.Brick && options.showHitCounts && entity.requiredHits > 1) {
    renderer.drawText(String(entity.requiredHits), entity.shape.position.x, entity.shape.position.y, {
      size: Math.min(entity.shape.height * 0.6, 14),
      color: HIT_COUNT_COLOR,
      family: options.fontFamily,
      align: 'center',
      baseline: 'middle',
      bold: true,
    });
  }
}

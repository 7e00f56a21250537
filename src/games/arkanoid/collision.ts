import { edges, type Edges, type Shape } from './geometry';
import type { Ball, Brick, Paddle } from './types';

// Inclusive on every side: touching edges count as a hit
export function intersects(a: Shape, b: Shape): boolean {
  const ea = edges(a);
  const eb = edges(b);
  return ea.right >= eb.left && ea.left <= eb.right && ea.bottom >= eb.top && ea.top <= eb.bottom;
}

// Send the ball back up, towards whichever half of the paddle it struck
export function resolvePaddleBall(paddle: Paddle, ball: Ball): boolean {
  if (!intersects(paddle.shape, ball.shape)) return false;

  ball.velocity.y = -ball.speed;
  ball.velocity.x = ball.shape.position.x < paddle.shape.position.x ? -ball.speed : ball.speed;
  return true;
}

export function resolveBrickBall(brick: Brick, ball: Ball): boolean {
  if (!intersects(brick.shape, ball.shape)) return false;

  brick.requiredHits--;
  if (brick.requiredHits <= 0) brick.destroyed = true;

  const b = edges(ball.shape);
  const k = edges(brick.shape);

  // Check which side we hit
  const overlapLeft = b.right - k.left;
  const overlapRight = k.right - b.left;
  const overlapTop = b.bottom - k.top;
  const overlapBottom = k.bottom - b.top;

  const fromLeft = Math.abs(overlapLeft) < Math.abs(overlapRight);
  const fromTop = Math.abs(overlapTop) < Math.abs(overlapBottom);

  const minOverlapX = fromLeft ? overlapLeft : overlapRight;
  const minOverlapY = fromTop ? overlapTop : overlapBottom;

  // Flip only the axis with the shallower penetration
  if (Math.abs(minOverlapX) < Math.abs(minOverlapY)) {
    ball.velocity.x = fromLeft ? -ball.speed : ball.speed;
  } else {
    ball.velocity.y = fromTop ? -ball.speed : ball.speed;
  }
  return true;
}

export function resolveBallBounds(ball: Ball, bounds: Edges): void {
  const { left, right, top, bottom } = edges(ball.shape);

  if (left < bounds.left) {
    ball.velocity.x = ball.speed;
  } else if (right > bounds.right) {
    ball.velocity.x = -ball.speed;
  }

  if (top < bounds.top) {
    ball.velocity.y = ball.speed;
  } else if (bottom > bounds.bottom) {
    // Out through the floor: the session notices the missing ball next frame
    ball.destroyed = true;
  }
}

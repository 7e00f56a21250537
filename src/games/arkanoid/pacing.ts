// Animation callbacks arrive slightly early or late; don't skip a frame over jitter
const FRAME_TOLERANCE_MS = 1;

/**
 * Caps the simulation at a fixed frame rate on top of requestAnimationFrame.
 * Each `tick` that returns true stands for exactly one fixed-size frame, and
 * a stall is never caught up with a burst of frames.
 */
export class FrameLimiter {
  readonly frameMs: number;
  private lastFrameAt: number | null = null;

  constructor(fps: number) {
    if (!(fps > 0)) {
      throw new RangeError(`Frame rate must be positive, got ${fps}`);
    }
    this.frameMs = 1000 / fps;
  }

  tick(now: number): boolean {
    if (this.lastFrameAt === null) {
      this.lastFrameAt = now;
      return true;
    }

    const elapsed = now - this.lastFrameAt;
    if (elapsed + FRAME_TOLERANCE_MS < this.frameMs) return false;

    // Stay on the frame grid unless we fell more than a frame behind
    this.lastFrameAt = elapsed >= this.frameMs * 2 ? now : this.lastFrameAt + this.frameMs;
    return true;
  }

  reset(): void {
    this.lastFrameAt = null;
  }
}

import { toCssColor, type Color } from './geometry';

export interface TextStyle {
  size: number;
  color: Color;
  family: string;
  align?: 'left' | 'center';
  baseline?: 'top' | 'middle';
  bold?: boolean;
}

/** Immediate-mode drawing surface the game loop renders each frame into. */
export interface Renderer {
  clear(color: Color): void;
  fillRect(x: number, y: number, width: number, height: number, color: Color): void;
  fillCircle(cx: number, cy: number, radius: number, color: Color): void;
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  present(): void;
}

export function cssFont(style: TextStyle): string {
  return `${style.bold ? 'bold ' : ''}${style.size}px ${style.family}`;
}

/** The part of a 2D canvas context the renderer draws with. */
export type CanvasSurface = Pick<
  CanvasRenderingContext2D,
  'save' | 'restore' | 'setTransform' | 'fillRect' | 'beginPath' | 'rect' | 'clip' | 'arc' | 'fill' | 'fillText'
> & {
  canvas: { width: number; height: number };
  fillStyle: CanvasRenderingContext2D['fillStyle'];
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
};

/**
 * Draws the fixed-size logical play field onto a canvas of any size,
 * scaled to fit and centered (letterboxed).
 */
export class CanvasRenderer implements Renderer {
  private ctx: CanvasSurface;
  private logicalWidth: number;
  private logicalHeight: number;
  private scale = 1;
  private offsetX = 0;
  private offsetY = 0;
  private frameOpen = false;

  constructor(ctx: CanvasSurface, logicalWidth: number, logicalHeight: number) {
    this.ctx = ctx;
    this.logicalWidth = logicalWidth;
    this.logicalHeight = logicalHeight;
  }

  resize(width: number, height: number, dpr: number): void {
    const canvas = this.ctx.canvas;
    canvas.width = Math.round(width * dpr);
    canvas.height = Math.round(height * dpr);

    const fit = Math.min(width / this.logicalWidth, height / this.logicalHeight);
    this.scale = fit * dpr;
    this.offsetX = ((width - this.logicalWidth * fit) / 2) * dpr;
    this.offsetY = ((height - this.logicalHeight * fit) / 2) * dpr;
  }

  clear(color: Color): void {
    const { ctx } = this;
    // A frame can end without present() (quit); unwind it before starting the next
    if (this.frameOpen) ctx.restore();
    ctx.save();
    this.frameOpen = true;
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.fillStyle = '#111827';
    ctx.fillRect(0, 0, ctx.canvas.width, ctx.canvas.height);

    ctx.setTransform(this.scale, 0, 0, this.scale, this.offsetX, this.offsetY);
    ctx.fillStyle = toCssColor(color);
    ctx.fillRect(0, 0, this.logicalWidth, this.logicalHeight);

    // Keep anything that strays outside the play field off the letterbox
    ctx.beginPath();
    ctx.rect(0, 0, this.logicalWidth, this.logicalHeight);
    ctx.clip();
  }

  fillRect(x: number, y: number, width: number, height: number, color: Color): void {
    this.ctx.fillStyle = toCssColor(color);
    this.ctx.fillRect(x, y, width, height);
  }

  fillCircle(cx: number, cy: number, radius: number, color: Color): void {
    const { ctx } = this;
    ctx.fillStyle = toCssColor(color);
    ctx.beginPath();
    ctx.arc(cx, cy, radius, 0, Math.PI * 2);
    ctx.fill();
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    const { ctx } = this;
    ctx.fillStyle = toCssColor(style.color);
    ctx.font = cssFont(style);
    ctx.textAlign = style.align ?? 'left';
    ctx.textBaseline = style.baseline ?? 'top';
    ctx.fillText(text, x, y);
  }

  present(): void {
    // Canvas draws immediately; just unwind the frame's transform and clip
    if (!this.frameOpen) return;
    this.ctx.restore();
    this.frameOpen = false;
  }
}

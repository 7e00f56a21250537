export interface Vec2 {
  x: number;
  y: number;
}

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

interface ShapeBase {
  position: Vec2;
  // Offset of `position` from the shape's top-left corner
  origin: Vec2;
  fill: Color;
}

export interface RectShape extends ShapeBase {
  kind: 'rect';
  width: number;
  height: number;
}

export interface CircleShape extends ShapeBase {
  kind: 'circle';
  radius: number;
}

export type Shape = RectShape | CircleShape;

export interface Edges {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export function createRect(x: number, y: number, width: number, height: number, fill: Color): RectShape {
  if (!(width > 0) || !(height > 0)) {
    throw new RangeError(`Rectangle extents must be positive, got ${width}x${height}`);
  }
  return {
    kind: 'rect',
    position: { x, y },
    origin: { x: width / 2, y: height / 2 },
    width,
    height,
    fill: { ...fill },
  };
}

export function createCircle(x: number, y: number, radius: number, fill: Color): CircleShape {
  if (!(radius > 0)) {
    throw new RangeError(`Circle radius must be positive, got ${radius}`);
  }
  return {
    kind: 'circle',
    position: { x, y },
    origin: { x: radius, y: radius },
    radius,
    fill: { ...fill },
  };
}

function extents(shape: Shape): Vec2 {
  if (shape.kind === 'circle') {
    return { x: shape.radius * 2, y: shape.radius * 2 };
  }
  return { x: shape.width, y: shape.height };
}

/**
 * Axis-aligned bounds of a shape. Rectangles and circles answer the same
 * way so collision code never needs to know which one it holds.
 */
export function edges(shape: Shape): Edges {
  const size = extents(shape);
  const left = shape.position.x - shape.origin.x;
  const top = shape.position.y - shape.origin.y;
  return {
    left,
    right: left + size.x,
    top,
    bottom: top + size.y,
  };
}

export function moveShape(shape: Shape, delta: Vec2): void {
  shape.position.x += delta.x;
  shape.position.y += delta.y;
}

export function toCssColor(color: Color): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.a / 255})`;
}

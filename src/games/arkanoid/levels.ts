import type { EntityRegistry } from './registry';
import { BRICK_HEIGHT, BRICK_WIDTH, EntityKind, type Brick } from './types';

export interface LevelLayout {
  columns: number;
  rows: number;
  startColumn: number;
  startRow: number;
  spacing: number;
  offsetX: number;
}

export const DEFAULT_LAYOUT: LevelLayout = {
  columns: 11,
  rows: 4,
  startColumn: 1,
  startRow: 2,
  spacing: 3,
  offsetX: 22,
};

// Deterministic difficulty pattern: 1-3 hits depending on grid position
export function requiredHitsAt(column: number, row: number): number {
  return 1 + ((column * row) % 3);
}

export function brickPosition(column: number, row: number, layout: LevelLayout = DEFAULT_LAYOUT) {
  return {
    x: layout.offsetX + (column + layout.startColumn) * (BRICK_WIDTH + layout.spacing),
    y: (row + layout.startRow) * (BRICK_HEIGHT + layout.spacing),
  };
}

/**
 * Fills the registry with the brick wall, column by column. Creation order
 * is also collision order, so it stays column-major.
 */
export function seedBricks(registry: EntityRegistry, layout: LevelLayout = DEFAULT_LAYOUT): Brick[] {
  const bricks: Brick[] = [];
  for (let column = 0; column < layout.columns; column++) {
    for (let row = 0; row < layout.rows; row++) {
      const { x, y } = brickPosition(column, row, layout);
      bricks.push(registry.create(EntityKind.Brick, x, y, requiredHitsAt(column, row)));
    }
  }
  return bricks;
}

export function isLevelCleared(registry: EntityRegistry): boolean {
  return registry.count(EntityKind.Brick) === 0;
}

import { describe, it, expect } from 'vitest';
import { EntityRegistry, RegistryError } from './registry';
import { EntityKind } from './types';

function populated() {
  const registry = new EntityRegistry();
  const brickA = registry.create(EntityKind.Brick, 100, 100, 2);
  const ball = registry.create(EntityKind.Ball, 400, 300);
  const brickB = registry.create(EntityKind.Brick, 200, 100);
  const paddle = registry.create(EntityKind.Paddle, 400, 550);
  return { registry, brickA, ball, brickB, paddle };
}

describe('EntityRegistry', () => {
  it('hands out increasing ids in creation order', () => {
    const { registry, brickA, ball, brickB, paddle } = populated();
    expect([brickA.id, ball.id, brickB.id, paddle.id]).toEqual([1, 2, 3, 4]);
    expect(registry.all()).toEqual([brickA, ball, brickB, paddle]);
    expect(registry.size).toBe(4);
  });

  it('passes spawn arguments to the factory', () => {
    const { brickA, ball } = populated();
    expect(brickA.requiredHits).toBe(2);
    expect(ball.shape.position).toEqual({ x: 400, y: 300 });
  });

  it('groups entities by kind', () => {
    const { registry, brickA, brickB, ball } = populated();
    expect(registry.query(EntityKind.Brick)).toEqual([brickA, brickB]);
    expect(registry.query(EntityKind.Ball)).toEqual([ball]);
    expect(registry.count(EntityKind.Paddle)).toBe(1);
  });

  it('looks entities up by id', () => {
    const { registry, brickB } = populated();
    expect(registry.get(brickB.id)).toBe(brickB);
    expect(registry.get(99)).toBeUndefined();
  });

  it('keeps destroyed entities until the next sweep', () => {
    const { registry, brickA, brickB } = populated();
    brickA.destroyed = true;

    expect(registry.count(EntityKind.Brick)).toBe(2);
    expect(registry.sweep()).toEqual([brickA]);
    expect(registry.query(EntityKind.Brick)).toEqual([brickB]);
    expect(registry.get(brickA.id)).toBeUndefined();
    expect(registry.size).toBe(3);
  });

  it('makes a repeated sweep a no-op', () => {
    const { registry, ball } = populated();
    ball.destroyed = true;
    registry.sweep();

    expect(registry.sweep()).toEqual([]);
    expect(registry.size).toBe(3);
  });

  it('visits every entity of a kind, destroyed or not', () => {
    const { registry, brickA, brickB } = populated();
    brickA.destroyed = true;

    const seen: number[] = [];
    registry.forEach(EntityKind.Brick, (brick) => seen.push(brick.id));
    expect(seen).toEqual([brickA.id, brickB.id]);
  });

  it('refuses to create while iterating', () => {
    const { registry } = populated();
    expect(() =>
      registry.forEach(EntityKind.Ball, () => {
        registry.create(EntityKind.Ball, 0, 0);
      })
    ).toThrow(RegistryError);
  });

  it('refuses to sweep or clear during updateAll', () => {
    const { registry } = populated();
    expect(() => registry.updateAll(() => registry.sweep())).toThrow(
      'Cannot sweep entities while iterating the registry'
    );
    expect(() => registry.updateAll(() => registry.clear())).toThrow(RegistryError);
  });

  it('allows mutation again after a callback throws', () => {
    const { registry } = populated();
    expect(() =>
      registry.forEach(EntityKind.Paddle, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(() => registry.create(EntityKind.Ball, 0, 0)).not.toThrow();
  });

  it('empties everything on clear but never reuses ids', () => {
    const { registry } = populated();
    registry.clear();

    expect(registry.size).toBe(0);
    expect(registry.count(EntityKind.Brick)).toBe(0);
    expect(registry.get(1)).toBeUndefined();
    expect(registry.create(EntityKind.Ball, 0, 0).id).toBe(5);
  });
});

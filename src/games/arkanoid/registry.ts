import { createBall, createBrick, createPaddle } from './entities';
import { Entity, EntityId, EntityKind, EntityMap, SpawnArgs } from './types';

type Factories = {
  [K in EntityKind]: (id: EntityId, ...args: SpawnArgs[K]) => EntityMap[K];
};

type Groups = {
  [K in EntityKind]: EntityMap[K][];
};

const FACTORIES: Factories = {
  [EntityKind.Ball]: createBall,
  [EntityKind.Paddle]: createPaddle,
  [EntityKind.Brick]: createBrick,
};

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

// Drop tombstoned items, keeping the survivors' order
function compact(list: { destroyed: boolean }[]): void {
  let write = 0;
  for (const item of list) {
    if (!item.destroyed) list[write++] = item;
  }
  list.length = write;
}

/**
 * Owns every live entity. Entities are kept in creation order in a master
 * list and, in parallel, in one group per kind so typed queries only touch
 * their own kind.
 *
 * Removal is deferred: callers set `destroyed` and the entity stays visible
 * to `query`/`forEach` until the next `sweep()`. Nested iteration over
 * several groups (ball × brick) therefore never sees a list shrink under it.
 */
export class EntityRegistry {
  private entities: Entity[] = [];
  private groups: Groups = {
    [EntityKind.Ball]: [],
    [EntityKind.Paddle]: [],
    [EntityKind.Brick]: [],
  };
  private byId = new Map<EntityId, Entity>();
  private nextId: EntityId = 1;
  private iterating = 0;

  get size(): number {
    return this.entities.length;
  }

  create<K extends EntityKind>(kind: K, ...args: SpawnArgs[K]): EntityMap[K] {
    this.assertNotIterating('create');

    const factory = FACTORIES[kind];
    const entity = factory(this.nextId++, ...args);

    this.groups[kind].push(entity);
    this.entities.push(entity);
    this.byId.set(entity.id, entity);
    return entity;
  }

  get(id: EntityId): Entity | undefined {
    return this.byId.get(id);
  }

  query<K extends EntityKind>(kind: K): readonly EntityMap[K][] {
    return this.groups[kind];
  }

  count(kind: EntityKind): number {
    return this.groups[kind].length;
  }

  all(): readonly Entity[] {
    return this.entities;
  }

  forEach<K extends EntityKind>(kind: K, fn: (entity: EntityMap[K]) => void): void {
    this.iterating++;
    try {
      for (const entity of this.groups[kind]) fn(entity);
    } finally {
      this.iterating--;
    }
  }

  updateAll(fn: (entity: Entity) => void): void {
    this.iterating++;
    try {
      for (const entity of this.entities) fn(entity);
    } finally {
      this.iterating--;
    }
  }

  /** Removes every destroyed entity and returns them in creation order. */
  sweep(): Entity[] {
    this.assertNotIterating('sweep');

    const removed = this.entities.filter((e) => e.destroyed);
    if (removed.length === 0) return removed;

    compact(this.entities);
    for (const group of Object.values(this.groups)) {
      compact(group);
    }
    for (const entity of removed) {
      this.byId.delete(entity.id);
    }
    return removed;
  }

  clear(): void {
    this.assertNotIterating('clear');

    this.entities.length = 0;
    for (const group of Object.values(this.groups)) {
      group.length = 0;
    }
    this.byId.clear();
  }

  private assertNotIterating(operation: string): void {
    if (this.iterating > 0) {
      throw new RegistryError(`Cannot ${operation} entities while iterating the registry`);
    }
  }
}

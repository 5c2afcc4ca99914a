/**
 * Entity Registry
 *
 * In-process store of every published entity. Pollers write to it; HTTP
 * routes read it and the WebSocket layer forwards its events.
 *
 * Publishing is idempotent: an unchanged entity emits nothing.
 */

import { EventEmitter } from 'node:events';
import { isDeepStrictEqual } from 'node:util';
import { ENTITY_KEY_PREFIX } from '@marquee/shared';
import type { EntityKind, EntityState, EntityValue } from '@marquee/shared';

// Events emitted by EntityRegistry for consumers
export interface EntityRegistryEvents {
  'entity:updated': EntityState;
  'entity:unavailable': EntityState;
  'entity:removed': { kind: EntityKind; key: string };
}

/**
 * Key of the single entity an aggregate kind publishes
 *
 * @example
 * aggregateKey('bandwidth'); // "emby_bandwidth"
 */
export function aggregateKey(kind: Exclude<EntityKind, 'session'>): string {
  return `${ENTITY_KEY_PREFIX}_${kind}`;
}

function entityId(kind: EntityKind, key: string): string {
  return `${kind}:${key}`;
}

/**
 * EntityRegistry - the Publisher
 *
 * @example
 * const registry = new EntityRegistry();
 * registry.subscribe('entity:updated', (entity) => io.emit('entity:updated', entity));
 * registry.publish('bandwidth', aggregateKey('bandwidth'), 1.25, { streams: [] });
 */
export class EntityRegistry extends EventEmitter {
  private readonly entities = new Map<string, EntityState>();

  constructor(private readonly clock: () => Date = () => new Date()) {
    super();
  }

  subscribe<E extends keyof EntityRegistryEvents>(
    event: E,
    listener: (payload: EntityRegistryEvents[E]) => void
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  private emitEvent<E extends keyof EntityRegistryEvents>(
    event: E,
    payload: EntityRegistryEvents[E]
  ): void {
    this.emit(event, payload);
  }

  /**
   * Store an entity. Emits `entity:updated` only when its state, attributes
   * or availability changed.
   *
   * @returns whether anything changed
   */
  publish(
    kind: EntityKind,
    key: string,
    state: EntityValue,
    attributes: Record<string, unknown>
  ): boolean {
    const id = entityId(kind, key);
    const previous = this.entities.get(id);
    if (
      previous?.available &&
      previous.state === state &&
      isDeepStrictEqual(previous.attributes, attributes)
    ) {
      return false;
    }

    const entity: EntityState = {
      kind,
      key,
      state,
      attributes,
      available: true,
      lastUpdated: this.clock().toISOString(),
    };
    this.entities.set(id, entity);
    this.emitEvent('entity:updated', entity);
    return true;
  }

  /**
   * Keep the last value but flag it unavailable. `lastUpdated` still shows
   * when it was last good.
   */
  markUnavailable(kind: EntityKind, key: string): boolean {
    const id = entityId(kind, key);
    const previous = this.entities.get(id);
    if (!previous?.available) return false;

    const entity: EntityState = { ...previous, available: false };
    this.entities.set(id, entity);
    this.emitEvent('entity:unavailable', entity);
    return true;
  }

  remove(kind: EntityKind, key: string): boolean {
    if (!this.entities.delete(entityId(kind, key))) return false;
    this.emitEvent('entity:removed', { kind, key });
    return true;
  }

  /**
   * Remove every entity of a kind
   */
  removeKind(kind: EntityKind): void {
    for (const key of this.keysOf(kind)) {
      this.remove(kind, key);
    }
  }

  get(kind: EntityKind, key: string): EntityState | undefined {
    return this.entities.get(entityId(kind, key));
  }

  list(kind?: EntityKind): EntityState[] {
    const all = [...this.entities.values()];
    return kind ? all.filter((e) => e.kind === kind) : all;
  }

  keysOf(kind: EntityKind): string[] {
    return this.list(kind).map((e) => e.key);
  }
}

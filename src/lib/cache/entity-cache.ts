/**
 * Entity cache: indexed, write-batching façade over the operation store
 */

import chalk from 'chalk';
import {
  AmbiguousMatchError,
  AmbiguousPrefixError,
  EntityNotFoundError,
  StorageFailureError,
  TracklogError,
  errorMessage,
} from '../errors';
import { IdentityRegistry } from '../identity-registry';
import { Identity } from '../model/identity';
import { Metadata, Operation, createOperation } from '../model/operation';
import { mergeLogs } from '../model/merge';
import { replay } from '../model/snapshot';
import { OperationStore } from '../storage/types';
import { AppendedOperation, CachedEntity } from './cached-entity';
import { EntityLockManager, LockHandle } from './lock-manager';

export interface EntityCacheOptions {
  /** Receives replay anomalies; defaults to a yellow console warning, once per message */
  onWarning?: (message: string) => void;
}

export interface CreatedEntity extends AppendedOperation {
  entity: CachedEntity;
}

export interface MergeEntityResult {
  entity: CachedEntity;
  created: boolean;
  added: number;
}

export class EntityCache {
  readonly identities: IdentityRegistry;
  private store: OperationStore;
  private entities = new Map<string, CachedEntity>();
  private locks = new EntityLockManager();
  private onWarning: (message: string) => void;

  // Track which warnings were already printed
  private warned = new Set<string>();

  constructor(store: OperationStore, identities: IdentityRegistry, options: EntityCacheOptions = {}) {
    this.store = store;
    this.identities = identities;
    this.onWarning =
      options.onWarning ??
      ((message) => {
        if (this.warned.has(message)) return;
        this.warned.add(message);
        console.warn(chalk.yellow(`⚠ ${message}`));
      });
  }

  /**
   * Load identities and every entity log of the store
   */
  static async open(store: OperationStore, options: EntityCacheOptions = {}): Promise<EntityCache> {
    const identities = await IdentityRegistry.load(store);
    const cache = new EntityCache(store, identities, options);

    for (const id of await store.listEntityIds()) {
      const operations = await store.readLog(id);
      cache.entities.set(id, new CachedEntity(operations, [], cache.onWarning));
    }

    return cache;
  }

  all(): CachedEntity[] {
    return Array.from(this.entities.values());
  }

  allIds(): string[] {
    return Array.from(this.entities.keys());
  }

  resolve(id: string): CachedEntity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new EntityNotFoundError(id);
    }
    return entity;
  }

  resolveByPrefix(prefix: string): CachedEntity {
    const matches = this.allIds().filter((id) => id.startsWith(prefix));

    if (matches.length > 1) {
      throw new AmbiguousPrefixError(prefix, matches);
    }
    if (matches.length === 0) {
      throw new EntityNotFoundError(prefix);
    }
    return this.resolve(matches[0]);
  }

  /**
   * Entity whose create operation carries `key=value`, or undefined when no
   * entity does. Importers branch to creation on undefined.
   */
  resolveCreateByMetadata(key: string, value: string): CachedEntity | undefined {
    const matches = this.all().filter((entity) => entity.createMetadata(key) === value);

    if (matches.length > 1) {
      throw new AmbiguousMatchError(key, value, matches.map((entity) => entity.id));
    }
    return matches[0];
  }

  /**
   * Stage a new entity. It becomes durable with the next flush.
   */
  createEntity(
    author: Identity,
    unixTime: number,
    title: string,
    message: string,
    metadata: Metadata = {}
  ): CreatedEntity {
    const operation = createOperation(author.id, unixTime, { type: 'create', title, message }, metadata);
    const entity = new CachedEntity([], [operation], this.onWarning);

    this.entities.set(entity.id, entity);
    return { entity, hash: entity.id, operation };
  }

  /**
   * Run `fn` with exclusive mutation rights on one entity
   */
  withEntityLock<T>(entityId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.withLock(entityId, fn);
  }

  /**
   * Take the entity's lock by hand, for callers that cannot wrap their work
   * in a single function (async generators). A free lock is taken before
   * this returns its promise.
   */
  acquireEntityLock(entityId: string): Promise<LockHandle> {
    return this.locks.acquireLock(entityId);
  }

  /**
   * Write every staged operation of the entity in one atomic append.
   * Returns false when there was nothing to write.
   */
  async flushIfDirty(entity: CachedEntity): Promise<boolean> {
    if (!entity.needsFlush()) {
      return false;
    }

    const pending = entity.stagedOperations();
    try {
      await this.store.appendOperations(entity.id, pending);
    } catch (error) {
      if (error instanceof TracklogError) throw error;
      throw new StorageFailureError(`flush of entity ${entity.humanId} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    entity.markFlushed(pending.length);
    return true;
  }

  /**
   * Forget unflushed work. An entity that never reached the store is
   * removed entirely.
   */
  rollback(entity: CachedEntity): void {
    if (!entity.isPersisted()) {
      this.entities.delete(entity.id);
      return;
    }
    entity.discardStaged();
  }

  /**
   * Merge a log coming from another clone into the local one and flush it
   */
  async mergeEntity(operations: readonly Operation[]): Promise<MergeEntityResult> {
    // Rejects logs that do not replay before anything is staged
    const { id } = replay(operations, { onWarning: this.onWarning });

    return this.withEntityLock(id, async () => {
      const existing = this.entities.get(id);

      if (!existing) {
        const entity = new CachedEntity([], [...operations], this.onWarning);
        this.entities.set(id, entity);
        try {
          await this.flushIfDirty(entity);
        } catch (error) {
          this.rollback(entity);
          throw error;
        }
        return { entity, created: true, added: operations.length };
      }

      const { added } = mergeLogs(existing.operations, operations);
      try {
        for (const op of added) {
          existing.adopt(op);
        }
        await this.flushIfDirty(existing);
      } catch (error) {
        this.rollback(existing);
        throw error;
      }
      return { entity: existing, created: false, added: added.length };
    });
  }
}

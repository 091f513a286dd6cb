/**
 * Import engine: mirrors a tracker's items into local entities, exactly
 * once per remote record, across repeated and interrupted runs
 */

import { CachedEntity } from '../cache/cached-entity';
import { EntityCache } from '../cache/entity-cache';
import {
  CancelledError,
  InvalidInputError,
  RemoteFetchError,
  StorageFailureError,
  errorMessage,
} from '../errors';
import { Identity } from '../model/identity';
import { OperationPayload } from '../model/operation';
import { searchComment } from '../model/snapshot';
import { GHOST_LOGIN, MetadataKeys, metadataKeys } from '../sources/keys';
import {
  RemoteActor,
  RemoteCommentEvent,
  RemoteEdit,
  RemoteEvent,
  RemoteItem,
  RemoteLabelEvent,
  RemoteStatusEvent,
  RemoteTitleEvent,
  SourceIterator,
} from '../sources/types';
import { ImportResult, importError, importNothing } from './import-result';

export interface ImportOptions {
  /** Only consider items changed at or after this time */
  since?: Date;
  /** Checked once per top-level item */
  signal?: AbortSignal;
}

type ResultStream<T = void> = AsyncGenerator<ImportResult, T>;

export function toUnixTime(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Re-yield an iterable, turning failures of the iterable itself (not of the
 * consumer) into RemoteFetchError.
 */
async function* guardRemote<T>(iterable: AsyncIterable<T>, context: string): AsyncGenerator<T, void> {
  const iterator = iterable[Symbol.asyncIterator]();
  try {
    while (true) {
      let next: IteratorResult<T>;
      try {
        next = await iterator.next();
      } catch (error) {
        if (error instanceof RemoteFetchError) throw error;
        throw new RemoteFetchError(`${context}: ${errorMessage(error)}`, { cause: error });
      }
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await iterator.return?.();
  }
}

/** Seconds between a push and the tracker's own record of it */
export const EXPORT_ECHO_WINDOW = 300;

type EchoEvent = RemoteStatusEvent | RemoteLabelEvent | RemoteTitleEvent;

function sameEffect(payload: OperationPayload, event: EchoEvent): boolean {
  switch (event.kind) {
    case 'status-change':
      return payload.type === 'set-status' && payload.status === event.status;
    case 'label-add':
      return payload.type === 'label-change' && payload.added.includes(event.label);
    case 'label-remove':
      return payload.type === 'label-change' && payload.removed.includes(event.label);
    case 'title-change':
      return payload.type === 'set-title' && payload.title === event.title;
  }
}

/**
 * Find the exported operation a tracker event merely records: same effect,
 * dated at or shortly after the push. Each pushed effect is matched once per
 * item, so later genuine changes to the same value still import.
 */
function findExportEcho(
  entity: CachedEntity,
  event: EchoEvent,
  keys: MetadataKeys,
  consumed: Set<string>
): string | undefined {
  const time = toUnixTime(event.createdAt);
  const byHash = new Map(entity.operations.map((operation, index) => [entity.hashOf(index), operation]));

  for (const tag of byHash.values()) {
    const payload = tag.payload;
    if (payload.type !== 'set-metadata' || payload.newMetadata[keys.exported] !== 'true') continue;
    if (time < tag.unixTime - EXPORT_ECHO_WINDOW || time > tag.unixTime + EXPORT_ECHO_WINDOW) continue;

    const pushed = byHash.get(payload.target);
    const key = `${payload.target}/${event.kind}/${'label' in event ? event.label : ''}`;
    if (!pushed || consumed.has(key) || !sameEffect(pushed.payload, event)) continue;

    consumed.add(key);
    return payload.target;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Importer {
  private cache: EntityCache;

  constructor(cache: EntityCache) {
    this.cache = cache;
  }

  /**
   * Import every item of the source. The stream is ordered like the appends
   * it reports; an error result is always the last one.
   */
  async *importAll(source: SourceIterator, options: ImportOptions = {}): ResultStream {
    const keys = metadataKeys(source.target);
    const items = guardRemote(source.items(options.since), `fetching ${source.target} items`);

    try {
      while (true) {
        if (options.signal?.aborted) {
          yield importError(new CancelledError(options.signal.reason));
          return;
        }

        let next: IteratorResult<RemoteItem>;
        try {
          next = await items.next();
        } catch (error) {
          yield importError(toError(error));
          return;
        }
        if (next.done) return;

        const item = next.value;
        try {
          yield* this.importItem(source.target, item, keys);
        } catch (error) {
          yield importError(toError(error), item.id);
          return;
        }
      }
    } finally {
      await items.return(undefined);
    }
  }

  private async *importItem(target: string, item: RemoteItem, keys: MetadataKeys): ResultStream {
    const author = yield* this.ensurePerson(item.author, keys);

    // Resolution and creation happen without an await in between, so two
    // concurrent runs cannot both create the same item.
    const existing = this.cache.resolveCreateByMetadata(keys.url, item.url);
    const entity =
      existing ??
      this.cache.createEntity(author, toUnixTime(item.createdAt), item.title, item.edits[0]?.body ?? item.body, {
        [keys.origin]: target,
        [keys.id]: item.id,
        [keys.url]: item.url,
      }).entity;

    const lock = await this.cache.acquireEntityLock(entity.id);
    // Also false when the consumer stops pulling results mid-item
    let committed = false;
    try {
      yield existing ? importNothing('entity already imported', entity.id) : { kind: 'entity', id: entity.id };

      // The first edit is the creation itself
      for (const edit of item.edits.slice(1)) {
        yield* this.importEdit(entity, entity.id, edit, keys);
      }

      let eventCount = 0;
      const echoes = new Set<string>();
      for await (const event of guardRemote(item.events(), `fetching events of item ${item.id}`)) {
        eventCount++;
        yield* this.importEvent(entity, event, keys, echoes);
      }

      if (eventCount === 0 && !item.knownEmpty) {
        throw new RemoteFetchError(`no events fetched for item ${item.id}`);
      }

      try {
        await this.cache.flushIfDirty(entity);
      } catch (error) {
        if (error instanceof StorageFailureError) throw error;
        throw new StorageFailureError(`commit of item ${item.id}: ${errorMessage(error)}`, { cause: error });
      }
      committed = true;
    } finally {
      if (!committed) this.cache.rollback(entity);
      lock.release();
    }
  }

  private async *importEvent(
    entity: CachedEntity,
    event: RemoteEvent,
    keys: MetadataKeys,
    echoes: Set<string>
  ): ResultStream {
    if (event.kind === 'comment') {
      yield* this.importComment(entity, event, keys);
      return;
    }
    if (event.kind === 'unsupported') {
      yield importNothing(`ignoring ${event.type} event`);
      return;
    }

    if (entity.resolveOperationByMetadata(keys.id, event.id)) {
      yield importNothing(`operation already imported: ${event.kind}`);
      return;
    }

    if (event.kind !== 'description-change') {
      const pushed = findExportEcho(entity, event, keys, echoes);
      if (pushed) {
        yield importNothing(`operation already exported: ${event.kind}`, pushed);
        return;
      }
    }

    const metadata = { [keys.id]: event.id };
    const time = toUnixTime(event.createdAt);

    switch (event.kind) {
      case 'status-change': {
        const actor = yield* this.ensurePerson(event.actor, keys);
        const { hash } = entity.setStatus(actor, time, event.status, metadata);
        yield { kind: 'status-change', id: hash };
        return;
      }

      case 'label-add':
      case 'label-remove': {
        const actor = yield* this.ensurePerson(event.actor, keys);
        const added = event.kind === 'label-add' ? [event.label] : [];
        const removed = event.kind === 'label-remove' ? [event.label] : [];
        const { hash } = entity.changeLabels(actor, time, added, removed, metadata);
        yield { kind: 'label-change', id: hash };
        return;
      }

      case 'title-change': {
        const actor = yield* this.ensurePerson(event.actor, keys);
        const { hash } = entity.setTitle(actor, time, event.title, metadata);
        yield { kind: 'title-edition', id: hash };
        return;
      }

      case 'description-change': {
        // Trackers without edit history only give the current text
        const description = entity.snapshot().comments[0];
        if (description.message === event.body) {
          yield importNothing('description unchanged');
          return;
        }
        const actor = yield* this.ensurePerson(event.actor, keys);
        const { hash } = entity.editComment(actor, time, entity.id, event.body, metadata);
        yield { kind: 'comment-edition', id: hash };
        return;
      }

      default: {
        const unreachable: never = event;
        throw new InvalidInputError(`unknown remote event ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async *importComment(entity: CachedEntity, event: RemoteCommentEvent, keys: MetadataKeys): ResultStream {
    let target = entity.resolveOperationByMetadata(keys.id, event.id);
    const metadata = { [keys.id]: event.id, [keys.url]: event.url };

    if (event.edits.length === 0) {
      if (!target) {
        const author = yield* this.ensurePerson(event.actor, keys);
        const { hash } = entity.addComment(author, toUnixTime(event.createdAt), event.body, metadata);
        yield { kind: 'comment', id: hash };
        return;
      }

      // No history from the tracker: compare texts to detect an edit
      const comment = searchComment(entity.snapshot(), target);
      if (!comment || comment.message === event.body) {
        yield importNothing('comment already imported', target);
        return;
      }
      const author = yield* this.ensurePerson(event.actor, keys);
      const { hash } = entity.editComment(author, toUnixTime(event.updatedAt), target, event.body);
      yield { kind: 'comment-edition', id: hash };
      return;
    }

    for (const [index, edit] of event.edits.entries()) {
      if (index === 0 && target) {
        yield importNothing('comment already imported', target);
        continue;
      }

      if (!target) {
        const editor = yield* this.ensurePerson(edit.editor ?? event.actor, keys);
        const { hash } = entity.addComment(editor, toUnixTime(edit.createdAt), edit.body ?? event.body, metadata);
        target = hash;
        yield { kind: 'comment', id: hash };
        continue;
      }

      yield* this.importEdit(entity, target, edit, keys);
    }
  }

  private async *importEdit(entity: CachedEntity, target: string, edit: RemoteEdit, keys: MetadataKeys): ResultStream {
    if (entity.resolveOperationByMetadata(keys.id, edit.id)) {
      yield importNothing('edition already imported');
      return;
    }

    if (edit.body === null) {
      yield importNothing('comment deletion is not supported');
      return;
    }

    const editor = yield* this.ensurePerson(edit.editor, keys);
    const { hash } = entity.editComment(editor, toUnixTime(edit.createdAt), target, edit.body, {
      [keys.id]: edit.id,
    });
    yield { kind: 'comment-edition', id: hash };
  }

  /**
   * Resolve or create the local identity of a remote actor. Deleted users
   * are reported as null and map to the tracker's ghost account.
   */
  private async *ensurePerson(actor: RemoteActor | null, keys: MetadataKeys): ResultStream<Identity> {
    const profile: RemoteActor = actor ?? { login: GHOST_LOGIN };
    const { identity, created } = await this.cache.identities.ensureIdentity(keys.login, {
      name: profile.name,
      email: profile.email,
      login: profile.login,
      avatarUrl: profile.avatarUrl,
    });

    if (created) {
      yield { kind: 'identity', id: identity.id };
    }
    return identity;
  }
}
